/**
 * Dependency edges between entities.
 *
 * A by-value edge means the target's complete definition must come first; a
 * by-pointer edge only needs the target to be declared.
 *
 * @packageDocumentation
 */

import { entityTypeRefs } from '../ir/type-ref.js';
import type { Entity, TypeRef } from '../ir/types.js';

/**
 * Kind of a dependency edge.
 */
export type EdgeKind = 'by-value' | 'by-pointer';

/**
 * One dependency of `from` on `to`.
 */
export interface DependencyEdge {
  readonly from: string;
  readonly to: string;
  readonly kind: EdgeKind;
}

function collect(ref: TypeRef, from: string, kind: EdgeKind, out: DependencyEdge[]): void {
  switch (ref.kind) {
    case 'primitive':
      return;
    case 'path':
      out.push({ from, to: ref.name, kind });
      for (const arg of ref.args) {
        if (arg.kind === 'type') {
          collect(arg.type, from, kind, out);
        }
      }
      return;
    case 'pointer':
      collect(ref.target, from, 'by-pointer', out);
      return;
    case 'array':
      collect(ref.element, from, kind, out);
      return;
    case 'fnptr':
      for (const param of ref.params) {
        collect(param.type, from, 'by-pointer', out);
      }
      collect(ref.returns, from, 'by-pointer', out);
      return;
  }
}

/**
 * Lists one edge per path occurrence in an entity, in declaration order.
 *
 * @param entity - The dependent entity.
 * @returns Its edges, duplicates included.
 */
export function entityEdges(entity: Entity): DependencyEdge[] {
  const edges: DependencyEdge[] = [];
  for (const ref of entityTypeRefs(entity)) {
    collect(ref, entity.name, 'by-value', edges);
  }
  return edges;
}

/**
 * Lists the path names a type reference holds by value.
 */
export function byValueTargets(ref: TypeRef): string[] {
  const edges: DependencyEdge[] = [];
  collect(ref, '', 'by-value', edges);
  return edges.filter((e) => e.kind === 'by-value').map((e) => e.to);
}
