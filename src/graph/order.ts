/**
 * Dependency ordering.
 *
 * Type entities are grouped into strongly connected components over all
 * edges. Components come out dependencies first, ties going to the component
 * holding the earliest declared member; members of one component are ordered
 * over by-value edges only. Pointer targets that are not yet declared get a
 * forward declaration right before the entity that needs them.
 *
 * @packageDocumentation
 */

import type { Library } from '../ir/library.js';
import type { Entity, TypeEntity } from '../ir/types.js';
import { isTypeEntity } from '../ir/types.js';
import { UnrepresentableCycleError, UnresolvedTypeError } from '../pipeline/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { entityEdges } from './dependencies.js';
import type { DependencyEdge } from './dependencies.js';

/**
 * One step of the declaration plan.
 */
export interface PlanStep {
  readonly action: 'forward-declare' | 'define' | 'constant' | 'function' | 'static';
  /** Canonical entity name. */
  readonly name: string;
}

/** Kinds that can be declared before they are defined. */
const FORWARD_DECLARABLE: ReadonlySet<Entity['kind']> = new Set(['struct', 'union', 'enum', 'opaque']);

interface TypeGraph {
  readonly types: readonly TypeEntity[];
  readonly position: ReadonlyMap<string, number>;
  readonly edges: ReadonlyMap<string, readonly DependencyEdge[]>;
}

function buildTypeGraph(library: Library): TypeGraph {
  const types = library.entities().filter(isTypeEntity);
  const position = new Map(types.map((t, i) => [t.name, i]));
  const edges = new Map<string, DependencyEdge[]>();
  for (const entity of types) {
    edges.set(
      entity.name,
      entityEdges(entity).filter((e) => position.has(e.to))
    );
  }
  return { types, position, edges };
}

/**
 * Tarjan's algorithm; visits nodes and neighbours in declaration order.
 */
function stronglyConnectedComponents(graph: TypeGraph): string[][] {
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const components: string[][] = [];
  let counter = 0;

  const visit = (name: string): void => {
    index.set(name, counter);
    lowLink.set(name, counter);
    counter++;
    stack.push(name);
    onStack.add(name);

    for (const edge of graph.edges.get(name) ?? []) {
      if (!index.has(edge.to)) {
        visit(edge.to);
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, lowLink.get(edge.to) ?? 0));
      } else if (onStack.has(edge.to)) {
        lowLink.set(name, Math.min(lowLink.get(name) ?? 0, index.get(edge.to) ?? 0));
      }
    }

    if (lowLink.get(name) === index.get(name)) {
      const component: string[] = [];
      for (let member = stack.pop(); member !== undefined; member = stack.pop()) {
        onStack.delete(member);
        component.push(member);
        if (member === name) {
          break;
        }
      }
      components.push(component);
    }
  };

  for (const entity of graph.types) {
    if (!index.has(entity.name)) {
      visit(entity.name);
    }
  }
  return components;
}

/**
 * Orders one component's members so each comes after the members it needs.
 *
 * @returns The order, or undefined when the constraints are cyclic.
 */
function orderMembers(
  members: readonly string[],
  mustFollow: (member: string) => readonly string[],
  position: ReadonlyMap<string, number>
): string[] | undefined {
  const memberSet = new Set(members);
  const remaining = [...members].sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
  const placed = new Set<string>();
  const order: string[] = [];

  while (remaining.length > 0) {
    const nextIndex = remaining.findIndex((m) =>
      mustFollow(m).every((dep) => !memberSet.has(dep) || placed.has(dep))
    );
    const next = remaining[nextIndex];
    if (next === undefined) {
      return undefined;
    }
    remaining.splice(nextIndex, 1);
    placed.add(next);
    order.push(next);
  }
  return order;
}

class Planner {
  private readonly incomplete = new Map<string, boolean>();

  constructor(
    private readonly library: Library,
    private readonly graph: TypeGraph
  ) {}

  private entity(name: string): TypeEntity | undefined {
    const entity = this.library.get(name);
    return entity !== undefined && isTypeEntity(entity) ? entity : undefined;
  }

  /** Whether the name denotes a type with no complete definition. */
  isIncomplete(name: string, visiting: Set<string> = new Set()): boolean {
    const cached = this.incomplete.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const entity = this.entity(name);
    if (entity === undefined || visiting.has(name)) {
      return false;
    }
    visiting.add(name);
    const result =
      entity.kind === 'opaque' ||
      (entity.kind === 'typedef' &&
        (this.graph.edges.get(name) ?? []).some(
          (e) => e.kind === 'by-value' && this.isIncomplete(e.to, visiting)
        ));
    visiting.delete(name);
    this.incomplete.set(name, result);
    return result;
  }

  checkContainment(): void {
    for (const entity of this.graph.types) {
      if (entity.kind === 'typedef' || entity.kind === 'opaque') {
        continue;
      }
      for (const edge of this.graph.edges.get(entity.name) ?? []) {
        if (edge.kind === 'by-value' && this.isIncomplete(edge.to)) {
          throw new UnresolvedTypeError(
            `'${entity.name}' contains '${edge.to}' by value, but '${edge.to}' is opaque and cannot be embedded`,
            'ordering',
            entity.name
          );
        }
      }
    }
  }

  orderTypes(): string[] {
    const { position, edges } = this.graph;
    const components = stronglyConnectedComponents(this.graph);
    const componentOf = new Map<string, number>();
    components.forEach((members, i) => {
      for (const member of members) {
        componentOf.set(member, i);
      }
    });

    const earliest = components.map((members) => Math.min(...members.map((m) => position.get(m) ?? 0)));
    const dependsOn = components.map((members, i) => {
      const deps = new Set<number>();
      for (const member of members) {
        for (const edge of edges.get(member) ?? []) {
          const target = componentOf.get(edge.to);
          if (target !== undefined && target !== i) {
            deps.add(target);
          }
        }
      }
      return deps;
    });

    const emitted = new Set<number>();
    const order: string[] = [];
    while (emitted.size < components.length) {
      let next: number | undefined;
      for (let i = 0; i < components.length; i++) {
        if (emitted.has(i) || [...(dependsOn[i] ?? [])].some((d) => !emitted.has(d))) {
          continue;
        }
        if (next === undefined || (earliest[i] ?? 0) < (earliest[next] ?? 0)) {
          next = i;
        }
      }
      if (next === undefined) {
        // Unreachable: the condensation is acyclic.
        throw new Error('No ready component while ordering types');
      }
      emitted.add(next);
      order.push(...this.orderComponent(components[next] ?? []));
    }
    return order;
  }

  private orderComponent(members: readonly string[]): string[] {
    const { position, edges } = this.graph;
    const byValue = (member: string): string[] =>
      (edges.get(member) ?? []).filter((e) => e.kind === 'by-value').map((e) => e.to);

    // Pointers to an alias need the alias itself, so place aliases first where the cycle allows.
    const withAliases = (member: string): string[] => [
      ...byValue(member),
      ...(edges.get(member) ?? [])
        .filter((e) => e.kind === 'by-pointer' && this.entity(e.to)?.kind === 'typedef')
        .map((e) => e.to),
    ];

    const order =
      orderMembers(members, withAliases, position) ?? orderMembers(members, byValue, position);
    if (order === undefined) {
      const sorted = [...members].sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
      const first = sorted[0] ?? '';
      throw new UnrepresentableCycleError(
        `Types contain each other by value: ${sorted.join(', ')}`,
        'ordering',
        first
      );
    }
    return order;
  }

  plan(typeOrder: readonly string[]): PlanStep[] {
    const steps: PlanStep[] = [];
    const declared = new Set<string>();

    const forwardDeclare = (name: string): void => {
      const target = this.entity(name);
      if (target === undefined || declared.has(name) || !FORWARD_DECLARABLE.has(target.kind)) {
        return;
      }
      declared.add(name);
      steps.push({ action: 'forward-declare', name });
    };

    for (const name of typeOrder) {
      const entity = this.entity(name);
      if (entity === undefined) {
        continue;
      }
      if (entity.kind === 'opaque') {
        forwardDeclare(name);
        continue;
      }
      for (const edge of this.graph.edges.get(name) ?? []) {
        const needsDeclaration =
          edge.kind === 'by-pointer' || (entity.kind === 'typedef' && this.isIncomplete(edge.to));
        if (needsDeclaration) {
          forwardDeclare(edge.to);
        }
      }
      steps.push({ action: 'define', name });
      declared.add(name);
    }
    return steps;
  }
}

/**
 * Computes the declaration plan of a specialized library.
 *
 * @param library - The library, after specialization and export naming.
 * @param logger - Logger for the ordering summary.
 * @returns Type steps, then constants, then functions and statics.
 * @throws UnrepresentableCycleError when types contain each other by value.
 * @throws UnresolvedTypeError when a type embeds an opaque type by value.
 */
export function orderLibrary(library: Library, logger: Logger = silentLogger): PlanStep[] {
  const graph = buildTypeGraph(library);
  const planner = new Planner(library, graph);

  planner.checkContainment();
  const steps = planner.plan(planner.orderTypes());

  const entities = library.entities();
  for (const entity of entities) {
    if (entity.kind === 'constant') {
      steps.push({ action: 'constant', name: entity.name });
    }
  }
  for (const entity of entities) {
    if (entity.kind === 'function' || entity.kind === 'static') {
      steps.push({ action: entity.kind, name: entity.name });
    }
  }

  logger.debug('order_computed', {
    types: graph.types.length,
    forwardDeclarations: steps.filter((s) => s.action === 'forward-declare').length,
    steps: steps.length,
  });
  return steps;
}
