/**
 * Generic parameter substitution.
 *
 * @packageDocumentation
 */

import { mapEntityTypeRefs } from '../ir/type-ref.js';
import type { Entity, GenericArg, TypeRef } from '../ir/types.js';

/**
 * Generic parameter name to concrete argument.
 */
export type Bindings = ReadonlyMap<string, GenericArg>;

/**
 * Replaces const parameters inside an array length or const argument expression.
 */
export function substituteConst(text: string, bindings: Bindings): string {
  return text.replace(/[A-Za-z_][A-Za-z0-9_]*/g, (word) => {
    const bound = bindings.get(word);
    return bound?.kind === 'const' ? bound.value : word;
  });
}

function substituteArg(arg: GenericArg, bindings: Bindings): GenericArg {
  if (arg.kind === 'const') {
    return { kind: 'const', value: substituteConst(arg.value, bindings) };
  }
  // `Buffer<N>` parses `N` as a type; a const binding turns it into a value.
  if (arg.type.kind === 'path' && arg.type.args.length === 0) {
    const bound = bindings.get(arg.type.name);
    if (bound?.kind === 'const') {
      return bound;
    }
  }
  return { kind: 'type', type: substituteType(arg.type, bindings) };
}

/**
 * Replaces every occurrence of the bound generic parameters in a type.
 */
export function substituteType(ref: TypeRef, bindings: Bindings): TypeRef {
  switch (ref.kind) {
    case 'primitive':
      return ref;
    case 'path': {
      if (ref.args.length === 0) {
        const bound = bindings.get(ref.name);
        return bound?.kind === 'type' ? bound.type : ref;
      }
      return { ...ref, args: ref.args.map((a) => substituteArg(a, bindings)) };
    }
    case 'pointer':
      return { ...ref, target: substituteType(ref.target, bindings) };
    case 'array':
      return {
        ...ref,
        element: substituteType(ref.element, bindings),
        length: substituteConst(ref.length, bindings),
      };
    case 'fnptr':
      return {
        ...ref,
        params: ref.params.map((p) => ({ ...p, type: substituteType(p.type, bindings) })),
        returns: substituteType(ref.returns, bindings),
      };
  }
}

/**
 * Substitutes the bindings throughout an entity's fields, variants or signature.
 */
export function substituteEntity(entity: Entity, bindings: Bindings): Entity {
  return mapEntityTypeRefs(entity, (ref) => substituteType(ref, bindings));
}
