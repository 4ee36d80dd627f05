/**
 * Specialization engine.
 *
 * Walks the library from its roots (exported functions, statics, constants,
 * public non-generic types and configured includes), creating one monomorph
 * per distinct generic instantiation and rewriting every reference to point
 * at it. Everything the walk does not reach is dropped, including the generic
 * entities themselves.
 *
 * @packageDocumentation
 */

import type { Library } from '../ir/library.js';
import { formatTypeRef, mapEntityTypeRefs } from '../ir/type-ref.js';
import type { Entity, GenericArg, TypeRef } from '../ir/types.js';
import { isTypeEntity } from '../ir/types.js';
import {
  MangledNameCollisionError,
  UnboundedSpecializationError,
  UnresolvedTypeError,
} from '../pipeline/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { mangleName, normalizeGenericArgs } from './mangle.js';
import { substituteEntity } from './substitute.js';

/**
 * Options for {@link specialize}.
 */
export interface SpecializeOptions {
  /** Deepest allowed chain of instantiations requesting instantiations. */
  readonly maxDepth: number;
  /** Extra root names. */
  readonly include?: readonly string[];
  readonly logger?: Logger;
}

/** Default for {@link SpecializeOptions.maxDepth}. */
export const DEFAULT_MAX_DEPTH = 32;

interface WorkItem {
  readonly name: string;
  readonly depth: number;
}

function isRoot(entity: Entity): boolean {
  switch (entity.kind) {
    case 'function':
    case 'static':
    case 'constant':
      return true;
    default:
      return entity.public && entity.generics.length === 0;
  }
}

class SpecializationWalk {
  private readonly queue: WorkItem[] = [];
  private readonly reached = new Set<string>();

  constructor(
    private readonly library: Library,
    private readonly maxDepth: number,
    private readonly logger: Logger
  ) {}

  enqueue(name: string, depth: number): void {
    if (this.reached.has(name)) {
      return;
    }
    this.reached.add(name);
    this.queue.push({ name, depth });
  }

  run(): ReadonlySet<string> {
    for (let item = this.queue.shift(); item !== undefined; item = this.queue.shift()) {
      const entity = this.library.get(item.name);
      if (entity === undefined) {
        continue;
      }
      const depth = item.depth;
      this.library.replace(mapEntityTypeRefs(entity, (ref) => this.rewrite(ref, depth, entity.name)));
    }
    return this.reached;
  }

  private rewrite(ref: TypeRef, depth: number, owner: string): TypeRef {
    switch (ref.kind) {
      case 'primitive':
        return ref;
      case 'pointer':
        return { ...ref, target: this.rewrite(ref.target, depth, owner) };
      case 'array':
        return { ...ref, element: this.rewrite(ref.element, depth, owner) };
      case 'fnptr':
        return {
          ...ref,
          params: ref.params.map((p) => ({ ...p, type: this.rewrite(p.type, depth, owner) })),
          returns: this.rewrite(ref.returns, depth, owner),
        };
      case 'path':
        return this.rewritePath(ref, depth, owner);
    }
  }

  private rewritePath(ref: Extract<TypeRef, { kind: 'path' }>, depth: number, owner: string): TypeRef {
    const target = this.library.get(ref.name);

    if (target === undefined) {
      // Unknown names are left for the emission check; their arguments may still need monomorphs.
      return ref.args.length === 0 ? ref : { ...ref, args: ref.args.map((a) => this.rewriteArg(a, depth, owner)) };
    }

    if (ref.args.length === 0) {
      if (target.generics.length > 0) {
        throw new UnresolvedTypeError(
          `Generic type '${ref.name}' is used without arguments (expects ${String(target.generics.length)})`,
          'specialization',
          owner
        );
      }
      this.enqueue(ref.name, depth);
      return ref;
    }

    if (target.generics.length !== ref.args.length) {
      throw new UnresolvedTypeError(
        `'${formatTypeRef(ref)}' passes ${String(ref.args.length)} argument(s) to '${ref.name}', which expects ${String(target.generics.length)}`,
        'specialization',
        owner
      );
    }

    return { kind: 'path', name: this.instantiate(target, ref, depth + 1), args: [] };
  }

  private rewriteArg(arg: GenericArg, depth: number, owner: string): GenericArg {
    return arg.kind === 'const' ? arg : { kind: 'type', type: this.rewrite(arg.type, depth, owner) };
  }

  private instantiate(generic: Entity, ref: Extract<TypeRef, { kind: 'path' }>, depth: number): string {
    const args = normalizeGenericArgs(ref.args);
    const key = formatTypeRef({ kind: 'path', name: ref.name, args });
    const cached = this.library.lookupInstantiation(key);
    if (cached !== undefined) {
      return cached;
    }

    const mangled = mangleName(generic.name, args);
    const clash = this.library.get(mangled);
    if (clash !== undefined) {
      const other = clash.instantiation === undefined ? 'a declared entity' : `the instantiation of '${clash.instantiation.generic}'`;
      throw new MangledNameCollisionError(
        `Mangled name '${mangled}' for '${key}' collides with ${other}`,
        'specialization',
        mangled
      );
    }

    if (depth > this.maxDepth) {
      throw new UnboundedSpecializationError(
        `Instantiating '${key}' exceeds the maximum specialization depth of ${String(this.maxDepth)}`,
        'specialization',
        generic.name
      );
    }

    const bindings = new Map<string, GenericArg>();
    generic.generics.forEach((param, index) => {
      const arg = args[index];
      if (arg !== undefined) {
        bindings.set(param.name, arg);
      }
    });

    const body = substituteEntity(generic, bindings);
    this.library.add({
      ...body,
      name: mangled,
      exportName: mangled,
      generics: [],
      instantiation: { generic: generic.name, args },
    });
    this.library.recordInstantiation(key, mangled);
    this.logger.debug('instantiation_created', { generic: generic.name, key, mangled, depth });
    this.enqueue(mangled, depth);
    return mangled;
  }
}

/**
 * Monomorphizes every reachable generic instantiation and drops unreachable entities.
 *
 * @param library - The library to specialize in place.
 * @param options - Depth limit, extra roots and logger.
 * @returns The same library.
 * @throws UnresolvedTypeError for generics used without, or with the wrong number of, arguments.
 * @throws MangledNameCollisionError when a mangled name is already taken.
 * @throws UnboundedSpecializationError when instantiations nest deeper than `maxDepth`.
 */
export function specialize(library: Library, options: SpecializeOptions): Library {
  const logger = options.logger ?? silentLogger;
  const walk = new SpecializationWalk(library, options.maxDepth, logger);

  for (const entity of library.entities()) {
    if (isRoot(entity)) {
      walk.enqueue(entity.name, 0);
    }
  }

  for (const name of options.include ?? []) {
    const entity = library.get(name);
    if (entity === undefined) {
      library.warn({
        stage: 'specialization',
        code: 'include_not_found',
        message: `Included name '${name}' does not exist`,
        entity: name,
      });
    } else if (entity.generics.length > 0) {
      library.warn({
        stage: 'specialization',
        code: 'include_generic',
        message: `Included name '${name}' is generic; name an instantiation through a type alias instead`,
        entity: name,
      });
    } else {
      walk.enqueue(name, 0);
    }
  }

  const reached = walk.run();

  let dropped = 0;
  for (const entity of library.entities()) {
    if (!reached.has(entity.name)) {
      library.remove(entity.name);
      dropped++;
      logger.debug('entity_unreachable', {
        entity: entity.name,
        generic: entity.generics.length > 0,
        type: isTypeEntity(entity),
      });
    }
  }

  logger.debug('specialization_complete', {
    instantiations: library.instantiationCount,
    dropped,
    remaining: library.size,
  });
  return library;
}
