/**
 * Conditional-compilation resolver.
 *
 * Removes entities, fields and variants whose predicates are false, applies
 * the configured export exclusions and opaque overrides, and keeps opaque
 * stubs for removed types that survivors still point at.
 *
 * @packageDocumentation
 */

import type { Library } from '../ir/library.js';
import { entityTypeRefs } from '../ir/type-ref.js';
import type { Entity, Field, OpaqueEntity, TypeRef, Variant } from '../ir/types.js';
import { isTypeEntity } from '../ir/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { evaluateCfg } from './predicate.js';
import type { Cfg, CfgEnvironment } from './predicate.js';

/**
 * Options for {@link resolveConditionals}.
 */
export interface ResolveOptions {
  readonly env: CfgEnvironment;
  /** Canonical names removed as if disabled. */
  readonly exclude?: readonly string[];
  /** Canonical names kept only as opaque, forward-declared types. */
  readonly opaque?: readonly string[];
  readonly logger?: Logger;
}

/**
 * Collects the names referenced behind a pointer or inside a function pointer.
 */
function pointerTargets(ref: TypeRef, behindPointer: boolean, out: Set<string>): void {
  switch (ref.kind) {
    case 'primitive':
      return;
    case 'path':
      if (behindPointer) {
        out.add(ref.name);
      }
      for (const arg of ref.args) {
        if (arg.kind === 'type') {
          pointerTargets(arg.type, behindPointer, out);
        }
      }
      return;
    case 'pointer':
      pointerTargets(ref.target, true, out);
      return;
    case 'array':
      pointerTargets(ref.element, behindPointer, out);
      return;
    case 'fnptr':
      for (const param of ref.params) {
        pointerTargets(param.type, true, out);
      }
      pointerTargets(ref.returns, true, out);
      return;
  }
}

function toOpaque(entity: Entity): OpaqueEntity {
  return {
    kind: 'opaque',
    name: entity.name,
    exportName: entity.exportName,
    generics: entity.generics,
    docs: entity.docs,
    crate: entity.crate,
    declIndex: entity.declIndex,
    public: entity.public,
    attributes: entity.attributes,
  };
}

/**
 * Resolves conditional compilation against an environment.
 *
 * @param library - The library to prune in place.
 * @param options - Environment, exclusions and opaque overrides.
 * @returns The same library.
 */
export function resolveConditionals(library: Library, options: ResolveOptions): Library {
  const logger = options.logger ?? silentLogger;
  const reportedLeaves = new Set<string>();
  let currentEntity = '';

  const holds = (cfg: Cfg | undefined): boolean => {
    if (cfg === undefined) {
      return true;
    }
    return evaluateCfg(cfg, options.env, (leaf) => {
      if (reportedLeaves.has(leaf)) {
        return;
      }
      reportedLeaves.add(leaf);
      library.warn({
        stage: 'cfg-resolver',
        code: 'unknown_cfg_leaf',
        message: `Unknown predicate '${leaf}' evaluates to false`,
        entity: currentEntity,
      });
    });
  };

  const excluded = new Set(options.exclude ?? []);
  const removed: Entity[] = [];

  for (const entity of library.entities()) {
    currentEntity = entity.name;
    if (excluded.has(entity.name)) {
      logger.debug('entity_excluded', { entity: entity.name });
      removed.push(entity);
      library.remove(entity.name);
      continue;
    }
    if (!holds(entity.cfg)) {
      logger.debug('entity_disabled', { entity: entity.name });
      removed.push(entity);
      library.remove(entity.name);
      continue;
    }

    const keepField = (field: Field): boolean => holds(field.cfg);
    const keepVariant = (variant: Variant): boolean => holds(variant.cfg);

    switch (entity.kind) {
      case 'struct':
        library.replace({ ...entity, fields: entity.fields.filter(keepField) });
        break;
      case 'union':
        library.replace({ ...entity, fields: entity.fields.filter(keepField) });
        break;
      case 'enum':
        library.replace({
          ...entity,
          variants: entity.variants
            .filter(keepVariant)
            .map((v) => ({ ...v, fields: v.fields.filter(keepField) })),
        });
        break;
      default:
        break;
    }
  }

  // Removal does not propagate through pointers: a pointed-at type survives as a stub.
  const referenced = new Set<string>();
  for (const survivor of library.entities()) {
    for (const ref of entityTypeRefs(survivor)) {
      pointerTargets(ref, false, referenced);
    }
  }
  for (const entity of removed) {
    if (isTypeEntity(entity) && referenced.has(entity.name) && !library.has(entity.name)) {
      library.add(toOpaque(entity));
      library.warn({
        stage: 'cfg-resolver',
        code: 'removed_type_stubbed',
        message: `'${entity.name}' is disabled but referenced through a pointer; keeping an opaque declaration`,
        entity: entity.name,
      });
    }
  }

  for (const name of options.opaque ?? []) {
    const entity = library.get(name);
    if (entity === undefined) {
      continue;
    }
    if (!isTypeEntity(entity)) {
      library.warn({
        stage: 'cfg-resolver',
        code: 'opaque_override_ignored',
        message: `'${name}' is a ${entity.kind}, not a type; it cannot be made opaque`,
        entity: name,
      });
      continue;
    }
    if (entity.kind !== 'opaque') {
      library.replace(toOpaque(entity));
      logger.debug('entity_made_opaque', { entity: name });
    }
  }

  logger.debug('conditionals_resolved', { removed: removed.length, remaining: library.size });
  return library;
}
