/**
 * Emission contract: turns the declaration plan into the event stream and
 * checks it before any writer sees it.
 *
 * Guarantees of a returned stream:
 * - every type reference names a declared type, a primitive or an external type;
 * - every by-value dependency of a definition is defined earlier;
 * - export names are pairwise distinct, including the tag and body names a
 *   tagged enum declares.
 *
 * @packageDocumentation
 */

import { byValueTargets } from '../graph/dependencies.js';
import type { PlanStep } from '../graph/order.js';
import type { Library } from '../ir/library.js';
import { entityTypeRefs, formatTypeRef } from '../ir/type-ref.js';
import type { Entity, TypeRef } from '../ir/types.js';
import { isTaggedEnum, isTypeEntity, taggedEnumHelperNames } from '../ir/types.js';
import {
  DuplicateDeclarationError,
  MangledNameCollisionError,
  UnresolvedTypeError,
} from '../pipeline/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { EmissionEvent, EmissionStream } from './events.js';

function unresolved(owner: string, message: string): UnresolvedTypeError {
  return new UnresolvedTypeError(message, 'emission', owner);
}

class StreamBuilder {
  private readonly events: EmissionEvent[] = [];
  private readonly declared = new Set<string>();
  private readonly defined = new Set<string>();
  private readonly exportNames = new Map<string, Entity>();

  constructor(private readonly library: Library) {}

  private lookup(name: string): Entity {
    const entity = this.library.get(name);
    if (entity === undefined) {
      throw unresolved(name, `Planned entity '${name}' is not in the library`);
    }
    return entity;
  }

  private checkResolved(owner: string, ref: TypeRef): void {
    switch (ref.kind) {
      case 'primitive':
        return;
      case 'path': {
        if (ref.args.length > 0) {
          throw unresolved(owner, `'${formatTypeRef(ref)}' names a generic type '${ref.name}' that is not declared`);
        }
        if (this.library.externalTypes.has(ref.name)) {
          return;
        }
        const target = this.library.get(ref.name);
        if (target === undefined) {
          throw unresolved(owner, `Type '${ref.name}' is not declared`);
        }
        if (!isTypeEntity(target)) {
          throw unresolved(owner, `'${ref.name}' is a ${target.kind}, not a type`);
        }
        return;
      }
      case 'pointer':
        this.checkResolved(owner, ref.target);
        return;
      case 'array':
        this.checkResolved(owner, ref.element);
        return;
      case 'fnptr':
        for (const param of ref.params) {
          this.checkResolved(owner, param.type);
        }
        this.checkResolved(owner, ref.returns);
        return;
    }
  }

  private claimExportName(entity: Entity, exportName: string = entity.exportName): void {
    const holder = this.exportNames.get(exportName);
    if (holder === undefined) {
      this.exportNames.set(exportName, entity);
      return;
    }
    if (holder.name === entity.name) {
      return;
    }
    const message = `Export name '${exportName}' is used by both '${holder.name}' and '${entity.name}'`;
    if (holder.instantiation !== undefined || entity.instantiation !== undefined) {
      throw new MangledNameCollisionError(message, 'emission', entity.name);
    }
    throw new DuplicateDeclarationError(message, 'emission', entity.name);
  }

  add(step: PlanStep): void {
    const entity = this.lookup(step.name);
    for (const ref of entityTypeRefs(entity)) {
      this.checkResolved(entity.name, ref);
    }
    this.claimExportName(entity);

    switch (step.action) {
      case 'forward-declare':
        if (!isTypeEntity(entity)) {
          throw unresolved(entity.name, `Only types can be forward-declared, '${entity.name}' is a ${entity.kind}`);
        }
        this.events.push({ kind: 'forward-declare', entity });
        this.declared.add(entity.name);
        return;
      case 'define': {
        if (!isTypeEntity(entity) || entity.kind === 'opaque') {
          throw unresolved(entity.name, `'${entity.name}' cannot be defined`);
        }
        for (const ref of entityTypeRefs(entity)) {
          for (const target of byValueTargets(ref)) {
            const ready =
              this.library.externalTypes.has(target) ||
              this.defined.has(target) ||
              (entity.kind === 'typedef' && this.declared.has(target));
            if (!ready) {
              throw unresolved(entity.name, `'${target}' is used by value before its definition`);
            }
          }
        }
        if (entity.kind === 'enum' && isTaggedEnum(entity)) {
          const helpers = taggedEnumHelperNames(entity);
          for (const name of [helpers.tag, ...helpers.bodies.values()]) {
            this.claimExportName(entity, name);
          }
        }
        this.events.push({ kind: 'define-type', entity });
        this.declared.add(entity.name);
        this.defined.add(entity.name);
        return;
      }
      case 'constant':
        if (entity.kind !== 'constant') {
          throw unresolved(entity.name, `'${entity.name}' is not a constant`);
        }
        this.events.push({ kind: 'declare-constant', entity });
        return;
      case 'function':
        if (entity.kind !== 'function') {
          throw unresolved(entity.name, `'${entity.name}' is not a function`);
        }
        this.events.push({ kind: 'declare-function', entity });
        return;
      case 'static':
        if (entity.kind !== 'static') {
          throw unresolved(entity.name, `'${entity.name}' is not a static`);
        }
        this.events.push({ kind: 'declare-static', entity });
        return;
    }
  }

  finish(): EmissionStream {
    const exportNames = new Map<string, string>();
    for (const entity of this.library.entities()) {
      exportNames.set(entity.name, entity.exportName);
    }
    return { events: this.events, exportNames, externalTypes: this.library.externalTypes };
  }
}

/**
 * Produces the checked emission stream for a declaration plan.
 *
 * @param library - The ordered library; its emission list is set to the result.
 * @param plan - Steps from the ordering stage.
 * @param logger - Logger for the stream summary.
 * @returns The event stream with the export-name table.
 * @throws UnresolvedTypeError, DuplicateDeclarationError or MangledNameCollisionError when a guarantee fails.
 */
export function emitDeclarations(
  library: Library,
  plan: readonly PlanStep[],
  logger: Logger = silentLogger
): EmissionStream {
  const builder = new StreamBuilder(library);
  for (const step of plan) {
    builder.add(step);
  }
  const stream = builder.finish();
  library.setEmission(stream.events);
  logger.debug('emission_checked', { events: stream.events.length });
  return stream;
}
