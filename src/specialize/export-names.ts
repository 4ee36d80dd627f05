/**
 * Export-name assignment.
 *
 * Runs after specialization. Types and constants take their configured
 * rename, then the configured prefix. Functions and statics keep their link
 * names. Fields, variants and arguments go through rename rules and C keyword
 * escaping.
 *
 * @packageDocumentation
 */

import { parsePtrsAsArrays } from '../ir/attributes.js';
import type { Library } from '../ir/library.js';
import { applyRenameRule, escapeReserved, parseRenameRule } from '../ir/rename.js';
import type { RenameRule } from '../ir/rename.js';
import type { Entity, Field, Param, Variant } from '../ir/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

/**
 * Naming options, taken from `[export]`, `[struct]`, `[enum]` and `[fn]`.
 */
export interface ExportNameOptions {
  /** Canonical (or mangled) name to export name. */
  readonly rename: ReadonlyMap<string, string>;
  readonly prefix: string;
  readonly renameFields: RenameRule;
  readonly renameVariants: RenameRule;
  readonly renameArgs: RenameRule;
  readonly prefixWithName: boolean;
  readonly logger?: Logger;
}

function annotationRule(entity: Entity, library: Library): RenameRule | undefined {
  const value = entity.attributes.annotations.get('rename-all');
  if (typeof value !== 'string') {
    return undefined;
  }
  const rule = parseRenameRule(value);
  if (rule === undefined) {
    library.warn({
      stage: 'specialization',
      code: 'rename_rule_unknown',
      message: `Unknown rename-all rule '${value}' on '${entity.name}'`,
      entity: entity.name,
    });
  }
  return rule;
}

function renameFields(fields: readonly Field[], rule: RenameRule): Field[] {
  return fields.map((f) => ({ ...f, exportName: escapeReserved(applyRenameRule(rule, f.name, 'field')) }));
}

/**
 * Assigns export names throughout the library.
 *
 * @param library - The specialized library, updated in place.
 * @param options - Rename table, prefix and rules.
 * @returns The same library.
 */
export function assignExportNames(library: Library, options: ExportNameOptions): Library {
  const logger = options.logger ?? silentLogger;

  for (const entity of library.entities()) {
    const typeName = (): string => `${options.prefix}${options.rename.get(entity.name) ?? entity.name}`;
    const rule = annotationRule(entity, library);

    switch (entity.kind) {
      case 'struct':
        library.replace({
          ...entity,
          exportName: typeName(),
          fields: renameFields(entity.fields, rule ?? options.renameFields),
        });
        break;
      case 'union':
        library.replace({
          ...entity,
          exportName: typeName(),
          fields: renameFields(entity.fields, rule ?? options.renameFields),
        });
        break;
      case 'enum': {
        const exportName = typeName();
        const variantRule = rule ?? options.renameVariants;
        const prefixWithName =
          entity.attributes.annotations.get('prefix-with-name') === true || options.prefixWithName;
        const variants: Variant[] = entity.variants.map((v) => {
          const renamed = applyRenameRule(variantRule, v.name, 'variant', exportName);
          return {
            ...v,
            exportName: escapeReserved(prefixWithName ? `${exportName}_${renamed}` : renamed),
            fields: renameFields(v.fields, options.renameFields),
          };
        });
        library.replace({ ...entity, exportName, variants });
        break;
      }
      case 'opaque':
      case 'typedef':
      case 'constant':
        library.replace({ ...entity, exportName: typeName() });
        break;
      case 'function': {
        const argRule = rule ?? options.renameArgs;
        const ptrsValue = entity.attributes.annotations.get('ptrs-as-arrays');
        const arrays = typeof ptrsValue === 'string' ? parsePtrsAsArrays(ptrsValue) : new Map<string, string>();
        const params: Param[] = entity.params.map((p) => {
          if (p.name === undefined) {
            return p;
          }
          const exportName = escapeReserved(applyRenameRule(argRule, p.name, 'arg'));
          const arrayLength = p.type.kind === 'pointer' ? arrays.get(exportName) : undefined;
          return arrayLength === undefined ? { ...p, exportName } : { ...p, exportName, arrayLength };
        });
        library.replace({ ...entity, params });
        break;
      }
      case 'static':
        break;
    }
  }

  logger.debug('export_names_assigned', { entities: library.size });
  return library;
}
