/**
 * Generic specialization and export naming.
 *
 * @packageDocumentation
 */

export { DEFAULT_MAX_DEPTH, specialize } from './engine.js';
export type { SpecializeOptions } from './engine.js';
export { assignExportNames } from './export-names.js';
export type { ExportNameOptions } from './export-names.js';
export { mangleName, mangleType, normalizeConst, normalizeGenericArgs } from './mangle.js';
export { substituteConst, substituteEntity, substituteType } from './substitute.js';
export type { Bindings } from './substitute.js';
