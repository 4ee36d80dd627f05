/**
 * ffi-headergen
 *
 * Generates C headers from the exported surface of a library described by
 * crate dumps.
 *
 * @example
 * ```typescript
 * import { loadConfig, loadCrates, runPipeline, writeHeader } from 'ffi-headergen';
 *
 * const [crates, config] = await Promise.all([
 *   loadCrates(['mylib.json']),
 *   loadConfig('headergen.toml'),
 * ]);
 * const { stream } = runPipeline(crates, config);
 * process.stdout.write(writeHeader(stream, config));
 * ```
 *
 * @packageDocumentation
 */

// Front-end
export {
  CrateLoadError,
  formatTypeExpr,
  loadCrateDump,
  loadCrates,
  parseCrateDump,
  parseTypeExpr,
  TypeExprParseError,
} from './syntax/index.js';
export type { CrateDump, DeclarationNode, TypeExpr } from './syntax/index.js';

// Configuration
export {
  ConfigParseError,
  ConfigValidationError,
  DEFAULT_CONFIG,
  EnvCoercionError,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  validateConfig,
} from './config/index.js';
export type { Config, EnvRecord } from './config/index.js';

// Pipeline stages
export * from './ir/index.js';
export * from './cfg/index.js';
export * from './specialize/index.js';
export * from './graph/index.js';
export * from './emit/index.js';
export * from './pipeline/index.js';

// Output
export { formatDeclaration, writeHeader } from './writer/index.js';
export type { HeaderOptions } from './writer/index.js';

// Logging
export { Logger, silentLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions, LogSink } from './utils/logger.js';
