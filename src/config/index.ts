/**
 * Configuration module for headergen.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, mergeConfigRecord, parseConfig } from './parser.js';
export type {
  ArgLayout,
  CfgConfig,
  Config,
  DeclarationStyle,
  DocumentationStyle,
  EnumConfig,
  ExportConfig,
  FnConfig,
  Language,
  PtrConfig,
  SpecializationConfig,
  StructConfig,
} from './types.js';
export {
  DEFAULT_CFG,
  DEFAULT_CONFIG,
  DEFAULT_ENUM,
  DEFAULT_EXPORT,
  DEFAULT_FN,
  DEFAULT_PTR,
  DEFAULT_SPECIALIZATION,
  DEFAULT_STRUCT,
  DEFAULT_SYS_INCLUDES,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  coerceToBoolean,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig } from './loader.js';
