/**
 * Environment variable overrides for configuration.
 *
 * Provides support for HEADERGEN_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isRecord, mergeConfigRecord } from './parser.js';
import type { Config } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

interface EnvVarMapping {
  /** Config table, or undefined for a top-level key. */
  readonly section?: 'export' | 'fn' | 'struct' | 'enum' | 'specialization';
  readonly field: string;
  readonly type: 'string' | 'number' | 'boolean';
  /** Allowed values of a string setting. */
  readonly choices?: readonly string[];
  readonly description: string;
}

/**
 * Mapping from environment variable names to config paths.
 *
 * Format: HEADERGEN_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * HEADERGEN_MAX_DEPTH is a shortcut for HEADERGEN_SPECIALIZATION_MAX_DEPTH.
 */
const ENV_VAR_MAPPINGS: Record<string, EnvVarMapping> = {
  HEADERGEN_INCLUDE_GUARD: {
    field: 'include_guard',
    type: 'string',
    description: 'Override the include guard macro',
  },
  HEADERGEN_PRAGMA_ONCE: {
    field: 'pragma_once',
    type: 'boolean',
    description: 'Write #pragma once (true/false)',
  },
  HEADERGEN_CPP_COMPAT: {
    field: 'cpp_compat',
    type: 'boolean',
    description: 'Wrap declarations in extern "C" for C++ (true/false)',
  },
  HEADERGEN_NO_INCLUDES: {
    field: 'no_includes',
    type: 'boolean',
    description: 'Skip every #include (true/false)',
  },
  HEADERGEN_DOCUMENTATION: {
    field: 'documentation',
    type: 'boolean',
    description: 'Write documentation comments (true/false)',
  },
  HEADERGEN_DOCUMENTATION_STYLE: {
    field: 'documentation_style',
    type: 'string',
    choices: ['c', 'c99', 'doxy', 'auto'],
    description: 'Override the documentation comment style',
  },
  HEADERGEN_STYLE: {
    field: 'style',
    type: 'string',
    choices: ['both', 'type', 'tag'],
    description: 'Override the declaration style',
  },
  HEADERGEN_LINE_LENGTH: {
    field: 'line_length',
    type: 'number',
    description: 'Override the line length used for argument layout',
  },
  HEADERGEN_TAB_WIDTH: {
    field: 'tab_width',
    type: 'number',
    description: 'Override the indentation width',
  },
  HEADERGEN_EXPORT_PREFIX: {
    section: 'export',
    field: 'prefix',
    type: 'string',
    description: 'Override the prefix of type and constant names',
  },
  HEADERGEN_FN_ARGS: {
    section: 'fn',
    field: 'args',
    type: 'string',
    choices: ['horizontal', 'vertical', 'auto'],
    description: 'Override the function argument layout',
  },
  HEADERGEN_FN_RENAME_ARGS: {
    section: 'fn',
    field: 'rename_args',
    type: 'string',
    description: 'Override the rename rule for function arguments',
  },
  HEADERGEN_STRUCT_RENAME_FIELDS: {
    section: 'struct',
    field: 'rename_fields',
    type: 'string',
    description: 'Override the rename rule for struct and union fields',
  },
  HEADERGEN_ENUM_RENAME_VARIANTS: {
    section: 'enum',
    field: 'rename_variants',
    type: 'string',
    description: 'Override the rename rule for enum variants',
  },
  HEADERGEN_ENUM_PREFIX_WITH_NAME: {
    section: 'enum',
    field: 'prefix_with_name',
    type: 'boolean',
    description: 'Prefix enum variants with the enum name (true/false)',
  },
  HEADERGEN_MAX_DEPTH: {
    section: 'specialization',
    field: 'max_depth',
    type: 'number',
    description:
      'Override the instantiation depth limit (shortcut for HEADERGEN_SPECIALIZATION_MAX_DEPTH)',
  },
  HEADERGEN_SPECIALIZATION_MAX_DEPTH: {
    section: 'specialization',
    field: 'max_depth',
    type: 'number',
    description: 'Override the instantiation depth limit',
  },
};

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
export function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceValue(value: string, mapping: EnvVarMapping, envVar: string): string | number | boolean {
  switch (mapping.type) {
    case 'string':
      if (mapping.choices !== undefined && !mapping.choices.includes(value)) {
        throw new EnvCoercionError(
          envVar,
          value,
          mapping.choices.join(' | '),
          `Invalid value '${value}' for '${envVar}'. Expected one of: ${mapping.choices.join(', ')}`
        );
      }
      return value;
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Overrides shaped like a headergen.toml document. */
  overrides: Record<string, unknown>;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

function setOverride(
  overrides: Record<string, unknown>,
  mapping: EnvVarMapping,
  value: string | number | boolean
): void {
  if (mapping.section === undefined) {
    overrides[mapping.field] = value;
    return;
  }
  const existing = overrides[mapping.section];
  const table: Record<string, unknown> = isRecord(existing) ? existing : {};
  table[mapping.field] = value;
  overrides[mapping.section] = table;
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Scans for HEADERGEN_* environment variables and returns a document with
 * the values to override, in the same shape as headergen.toml.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Options for reading environment variables.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ HEADERGEN_STYLE: 'tag' });
 * console.log(result.overrides); // { style: 'tag' }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: Record<string, unknown> = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      setOverride(overrides, mapping, coerceValue(value, mapping, envVar));
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfigRecord(overrides, config);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = {
      description: mapping.description,
      type: mapping.choices?.join(' | ') ?? mapping.type,
    };
  }
  return docs;
}
