/**
 * Semantic validation for headergen.toml configuration.
 *
 * Type checks happen while parsing; this module checks what a well-typed
 * configuration can still get wrong.
 *
 * @packageDocumentation
 */

import { parseRenameRule, RENAME_RULE_SPELLINGS, isReservedWord } from '../ir/rename.js';
import type { Config } from './types.js';

/**
 * A single validation error with context.
 */
export interface ValidationError {
  /** The field path that failed validation (e.g., 'fn.rename_args'). */
  field: string;
  /** The invalid value. */
  value: unknown;
  /** Human-readable error message. */
  message: string;
}

/**
 * Result of configuration validation.
 */
export interface ValidationResult {
  /** Whether the configuration is valid. */
  valid: boolean;
  /** List of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Error class for configuration validation errors.
 */
export class ConfigValidationError extends Error {
  /** All validation errors found. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of individual validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

const C_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function validateRenameRule(value: string, fieldPath: string, errors: ValidationError[]): void {
  if (parseRenameRule(value) === undefined) {
    errors.push({
      field: fieldPath,
      value,
      message: `Unknown rename rule '${value}'. Recognized rules: ${RENAME_RULE_SPELLINGS.join(', ')}`,
    });
  }
}

/**
 * Validates that a value is a positive integer.
 *
 * @param value - The value to validate.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validatePositiveInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

function validateIdentifier(value: string, fieldPath: string, errors: ValidationError[]): void {
  if (!C_IDENTIFIER.test(value)) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${value}' is not a valid C identifier`,
    });
  } else if (isReservedWord(value)) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${value}' is a reserved C or C++ keyword`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * Checks that:
 * - rename rules are recognized;
 * - numeric settings are positive integers;
 * - the include guard, export prefix and rename targets are usable C identifiers.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateRenameRule(config.fn.rename_args, 'fn.rename_args', errors);
  validateRenameRule(config.struct.rename_fields, 'struct.rename_fields', errors);
  validateRenameRule(config.enum.rename_variants, 'enum.rename_variants', errors);

  validatePositiveInteger(config.line_length, 'line_length', errors);
  validatePositiveInteger(config.tab_width, 'tab_width', errors);
  validatePositiveInteger(config.specialization.max_depth, 'specialization.max_depth', errors);

  if (config.include_guard !== '') {
    validateIdentifier(config.include_guard, 'include_guard', errors);
  }
  if (config.export.prefix !== '' && !C_IDENTIFIER.test(config.export.prefix)) {
    errors.push({
      field: 'export.prefix',
      value: config.export.prefix,
      message: `Prefix '${config.export.prefix}' cannot start a C identifier`,
    });
  }
  for (const [name, target] of Object.entries(config.export.rename)) {
    validateIdentifier(target, `export.rename.${name}`, errors);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
