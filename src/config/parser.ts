/**
 * TOML configuration parser for headergen.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG } from './defaults.js';
import type {
  ArgLayout,
  CfgConfig,
  Config,
  DeclarationStyle,
  DocumentationStyle,
  EnumConfig,
  ExportConfig,
  FnConfig,
  PtrConfig,
  SpecializationConfig,
  StructConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Checks that a value is a plain table.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${describeType(value)}`
    );
  }
  return value.map((item: unknown, i) => validateString(item, `${fieldPath}[${String(i)}]`));
}

function validateTable(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

function validateStringTable(value: unknown, fieldPath: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(validateTable(value, fieldPath))) {
    result[key] = validateString(item, `${fieldPath}.${key}`);
  }
  return result;
}

function validateBooleanTable(value: unknown, fieldPath: string): Record<string, boolean> {
  const result: Record<string, boolean> = {};
  for (const [key, item] of Object.entries(validateTable(value, fieldPath))) {
    result[key] = validateBoolean(item, `${fieldPath}.${key}`);
  }
  return result;
}

/**
 * Validates that a value is one of a fixed set of strings.
 *
 * @throws ConfigParseError if value is not a string or not one of the choices.
 */
function validateChoice<T extends string>(
  value: unknown,
  fieldPath: string,
  choices: readonly T[]
): T {
  const text = validateString(value, fieldPath);
  const match = choices.find((choice) => choice === text);
  if (match === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${choices.map((c) => `'${c}'`).join(', ')}, got '${text}'`
    );
  }
  return match;
}

const DOCUMENTATION_STYLES: readonly DocumentationStyle[] = ['c', 'c99', 'doxy', 'auto'];
const DECLARATION_STYLES: readonly DeclarationStyle[] = ['both', 'type', 'tag'];
const ARG_LAYOUTS: readonly ArgLayout[] = ['horizontal', 'vertical', 'auto'];

function sectionOf(parsed: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  return name in parsed ? validateTable(parsed[name], name) : undefined;
}

function parseCfgSection(raw: Record<string, unknown> | undefined, base: CfgConfig): CfgConfig {
  if (raw === undefined) {
    return base;
  }

  const result: CfgConfig = { ...base };

  if ('flags' in raw) {
    result.flags = { ...base.flags, ...validateBooleanTable(raw.flags, 'cfg.flags') };
  }
  if ('features' in raw) {
    result.features = { ...base.features, ...validateBooleanTable(raw.features, 'cfg.features') };
  }
  if ('values' in raw) {
    result.values = { ...base.values, ...validateStringTable(raw.values, 'cfg.values') };
  }

  return result;
}

function parseExportSection(
  raw: Record<string, unknown> | undefined,
  base: ExportConfig
): ExportConfig {
  if (raw === undefined) {
    return base;
  }

  const result: ExportConfig = { ...base };

  if ('include' in raw) {
    result.include = validateStringArray(raw.include, 'export.include');
  }
  if ('exclude' in raw) {
    result.exclude = validateStringArray(raw.exclude, 'export.exclude');
  }
  if ('opaque' in raw) {
    result.opaque = validateStringArray(raw.opaque, 'export.opaque');
  }
  if ('prefix' in raw) {
    result.prefix = validateString(raw.prefix, 'export.prefix');
  }
  if ('rename' in raw) {
    result.rename = { ...base.rename, ...validateStringTable(raw.rename, 'export.rename') };
  }
  if ('external_types' in raw) {
    result.external_types = validateStringArray(raw.external_types, 'export.external_types');
  }

  return result;
}

function parseFnSection(raw: Record<string, unknown> | undefined, base: FnConfig): FnConfig {
  if (raw === undefined) {
    return base;
  }

  const result: FnConfig = { ...base };

  if ('rename_args' in raw) {
    result.rename_args = validateString(raw.rename_args, 'fn.rename_args');
  }
  if ('args' in raw) {
    result.args = validateChoice(raw.args, 'fn.args', ARG_LAYOUTS);
  }
  if ('no_return' in raw) {
    result.no_return = validateString(raw.no_return, 'fn.no_return');
  }
  if ('deprecated' in raw) {
    result.deprecated = validateString(raw.deprecated, 'fn.deprecated');
  }
  if ('must_use' in raw) {
    result.must_use = validateString(raw.must_use, 'fn.must_use');
  }

  return result;
}

function parseStructSection(
  raw: Record<string, unknown> | undefined,
  base: StructConfig
): StructConfig {
  if (raw === undefined) {
    return base;
  }
  return 'rename_fields' in raw
    ? { rename_fields: validateString(raw.rename_fields, 'struct.rename_fields') }
    : base;
}

function parseEnumSection(raw: Record<string, unknown> | undefined, base: EnumConfig): EnumConfig {
  if (raw === undefined) {
    return base;
  }

  const result: EnumConfig = { ...base };

  if ('rename_variants' in raw) {
    result.rename_variants = validateString(raw.rename_variants, 'enum.rename_variants');
  }
  if ('prefix_with_name' in raw) {
    result.prefix_with_name = validateBoolean(raw.prefix_with_name, 'enum.prefix_with_name');
  }

  return result;
}

function parsePtrSection(raw: Record<string, unknown> | undefined, base: PtrConfig): PtrConfig {
  if (raw === undefined) {
    return base;
  }

  const result: PtrConfig = { ...base };

  if ('non_null_attribute' in raw) {
    result.non_null_attribute = validateString(raw.non_null_attribute, 'ptr.non_null_attribute');
  }
  if ('nullable_attribute' in raw) {
    result.nullable_attribute = validateString(raw.nullable_attribute, 'ptr.nullable_attribute');
  }

  return result;
}

function parseSpecializationSection(
  raw: Record<string, unknown> | undefined,
  base: SpecializationConfig
): SpecializationConfig {
  if (raw === undefined) {
    return base;
  }
  return 'max_depth' in raw
    ? { max_depth: validateNumber(raw.max_depth, 'specialization.max_depth') }
    : base;
}

/**
 * Merges an already-parsed TOML document over a base configuration.
 *
 * Unknown keys are ignored. Tables (`cfg.*`, `export.rename`) merge key by
 * key; arrays and scalars replace the base value.
 *
 * @param parsed - The TOML document as a plain object.
 * @param base - The configuration the document overrides.
 * @returns The merged configuration.
 * @throws ConfigParseError for invalid field types or values.
 */
export function mergeConfigRecord(parsed: Record<string, unknown>, base: Config): Config {
  const result: Config = { ...base };

  if ('language' in parsed) {
    result.language = validateChoice(parsed.language, 'language', ['C']);
  }
  if ('header' in parsed) {
    result.header = validateString(parsed.header, 'header');
  }
  if ('trailer' in parsed) {
    result.trailer = validateString(parsed.trailer, 'trailer');
  }
  if ('include_guard' in parsed) {
    result.include_guard = validateString(parsed.include_guard, 'include_guard');
  }
  if ('pragma_once' in parsed) {
    result.pragma_once = validateBoolean(parsed.pragma_once, 'pragma_once');
  }
  if ('autogen_warning' in parsed) {
    result.autogen_warning = validateString(parsed.autogen_warning, 'autogen_warning');
  }
  if ('include_version' in parsed) {
    result.include_version = validateBoolean(parsed.include_version, 'include_version');
  }
  if ('no_includes' in parsed) {
    result.no_includes = validateBoolean(parsed.no_includes, 'no_includes');
  }
  if ('sys_includes' in parsed) {
    result.sys_includes = validateStringArray(parsed.sys_includes, 'sys_includes');
  }
  if ('includes' in parsed) {
    result.includes = validateStringArray(parsed.includes, 'includes');
  }
  if ('cpp_compat' in parsed) {
    result.cpp_compat = validateBoolean(parsed.cpp_compat, 'cpp_compat');
  }
  if ('documentation' in parsed) {
    result.documentation = validateBoolean(parsed.documentation, 'documentation');
  }
  if ('documentation_style' in parsed) {
    result.documentation_style = validateChoice(
      parsed.documentation_style,
      'documentation_style',
      DOCUMENTATION_STYLES
    );
  }
  if ('line_length' in parsed) {
    result.line_length = validateNumber(parsed.line_length, 'line_length');
  }
  if ('tab_width' in parsed) {
    result.tab_width = validateNumber(parsed.tab_width, 'tab_width');
  }
  if ('style' in parsed) {
    result.style = validateChoice(parsed.style, 'style', DECLARATION_STYLES);
  }

  result.cfg = parseCfgSection(sectionOf(parsed, 'cfg'), base.cfg);
  result.export = parseExportSection(sectionOf(parsed, 'export'), base.export);
  result.fn = parseFnSection(sectionOf(parsed, 'fn'), base.fn);
  result.struct = parseStructSection(sectionOf(parsed, 'struct'), base.struct);
  result.enum = parseEnumSection(sectionOf(parsed, 'enum'), base.enum);
  result.ptr = parsePtrSection(sectionOf(parsed, 'ptr'), base.ptr);
  result.specialization = parseSpecializationSection(
    sectionOf(parsed, 'specialization'),
    base.specialization
  );

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * import { parseConfig } from 'ffi-headergen';
 *
 * const config = parseConfig(`
 * include_guard = "MYLIB_H"
 *
 * [export]
 * prefix = "ml_"
 * `);
 * console.log(config.export.prefix); // "ml_"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(
      `Invalid TOML syntax: ${cause?.message ?? String(error)}`,
      cause
    );
  }

  return mergeConfigRecord(parsed, DEFAULT_CONFIG);
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG };
}
