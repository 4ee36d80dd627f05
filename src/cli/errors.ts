/**
 * Error suggestion system for the ffi-headergen CLI.
 *
 * Maps pipeline failures and input errors to a headline, contextual
 * suggestions and an exit code.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { ConstExprParseError } from '../ir/const-expr.js';
import { formatPipelineError, PipelineError } from '../pipeline/errors.js';
import type { PipelineErrorKind } from '../pipeline/errors.js';
import { CrateLoadError, TypeExprParseError } from '../syntax/index.js';
import { PathValidationError } from '../utils/safe-fs.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types the CLI distinguishes: every pipeline error kind plus input errors.
 */
export type ErrorType = PipelineErrorKind | 'usage' | 'config' | 'input' | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or configuration to try (optional). */
  action?: string;
}

/**
 * Exit code of a successful run.
 */
export const EXIT_SUCCESS = 0;

/**
 * Exit code of every failed run.
 */
export const EXIT_FAILURE = 1;

/**
 * Error thrown for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  DuplicateDeclaration: [
    { text: 'Rename one of the declarations, or gate one of them behind a cfg predicate' },
    {
      text: 'Give one of them another export name',
      action: '[export] rename = { <name> = "<new name>" }',
    },
  ],

  UnresolvedType: [
    { text: 'Check that the crate declaring the type is passed to generate' },
    {
      text: 'List the type as external when an included header provides it',
      action: '[export] external_types = ["<name>"]',
    },
    { text: 'Check whether a [cfg] setting or [export] exclude removed the type' },
  ],

  MangledNameCollision: [
    { text: 'A specialized name matches another declaration' },
    {
      text: 'Rename the clashing declaration',
      action: '[export] rename = { <name> = "<new name>" }',
    },
  ],

  UnboundedSpecialization: [
    { text: 'Look for a generic type that refers to itself with a growing argument' },
    {
      text: 'Raise the nesting limit if the depth is intended',
      action: '[specialization] max_depth = 64',
    },
  ],

  UnrepresentableCycle: [
    { text: 'Put a pointer or Box between the types that contain each other' },
    {
      text: 'Or declare one of the types opaque',
      action: '[export] opaque = ["<name>"]',
    },
  ],

  usage: [
    {
      text: 'Check the command line',
      action: 'ffi-headergen help generate',
    },
  ],

  config: [
    { text: 'Check the field named in the message against the documented settings' },
    {
      text: 'Check HEADERGEN_* environment variables, which override the file',
      action: 'ffi-headergen help',
    },
  ],

  input: [
    { text: 'Regenerate the crate dump with the front-end' },
    { text: 'Check the dump against schemas/crate.schema.json' },
  ],

  unknown: [
    {
      text: 'Run again with debug logging',
      action: 'ffi-headergen generate <crate.json> --verbose',
    },
  ],
};

/**
 * Classifies an error.
 *
 * @param error - Anything thrown while running a command.
 * @returns The error type.
 */
export function errorTypeOf(error: unknown): ErrorType {
  if (error instanceof PipelineError) {
    return error.kind;
  }
  if (error instanceof CliUsageError) {
    return 'usage';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'config';
  }
  if (
    error instanceof CrateLoadError ||
    error instanceof TypeExprParseError ||
    error instanceof ConstExprParseError ||
    error instanceof PathValidationError
  ) {
    return 'input';
  }
  return 'unknown';
}

/**
 * Gets suggestions for a given error type.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * One-line summary of an error. Pipeline errors use their diagnostic format.
 */
export function errorHeadline(error: unknown): string {
  if (error instanceof PipelineError) {
    return formatPipelineError(error);
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error with contextual suggestions.
 *
 * @param error - The error.
 * @param options - Display options.
 * @returns The headline, then a numbered suggestion list.
 */
export function formatErrorWithSuggestions(error: unknown, options: DisplayOptions): string {
  const suggestions = getSuggestions(errorTypeOf(error));

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';

  let result = `${redCode}${errorHeadline(error)}${resetCode}`;

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Writes an error with suggestions to stderr.
 */
export function displayErrorWithSuggestions(error: unknown, options: DisplayOptions): void {
  console.error(formatErrorWithSuggestions(error, options));
}

/**
 * Whether an error is one the CLI reports with suggestions rather than as an
 * unexpected failure.
 */
export function isReportableError(error: unknown): boolean {
  return errorTypeOf(error) !== 'unknown';
}
