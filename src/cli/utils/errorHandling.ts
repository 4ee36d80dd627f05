/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

import { EXIT_FAILURE } from '../errors.js';
import type { CliCommandResult } from '../types.js';

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and handles any errors:
 * - On success: sets the process exit code from the result
 * - On error: logs the error message and stack, and exits with 1
 *
 * The process exits on its own once pending output is flushed, so headers
 * written to a pipe are never truncated.
 *
 * @param fn - The function to wrap (sync or async).
 * @returns A promise settled once the exit code is set.
 */
export async function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<void> {
  try {
    const result = await fn();
    process.exitCode = result.exitCode;
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Unexpected error: ${error.message}`);
      if (error.stack !== undefined) {
        console.error(error.stack);
      }
    } else {
      console.error(`Unexpected error: ${String(error)}`);
    }
    process.exitCode = EXIT_FAILURE;
  }
}
