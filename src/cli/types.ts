/**
 * CLI types and interfaces for the ffi-headergen CLI.
 */

import type { EnvRecord } from '../config/env.js';
import type { LogSink } from '../utils/logger.js';

/**
 * Display options for CLI output.
 */
export interface DisplayOptions {
  /**
   * Whether to use ANSI colors.
   */
  colors: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments after the command name.
   */
  args: string[];

  /**
   * Environment variables consulted for `HEADERGEN_*` overrides.
   */
  env: EnvRecord;

  /**
   * Directory searched for `headergen.toml` when no `--config` is given.
   */
  cwd: string;

  /**
   * Display settings.
   */
  display: DisplayOptions;

  /**
   * Destination of structured log lines; stderr when unset.
   */
  logSink?: LogSink;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
