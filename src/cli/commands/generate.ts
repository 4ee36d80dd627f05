/**
 * Generate command handler for the ffi-headergen CLI.
 *
 * Loads crate dumps and configuration, runs the pipeline and writes the
 * header to a file or stdout. Nothing is written unless every stage succeeds.
 */

import * as path from 'node:path';
import { coerceToBoolean, loadConfig } from '../../config/index.js';
import { describeEvent } from '../../emit/events.js';
import { runPipeline } from '../../pipeline/pipeline.js';
import { loadCrates } from '../../syntax/index.js';
import { Logger } from '../../utils/logger.js';
import { safeExists, safeWriteFileAtomic } from '../../utils/safe-fs.js';
import { writeHeader } from '../../writer/index.js';
import {
  CliUsageError,
  displayErrorWithSuggestions,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  isReportableError,
} from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { getPackageVersion } from './version.js';

/**
 * Config file looked up in the working directory when `--config` is not given.
 */
export const DEFAULT_CONFIG_FILE = 'headergen.toml';

/**
 * Parsed `generate` arguments.
 */
export interface GenerateArgs {
  /** Crate dump paths, root crate first. */
  inputs: string[];
  configPath?: string;
  outputPath?: string;
  /** Print the emission stream instead of the header. */
  events: boolean;
  verbose: boolean;
}

/**
 * Parses command-line arguments for the generate command.
 *
 * @param args - Arguments after `generate`.
 * @returns The parsed arguments.
 * @throws CliUsageError for unknown options, missing option values or no inputs.
 */
export function parseGenerateArgs(args: string[]): GenerateArgs {
  const parsed: GenerateArgs = { inputs: [], events: false, verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--config' || arg === '-c' || arg === '--output' || arg === '-o') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new CliUsageError(`Option '${arg}' requires a file path`);
      }
      if (arg === '--config' || arg === '-c') {
        parsed.configPath = value;
      } else {
        parsed.outputPath = value;
      }
      i++;
    } else if (arg === '--events') {
      parsed.events = true;
    } else if (arg === '--verbose' || arg === '-v') {
      parsed.verbose = true;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option '${arg}'`);
    } else {
      parsed.inputs.push(arg);
    }
  }

  if (parsed.inputs.length === 0) {
    throw new CliUsageError('No crate dump given');
  }
  return parsed;
}

async function findConfigFile(args: GenerateArgs, cwd: string): Promise<string | undefined> {
  if (args.configPath !== undefined) {
    return args.configPath;
  }
  const candidate = path.join(cwd, DEFAULT_CONFIG_FILE);
  return (await safeExists(candidate)) ? candidate : undefined;
}

function debugEnabled(args: GenerateArgs, context: CliContext): boolean {
  const raw = context.env.HEADERGEN_DEBUG;
  return args.verbose || (raw !== undefined && raw !== '' && coerceToBoolean(raw, 'HEADERGEN_DEBUG'));
}

async function generate(args: GenerateArgs, context: CliContext): Promise<void> {
  const logger = new Logger({
    component: 'cli',
    debugMode: debugEnabled(args, context),
    ...(context.logSink !== undefined ? { sink: context.logSink } : {}),
  });

  const configPath = await findConfigFile(args, context.cwd);
  logger.debug('config_selected', { path: configPath ?? null });

  const [crates, config] = await Promise.all([loadCrates(args.inputs), loadConfig(configPath, context.env)]);
  const result = runPipeline(crates, config, { logger });

  if (args.events) {
    process.stdout.write(result.stream.events.map((e) => `${describeEvent(e)}\n`).join(''));
    if (args.outputPath === undefined) {
      return;
    }
  }

  const header = writeHeader(result.stream, config, { version: getPackageVersion() });
  if (args.outputPath !== undefined) {
    await safeWriteFileAtomic(args.outputPath, header);
    logger.info('header_written', { path: args.outputPath, bytes: Buffer.byteLength(header) });
  } else {
    process.stdout.write(header);
  }
}

/**
 * Handles the generate command.
 *
 * @param context - The CLI context.
 * @returns Exit code 0 on success, 1 when arguments, inputs, configuration or a stage fail.
 */
export async function handleGenerateCommand(context: CliContext): Promise<CliCommandResult> {
  try {
    await generate(parseGenerateArgs(context.args), context);
    return { exitCode: EXIT_SUCCESS };
  } catch (error) {
    if (!isReportableError(error)) {
      throw error;
    }
    displayErrorWithSuggestions(error, context.display);
    return { exitCode: EXIT_FAILURE };
  }
}
