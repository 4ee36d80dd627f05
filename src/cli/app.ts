/**
 * Command dispatch and help text for the ffi-headergen CLI.
 */

import { getEnvVarDocumentation } from '../config/index.js';
import type { EnvRecord } from '../config/index.js';
import { handleGenerateCommand } from './commands/generate.js';
import { getPackageVersion, handleVersionCommand } from './commands/version.js';
import type { CliCommandResult, CliContext } from './types.js';

/**
 * Creates the CLI context for one invocation.
 *
 * @param args - Arguments after the command name.
 * @param env - Environment variables.
 * @returns The context; colors are used only on a terminal without NO_COLOR.
 */
export function createCliContext(args: string[], env: EnvRecord = process.env): CliContext {
  return {
    args,
    env,
    cwd: process.cwd(),
    display: { colors: process.stderr.isTTY === true && env.NO_COLOR === undefined },
  };
}

/**
 * Builds the general usage text.
 */
export function formatHelp(): string {
  const envDocs = Object.entries(getEnvVarDocumentation())
    .map(([name, doc]) => `  ${name.padEnd(36)} ${doc.description} (${doc.type})`)
    .join('\n');

  return `
ffi-headergen v${getPackageVersion()}

Generates a C header from crate dumps.

USAGE:
  ffi-headergen <command> [options]

COMMANDS:
  generate    Generate a header from one or more crate dumps
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version      Show version information

ENVIRONMENT:
${envDocs}
  ${'HEADERGEN_DEBUG'.padEnd(36)} Enable debug logging (boolean)

EXAMPLES:
  ffi-headergen generate mylib.json --output mylib.h
  ffi-headergen generate mylib.json dep.json --config headergen.toml
`;
}

const COMMAND_HELP: ReadonlyMap<string, string> = new Map([
  [
    'generate',
    `
USAGE: ffi-headergen generate <crate.json>... [options]

Runs the pipeline over the crate dumps (root crate first) and writes one
header. Nothing is written when any stage fails.

OPTIONS:
  --config, -c <file>   Configuration file (default: ./headergen.toml if present)
  --output, -o <file>   Write the header to a file instead of stdout
  --events              Print the emission stream instead of the header
  --verbose, -v         Enable debug logging

EXAMPLES:
  ffi-headergen generate mylib.json
  ffi-headergen generate mylib.json --output include/mylib.h
  ffi-headergen generate mylib.json --events
`,
  ],
  [
    'version',
    `
USAGE: ffi-headergen version

Prints the generator version.
`,
  ],
]);

/**
 * Looks up help for one command.
 *
 * @returns The help text, or undefined for unknown commands.
 */
export function formatCommandHelp(commandName: string): string | undefined {
  return COMMAND_HELP.get(commandName);
}

/**
 * Runs one command line.
 *
 * @param argv - Arguments after the program name.
 * @param env - Environment variables.
 * @returns The command result.
 */
export async function runCli(argv: string[], env: EnvRecord = process.env): Promise<CliCommandResult> {
  const [command = '', ...commandArgs] = argv;
  const wantsHelp = commandArgs.includes('--help') || commandArgs.includes('-h');

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const topic = commandArgs[0];
      if (topic === undefined) {
        console.log(formatHelp());
        return { exitCode: 0 };
      }
      const help = formatCommandHelp(topic);
      if (help === undefined) {
        console.error(`Unknown command: ${topic}`);
        console.error('\nRun "ffi-headergen help" to see all available commands.');
        return { exitCode: 1 };
      }
      console.log(help);
      return { exitCode: 0 };
    }

    case 'version':
    case '--version':
      return handleVersionCommand();

    case 'generate':
      if (wantsHelp) {
        console.log(formatCommandHelp('generate'));
        return { exitCode: 0 };
      }
      return handleGenerateCommand(createCliContext(commandArgs, env));

    default:
      console.error(`Error: Unknown command: ${command}`);
      console.error('\nRun "ffi-headergen help" for usage information.');
      return { exitCode: 1 };
  }
}
