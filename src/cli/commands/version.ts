/**
 * Version command handler for the ffi-headergen CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { isRecord } from '../../config/parser.js';
import { PackageFileNotFoundError, resolvePackageFile } from '../../utils/package-files.js';
import { safeReadFileSync } from '../../utils/safe-fs.js';
import type { CliCommandResult } from '../types.js';

let cachedVersion: string | undefined;

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if package.json is missing or has no version.
 */
export function getPackageVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  let data: unknown;
  try {
    data = JSON.parse(safeReadFileSync(resolvePackageFile(import.meta.url, 3, 'package.json'), 'utf-8'));
  } catch (error) {
    if (error instanceof PackageFileNotFoundError || error instanceof SyntaxError) {
      return '(unknown)';
    }
    throw error;
  }

  cachedVersion = isRecord(data) && typeof data.version === 'string' ? data.version : '(unknown)';
  return cachedVersion;
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  console.log(`ffi-headergen v${getPackageVersion()}`);
  return { exitCode: 0 };
}
