/**
 * Safe file system utilities with path validation.
 *
 * Every path is resolved to an absolute path and validated before any file
 * system operation is attempted. Header output goes through
 * {@link safeWriteFileAtomic} so a failed run never leaves a partial file.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty, contains null bytes, or does not resolve to an absolute path.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Safely reads a text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @param encoding - Text encoding.
 * @returns A promise that resolves to the file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string, encoding: BufferEncoding): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, { encoding });
}

/**
 * Synchronously reads a text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @param encoding - Text encoding.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeReadFileSync(filePath: string, encoding: BufferEncoding): string {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath, { encoding });
}

/**
 * Writes a file by writing a sibling temporary file and renaming it over the target.
 *
 * Readers either see the previous content or the complete new content. The
 * temporary file is removed if the write fails.
 *
 * @param filePath - The path to the file to write.
 * @param data - The data to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFileAtomic(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  const tempPath = path.join(
    path.dirname(validatedPath),
    `.${path.basename(validatedPath)}.${String(process.pid)}.${Date.now().toString(36)}.tmp`
  );

  try {
    await fs.writeFile(tempPath, data, { encoding: 'utf-8' });
    await fs.rename(tempPath, validatedPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Safely checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns A promise that resolves to true if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Synchronously checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fsSync.existsSync(validatedPath);
}
