/**
 * Locates files shipped at the package root (schemas, word lists, package.json).
 *
 * Modules run from `src/` under the test runner and from `dist/src/` once
 * built, so both depths are tried.
 *
 * @packageDocumentation
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { safeExistsSync } from './safe-fs.js';

/**
 * Error thrown when a package file cannot be found.
 */
export class PackageFileNotFoundError extends Error {
  /** Package-relative path that was looked up. */
  public readonly relativePath: string;

  constructor(relativePath: string, searched: readonly string[]) {
    super(`Package file '${relativePath}' not found (searched: ${searched.join(', ')})`);
    this.name = 'PackageFileNotFoundError';
    this.relativePath = relativePath;
  }
}

/**
 * Resolves a package-root-relative path from a module URL.
 *
 * @param moduleUrl - `import.meta.url` of the calling module.
 * @param depth - Directory depth of the calling module below the package root, when run from sources.
 * @param relativePath - Path relative to the package root.
 * @returns The absolute path of the first existing candidate.
 * @throws PackageFileNotFoundError if no candidate exists.
 */
export function resolvePackageFile(moduleUrl: string, depth: number, relativePath: string): string {
  const here = dirname(fileURLToPath(moduleUrl));
  const candidates = [depth, depth + 1].map((levels) =>
    join(here, ...Array.from({ length: levels }, () => '..'), relativePath)
  );
  const found = candidates.find((candidate) => safeExistsSync(candidate));
  if (found === undefined) {
    throw new PackageFileNotFoundError(relativePath, candidates);
  }
  return found;
}
