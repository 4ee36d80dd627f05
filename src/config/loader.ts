/**
 * Loads the effective configuration of one invocation.
 *
 * @packageDocumentation
 */

import { safeReadFile } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { applyEnvOverrides } from './env.js';
import type { EnvRecord } from './env.js';
import { ConfigParseError, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Reads the config file (when given), applies environment overrides and
 * validates the result.
 *
 * @param configPath - Path of headergen.toml, or undefined for defaults only.
 * @param env - Environment to read HEADERGEN_* overrides from.
 * @returns The validated configuration.
 * @throws ConfigParseError if the file cannot be read or parsed.
 * @throws EnvCoercionError if an override cannot be coerced.
 * @throws ConfigValidationError if the merged configuration is invalid.
 */
export async function loadConfig(
  configPath: string | undefined,
  env: EnvRecord = process.env
): Promise<Config> {
  let config = DEFAULT_CONFIG;

  if (configPath !== undefined) {
    let content: string;
    try {
      content = await safeReadFile(configPath, 'utf-8');
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigParseError(
        `Cannot read config file '${configPath}': ${cause?.message ?? String(error)}`,
        cause
      );
    }
    config = parseConfig(content);
  }

  config = applyEnvOverrides(config, env);
  assertConfigValid(config);
  return config;
}
