/**
 * CLI context creation for the argspec CLI.
 */

import { existsSync, readFileSync } from 'node:fs';
import {
  applyEnvOverrides,
  ConfigParseError,
  getDefaultConfig,
  parseConfig,
  type EnvRecord,
} from '../config/index.js';
import type { CliContext } from './types.js';

/** Project configuration file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'argspec.toml';

/**
 * Options for {@link createCliApp}.
 */
export interface CreateCliAppOptions {
  /** Arguments passed to the command. */
  args?: string[];
  /** Path of the configuration file. */
  configFilePath?: string;
  /** Environment used for ARGSPEC_* overrides. */
  env?: EnvRecord;
}

/**
 * Creates the CLI context, loading configuration from file and environment.
 *
 * An unreadable or invalid configuration file is reported as a warning and
 * the defaults are used instead; invalid environment overrides are errors.
 *
 * @param options - Arguments, config path and environment.
 * @returns CLI context.
 * @throws EnvCoercionError if an ARGSPEC_* variable has an invalid value.
 */
export function createCliApp(options: CreateCliAppOptions = {}): CliContext {
  const configFilePath = options.configFilePath ?? CONFIG_FILE_NAME;
  let config = getDefaultConfig();

  if (existsSync(configFilePath)) {
    try {
      config = parseConfig(readFileSync(configFilePath, 'utf-8'));
    } catch (error) {
      const errorMessage = error instanceof ConfigParseError ? error.message : String(error);
      console.warn(`Warning: Failed to load config from ${configFilePath}: ${errorMessage}`);
      console.warn('Using default settings.');
    }
  }

  return {
    args: options.args ?? process.argv.slice(3),
    config: applyEnvOverrides(config, options.env ?? process.env),
  };
}
