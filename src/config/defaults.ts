/**
 * Default configuration values for argspec.toml.
 *
 * @packageDocumentation
 */

import type { CompilerSettingsConfig, Config, LoggingConfig, OutputConfig } from './types.js';

/**
 * Default compiler limits.
 */
export const DEFAULT_COMPILER_SETTINGS: CompilerSettingsConfig = {
  max_depth: 32,
};

/**
 * Default output settings.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  format: 'outline',
  indent: 2,
  colors: true,
};

/**
 * Default logging settings (debug disabled).
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  compiler: DEFAULT_COMPILER_SETTINGS,
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
};

/** Largest accepted output indent. */
export const MAX_INDENT = 8;
