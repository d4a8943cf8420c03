/**
 * Configuration module for argspec.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  CompilerSettingsConfig,
  Config,
  LoggingConfig,
  OutputConfig,
  OutputFormat,
  PartialConfig,
} from './types.js';
export {
  DEFAULT_COMPILER_SETTINGS,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
} from './defaults.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
