/**
 * argspec
 *
 * Compiles declarative command-line specifications into validated,
 * immutable command trees for an argument-matching engine.
 *
 * @packageDocumentation
 */

export * from './spec/index.js';

export {
  ConfigParseError,
  DEFAULT_CONFIG,
  EnvCoercionError,
  applyEnvOverrides,
  getDefaultConfig,
  parseConfig,
  readEnvOverrides,
  type Config,
  type EnvRecord,
  type OutputFormat,
} from './config/index.js';

export { Logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';

/** Library version. */
export const VERSION = '0.1.0';
