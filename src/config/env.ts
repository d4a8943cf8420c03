/**
 * Environment variable overrides for configuration.
 *
 * ARGSPEC_* environment variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { MAX_INDENT } from './defaults.js';
import { ConfigParseError, validateIntegerRange, validateOutputFormat } from './parser.js';
import type { Config, OutputFormat, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to an integer within a range.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @param min - Minimum allowed value (inclusive).
 * @param max - Maximum allowed value (inclusive).
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value is not an integer in range.
 */
function coerceToInteger(value: string, envVar: string, min: number, max: number): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'integer', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);
  try {
    return validateIntegerRange(num, envVar, min, max);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new EnvCoercionError(envVar, value, 'integer', error.message);
    }
    throw error;
  }
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to an output format.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The output format.
 * @throws EnvCoercionError for unknown formats.
 */
function coerceToFormat(value: string, envVar: string): OutputFormat {
  try {
    return validateOutputFormat(value.trim(), envVar);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new EnvCoercionError(envVar, value, 'output format', error.message);
    }
    throw error;
  }
}

/**
 * How one environment variable maps onto the configuration.
 */
interface EnvMapping {
  /** Human-readable description for documentation output. */
  readonly description: string;
  /** Type name shown in documentation. */
  readonly type: 'integer' | 'boolean' | 'string';
  /** Coerces the raw value and records it in the overrides. */
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

/**
 * Supported environment variables.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  [
    'ARGSPEC_MAX_DEPTH',
    {
      description: 'Override the maximum subcommand nesting depth',
      type: 'integer',
      apply: (overrides, value, envVar) => {
        overrides.compiler = {
          ...overrides.compiler,
          max_depth: coerceToInteger(value, envVar, 1, 1024),
        };
      },
    },
  ],
  [
    'ARGSPEC_OUTPUT_FORMAT',
    {
      description: "Override the output format ('outline' or 'json')",
      type: 'string',
      apply: (overrides, value, envVar) => {
        overrides.output = { ...overrides.output, format: coerceToFormat(value, envVar) };
      },
    },
  ],
  [
    'ARGSPEC_OUTPUT_INDENT',
    {
      description: 'Override the number of spaces per indentation level',
      type: 'integer',
      apply: (overrides, value, envVar) => {
        overrides.output = {
          ...overrides.output,
          indent: coerceToInteger(value, envVar, 0, MAX_INDENT),
        };
      },
    },
  ],
  [
    'ARGSPEC_DEBUG',
    {
      description: 'Enable debug logging to stderr',
      type: 'boolean',
      apply: (overrides, value, envVar) => {
        overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
      },
    },
  ],
]);

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ ARGSPEC_OUTPUT_FORMAT: 'json' });
 * console.log(result.overrides.output?.format); // "json"
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return {
    compiler: { ...config.compiler, ...overrides.compiler },
    output: { ...config.output, ...overrides.output },
    logging: { ...config.logging, ...overrides.logging },
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    [...ENV_VAR_MAPPINGS].map(([envVar, { description, type }]) => [envVar, { description, type }])
  );
}
