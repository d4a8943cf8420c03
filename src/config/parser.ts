/**
 * TOML configuration parser for argspec.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_COMPILER_SETTINGS,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  MAX_INDENT,
} from './defaults.js';
import type {
  CompilerSettingsConfig,
  Config,
  LoggingConfig,
  OutputConfig,
  OutputFormat,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/** Accepted output formats. */
const OUTPUT_FORMATS: readonly OutputFormat[] = ['outline', 'json'];

/**
 * Checks whether a value is a TOML table.
 *
 * @param value - Value to check.
 * @returns Whether the value is a non-array object.
 */
function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an optional section, rejecting non-table values.
 *
 * @param parsed - Parsed TOML document.
 * @param section - Section name.
 * @returns The section table, or undefined if absent.
 * @throws ConfigParseError if the section is not a table.
 */
function readSection(
  parsed: Record<string, unknown>,
  section: string
): Record<string, unknown> | undefined {
  const value = parsed[section];
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a number is an integer within a range.
 *
 * @param value - Number to check.
 * @param fieldPath - Path to the field for error messages.
 * @param min - Minimum allowed value (inclusive).
 * @param max - Maximum allowed value (inclusive).
 * @returns The validated number.
 * @throws ConfigParseError if out of range or not an integer.
 */
export function validateIntegerRange(
  value: number,
  fieldPath: string,
  min: number,
  max: number
): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be an integer between ${String(min)} and ${String(max)}, got ${String(value)}`
    );
  }
  return value;
}

/**
 * Validates an output format name.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The output format.
 * @throws ConfigParseError for unknown formats.
 */
export function validateOutputFormat(value: string, fieldPath: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected ${OUTPUT_FORMATS.map((f) => `'${f}'`).join(' or ')}, got '${value}'`
    );
  }
  return format;
}

/**
 * Parses compiler settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the compiler section.
 * @returns Validated settings merged with defaults.
 */
function parseCompilerSettings(raw: Record<string, unknown> | undefined): CompilerSettingsConfig {
  const result: CompilerSettingsConfig = { ...DEFAULT_COMPILER_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('max_depth' in raw) {
    result.max_depth = validateIntegerRange(
      validateNumber(raw.max_depth, 'compiler.max_depth'),
      'compiler.max_depth',
      1,
      1024
    );
  }

  return result;
}

/**
 * Parses output settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the output section.
 * @returns Validated settings merged with defaults.
 */
function parseOutput(raw: Record<string, unknown> | undefined): OutputConfig {
  const result: OutputConfig = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('format' in raw) {
    result.format = validateOutputFormat(
      validateString(raw.format, 'output.format'),
      'output.format'
    );
  }
  if ('indent' in raw) {
    result.indent = validateIntegerRange(
      validateNumber(raw.indent, 'output.indent'),
      'output.indent',
      0,
      MAX_INDENT
    );
  }
  if ('colors' in raw) {
    result.colors = validateBoolean(raw.colors, 'output.colors');
  }

  return result;
}

/**
 * Parses logging settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the logging section.
 * @returns Validated settings merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [output]
 * format = "json"
 * `);
 * console.log(config.output.format); // "json"
 * console.log(config.compiler.max_depth); // 32
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    compiler: parseCompilerSettings(readSection(parsed, 'compiler')),
    output: parseOutput(readSection(parsed, 'output')),
    logging: parseLogging(readSection(parsed, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return {
    compiler: { ...DEFAULT_CONFIG.compiler },
    output: { ...DEFAULT_CONFIG.output },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
