/**
 * Configuration types for argspec.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * How the `check` command prints a compiled specification.
 */
export type OutputFormat = 'outline' | 'json';

/**
 * Compiler limits.
 */
export interface CompilerSettingsConfig {
  /** Maximum subcommand nesting depth; the root is depth 0. */
  max_depth: number;
}

/**
 * Output settings for the CLI.
 */
export interface OutputConfig {
  /** Output format for compiled specifications. */
  format: OutputFormat;
  /** Spaces per indentation level, for both outline and JSON output. */
  indent: number;
  /** Whether error output uses ANSI colors. */
  colors: boolean;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level log entries are written to stderr. */
  debug: boolean;
}

/**
 * Complete argspec configuration.
 */
export interface Config {
  compiler: CompilerSettingsConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration used for overrides.
 */
export interface PartialConfig {
  compiler?: Partial<CompilerSettingsConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}
