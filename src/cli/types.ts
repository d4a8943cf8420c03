/**
 * CLI types and interfaces for the argspec CLI.
 */

import type { Config } from '../config/types.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments after the command name.
   */
  args: string[];

  /**
   * Effective configuration (env > argspec.toml > defaults).
   */
  config: Config;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
