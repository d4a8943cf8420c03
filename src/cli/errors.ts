/**
 * Error suggestion system for the argspec CLI.
 *
 * Pairs compile and load errors with hints on how to fix the spec file.
 *
 * @packageDocumentation
 */

import type { CompileErrorCode } from '../spec/errors.js';

/**
 * Error types reported by the CLI.
 */
export type ErrorType = CompileErrorCode | 'LOAD';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Example of the fix (optional). */
  action?: string;
}

/**
 * Display options for error output.
 */
export interface ErrorDisplayOptions {
  /** Whether to use ANSI colors. */
  colors: boolean;
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  STRUCTURE: [
    {
      text: 'Declare args, flags, options and subcommands as tables keyed by name',
      action: '[flags.verbose]',
    },
    {
      text: 'Remove the duplicated key named in the message',
    },
  ],
  FIELD: [
    {
      text: 'Check the type of the property named in the message',
    },
    {
      text: 'Every flag and option needs a short or long form',
      action: 'short = "v"',
    },
  ],
  ORDERING: [
    {
      text: 'Declare required arguments before optional ones',
    },
    {
      text: 'Or mark the later argument as optional',
      action: 'required = false',
    },
  ],
  CONFLICT: [
    {
      text: 'Give each flag and option at this level a distinct short and long name',
    },
  ],
  DEPTH: [
    {
      text: 'Reduce subcommand nesting or raise the limit',
      action: 'ARGSPEC_MAX_DEPTH=64',
    },
  ],
  LOAD: [
    {
      text: 'Check that the file exists and is valid TOML',
    },
    {
      text: 'Arrays are not supported; use tables keyed by name',
    },
  ],
};

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(
  suggestion: Suggestion,
  index: number,
  options: ErrorDisplayOptions
): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats an error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param errorType - Category used to pick suggestions.
 * @param path - Subcommand keys leading to the failing level.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  errorType: ErrorType,
  path: readonly string[] = [],
  options: ErrorDisplayOptions = { colors: true }
): string {
  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (path.length > 0) {
    result += `\n  ${yellowCode}Subcommand:${resetCode} ${path.join(' > ')}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  getSuggestions(errorType).forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}
