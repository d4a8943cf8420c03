/**
 * Check command handler for the argspec CLI.
 *
 * Compiles a spec file and prints the compiled tree.
 */

import type { CompileResult } from '../../spec/compiler.js';
import { SpecLoadError } from '../../spec/errors.js';
import { renderOutline, toPlainObject } from '../../spec/outline.js';
import { compileSpecFile } from '../../spec/parser.js';
import { Logger } from '../../utils/logger.js';
import { formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Parsed arguments of the check command.
 */
interface CheckArgs {
  filePath: string | undefined;
  format: 'outline' | 'json' | undefined;
  quiet: boolean;
}

/**
 * Parses check command arguments.
 *
 * @param args - Arguments after the command name.
 * @returns Parsed arguments.
 * @throws Error for unknown options or more than one file.
 */
function parseCheckArgs(args: readonly string[]): CheckArgs {
  const parsed: CheckArgs = { filePath: undefined, format: undefined, quiet: false };

  for (const arg of args) {
    if (arg === '--json') {
      parsed.format = 'json';
    } else if (arg === '--outline') {
      parsed.format = 'outline';
    } else if (arg === '--quiet' || arg === '-q') {
      parsed.quiet = true;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option for check: ${arg}`);
    } else if (parsed.filePath === undefined) {
      parsed.filePath = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

/**
 * Handles the check command.
 *
 * Exit codes: 0 when the spec compiles, 1 when it does not, 2 on usage errors.
 *
 * @param context - CLI context.
 * @returns The command result.
 * @throws Error for unknown options.
 */
export async function handleCheckCommand(context: CliContext): Promise<CliCommandResult> {
  const { filePath, format, quiet } = parseCheckArgs(context.args);
  const { config } = context;

  if (filePath === undefined) {
    console.error('Usage: argspec check <spec.toml> [--json | --outline] [--quiet]');
    return { exitCode: 2, message: 'missing spec file' };
  }

  const logger = new Logger({ component: 'SpecCompiler', debugMode: config.logging.debug });
  const displayOptions = { colors: config.output.colors };

  let result: CompileResult;
  try {
    result = await compileSpecFile(filePath, { logger, maxDepth: config.compiler.max_depth });
  } catch (error) {
    if (error instanceof SpecLoadError) {
      console.error(formatErrorWithSuggestions(error.message, 'LOAD', [], displayOptions));
      return { exitCode: 1, message: error.message };
    }
    throw error;
  }

  if (!result.success) {
    const { error } = result;
    console.error(formatErrorWithSuggestions(error.message, error.code, error.path, displayOptions));
    return { exitCode: 1, message: error.message };
  }

  if (!quiet) {
    const effectiveFormat = format ?? config.output.format;
    if (effectiveFormat === 'json') {
      console.log(JSON.stringify(toPlainObject(result.spec), null, config.output.indent));
    } else {
      console.log(renderOutline(result.spec, config.output.indent));
    }
  }

  return { exitCode: 0 };
}
