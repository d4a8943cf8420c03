#!/usr/bin/env node

/**
 * argspec CLI entry point.
 *
 * This is the main entry point for the 'argspec' CLI command.
 */

/* eslint-disable no-console */
import { createCliApp } from './app.js';
import { handleCheckCommand } from './commands/check.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
argspec v${getVersionFromPackageJson()}

USAGE:
  argspec <command> [options]

COMMANDS:
  check       Compile a spec file and print the compiled tree
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  argspec check cli.toml
  argspec check cli.toml --json
`;
  console.log(helpText);
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  if (commandName === 'check') {
    console.log(`
USAGE: argspec check <spec.toml> [options]

Compiles a command-line spec file, reporting the first error found,
and prints the compiled tree.

OPTIONS:
  --json         Print the compiled tree as JSON
  --outline      Print an indented outline (default)
  --quiet, -q    Only report errors

CONFIGURATION:
  argspec.toml in the working directory, overridden by ARGSPEC_MAX_DEPTH,
  ARGSPEC_OUTPUT_FORMAT, ARGSPEC_OUTPUT_INDENT and ARGSPEC_DEBUG.

EXAMPLES:
  argspec check cli.toml
  ARGSPEC_DEBUG=1 argspec check cli.toml --json
`);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "argspec help" to see all available commands.');
  }
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "argspec help" for usage information.');
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    case 'check':
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand('check');
        process.exit(0);
      }
      withErrorHandling(async () => {
        const context = createCliApp({ args: commandArgs });
        return await handleCheckCommand(context);
      });
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}
