#!/usr/bin/env node

/**
 * asv CLI entry point.
 */

import { createCliApp } from './app.js';
import { handleListCommand } from './commands/list.js';
import { handleRunCommand } from './commands/run.js';
import { handleVersionCommand } from './commands/version.js';
import { withErrorHandling } from './utils/errorHandling.js';
import { EXIT_CODES } from './types.js';

const HELP_TEXT = `
asymptotic-verifier

USAGE:
  asv <command> [options]

COMMANDS:
  list        List the claims of a catalog
  run         Verify one claim
  help        Show this help message
  version     Show version information

OPTIONS:
  --catalog <file>   Claim catalog (default: claims.toml)
  --config <file>    Configuration file (default: built-in defaults)
  --debug            Write debug logs to stderr
  --help, -h         Show help for a command

EXIT CODES:
  0  Proved or Disproved
  1  Unknown
  2  Usage, catalog, configuration or oracle error

EXAMPLES:
  asv list --catalog examples/claims.toml
  asv run quartic_tail --catalog examples/claims.toml
  asv run am_gm_two --catalog examples/claims.toml --config asymptotic.toml
`;

const COMMAND_HELP: Readonly<Record<string, string>> = {
  list: `
USAGE: asv list [--catalog <file>]

Prints each claim of the catalog with its kind and statement.
`,
  run: `
USAGE: asv run <name> [--catalog <file>] [--config <file>] [--debug]

Verifies the named claim and prints the transcript and the verdict.
Environment variables ASV_*, WOLFRAMSCRIPT, WOLFRAM_API_URL and
WOLFRAM_TIMEOUT (seconds) override the configuration file.
`,
};

function showHelpForCommand(commandName: string): void {
  const help = COMMAND_HELP[commandName];
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "asv help" to see all available commands.');
  }
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
        console.log(HELP_TEXT);
      }
      process.exit(EXIT_CODES.settled);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(handleVersionCommand, createCliApp(commandArgs));
      break;

    case 'list':
    case 'run':
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand(command);
        process.exit(EXIT_CODES.settled);
      }
      withErrorHandling(command === 'list' ? handleListCommand : handleRunCommand, createCliApp(commandArgs));
      break;

    default:
      console.error(`Error: Unknown command: ${command}`);
      console.error('\nRun "asv help" for usage information.');
      process.exit(EXIT_CODES.fatal);
  }
}

main();
