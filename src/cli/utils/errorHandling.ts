/**
 * Shared error handling for CLI commands.
 */

import { errorMessage } from '../../utils/guards.js';
import { classifyError, formatErrorWithSuggestions } from '../errors.js';
import { EXIT_CODES, type CliCommandHandler, type CliContext } from '../types.js';

/**
 * Runs a command handler and returns its exit code. A thrown error is
 * printed with suggestions and yields {@link EXIT_CODES.fatal}.
 */
export async function executeCommand(handler: CliCommandHandler, context: CliContext): Promise<number> {
  try {
    const result = await handler(context);
    return result.exitCode;
  } catch (error) {
    context.io.err(formatErrorWithSuggestions(errorMessage(error), classifyError(error), { colors: context.colors }));
    return EXIT_CODES.fatal;
  }
}

/**
 * Runs a command handler and exits the process with its exit code.
 */
export function withErrorHandling(handler: CliCommandHandler, context: CliContext): void {
  void executeCommand(handler, context).then((exitCode) => {
    process.exit(exitCode);
  });
}
