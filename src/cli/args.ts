/**
 * Argument parsing for `asv` commands.
 */

/**
 * Error for a malformed command line.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parsed command arguments.
 */
export interface CommandArgs {
  /** Arguments that are not options, in order. */
  positional: string[];
  /** `--catalog <file>`. */
  catalog: string | undefined;
  /** `--config <file>`. */
  config: string | undefined;
  /** `--debug`. */
  debug: boolean;
  /** `--help` or `-h`. */
  help: boolean;
}

const VALUE_OPTIONS = new Set(['--catalog', '--config']);

/**
 * Parses the arguments that follow a command name. Options take their
 * value from the next argument or after `=`.
 *
 * @throws CliUsageError for an unknown option or a missing value.
 *
 * @example
 * ```typescript
 * parseCommandArgs(['quartic_tail', '--catalog=claims.toml']);
 * // { positional: ['quartic_tail'], catalog: 'claims.toml', config: undefined, debug: false, help: false }
 * ```
 */
export function parseCommandArgs(args: readonly string[]): CommandArgs {
  const result: CommandArgs = { positional: [], catalog: undefined, config: undefined, debug: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }
    if (arg === '--debug') {
      result.debug = true;
      continue;
    }
    if (!arg.startsWith('-')) {
      result.positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    if (!VALUE_OPTIONS.has(name)) {
      throw new CliUsageError(`Unknown option: ${name}`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === '' || value.startsWith('--')) {
      throw new CliUsageError(`Option ${name} requires a file path`);
    }

    if (name === '--catalog') {
      result.catalog = value;
    } else {
      result.config = value;
    }
  }

  return result;
}
