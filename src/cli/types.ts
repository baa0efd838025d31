/**
 * CLI types.
 */

import type { ProposalOracle, ResolutionOracle } from '../oracle/index.js';
import type { Config, EnvRecord } from '../config/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Exit codes. Disproved is a verdict, not a failure, so it exits 0.
 */
export const EXIT_CODES = {
  settled: 0,
  unknown: 1,
  fatal: 2,
} as const;

/**
 * Where command output goes. `out` carries verdicts and transcripts,
 * `err` carries diagnostics.
 */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

/**
 * The oracles a run uses.
 */
export interface CliOracles {
  readonly resolutionOracle: ResolutionOracle;
  readonly proposalOracle?: ProposalOracle | undefined;
}

/**
 * Builds the oracles for a resolved configuration.
 */
export type OracleFactory = (config: Config, logger: Logger) => Promise<CliOracles>;

/**
 * CLI command context.
 */
export interface CliContext {
  /** Arguments after the command name. */
  args: string[];
  env: EnvRecord;
  io: CliIo;
  /** Whether to use ANSI colors in output. */
  colors: boolean;
  createOracles: OracleFactory;
  /** Creates the structured logger for a command. */
  createLogger: (debugMode: boolean) => Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code, one of {@link EXIT_CODES}.
   */
  exitCode: number;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
