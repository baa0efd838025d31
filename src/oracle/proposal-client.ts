/**
 * Proposal Oracle backed by an external command.
 *
 * The prompt is written to the command's stdin and its stdout is taken as
 * the response, so any CLI that reads a prompt and prints an answer can
 * serve as the proposer.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { Claim } from '../claims/index.js';
import { errorMessage } from '../utils/guards.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import { buildProposalPrompt } from './prompts.js';
import { DEFAULT_ORACLE_TIMEOUT_MS, OracleTransportError, type ProposalOracle } from './types.js';

/**
 * Options for creating a CommandProposalOracle.
 */
export interface CommandProposalOracleOptions {
  readonly command: string;
  /** Extra arguments passed on every call. */
  readonly args?: readonly string[];
  /** Time limit per call in milliseconds (default: 120000). */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
  /** Overrides the prompt text. */
  readonly buildPrompt?: (claim: Claim) => string;
}

/**
 * Runs a command per proposal request.
 *
 * @example
 * ```typescript
 * const proposer = new CommandProposalOracle({ command: 'llm', args: ['-m', 'some-model'] });
 * const text = await proposer.proposePartition(claim);
 * ```
 */
export class CommandProposalOracle implements ProposalOracle {
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly buildPrompt: (claim: Claim) => string;

  constructor(options: CommandProposalOracleOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger('proposal-oracle');
    this.buildPrompt = options.buildPrompt ?? buildProposalPrompt;
  }

  async proposePartition(claim: Claim): Promise<string> {
    const prompt = this.buildPrompt(claim);
    this.logger.debug('proposal_call', { command: this.command, promptLength: prompt.length });

    let result;
    try {
      result = await execa(this.command, [...this.args], {
        input: prompt,
        timeout: this.timeoutMs,
        reject: false,
      });
    } catch (error) {
      throw new OracleTransportError(`Failed to launch '${this.command}': ${errorMessage(error)}`, {
        oracle: 'proposal',
        cause: error,
      });
    }

    if (result.timedOut) {
      throw new OracleTransportError(`Proposal oracle timed out after ${String(this.timeoutMs)}ms`, {
        oracle: 'proposal',
        timedOut: true,
      });
    }
    if (result.exitCode === undefined) {
      throw new OracleTransportError(`Failed to launch '${this.command}'`, { oracle: 'proposal' });
    }
    if (result.exitCode !== 0) {
      throw new OracleTransportError(
        `'${this.command}' exited with code ${String(result.exitCode)}. Stderr: ${result.stderr || '(empty)'}`,
        { oracle: 'proposal' }
      );
    }

    this.logger.debug('proposal_response', { length: result.stdout.length });
    return result.stdout;
  }
}
