/**
 * CLI application context and oracle wiring.
 */

import { resolveTransport, type Config } from '../config/index.js';
import { CommandProposalOracle, createWolframResolutionOracle } from '../oracle/index.js';
import { Logger } from '../utils/logger.js';
import type { CliContext, CliIo, CliOracles } from './types.js';

const consoleIo: CliIo = {
  out: (line) => {
    console.log(line);
  },
  err: (line) => {
    console.error(line);
  },
};

/**
 * Builds the resolution oracle from `[oracle]` and, when enabled, the
 * proposal oracle from `[proposal]`.
 *
 * @throws OracleUnavailableError if the local executable cannot be launched.
 */
export async function createOraclesFromConfig(config: Config, logger: Logger): Promise<CliOracles> {
  const resolutionOracle = await createWolframResolutionOracle({
    transport: resolveTransport(config),
    timeoutMs: config.oracle.timeout_ms,
    logger: logger.child('WolframResolutionOracle'),
  });

  const { proposal } = config;
  if (!proposal.enabled || proposal.command === undefined) {
    return { resolutionOracle };
  }
  const proposalOracle = new CommandProposalOracle({
    command: proposal.command,
    args: proposal.args,
    timeoutMs: proposal.timeout_ms,
    logger: logger.child('CommandProposalOracle'),
  });
  return { resolutionOracle, proposalOracle };
}

/**
 * Creates the CLI context for a process.
 *
 * @param args - Arguments after the command name.
 * @param overrides - Replacements for the process defaults.
 */
export function createCliApp(args: string[], overrides: Partial<CliContext> = {}): CliContext {
  return {
    args,
    env: overrides.env ?? process.env,
    io: overrides.io ?? consoleIo,
    colors: overrides.colors ?? process.stdout.isTTY === true,
    createOracles: overrides.createOracles ?? createOraclesFromConfig,
    createLogger: overrides.createLogger ?? ((debugMode): Logger => new Logger({ component: 'asv', debugMode })),
  };
}
