/**
 * asymptotic-verifier
 *
 * Decomposes asymptotic claims into pieces, asks a symbolic engine to
 * decide each piece for candidate constants `C = 10^c`, and reports
 * Proved, Disproved or Unknown with a transcript.
 *
 * @packageDocumentation
 */

import type { Claim } from './claims/index.js';
import {
  VerificationController,
  type VerificationControllerOptions,
  type VerificationRun,
} from './verification/index.js';

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

/**
 * Verifies one claim with a fresh controller.
 *
 * @example
 * ```typescript
 * const run = await verifyClaim(claim, { resolutionOracle });
 * console.log(run.verdict.status);
 * ```
 */
export async function verifyClaim(claim: Claim, options: VerificationControllerOptions): Promise<VerificationRun> {
  return new VerificationController(options).verify(claim);
}

export * from './claims/index.js';
export * from './expression/index.js';
export * from './partition/index.js';
export * from './query/index.js';
export * from './oracle/index.js';
export * from './search/index.js';
export * from './verification/index.js';
export * from './config/index.js';
export { Logger, createSilentLogger, type LogEntry, type LogLevel, type LogSink, type LoggerOptions } from './utils/logger.js';
