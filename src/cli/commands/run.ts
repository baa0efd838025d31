/**
 * `asv run <name>`: verifies one catalog claim and prints the transcript
 * and the verdict.
 */

import { ClaimCatalogError, describeClaim, loadClaimCatalog } from '../../claims/index.js';
import { resolveConfig, toVerificationSettings } from '../../config/index.js';
import { VerificationController, describeVerdict, formatTranscript } from '../../verification/index.js';
import { CliUsageError, parseCommandArgs } from '../args.js';
import { EXIT_CODES, type CliCommandResult, type CliContext } from '../types.js';
import { DEFAULT_CATALOG_PATH } from './list.js';

/**
 * Runs the verification controller on the named claim.
 *
 * Exits 0 for Proved and Disproved and 1 for Unknown. Construction errors
 * (bad arguments, catalog, config or an unavailable oracle) are thrown.
 */
export async function handleRunCommand(context: CliContext): Promise<CliCommandResult> {
  const args = parseCommandArgs(context.args);
  const [name, ...extra] = args.positional;
  if (name === undefined || extra.length > 0) {
    throw new CliUsageError('Expected exactly one claim name');
  }

  const catalogPath = args.catalog ?? DEFAULT_CATALOG_PATH;
  const catalog = await loadClaimCatalog(catalogPath);
  const claim = catalog.get(name);
  if (claim === undefined) {
    throw new ClaimCatalogError(
      `Unknown claim '${name}' in '${catalogPath}'. Known claims: ${[...catalog.keys()].join(', ') || '(none)'}`
    );
  }

  const config = await resolveConfig({ path: args.config, env: context.env });
  const logger = context.createLogger(args.debug || config.logging.debug);
  const oracles = await context.createOracles(config, logger);

  const controller = new VerificationController({
    ...oracles,
    settings: toVerificationSettings(config),
    logger: logger.child('VerificationController'),
  });
  const run = await controller.verify(claim);

  context.io.out(`claim: ${name}`);
  context.io.out(`statement: ${describeClaim(claim)}`);
  context.io.out(formatTranscript(run.transcript));
  context.io.out(`verdict: ${describeVerdict(run.verdict)}`);

  return { exitCode: run.verdict.status === 'unknown' ? EXIT_CODES.unknown : EXIT_CODES.settled };
}
