/**
 * `asv list`: prints the claims of a catalog.
 */

import { describeClaim, loadClaimCatalog } from '../../claims/index.js';
import { CliUsageError, parseCommandArgs } from '../args.js';
import { EXIT_CODES, type CliCommandResult, type CliContext } from '../types.js';

/** Catalog read when `--catalog` is not given. */
export const DEFAULT_CATALOG_PATH = 'claims.toml';

/**
 * Prints one line per claim: name, kind and statement.
 */
export async function handleListCommand(context: CliContext): Promise<CliCommandResult> {
  const args = parseCommandArgs(context.args);
  if (args.positional.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${args.positional.join(' ')}`);
  }

  const catalog = await loadClaimCatalog(args.catalog ?? DEFAULT_CATALOG_PATH);
  if (catalog.size === 0) {
    context.io.out('(no claims)');
  }
  for (const [name, claim] of catalog) {
    context.io.out(`${name} (${claim.kind}): ${describeClaim(claim)}`);
  }
  return { exitCode: EXIT_CODES.settled };
}
