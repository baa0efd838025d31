/**
 * Version command handler.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import { isRecord } from '../../utils/guards.js';
import { EXIT_CODES, type CliCommandResult, type CliContext } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  try {
    const packageJsonPath = join(__dirname, '../../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(context: CliContext): Promise<CliCommandResult> {
  context.io.out(`asymptotic-verifier v${getVersionFromPackageJson()}`);
  return Promise.resolve({ exitCode: EXIT_CODES.settled });
}
