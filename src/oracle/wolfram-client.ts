/**
 * Resolution Oracle client for a Wolfram Language engine.
 *
 * Local transport runs `wolframscript -code <program>` as a subprocess.
 * Remote transport POSTs the program as a `code` form field to an
 * evaluation endpoint and reads the response body.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import { renderForallProgram, type ForallQuery } from '../query/index.js';
import { errorMessage } from '../utils/guards.js';
import { toOracleVerdict } from './payload.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import {
  DEFAULT_ORACLE_TIMEOUT_MS,
  OracleTransportError,
  OracleUnavailableError,
  type OracleTransport,
  type OracleVerdict,
  type ResolutionOracle,
} from './types.js';

/**
 * Options for creating a WolframResolutionOracle.
 */
export interface WolframResolutionOracleOptions {
  readonly transport: OracleTransport;
  /** Time limit per call in milliseconds (default: 120000). */
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

/** Time limit for the `-version` launch check. */
const VERSION_CHECK_TIMEOUT_MS = 10000;

/**
 * Copies the environment without the `DYLD*` loader variables, which stop
 * the engine from starting on macOS.
 */
export function sanitizedEnvironment(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && !key.startsWith('DYLD')) {
      result[key] = value;
    }
  }
  return result;
}

function describeTransport(transport: OracleTransport): string {
  return transport.kind === 'local' ? transport.executable : transport.endpoint;
}

/**
 * Resolution Oracle backed by a Wolfram Language engine.
 *
 * @example
 * ```typescript
 * const oracle = new WolframResolutionOracle({
 *   transport: { kind: 'local', executable: 'wolframscript' },
 * });
 * const verdict = await oracle.resolveForall(query); // 'true' | 'false' | 'unknown'
 * ```
 */
export class WolframResolutionOracle implements ResolutionOracle {
  private readonly transport: OracleTransport;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: WolframResolutionOracleOptions) {
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger('resolution-oracle');
  }

  async resolveForall(query: ForallQuery): Promise<OracleVerdict> {
    const output = await this.run(`ToString[(${renderForallProgram(query)}), InputForm]`, 'forall');
    const verdict = toOracleVerdict(output);
    if (verdict === 'unknown') {
      this.logger.debug('oracle_semantic_unknown', { output });
    }
    return verdict;
  }

  async evaluate(program: string): Promise<unknown> {
    const output = await this.run(`ExportString[(${program}), "JSON"]`, 'evaluate');
    try {
      return JSON.parse(output) as unknown;
    } catch (error) {
      throw new OracleTransportError(`Resolution oracle returned undecodable JSON: ${errorMessage(error)}`, {
        oracle: 'resolution',
        cause: error,
      });
    }
  }

  private async run(code: string, call: 'forall' | 'evaluate'): Promise<string> {
    const startTime = Date.now();
    this.logger.debug('oracle_call', {
      transport: this.transport.kind,
      target: describeTransport(this.transport),
      call,
      codeLength: code.length,
    });

    try {
      const output =
        this.transport.kind === 'local'
          ? await this.runLocal(this.transport.executable, code)
          : await this.runRemote(this.transport.endpoint, code);
      this.logger.debug('oracle_response', { call, latencyMs: Date.now() - startTime });
      return output;
    } catch (error) {
      this.logger.warn('oracle_transport_error', { call, error: errorMessage(error) });
      throw error;
    }
  }

  private async runLocal(executable: string, code: string): Promise<string> {
    let result;
    try {
      result = await execa(executable, ['-code', code], {
        timeout: this.timeoutMs,
        reject: false,
        env: sanitizedEnvironment(),
        extendEnv: false,
      });
    } catch (error) {
      throw new OracleTransportError(`Failed to launch '${executable}': ${errorMessage(error)}`, {
        oracle: 'resolution',
        cause: error,
      });
    }

    if (result.timedOut) {
      throw new OracleTransportError(`Resolution oracle timed out after ${String(this.timeoutMs)}ms`, {
        oracle: 'resolution',
        timedOut: true,
      });
    }
    if (result.exitCode === undefined) {
      throw new OracleTransportError(`Failed to launch '${executable}'`, { oracle: 'resolution' });
    }
    if (result.exitCode !== 0) {
      throw new OracleTransportError(
        `'${executable}' exited with code ${String(result.exitCode)}. Stderr: ${result.stderr || '(empty)'}`,
        { oracle: 'resolution' }
      );
    }

    return result.stdout.trim();
  }

  private async runRemote(endpoint: string, code: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({ code }).toString(),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new OracleTransportError(`HTTP ${String(response.status)}: ${response.statusText}`, {
          oracle: 'resolution',
        });
      }

      return (await response.text()).trim();
    } catch (error) {
      if (error instanceof OracleTransportError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new OracleTransportError(`Request timeout after ${String(this.timeoutMs)}ms`, {
          oracle: 'resolution',
          timedOut: true,
          cause: error,
        });
      }
      throw new OracleTransportError(`Request to ${endpoint} failed: ${errorMessage(error)}`, {
        oracle: 'resolution',
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Checks that a local engine launches.
 *
 * @throws OracleUnavailableError if `<executable> -version` cannot be run
 * or exits non-zero.
 */
export async function checkWolframScript(executable: string): Promise<void> {
  let result;
  try {
    result = await execa(executable, ['-version'], {
      timeout: VERSION_CHECK_TIMEOUT_MS,
      reject: false,
      env: sanitizedEnvironment(),
      extendEnv: false,
    });
  } catch (error) {
    throw new OracleUnavailableError(
      `Resolution oracle executable '${executable}' could not be launched: ${errorMessage(error)}`,
      error
    );
  }

  if (result.exitCode === undefined) {
    throw new OracleUnavailableError(
      `Resolution oracle executable '${executable}' could not be launched. ` +
        'Set WOLFRAMSCRIPT or [oracle].executable, or configure a remote endpoint.'
    );
  }
  if (result.exitCode !== 0) {
    throw new OracleUnavailableError(
      `Resolution oracle executable '${executable}' returned exit code ${String(result.exitCode)}. ` +
        `Stderr: ${result.stderr || '(empty)'}`
    );
  }
}

/**
 * Creates a WolframResolutionOracle after checking that its transport is
 * usable: a local executable must launch and a remote endpoint must be an
 * http(s) URL.
 *
 * @throws OracleUnavailableError if the transport cannot be used.
 */
export async function createWolframResolutionOracle(
  options: WolframResolutionOracleOptions
): Promise<WolframResolutionOracle> {
  const { transport } = options;
  if (transport.kind === 'local') {
    await checkWolframScript(transport.executable);
  } else {
    let url: URL;
    try {
      url = new URL(transport.endpoint);
    } catch (error) {
      throw new OracleUnavailableError(`Invalid resolution oracle endpoint '${transport.endpoint}'`, error);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new OracleUnavailableError(
        `Resolution oracle endpoint must use http or https, got '${url.protocol}'`
      );
    }
  }
  return new WolframResolutionOracle(options);
}
