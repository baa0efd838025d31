/**
 * Decoding of the batched series program's result.
 *
 * @packageDocumentation
 */

import { isRecord } from '../utils/guards.js';
import { OracleTransportError, type OracleVerdict } from './types.js';

/**
 * Decoded `<|"Logs" -> ..., "Result" -> ...|>` association.
 */
export interface SeriesPayload {
  /** The program's own log lines, in order. */
  readonly logs: readonly string[];
  /** `all-true` when every subrange resolved to `True`. */
  readonly verdicts: 'all-true' | readonly OracleVerdict[];
}

/**
 * Reads an `InputForm` answer as a verdict.
 */
export function toOracleVerdict(output: string): OracleVerdict {
  switch (output.trim()) {
    case 'True':
      return 'true';
    case 'False':
      return 'false';
    default:
      return 'unknown';
  }
}

function decodeVerdict(value: unknown): OracleVerdict {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    return toOracleVerdict(value);
  }
  return 'unknown';
}

function invalid(detail: string): OracleTransportError {
  return new OracleTransportError(`Unexpected series payload: ${detail}`, { oracle: 'resolution' });
}

/**
 * Decodes the JSON value returned by a series program.
 *
 * A bare `true` means every subrange held; a bare `false` counts as one
 * `false` verdict. A list result yields one verdict per subrange; entries
 * other than `True`/`False` are `unknown`.
 *
 * @throws OracleTransportError if the value has neither form.
 */
export function parseSeriesPayload(value: unknown): SeriesPayload {
  if (typeof value === 'boolean') {
    return { logs: [], verdicts: value ? 'all-true' : ['false'] };
  }
  if (!isRecord(value)) {
    throw invalid(`expected an object, got ${Array.isArray(value) ? 'array' : typeof value}`);
  }

  const rawLogs = value.Logs ?? [];
  if (!Array.isArray(rawLogs)) {
    throw invalid('"Logs" is not a list');
  }
  const logs = rawLogs.map((line) => (typeof line === 'string' ? line : JSON.stringify(line)));

  const result = value.Result;
  if (result === true) {
    return { logs, verdicts: 'all-true' };
  }
  if (result === false) {
    return { logs, verdicts: ['false'] };
  }
  if (Array.isArray(result)) {
    return { logs, verdicts: result.map(decodeVerdict) };
  }
  throw invalid('"Result" is neither True nor a list of verdicts');
}
