/**
 * Run transcript.
 *
 * Entries are appended in the order events happen and carry their attempt,
 * piece and exponent so that tests and callers can filter them without
 * parsing the rendered lines.
 *
 * @packageDocumentation
 */

import type { OracleVerdict } from '../oracle/index.js';
import type { TranscriptEntry, TranscriptEvent } from './types.js';

const VERDICT_LABELS: Readonly<Record<OracleVerdict, string>> = {
  true: 'True',
  false: 'False',
  unknown: 'Unknown',
};

/**
 * Renders an oracle verdict the way the oracle spells it.
 */
export function verdictLabel(verdict: OracleVerdict): string {
  return VERDICT_LABELS[verdict];
}

/**
 * Append-only list of {@link TranscriptEntry} values.
 */
export class Transcript {
  private readonly items: TranscriptEntry[] = [];

  get entries(): readonly TranscriptEntry[] {
    return this.items;
  }

  add(
    attempt: number,
    event: TranscriptEvent,
    message: string,
    position: { readonly piece?: number; readonly exponent?: number } = {}
  ): void {
    const entry: TranscriptEntry = { attempt, event, message };
    this.items.push({
      ...entry,
      ...(position.piece !== undefined ? { piece: position.piece } : {}),
      ...(position.exponent !== undefined ? { exponent: position.exponent } : {}),
    });
  }
}

/**
 * Renders one entry as `[attempt N][piece P][c=E] message`, omitting the
 * tags an entry does not have.
 */
export function formatTranscriptEntry(entry: TranscriptEntry): string {
  let prefix = `[attempt ${String(entry.attempt)}]`;
  if (entry.piece !== undefined) {
    prefix += `[piece ${String(entry.piece)}]`;
  }
  if (entry.exponent !== undefined) {
    prefix += `[c=${String(entry.exponent)}]`;
  }
  return `${prefix} ${entry.message}`;
}

/**
 * Renders a transcript, one entry per line.
 *
 * @example
 * ```typescript
 * formatTranscript([{ attempt: 1, piece: 2, exponent: 0, event: 'verdict', message: 'verdict: True' }]);
 * // '[attempt 1][piece 2][c=0] verdict: True'
 * ```
 */
export function formatTranscript(entries: readonly TranscriptEntry[]): string {
  return entries.map(formatTranscriptEntry).join('\n');
}
