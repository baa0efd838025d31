import { describe, it, expect } from 'vitest';
import { Transcript, formatTranscript, formatTranscriptEntry, verdictLabel } from './transcript.js';

describe('Transcript', () => {
  it('should keep entries in order and omit absent tags', () => {
    const transcript = new Transcript();
    transcript.add(1, 'partition', 'partition: {1, Infinity}');
    transcript.add(1, 'verdict', 'verdict: True', { piece: 1, exponent: 0 });

    expect(transcript.entries).toEqual([
      { attempt: 1, event: 'partition', message: 'partition: {1, Infinity}' },
      { attempt: 1, event: 'verdict', message: 'verdict: True', piece: 1, exponent: 0 },
    ]);
    expect('piece' in (transcript.entries[0] ?? {})).toBe(false);
  });
});

describe('formatTranscript', () => {
  it('should prefix attempt, piece and exponent', () => {
    expect(formatTranscriptEntry({ attempt: 1, piece: 2, exponent: 0, event: 'verdict', message: 'verdict: True' })).toBe(
      '[attempt 1][piece 2][c=0] verdict: True'
    );
    expect(formatTranscriptEntry({ attempt: 3, exponent: -1, event: 'oracle-log', message: 'oracle: x' })).toBe(
      '[attempt 3][c=-1] oracle: x'
    );
  });

  it('should join entries with newlines', () => {
    expect(
      formatTranscript([
        { attempt: 1, event: 'failure', message: 'MalformedProposal: EMPTY_PROPOSAL: Proposal is empty' },
        { attempt: 2, event: 'outcome', message: 'Proved with C = 10^0' },
      ])
    ).toBe('[attempt 1] MalformedProposal: EMPTY_PROPOSAL: Proposal is empty\n[attempt 2] Proved with C = 10^0');
  });

  it('should spell verdicts as the oracle does', () => {
    expect(verdictLabel('true')).toBe('True');
    expect(verdictLabel('false')).toBe('False');
    expect(verdictLabel('unknown')).toBe('Unknown');
  });
});
