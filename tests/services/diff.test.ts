import { describe, it, expect } from 'vitest';
import { computeChange, computeHunks, needsWrite } from '../../src/services/diff.js';

describe('computeHunks', () => {
  it('marks source-only lines as added and destination-only lines as removed', () => {
    const hunks = computeHunks('a\nB\nc\n', 'a\nb\nc\n');
    expect(hunks).toEqual([
      {
        destStart: 1,
        destLines: 3,
        sourceStart: 1,
        sourceLines: 3,
        lines: [
          { kind: 'context', text: 'a' },
          { kind: 'removed', text: 'b' },
          { kind: 'added', text: 'B' },
          { kind: 'context', text: 'c' },
        ],
      },
    ]);
  });

  it('returns no hunks for equal text', () => {
    expect(computeHunks('same\n', 'same\n')).toEqual([]);
  });

  it('keeps three lines of context', () => {
    const dest = ['1', '2', '3', '4', '5', '6', '7', '8', '9'].join('\n') + '\n';
    const source = dest.replace('5', 'five');
    const [hunk] = computeHunks(source, dest);
    expect(hunk.destStart).toBe(2);
    expect(hunk.destLines).toBe(7);
    expect(hunk.lines.map(line => line.text)).toEqual(['2', '3', '4', '5', 'five', '6', '7', '8']);
  });
});

describe('computeChange', () => {
  it('reports a missing source before anything else', () => {
    expect(computeChange(undefined, Buffer.from('x'))).toEqual({ kind: 'source-missing' });
    expect(computeChange(undefined, undefined)).toEqual({ kind: 'source-missing' });
  });

  it('reports a missing destination', () => {
    expect(computeChange(Buffer.from('x'), undefined)).toEqual({ kind: 'dest-missing' });
  });

  it('compares bytes for identity', () => {
    expect(computeChange(Buffer.from('x\n'), Buffer.from('x\n'))).toEqual({ kind: 'identical' });
  });

  it('reports binary differences without hunks', () => {
    const change = computeChange(Buffer.from([0xff, 0x00]), Buffer.from([0xff, 0x01]));
    expect(change).toEqual({ kind: 'changed', hunks: [], binary: true });
  });

  it('reports text differences with hunks', () => {
    const change = computeChange(Buffer.from('new\n'), Buffer.from('old\n'));
    expect(change.kind).toBe('changed');
    if (change.kind === 'changed') {
      expect(change.binary).toBe(false);
      expect(change.hunks).toHaveLength(1);
      expect(change.hunks[0].lines).toEqual([
        { kind: 'removed', text: 'old' },
        { kind: 'added', text: 'new' },
      ]);
    }
  });
});

describe('needsWrite', () => {
  it('is true only for changes and missing destinations', () => {
    expect(needsWrite({ kind: 'changed', hunks: [], binary: false })).toBe(true);
    expect(needsWrite({ kind: 'dest-missing' })).toBe(true);
    expect(needsWrite({ kind: 'identical' })).toBe(false);
    expect(needsWrite({ kind: 'source-missing' })).toBe(false);
  });
});
