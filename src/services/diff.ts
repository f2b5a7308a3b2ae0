/**
 * Diff Service
 * Line-oriented change detection between effective source content and a destination
 */

import * as diff from 'diff';
import { DIFF_CONTEXT_LINES } from '../constants.js';
import { decodeText } from './template.js';
import type { ChangeResult, DiffLine, Hunk } from '../types/index.js';

function toDiffLine(line: string): DiffLine | undefined {
  switch (line[0]) {
    case '+':
      return { kind: 'added', text: line.slice(1) };
    case '-':
      return { kind: 'removed', text: line.slice(1) };
    case ' ':
      return { kind: 'context', text: line.slice(1) };
    default:
      // "\ No newline at end of file"
      return undefined;
  }
}

/**
 * Hunks turning `destText` into `sourceText`. Lines only in the source are
 * `added`, lines only in the destination are `removed`.
 */
export function computeHunks(sourceText: string, destText: string, context = DIFF_CONTEXT_LINES): Hunk[] {
  const patch = diff.structuredPatch('dest', 'source', destText, sourceText, '', '', { context });
  return patch.hunks.map(hunk => ({
    destStart: hunk.oldStart,
    destLines: hunk.oldLines,
    sourceStart: hunk.newStart,
    sourceLines: hunk.newLines,
    lines: hunk.lines
      .map(toDiffLine)
      .filter((line): line is DiffLine => line !== undefined),
  }));
}

/**
 * Compare effective source content against the destination.
 * Undefined content means the file does not exist.
 */
export function computeChange(source: Buffer | undefined, dest: Buffer | undefined): ChangeResult {
  if (source === undefined) {
    return { kind: 'source-missing' };
  }
  if (dest === undefined) {
    return { kind: 'dest-missing' };
  }
  if (source.equals(dest)) {
    return { kind: 'identical' };
  }

  const sourceText = decodeText(source);
  const destText = decodeText(dest);
  if (sourceText === undefined || destText === undefined) {
    return { kind: 'changed', hunks: [], binary: true };
  }
  return { kind: 'changed', hunks: computeHunks(sourceText, destText), binary: false };
}

export function needsWrite(change: ChangeResult): boolean {
  return change.kind === 'changed' || change.kind === 'dest-missing';
}
