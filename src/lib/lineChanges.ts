import type { ChangeSide, LineChange, LineSpan } from './comparator.types';

/** Shape of a Monaco `ILineChange`, which spells its fields with a `Number` suffix. */
export interface MonacoLineChangeLike {
  originalStartLineNumber: number;
  originalEndLineNumber: number;
  modifiedStartLineNumber: number;
  modifiedEndLineNumber: number;
}

export interface LineChangeSummary {
  hunkCount: number;
  addedLineCount: number;
  removedLineCount: number;
}

export function fromMonacoLineChange(change: MonacoLineChangeLike): LineChange {
  return {
    originalStartLine: change.originalStartLineNumber,
    originalEndLine: change.originalEndLineNumber,
    modifiedStartLine: change.modifiedStartLineNumber,
    modifiedEndLine: change.modifiedEndLineNumber,
  };
}

export function fromMonacoLineChanges(changes: readonly MonacoLineChangeLike[] | null | undefined) {
  if (!changes) {
    return [];
  }

  return changes.map(fromMonacoLineChange);
}

export function getLineSpan(change: LineChange, side: ChangeSide): LineSpan {
  const start = side === 'original' ? change.originalStartLine : change.modifiedStartLine;
  const end = side === 'original' ? change.originalEndLine : change.modifiedEndLine;

  if (end <= 0) {
    return { kind: 'absent', after: Math.max(0, start) };
  }

  // A missing start falls back to the end line, as in getEffectiveLineRange.
  return { kind: 'present', start: start === 0 ? end : Math.max(1, start), end };
}

export function getOppositeSide(side: ChangeSide): ChangeSide {
  return side === 'original' ? 'modified' : 'original';
}

export function isVacuousLineChange(change: LineChange) {
  return change.originalEndLine <= 0 && change.modifiedEndLine <= 0;
}

export function getSpanLineCount(span: LineSpan) {
  return span.kind === 'present' ? span.end - span.start + 1 : 0;
}

/**
 * Range a gutter click is matched against. A missing start or end borrows the
 * other bound, and both are kept at line 1 or later.
 */
export function getEffectiveLineRange(change: LineChange, side: ChangeSide) {
  const start = side === 'original' ? change.originalStartLine : change.modifiedStartLine;
  const end = side === 'original' ? change.originalEndLine : change.modifiedEndLine;
  const startLine = start === 0 ? end : start;
  const endLine = end === 0 ? start : end;

  return {
    startLine: Math.max(1, startLine),
    endLine: Math.max(1, endLine),
  };
}

export function summarizeLineChanges(changes: readonly LineChange[]): LineChangeSummary {
  let hunkCount = 0;
  let addedLineCount = 0;
  let removedLineCount = 0;

  for (const change of changes) {
    if (isVacuousLineChange(change)) {
      continue;
    }

    hunkCount += 1;
    removedLineCount += getSpanLineCount(getLineSpan(change, 'original'));
    addedLineCount += getSpanLineCount(getLineSpan(change, 'modified'));
  }

  return { hunkCount, addedLineCount, removedLineCount };
}
