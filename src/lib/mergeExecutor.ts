import type {
  ChangeSide,
  ComparatorDocument,
  LineChange,
  MergeDirection,
  TextEdit,
  TextRange,
} from './comparator.types';
import { isLiveDocument } from './lineBounds';
import { getLineSpan, getOppositeSide } from './lineChanges';

export const MERGE_EDIT_SOURCE = 'merge-tool';

const LINE_END_COLUMN = Number.MAX_SAFE_INTEGER;

export type MergeEditKind = 'delete' | 'insert' | 'replace';

export interface MergePlan {
  kind: MergeEditKind;
  edit: TextEdit;
}

export function getMergeSourceSide(direction: MergeDirection): ChangeSide {
  return direction === 'toModified' ? 'original' : 'modified';
}

export function getMergeDirectionForClickedSide(side: ChangeSide): MergeDirection {
  return side === 'modified' ? 'toModified' : 'toOriginal';
}

function pointRange(lineNumber: number, column: number): TextRange {
  return {
    startLineNumber: lineNumber,
    startColumn: column,
    endLineNumber: lineNumber,
    endColumn: column,
  };
}

function fullLinesRange(startLine: number, endLine: number): TextRange {
  return {
    startLineNumber: startLine,
    startColumn: 1,
    endLineNumber: endLine,
    endColumn: LINE_END_COLUMN,
  };
}

function deletionRange(startLine: number, endLine: number, targetLineCount: number): TextRange {
  if (endLine < targetLineCount) {
    return {
      startLineNumber: startLine,
      startColumn: 1,
      endLineNumber: endLine + 1,
      endColumn: 1,
    };
  }

  if (startLine > 1) {
    return {
      startLineNumber: startLine - 1,
      startColumn: LINE_END_COLUMN,
      endLineNumber: endLine,
      endColumn: LINE_END_COLUMN,
    };
  }

  return fullLinesRange(1, endLine);
}

function insertionEdit(afterLine: number, text: string, targetLineCount: number): TextEdit {
  if (afterLine <= 0) {
    return { range: pointRange(1, 1), text: `${text}\n` };
  }

  if (afterLine < targetLineCount) {
    return { range: pointRange(afterLine + 1, 1), text: `${text}\n` };
  }

  return { range: pointRange(targetLineCount, LINE_END_COLUMN), text: `\n${text}` };
}

/**
 * Edit that makes the target side of `change` match its source side. Returns
 * null for a change with no lines on either side.
 */
export function planMerge(
  change: LineChange,
  source: Pick<ComparatorDocument, 'getValueInRange'>,
  target: Pick<ComparatorDocument, 'getLineCount'>,
  direction: MergeDirection
): MergePlan | null {
  const sourceSide = getMergeSourceSide(direction);
  const sourceSpan = getLineSpan(change, sourceSide);
  const targetSpan = getLineSpan(change, getOppositeSide(sourceSide));

  if (sourceSpan.kind === 'absent') {
    if (targetSpan.kind === 'absent') {
      return null;
    }

    return {
      kind: 'delete',
      edit: {
        range: deletionRange(targetSpan.start, targetSpan.end, target.getLineCount()),
        text: '',
      },
    };
  }

  const sourceText = source.getValueInRange(fullLinesRange(sourceSpan.start, sourceSpan.end));

  if (targetSpan.kind === 'absent') {
    return {
      kind: 'insert',
      edit: insertionEdit(targetSpan.after, sourceText, target.getLineCount()),
    };
  }

  return {
    kind: 'replace',
    edit: {
      range: fullLinesRange(targetSpan.start, targetSpan.end),
      text: sourceText,
    },
  };
}

export function executeMerge(
  change: LineChange,
  source: ComparatorDocument | null | undefined,
  target: ComparatorDocument | null | undefined,
  direction: MergeDirection
): MergePlan | null {
  if (!isLiveDocument(source) || !isLiveDocument(target)) {
    return null;
  }

  const plan = planMerge(change, source, target, direction);
  if (!plan) {
    return null;
  }

  target.applyEdit(plan.edit);
  return plan;
}
