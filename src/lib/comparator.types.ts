export type ChangeSide = 'original' | 'modified';

export type MergeDirection = 'toModified' | 'toOriginal';

/**
 * One diff hunk between the two panes. Line numbers are 1-based; a side whose
 * `EndLine` is 0 has no lines in the hunk and its `StartLine` names the line
 * after which the other side's lines belong.
 */
export interface LineChange {
  originalStartLine: number;
  originalEndLine: number;
  modifiedStartLine: number;
  modifiedEndLine: number;
}

export type LineSpan =
  | { kind: 'present'; start: number; end: number }
  | { kind: 'absent'; after: number };

export interface TextRange {
  startLineNumber: number;
  startColumn: number;
  endLineNumber: number;
  endColumn: number;
}

export interface TextEdit {
  range: TextRange;
  text: string;
}

export const ORIGINAL_MARKER_CLASS = 'merge-arrow-left';
export const MODIFIED_MARKER_CLASS = 'merge-arrow-right';

export type MergeMarkerClassName = typeof ORIGINAL_MARKER_CLASS | typeof MODIFIED_MARKER_CLASS;

export interface MergeMarker {
  side: ChangeSide;
  lineNumber: number;
  className: MergeMarkerClassName;
  hoverMessage: string;
}

export interface MergeMarkerSet {
  originalMarkers: MergeMarker[];
  modifiedMarkers: MergeMarker[];
}

/**
 * Narrow handle over one editor pane. The pane is owned by the host and may be
 * torn down at any time, so callers check `isDisposed()` before each use.
 */
export interface ComparatorDocument {
  isDisposed(): boolean;
  getLineCount(): number;
  getValue(): string;
  setValue(value: string): void;
  getValueInRange(range: TextRange): string;
  applyEdit(edit: TextEdit): void;
  getMergeDecorationIds(className: MergeMarkerClassName): string[];
  deltaMergeDecorations(oldIds: string[], markers: MergeMarker[]): string[];
}
