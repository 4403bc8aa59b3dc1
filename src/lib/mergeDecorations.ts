import {
  MODIFIED_MARKER_CLASS,
  ORIGINAL_MARKER_CLASS,
  type ComparatorDocument,
  type LineChange,
  type LineSpan,
  type MergeMarker,
  type MergeMarkerClassName,
  type MergeMarkerSet,
} from './comparator.types';
import { clampLineNumber, isDocumentEmpty, isLiveDocument } from './lineBounds';
import { getLineSpan } from './lineChanges';

export interface MergeHoverMessages {
  copyFromOriginal: string;
  copyFromModified: string;
}

export const DEFAULT_MERGE_HOVER_MESSAGES: MergeHoverMessages = {
  copyFromOriginal: '← Copy from Original',
  copyFromModified: '→ Copy from Modified',
};

function emptyMarkerSet(): MergeMarkerSet {
  return { originalMarkers: [], modifiedMarkers: [] };
}

// Absent spans anchor on the line they follow so degenerate hunks stay clickable.
function resolveAnchorLine(span: LineSpan, maxLine: number) {
  const line = span.kind === 'present' ? span.start : span.after || 1;
  return clampLineNumber(line, maxLine);
}

export function buildMergeMarkers(
  changes: readonly LineChange[],
  original: Pick<ComparatorDocument, 'getLineCount' | 'getValue'>,
  modified: Pick<ComparatorDocument, 'getLineCount' | 'getValue'>,
  hoverMessages: MergeHoverMessages = DEFAULT_MERGE_HOVER_MESSAGES
): MergeMarkerSet {
  const originalEmpty = isDocumentEmpty(original);
  const modifiedEmpty = isDocumentEmpty(modified);

  if (changes.length === 0 || (originalEmpty && modifiedEmpty)) {
    return emptyMarkerSet();
  }

  const originalMaxLine = original.getLineCount();
  const modifiedMaxLine = modified.getLineCount();
  const markers = emptyMarkerSet();

  for (const change of changes) {
    const originalSpan = getLineSpan(change, 'original');
    const modifiedSpan = getLineSpan(change, 'modified');

    if (!modifiedEmpty && originalSpan.kind === 'present') {
      markers.modifiedMarkers.push({
        side: 'modified',
        lineNumber: resolveAnchorLine(modifiedSpan, modifiedMaxLine),
        className: MODIFIED_MARKER_CLASS,
        hoverMessage: hoverMessages.copyFromOriginal,
      });
    }

    if (!originalEmpty && modifiedSpan.kind === 'present') {
      markers.originalMarkers.push({
        side: 'original',
        lineNumber: resolveAnchorLine(originalSpan, originalMaxLine),
        className: ORIGINAL_MARKER_CLASS,
        hoverMessage: hoverMessages.copyFromModified,
      });
    }
  }

  return markers;
}

/** Drops every marker previously placed under `className`, then places `markers`. */
export function replaceMergeMarkers(
  document: ComparatorDocument | null | undefined,
  className: MergeMarkerClassName,
  markers: MergeMarker[]
) {
  if (!isLiveDocument(document)) {
    return [];
  }

  const previousIds = document.getMergeDecorationIds(className);
  if (previousIds.length === 0 && markers.length === 0) {
    return [];
  }

  return document.deltaMergeDecorations(previousIds, markers);
}

export function syncMergeDecorations(
  changes: readonly LineChange[] | null | undefined,
  original: ComparatorDocument | null | undefined,
  modified: ComparatorDocument | null | undefined,
  hoverMessages: MergeHoverMessages = DEFAULT_MERGE_HOVER_MESSAGES
): MergeMarkerSet {
  if (!isLiveDocument(original) || !isLiveDocument(modified)) {
    return emptyMarkerSet();
  }

  const markers = buildMergeMarkers(changes ?? [], original, modified, hoverMessages);

  replaceMergeMarkers(modified, MODIFIED_MARKER_CLASS, markers.modifiedMarkers);
  replaceMergeMarkers(original, ORIGINAL_MARKER_CLASS, markers.originalMarkers);

  return markers;
}
