import type { ComparatorDocument } from './comparator.types';

export function clampLineNumber(line: number, maxLine: number) {
  if (line < 1) {
    return 1;
  }

  if (line > maxLine) {
    return maxLine;
  }

  return line;
}

export function isDocumentEmpty(document: Pick<ComparatorDocument, 'getLineCount' | 'getValue'>) {
  const lineCount = document.getLineCount();
  return lineCount === 0 || (lineCount === 1 && document.getValue().trim() === '');
}

export function isLiveDocument(
  document: ComparatorDocument | null | undefined
): document is ComparatorDocument {
  return !!document && !document.isDisposed();
}
