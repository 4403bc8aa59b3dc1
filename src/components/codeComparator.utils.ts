import type { editor } from 'monaco-editor';
import type { AppTheme } from '@/store/useStore';

export const LARGE_PASTE_LINE_THRESHOLD = 5;
export const PASTE_SCROLL_RESET_DELAY_MS = 100;

export const COMPARATOR_EDITOR_OPTIONS: editor.IDiffEditorConstructionOptions = {
  renderSideBySide: true,
  originalEditable: true,
  readOnly: false,
  minimap: { enabled: false },
  scrollBeyondLastLine: false,
  fontSize: 14,
  wordWrap: 'on',
  automaticLayout: true,
  padding: { top: 16 },
  glyphMargin: true,
  renderValidationDecorations: 'off',
};

export function getMonacoTheme(theme: AppTheme) {
  return theme === 'dark' ? 'vs-dark' : 'light';
}

export function countTextLines(text: string) {
  return text.split('\n').length;
}

export function isLargePaste(changes: ReadonlyArray<{ text: string }>) {
  return changes.some((change) => countTextLines(change.text) > LARGE_PASTE_LINE_THRESHOLD);
}
