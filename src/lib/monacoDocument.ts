import type { IRange, editor } from 'monaco-editor';
import type { ComparatorDocument, MergeMarker } from './comparator.types';
import { MERGE_EDIT_SOURCE } from './mergeExecutor';

export interface MonacoModelLike {
  isDisposed(): boolean;
  getLineCount(): number;
  getValue(): string;
  setValue(value: string): void;
  getValueInRange(range: IRange): string;
  getAllDecorations(): Array<{ id: string; options: { glyphMarginClassName?: string | null } }>;
}

/** The slice of `editor.ICodeEditor` the comparator reads and writes through. */
export interface MonacoCodeEditorLike {
  getModel(): MonacoModelLike | null;
  deltaDecorations(oldDecorations: string[], newDecorations: editor.IModelDeltaDecoration[]): string[];
  executeEdits(source: string | null | undefined, edits: editor.IIdentifiedSingleEditOperation[]): boolean;
  pushUndoStop(): boolean;
}

export function toMonacoDecoration(marker: MergeMarker): editor.IModelDeltaDecoration {
  return {
    range: {
      startLineNumber: marker.lineNumber,
      startColumn: 1,
      endLineNumber: marker.lineNumber,
      endColumn: 1,
    },
    options: {
      isWholeLine: false,
      glyphMarginClassName: marker.className,
      glyphMarginHoverMessage: { value: marker.hoverMessage },
    },
  };
}

/**
 * Wraps the model currently attached to `codeEditor`. The handle reports itself
 * disposed once that model is disposed or the editor switches to another model.
 */
export function createMonacoDocument(
  codeEditor: MonacoCodeEditorLike | null | undefined
): ComparatorDocument | null {
  const model = codeEditor?.getModel();
  if (!codeEditor || !model || model.isDisposed()) {
    return null;
  }

  return {
    isDisposed: () => model.isDisposed() || codeEditor.getModel() !== model,
    getLineCount: () => model.getLineCount(),
    getValue: () => model.getValue(),
    setValue: (value) => model.setValue(value),
    getValueInRange: (range) => model.getValueInRange(range),
    applyEdit: (edit) => {
      codeEditor.pushUndoStop();
      const applied = codeEditor.executeEdits(MERGE_EDIT_SOURCE, [{ range: edit.range, text: edit.text }]);
      codeEditor.pushUndoStop();

      if (!applied) {
        console.warn('Merge edit was rejected by the editor:', edit.range);
      }
    },
    getMergeDecorationIds: (className) =>
      model
        .getAllDecorations()
        .filter((decoration) => decoration.options.glyphMarginClassName === className)
        .map((decoration) => decoration.id),
    deltaMergeDecorations: (oldIds, markers) =>
      codeEditor.deltaDecorations(oldIds, markers.map(toMonacoDecoration)),
  };
}
