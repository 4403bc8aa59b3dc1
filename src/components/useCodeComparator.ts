import { useCallback, useEffect, useRef } from 'react';
import type { IDisposable } from 'monaco-editor';
import type { ChangeSide, LineChange } from '@/lib/comparator.types';
import { locateLineChange } from '@/lib/changeLocator';
import { scheduleGuardedAction, type CancelGuardedAction } from '@/lib/deferredAction';
import { fromMonacoLineChanges, type MonacoLineChangeLike } from '@/lib/lineChanges';
import {
  DEFAULT_MERGE_HOVER_MESSAGES,
  syncMergeDecorations,
  type MergeHoverMessages,
} from '@/lib/mergeDecorations';
import { executeMerge, getMergeDirectionForClickedSide } from '@/lib/mergeExecutor';
import { createMonacoDocument, type MonacoCodeEditorLike } from '@/lib/monacoDocument';
import { PASTE_SCROLL_RESET_DELAY_MS, isLargePaste } from './codeComparator.utils';

export interface EditorMouseDownLike {
  target: {
    type: number;
    position: { lineNumber: number } | null;
  };
}

export interface ContentChangeEventLike {
  changes: ReadonlyArray<{ text: string }>;
}

export interface ComparatorCodeEditor extends MonacoCodeEditorLike {
  onMouseDown(listener: (event: EditorMouseDownLike) => void): IDisposable;
  onDidChangeModelContent(listener: (event: ContentChangeEventLike) => void): IDisposable;
  setScrollTop(scrollTop: number): void;
  setPosition(position: { lineNumber: number; column: number }): void;
  revealLine(lineNumber: number): void;
}

export interface ComparatorDiffEditor {
  getOriginalEditor(): ComparatorCodeEditor;
  getModifiedEditor(): ComparatorCodeEditor;
  getLineChanges(): MonacoLineChangeLike[] | null;
  onDidUpdateDiff(listener: () => void): IDisposable;
}

export interface ComparatorMonaco {
  editor: {
    MouseTargetType: {
      GUTTER_GLYPH_MARGIN: number;
    };
  };
}

interface UseCodeComparatorParams {
  hoverMessages?: MergeHoverMessages;
  onContentChange?: (side: ChangeSide, text: string) => void;
  /** Receives the editor's line changes after every decoration sync. */
  onDiffUpdate?: (changes: LineChange[]) => void;
}

export function useCodeComparator({
  hoverMessages,
  onContentChange,
  onDiffUpdate,
}: UseCodeComparatorParams = {}) {
  const diffEditorRef = useRef<ComparatorDiffEditor | null>(null);
  const monacoRef = useRef<ComparatorMonaco | null>(null);
  const subscriptionsRef = useRef<IDisposable[]>([]);
  const pendingActionsRef = useRef(new Set<CancelGuardedAction>());
  const isActiveRef = useRef(true);
  const hoverMessagesRef = useRef<MergeHoverMessages>(hoverMessages ?? DEFAULT_MERGE_HOVER_MESSAGES);
  const onContentChangeRef = useRef(onContentChange);
  const onDiffUpdateRef = useRef(onDiffUpdate);

  useEffect(() => {
    hoverMessagesRef.current = hoverMessages ?? DEFAULT_MERGE_HOVER_MESSAGES;
    onContentChangeRef.current = onContentChange;
    onDiffUpdateRef.current = onDiffUpdate;
  }, [hoverMessages, onContentChange, onDiffUpdate]);

  const getDocuments = useCallback(() => {
    const diffEditor = diffEditorRef.current;
    if (!diffEditor || !monacoRef.current) {
      return null;
    }

    const original = createMonacoDocument(diffEditor.getOriginalEditor());
    const modified = createMonacoDocument(diffEditor.getModifiedEditor());
    if (!original || !modified) {
      return null;
    }

    return { original, modified };
  }, []);

  const getLineChanges = useCallback(
    () => fromMonacoLineChanges(diffEditorRef.current?.getLineChanges()),
    []
  );

  const updateMergeDecorations = useCallback(() => {
    const documents = getDocuments();
    if (!documents) {
      return;
    }

    const changes = getLineChanges();
    syncMergeDecorations(changes, documents.original, documents.modified, hoverMessagesRef.current);
    onDiffUpdateRef.current?.(changes);
  }, [getDocuments, getLineChanges]);

  const handleGutterClick = useCallback(
    (side: ChangeSide, lineNumber: number | null | undefined) => {
      if (!lineNumber || lineNumber < 1) {
        return;
      }

      const documents = getDocuments();
      if (!documents) {
        return;
      }

      const change = locateLineChange(getLineChanges(), lineNumber, side);
      if (!change) {
        return;
      }

      const isModifiedSide = side === 'modified';
      executeMerge(
        change,
        isModifiedSide ? documents.original : documents.modified,
        isModifiedSide ? documents.modified : documents.original,
        getMergeDirectionForClickedSide(side)
      );
    },
    [getDocuments, getLineChanges]
  );

  const scheduleScrollReset = useCallback((codeEditor: ComparatorCodeEditor) => {
    const pendingActions = pendingActionsRef.current;
    const cancel = scheduleGuardedAction({
      delayMs: PASTE_SCROLL_RESET_DELAY_MS,
      isActive: () => {
        pendingActions.delete(cancel);
        return isActiveRef.current && createMonacoDocument(codeEditor) !== null;
      },
      run: () => {
        codeEditor.setScrollTop(0);
        codeEditor.setPosition({ lineNumber: 1, column: 1 });
        codeEditor.revealLine(1);
      },
    });

    pendingActions.add(cancel);
  }, []);

  const handleContentChange = useCallback(
    (side: ChangeSide, codeEditor: ComparatorCodeEditor, event: ContentChangeEventLike) => {
      if (!isActiveRef.current) {
        return;
      }

      const document = createMonacoDocument(codeEditor);
      if (!document) {
        return;
      }

      onContentChangeRef.current?.(side, document.getValue());

      if (isLargePaste(event.changes)) {
        scheduleScrollReset(codeEditor);
      }
    },
    [scheduleScrollReset]
  );

  const disposeSubscriptions = useCallback(() => {
    const subscriptions = subscriptionsRef.current;
    subscriptionsRef.current = [];

    for (const subscription of subscriptions) {
      try {
        subscription.dispose();
      } catch (error) {
        console.warn('Failed to dispose comparator listener:', error);
      }
    }
  }, []);

  const handleEditorDidMount = useCallback(
    (diffEditor: ComparatorDiffEditor, monaco: ComparatorMonaco) => {
      if (!isActiveRef.current) {
        return;
      }

      disposeSubscriptions();
      diffEditorRef.current = diffEditor;
      monacoRef.current = monaco;

      updateMergeDecorations();

      const glyphMarginType = monaco.editor.MouseTargetType.GUTTER_GLYPH_MARGIN;
      const panes: Array<[ChangeSide, ComparatorCodeEditor]> = [
        ['original', diffEditor.getOriginalEditor()],
        ['modified', diffEditor.getModifiedEditor()],
      ];

      const subscriptions: IDisposable[] = [diffEditor.onDidUpdateDiff(updateMergeDecorations)];
      for (const [side, codeEditor] of panes) {
        subscriptions.push(
          codeEditor.onMouseDown((event) => {
            if (event.target.type === glyphMarginType) {
              handleGutterClick(side, event.target.position?.lineNumber);
            }
          }),
          codeEditor.onDidChangeModelContent((event) => {
            handleContentChange(side, codeEditor, event);
          })
        );
      }

      subscriptionsRef.current = subscriptions;
    },
    [disposeSubscriptions, handleContentChange, handleGutterClick, updateMergeDecorations]
  );

  const swapContents = useCallback(() => {
    const documents = getDocuments();
    if (!documents) {
      return false;
    }

    const originalValue = documents.original.getValue();
    const modifiedValue = documents.modified.getValue();
    documents.original.setValue(modifiedValue);
    documents.modified.setValue(originalValue);
    return true;
  }, [getDocuments]);

  const clearContents = useCallback(() => {
    const diffEditor = diffEditorRef.current;
    if (!diffEditor) {
      return;
    }

    createMonacoDocument(diffEditor.getOriginalEditor())?.setValue('');
    createMonacoDocument(diffEditor.getModifiedEditor())?.setValue('');
  }, []);

  useEffect(() => {
    isActiveRef.current = true;
    const pendingActions = pendingActionsRef.current;

    return () => {
      isActiveRef.current = false;
      pendingActions.forEach((cancel) => cancel());
      pendingActions.clear();
      disposeSubscriptions();
      diffEditorRef.current = null;
      monacoRef.current = null;
    };
  }, [disposeSubscriptions]);

  return {
    handleEditorDidMount,
    updateMergeDecorations,
    swapContents,
    clearContents,
  };
}
