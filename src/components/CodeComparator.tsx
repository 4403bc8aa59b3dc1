import { useCallback, useEffect, useMemo, useState } from 'react';
import { DiffEditor } from '@monaco-editor/react';
import { t } from '@/i18n';
import type { ChangeSide, LineChange } from '@/lib/comparator.types';
import { detectLanguage, shouldAutoDetectLanguage } from '@/lib/languageDetection';
import { summarizeLineChanges } from '@/lib/lineChanges';
import type { MergeHoverMessages } from '@/lib/mergeDecorations';
import { useStore } from '@/store/useStore';
import { COMPARATOR_EDITOR_OPTIONS, getMonacoTheme } from './codeComparator.utils';
import { ComparatorStatusBar } from './ComparatorStatusBar';
import { ComparatorToolbar } from './ComparatorToolbar';
import { useCodeComparator } from './useCodeComparator';

export function CodeComparator() {
    const locale = useStore((state) => state.settings.locale);
    const theme = useStore((state) => state.settings.theme);
    const language = useStore((state) => state.language);
    const languageSource = useStore((state) => state.languageSource);
    const setPaneText = useStore((state) => state.setPaneText);
    const selectLanguage = useStore((state) => state.selectLanguage);
    const applyDetectedLanguage = useStore((state) => state.applyDetectedLanguage);
    const clearPanes = useStore((state) => state.clearPanes);
    const setChangeSummary = useStore((state) => state.setChangeSummary);
    const toggleTheme = useStore((state) => state.toggleTheme);
    const tr = (key: Parameters<typeof t>[1]) => t(locale, key);

    // The editor owns the text once mounted; the store only mirrors it.
    const [initialTexts] = useState(() => {
        const state = useStore.getState();
        return { original: state.originalText, modified: state.modifiedText };
    });

    const hoverMessages = useMemo<MergeHoverMessages>(
        () => ({
            copyFromOriginal: t(locale, 'merge.copyFromOriginal'),
            copyFromModified: t(locale, 'merge.copyFromModified'),
        }),
        [locale]
    );

    const handleContentChange = useCallback(
        (side: ChangeSide, text: string) => {
            setPaneText(side, text);

            if (side === 'original' && shouldAutoDetectLanguage(text)) {
                applyDetectedLanguage(detectLanguage(text));
            }
        },
        [applyDetectedLanguage, setPaneText]
    );

    const handleDiffUpdate = useCallback(
        (changes: LineChange[]) => {
            setChangeSummary(summarizeLineChanges(changes));
        },
        [setChangeSummary]
    );

    const { handleEditorDidMount, updateMergeDecorations, swapContents, clearContents } = useCodeComparator({
        hoverMessages,
        onContentChange: handleContentChange,
        onDiffUpdate: handleDiffUpdate,
    });

    useEffect(() => {
        updateMergeDecorations();
    }, [hoverMessages, updateMergeDecorations]);

    const handleClear = useCallback(() => {
        clearContents();
        clearPanes();
    }, [clearContents, clearPanes]);

    return (
        <section className="flex h-full min-h-0 flex-col gap-3 p-4" data-layout-region="comparator">
            <header className="flex flex-wrap items-baseline gap-2">
                <h1 className="text-lg font-semibold">{tr('comparator.title')}</h1>
                <span className="text-muted-foreground">•</span>
                <p className="text-sm text-muted-foreground">{tr('comparator.subtitle')}</p>
            </header>

            <div className="flex min-h-0 flex-1 flex-col overflow-hidden rounded-lg border bg-background">
                <ComparatorToolbar
                    locale={locale}
                    language={language}
                    theme={theme}
                    autoDetectActive={language !== 'plaintext' && languageSource === 'detected'}
                    onLanguageChange={selectLanguage}
                    onSwap={() => {
                        swapContents();
                    }}
                    onClear={handleClear}
                    onToggleTheme={toggleTheme}
                />

                <div className="min-h-0 flex-1">
                    <DiffEditor
                        height="100%"
                        language={language}
                        original={initialTexts.original}
                        modified={initialTexts.modified}
                        theme={getMonacoTheme(theme)}
                        onMount={handleEditorDidMount}
                        options={COMPARATOR_EDITOR_OPTIONS}
                    />
                </div>

                <ComparatorStatusBar />
            </div>

            <p className="text-center text-sm text-muted-foreground">{tr('comparator.tip')}</p>
        </section>
    );
}
