import type { AppLocale } from '@/store/useStore';

export type I18nKey =
  | 'comparator.title'
  | 'comparator.subtitle'
  | 'comparator.tip'
  | 'toolbar.original'
  | 'toolbar.modified'
  | 'toolbar.selectLanguage'
  | 'toolbar.autoDetectActive'
  | 'toolbar.swap'
  | 'toolbar.clear'
  | 'toolbar.toggleTheme'
  | 'merge.copyFromOriginal'
  | 'merge.copyFromModified'
  | 'status.noDifferences'
  | 'status.language'
  | 'status.locale';

type Messages = Record<I18nKey, string>;

const enUS: Messages = {
  'comparator.title': 'Code Comparator',
  'comparator.subtitle': 'Compare two snippets side by side and merge changes',
  'comparator.tip': 'Click the arrows in the gutter to copy a change from one side to the other.',
  'toolbar.original': 'Original',
  'toolbar.modified': 'Modified',
  'toolbar.selectLanguage': 'Select Language',
  'toolbar.autoDetectActive': 'Auto-detect active',
  'toolbar.swap': 'Swap',
  'toolbar.clear': 'Clear',
  'toolbar.toggleTheme': 'Toggle theme',
  'merge.copyFromOriginal': '← Copy from Original',
  'merge.copyFromModified': '→ Copy from Modified',
  'status.noDifferences': 'No differences',
  'status.language': 'Language',
  'status.locale': 'Interface language',
};

const esES: Messages = {
  'comparator.title': 'Comparador de Código',
  'comparator.subtitle': 'Compara dos fragmentos lado a lado y combina los cambios',
  'comparator.tip': 'Haz clic en las flechas del margen para copiar un cambio de un lado al otro.',
  'toolbar.original': 'Original',
  'toolbar.modified': 'Modificado',
  'toolbar.selectLanguage': 'Seleccionar lenguaje',
  'toolbar.autoDetectActive': 'Autodetección activa',
  'toolbar.swap': 'Intercambiar',
  'toolbar.clear': 'Limpiar',
  'toolbar.toggleTheme': 'Cambiar tema',
  'merge.copyFromOriginal': '← Copiar desde Original',
  'merge.copyFromModified': '→ Copiar desde Modificado',
  'status.noDifferences': 'Sin diferencias',
  'status.language': 'Lenguaje',
  'status.locale': 'Idioma de la interfaz',
};

const dictionaries: Record<AppLocale, Messages> = {
  'en-US': enUS,
  'es-ES': esES,
};

export const LOCALE_OPTIONS: Array<{ value: AppLocale; label: string }> = [
  { value: 'en-US', label: 'English' },
  { value: 'es-ES', label: 'Español' },
];

export function t(locale: AppLocale, key: I18nKey): string {
  return dictionaries[locale][key] ?? dictionaries['en-US'][key] ?? key;
}

export function getChangeSummaryMessage(
  locale: AppLocale,
  summary: { hunkCount: number; addedLineCount: number; removedLineCount: number }
) {
  if (summary.hunkCount === 0) {
    return t(locale, 'status.noDifferences');
  }

  const { hunkCount, addedLineCount, removedLineCount } = summary;
  if (locale === 'es-ES') {
    const noun = hunkCount === 1 ? 'cambio' : 'cambios';
    return `${hunkCount} ${noun} · +${addedLineCount} / -${removedLineCount} líneas`;
  }

  const noun = hunkCount === 1 ? 'change' : 'changes';
  return `${hunkCount} ${noun} · +${addedLineCount} / -${removedLineCount} lines`;
}
