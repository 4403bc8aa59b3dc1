import { describe, expect, it } from 'vitest';
import { LOCALE_OPTIONS, getChangeSummaryMessage, t } from './i18n';

describe('i18n.t', () => {
  it('returns english translation for known key', () => {
    expect(t('en-US', 'toolbar.swap')).toBe('Swap');
    expect(t('en-US', 'merge.copyFromOriginal')).toBe('← Copy from Original');
  });

  it('returns spanish translation for known key', () => {
    expect(t('es-ES', 'toolbar.clear')).toBe('Limpiar');
    expect(t('es-ES', 'merge.copyFromModified')).toBe('→ Copiar desde Modificado');
  });

  it('falls back to key when dictionary key is unknown', () => {
    expect(t('en-US', '__missing_key__' as never)).toBe('__missing_key__');
  });

  it('lists every supported locale', () => {
    expect(LOCALE_OPTIONS.map((option) => option.value)).toEqual(['en-US', 'es-ES']);
  });
});

describe('i18n.getChangeSummaryMessage', () => {
  it('reports identical panes', () => {
    const summary = { hunkCount: 0, addedLineCount: 0, removedLineCount: 0 };
    expect(getChangeSummaryMessage('en-US', summary)).toBe('No differences');
    expect(getChangeSummaryMessage('es-ES', summary)).toBe('Sin diferencias');
  });

  it('pluralizes the hunk count', () => {
    expect(getChangeSummaryMessage('en-US', { hunkCount: 1, addedLineCount: 2, removedLineCount: 0 })).toBe(
      '1 change · +2 / -0 lines'
    );
    expect(getChangeSummaryMessage('en-US', { hunkCount: 3, addedLineCount: 4, removedLineCount: 5 })).toBe(
      '3 changes · +4 / -5 lines'
    );
    expect(getChangeSummaryMessage('es-ES', { hunkCount: 2, addedLineCount: 1, removedLineCount: 1 })).toBe(
      '2 cambios · +1 / -1 líneas'
    );
  });
});
