import { create } from 'zustand';
import type { ChangeSide } from '@/lib/comparator.types';
import type { LanguageKey } from '@/lib/languageDetection';
import type { LineChangeSummary } from '@/lib/lineChanges';

export type AppLocale = 'en-US' | 'es-ES';
export type AppTheme = 'light' | 'dark';
export type LanguageSource = 'default' | 'detected' | 'manual';

interface SettingsState {
  locale: AppLocale;
  theme: AppTheme;
}

interface AppState {
  originalText: string;
  modifiedText: string;
  language: LanguageKey;
  languageSource: LanguageSource;
  changeSummary: LineChangeSummary;
  settings: SettingsState;

  setPaneText: (side: ChangeSide, text: string) => void;
  setChangeSummary: (summary: LineChangeSummary) => void;
  clearPanes: () => void;
  selectLanguage: (language: LanguageKey) => void;
  applyDetectedLanguage: (language: LanguageKey) => void;
  updateSettings: (updates: Partial<SettingsState>) => void;
  toggleTheme: () => void;
}

const EMPTY_CHANGE_SUMMARY: LineChangeSummary = {
  hunkCount: 0,
  addedLineCount: 0,
  removedLineCount: 0,
};

export const useStore = create<AppState>((set) => ({
  originalText: '',
  modifiedText: '',
  language: 'plaintext',
  languageSource: 'default',
  changeSummary: EMPTY_CHANGE_SUMMARY,
  settings: {
    locale: 'en-US',
    theme: 'dark',
  },

  setPaneText: (side, text) => set((state) => {
    if (side === 'original') {
      return state.originalText === text ? state : { originalText: text };
    }

    return state.modifiedText === text ? state : { modifiedText: text };
  }),
  setChangeSummary: (summary) => set((state) => {
    const current = state.changeSummary;
    if (
      current.hunkCount === summary.hunkCount &&
      current.addedLineCount === summary.addedLineCount &&
      current.removedLineCount === summary.removedLineCount
    ) {
      return state;
    }

    return { changeSummary: summary };
  }),
  clearPanes: () => set({
    originalText: '',
    modifiedText: '',
    language: 'plaintext',
    languageSource: 'default',
    changeSummary: EMPTY_CHANGE_SUMMARY,
  }),
  selectLanguage: (language) => set({ language, languageSource: 'manual' }),
  applyDetectedLanguage: (language) => set((state) => {
    if (state.languageSource === 'manual' || language === 'plaintext' || language === state.language) {
      return state;
    }

    return { language, languageSource: 'detected' };
  }),
  updateSettings: (updates) => set((state) => ({
    settings: { ...state.settings, ...updates }
  })),
  toggleTheme: () => set((state) => ({
    settings: { ...state.settings, theme: state.settings.theme === 'dark' ? 'light' : 'dark' }
  })),
}));
