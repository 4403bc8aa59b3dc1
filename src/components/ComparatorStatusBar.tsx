import { GitCompare, Globe } from 'lucide-react';
import { LOCALE_OPTIONS, getChangeSummaryMessage, t } from '@/i18n';
import { getLanguageLabel } from '@/lib/languageDetection';
import { useStore, type AppLocale } from '@/store/useStore';

function isAppLocale(value: string): value is AppLocale {
    return LOCALE_OPTIONS.some((option) => option.value === value);
}

export function ComparatorStatusBar() {
    const summary = useStore((state) => state.changeSummary);
    const language = useStore((state) => state.language);
    const locale = useStore((state) => state.settings.locale);
    const updateSettings = useStore((state) => state.updateSettings);
    const tr = (key: Parameters<typeof t>[1]) => t(locale, key);

    return (
        <div
            className="h-6 bg-muted/50 border-t flex items-center justify-between px-3 text-[10px] text-muted-foreground select-none"
            data-layout-region="statusbar"
        >
            <div className="flex items-center gap-4">
                <span className="flex items-center gap-1">
                    <GitCompare className="w-3 h-3" />
                    {getChangeSummaryMessage(locale, summary)}
                </span>
                <div className="w-[1px] h-3 bg-border" />
                <span>{tr('status.language')}: {getLanguageLabel(language)}</span>
            </div>

            <div className="flex items-center gap-1.5 group cursor-pointer hover:text-foreground transition-colors">
                <Globe className="w-3 h-3" />
                <select
                    aria-label={tr('status.locale')}
                    className="bg-transparent border-none outline-none cursor-pointer appearance-none text-[10px]"
                    value={locale}
                    onChange={(event) => {
                        const nextLocale = event.target.value;
                        if (isAppLocale(nextLocale)) {
                            updateSettings({ locale: nextLocale });
                        }
                    }}
                >
                    {LOCALE_OPTIONS.map((option) => (
                        <option key={option.value} value={option.value} className="bg-background text-foreground">
                            {option.label}
                        </option>
                    ))}
                </select>
            </div>
        </div>
    );
}
