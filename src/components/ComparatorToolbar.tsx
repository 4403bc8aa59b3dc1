import { ArrowLeftRight, ChevronDown, Moon, Sparkles, Sun, Trash2, type LucideIcon } from 'lucide-react';
import { t } from '@/i18n';
import { LANGUAGE_OPTIONS, isLanguageKey, type LanguageKey } from '@/lib/languageDetection';
import { cn } from '@/lib/utils';
import type { AppLocale, AppTheme } from '@/store/useStore';

interface ComparatorToolbarProps {
    locale: AppLocale;
    language: LanguageKey;
    theme: AppTheme;
    autoDetectActive: boolean;
    onLanguageChange: (language: LanguageKey) => void;
    onSwap: () => void;
    onClear: () => void;
    onToggleTheme: () => void;
}

export function ComparatorToolbar({
    locale,
    language,
    theme,
    autoDetectActive,
    onLanguageChange,
    onSwap,
    onClear,
    onToggleTheme,
}: ComparatorToolbarProps) {
    const tr = (key: Parameters<typeof t>[1]) => t(locale, key);

    return (
        <div
            className="flex flex-wrap items-center justify-between gap-y-2 border-b px-3 py-2 text-sm"
            data-layout-region="comparator-toolbar"
        >
            <div className="flex items-center gap-3">
                <span className="hidden items-center gap-1.5 text-red-500 sm:flex">
                    <span className="h-2 w-2 rounded-full bg-red-500" /> {tr('toolbar.original')}
                </span>
                <span className="hidden items-center gap-1.5 text-emerald-500 sm:flex">
                    <span className="h-2 w-2 rounded-full bg-emerald-500" /> {tr('toolbar.modified')}
                </span>

                <div className="relative ml-2 flex items-center">
                    <select
                        aria-label={tr('toolbar.selectLanguage')}
                        title={tr('toolbar.selectLanguage')}
                        className="appearance-none rounded-md border bg-background py-1 pl-2 pr-7 text-xs outline-none"
                        value={language}
                        onChange={(event) => {
                            const nextLanguage = event.target.value;
                            if (isLanguageKey(nextLanguage)) {
                                onLanguageChange(nextLanguage);
                            }
                        }}
                    >
                        {LANGUAGE_OPTIONS.map((option) => (
                            <option key={option.value} value={option.value} className="bg-background text-foreground">
                                {option.label}
                            </option>
                        ))}
                    </select>
                    <ChevronDown className="pointer-events-none absolute right-2 h-3 w-3 text-muted-foreground" />
                </div>

                {autoDetectActive && (
                    <span className="hidden items-center gap-1 text-xs text-muted-foreground md:flex">
                        <Sparkles className="h-3 w-3 text-sky-400" /> {tr('toolbar.autoDetectActive')}
                    </span>
                )}
            </div>

            <div className="flex items-center gap-2">
                <ToolbarBtn icon={ArrowLeftRight} title={tr('toolbar.swap')} onClick={onSwap} />
                <ToolbarBtn
                    icon={Trash2}
                    title={tr('toolbar.clear')}
                    onClick={onClear}
                    className="text-red-500 hover:border-red-500"
                />
                <ToolbarBtn
                    icon={theme === 'dark' ? Sun : Moon}
                    title={tr('toolbar.toggleTheme')}
                    onClick={onToggleTheme}
                    showLabel={false}
                />
            </div>
        </div>
    );
}

function ToolbarBtn({
    icon: Icon,
    title,
    onClick,
    className,
    showLabel = true,
}: {
    icon: LucideIcon;
    title: string;
    onClick: () => void;
    className?: string;
    showLabel?: boolean;
}) {
    return (
        <button
            type="button"
            title={title}
            aria-label={title}
            className={cn(
                'flex items-center gap-1 rounded-md border px-2 py-1 text-xs hover:bg-accent hover:text-accent-foreground transition-colors',
                className
            )}
            onClick={onClick}
        >
            <Icon className="h-3.5 w-3.5" />
            {showLabel && <span className="hidden sm:inline">{title}</span>}
        </button>
    );
}
