import { useEffect } from 'react';
import { CodeComparator } from '@/components/CodeComparator';
import { useStore } from '@/store/useStore';

function App() {
  const theme = useStore((state) => state.settings.theme);
  const locale = useStore((state) => state.settings.locale);

  useEffect(() => {
    const root = document.documentElement;
    root.classList.toggle('dark', theme === 'dark');
  }, [theme]);

  useEffect(() => {
    document.documentElement.lang = locale;
  }, [locale]);

  return (
    <div className="flex h-screen w-full flex-col overflow-hidden bg-background text-foreground">
      <CodeComparator />
    </div>
  );
}

export default App;
