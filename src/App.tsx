import { useEffect, type ReactNode } from 'react';
import { Navigate, Route, Routes } from 'react-router-dom';

// Components
import { ErrorBoundary } from './components/ErrorBoundary';

// Pages
import JournalPage from './pages/JournalPage';
import SetupPage from './pages/SetupPage';

// Services
import { configStore } from './services/configStore';

// First run goes through setup before anything else
function RequireSetup({ children }: { children: ReactNode }) {
  if (!configStore.getSnapshot().configured) {
    return <Navigate to="/setup" replace />;
  }
  return <>{children}</>;
}

export default function App() {
  // Follow the system color scheme
  useEffect(() => {
    const media = window.matchMedia('(prefers-color-scheme: dark)');
    const applyTheme = () => {
      document.documentElement.classList.toggle('dark', media.matches);
    };

    applyTheme();
    media.addEventListener('change', applyTheme);
    return () => media.removeEventListener('change', applyTheme);
  }, []);

  return (
    <div className="min-h-screen bg-[#F1F3F5] dark:bg-[#1C1C1E] flex justify-center font-sans">
      {/* Mobile container */}
      <div className="w-full max-w-[450px] bg-[#F8F9FA] dark:bg-[#1C1C1E] min-h-screen relative shadow-2xl overflow-hidden">
        <ErrorBoundary>
          <Routes>
            <Route path="/setup" element={<SetupPage />} />
            <Route
              path="/"
              element={
                <RequireSetup>
                  <JournalPage />
                </RequireSetup>
              }
            />
            <Route path="*" element={<Navigate to="/" replace />} />
          </Routes>
        </ErrorBoundary>
      </div>
    </div>
  );
}
