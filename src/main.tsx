import React from 'react';
import ReactDOM from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import { App as KonstaApp } from 'konsta/react';
import App from './App';
import './index.css';

// Detect platform
const getTheme = (): 'ios' | 'material' => {
  return /iPhone|iPad|iPod|Macintosh/.test(navigator.userAgent) ? 'ios' : 'material';
};

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Root element #root is missing from index.html');
}

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <BrowserRouter>
      <KonstaApp theme={getTheme()} safeAreas>
        <App />
      </KonstaApp>
    </BrowserRouter>
  </React.StrictMode>
);
