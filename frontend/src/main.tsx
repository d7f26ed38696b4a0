import React from 'react';
import { createRoot } from 'react-dom/client';
import { ConfigProvider, Result } from 'antd';
import { darkThemeConfig } from '@/theme';
import { getConfig } from '@/config';
import App from './App';
import './index.css';

const container = document.getElementById('root');
if (!container) {
  throw new Error('Missing #root element');
}

let configError: string | null = null;
try {
  getConfig();
} catch (e) {
  configError = e instanceof Error ? e.message : String(e);
  console.error('[Config]', configError);
}

createRoot(container).render(
  <React.StrictMode>
    {configError ? (
      <ConfigProvider theme={darkThemeConfig}>
        <Result status="error" title="The application is not configured correctly" subTitle={configError} />
      </ConfigProvider>
    ) : (
      <App />
    )}
  </React.StrictMode>,
);
