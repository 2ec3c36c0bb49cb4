import '@mantine/core/styles.css';
import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import { App } from './components/App';
import { resolveAppConfig } from './config/apiConfig';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger({ component: 'main' });

const config = resolveAppConfig(import.meta.env);
setLogLevel(config.logLevel);
log.info(`Analysis server: ${config.api.baseUrl}`, { action: 'startup' });

const container = document.getElementById('root');
if (!container) {
  throw new Error('Root element #root not found');
}

createRoot(container).render(
  <StrictMode>
    <BrowserRouter>
      <App config={config.api} />
    </BrowserRouter>
  </StrictMode>
);
