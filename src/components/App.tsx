import type React from 'react';
import { useEffect, useState } from 'react';
import { ErrorBoundary } from 'react-error-boundary';
import { NavLink, Route, Routes } from 'react-router-dom';
import { Badge, Group, MantineProvider, Title } from '@mantine/core';
import type { ApiConfig } from '../config/apiConfig';
import { type Services, ServicesProvider, useServices } from '../contexts/ServicesContext';
import { theme } from '../theme';
import { createLogger } from '../utils/logger';
import { CrashFallback } from './CrashFallback';
import { TestHistoryPage } from './TestHistoryPage';
import { UploadPage } from './UploadPage';

const log = createLogger({ component: 'App' });

type ServerStatus = 'checking' | 'online' | 'offline';

const STATUS_COLORS: Record<ServerStatus, string> = {
  checking: 'gray',
  online: 'green',
  offline: 'red',
};

const ServerStatusBadge: React.FC = () => {
  const { api } = useServices();
  const [status, setStatus] = useState<ServerStatus>('checking');

  useEffect(() => {
    let active = true;
    api
      .healthCheck()
      .then((health) => {
        if (active) setStatus(health ? 'online' : 'offline');
      })
      .catch((error) => {
        log.warn(`Health check failed: ${String(error)}`, { action: 'health' });
        if (active) setStatus('offline');
      });
    return () => {
      active = false;
    };
  }, [api]);

  return (
    <Badge variant="light" color={STATUS_COLORS[status]} data-testid="server-status">
      {status === 'checking' ? 'Server…' : `Server ${status}`}
    </Badge>
  );
};

const Header: React.FC = () => (
  <header style={{ padding: '0.75rem 1rem', borderBottom: '1px solid #e5e7eb' }}>
    <Group justify="space-between">
      <Title order={3}>Exercise Analysis</Title>
      <Group gap="md">
        <NavLink to="/">Analyze</NavLink>
        <NavLink to="/results">Results</NavLink>
        <ServerStatusBadge />
      </Group>
    </Group>
  </header>
);

interface AppProps {
  config: ApiConfig;
  /** Swap in fakes for individual services */
  services?: Partial<Omit<Services, 'config'>>;
}

export const App: React.FC<AppProps> = ({ config, services }) => {
  return (
    <MantineProvider theme={theme}>
      <ErrorBoundary
        FallbackComponent={CrashFallback}
        onError={(error) => log.error('Unhandled render error', error)}
      >
        <ServicesProvider config={config} overrides={services}>
          <Header />
          <Routes>
            <Route path="/" element={<UploadPage />} />
            <Route path="/results" element={<TestHistoryPage />} />
          </Routes>
        </ServicesProvider>
      </ErrorBoundary>
    </MantineProvider>
  );
};

export default App;
