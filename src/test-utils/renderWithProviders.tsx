import { MantineProvider } from '@mantine/core';
import { render, type RenderOptions } from '@testing-library/react';
import type { ReactElement, ReactNode } from 'react';
import { MemoryRouter } from 'react-router-dom';
import type { ApiConfig } from '../config/apiConfig';
import { type Services, ServicesProvider } from '../contexts/ServicesContext';
import { theme } from '../theme';

export const TEST_CONFIG: ApiConfig = { baseUrl: 'http://test.local' };

interface ProviderOptions {
  config?: ApiConfig;
  services?: Partial<Omit<Services, 'config'>>;
  initialEntries?: string[];
}

export function createWrapper({
  config = TEST_CONFIG,
  services,
  initialEntries = ['/'],
}: ProviderOptions = {}) {
  return function Wrapper({ children }: { children: ReactNode }) {
    return (
      <MantineProvider theme={theme}>
        <MemoryRouter initialEntries={initialEntries}>
          <ServicesProvider config={config} overrides={services}>
            {children}
          </ServicesProvider>
        </MemoryRouter>
      </MantineProvider>
    );
  };
}

export function renderWithProviders(
  ui: ReactElement,
  options: ProviderOptions & Omit<RenderOptions, 'wrapper'> = {}
) {
  const { config, services, initialEntries, ...renderOptions } = options;
  return render(ui, {
    wrapper: createWrapper({ config, services, initialEntries }),
    ...renderOptions,
  });
}
