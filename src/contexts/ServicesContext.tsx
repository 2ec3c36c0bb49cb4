import type React from 'react';
import { createContext, type ReactNode, useContext, useMemo } from 'react';
import type { ApiConfig } from '../config/apiConfig';
import { AnalysisApi } from '../services/AnalysisApi';
import {
  browserPreviewUrls,
  createBrowserMediaPicker,
  MediaAcquirer,
} from '../services/MediaAcquirer';
import {
  createBrowserFileSaver,
  type FileSaver,
} from '../services/PostReportActions';
import type { ValidationMode } from '../utils/validation';

export interface Services {
  config: ApiConfig;
  api: AnalysisApi;
  acquirer: MediaAcquirer;
  saver: FileSaver;
  validationMode: ValidationMode;
}

const ServicesContext = createContext<Services | null>(null);

interface ServicesProviderProps {
  config: ApiConfig;
  /** Override individual services (tests, storybook-style previews) */
  overrides?: Partial<Omit<Services, 'config'>>;
  children: ReactNode;
}

/**
 * Builds the browser-backed services once per config and hands them down.
 */
export const ServicesProvider: React.FC<ServicesProviderProps> = ({
  config,
  overrides,
  children,
}) => {
  const services = useMemo<Services>(
    () => ({
      config,
      api: overrides?.api ?? new AnalysisApi({ config }),
      acquirer:
        overrides?.acquirer ??
        new MediaAcquirer({
          picker: createBrowserMediaPicker(),
          previews: browserPreviewUrls,
        }),
      saver: overrides?.saver ?? createBrowserFileSaver(),
      validationMode: overrides?.validationMode ?? 'permissive',
    }),
    [config, overrides]
  );

  return (
    <ServicesContext.Provider value={services}>
      {children}
    </ServicesContext.Provider>
  );
};

export const useServices = (): Services => {
  const context = useContext(ServicesContext);

  if (!context) {
    throw new Error('useServices must be used within a ServicesProvider');
  }

  return context;
};
