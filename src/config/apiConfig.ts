/**
 * API Configuration
 *
 * The backend base URL is injected into the session, API client and hooks
 * rather than read from a global, so tests and environments can swap it.
 */

import { z } from 'zod';
import type { LogLevel } from '../utils/logger';

export interface ApiConfig {
  /** Base URL of the analysis backend, e.g. http://127.0.0.1:8000 */
  baseUrl: string;
}

export interface AppConfig {
  api: ApiConfig;
  logLevel: LogLevel;
}

export const DEFAULT_API_BASE_URL = 'http://127.0.0.1:8000';

/** How many results the history screen asks for */
export const HISTORY_RESULT_LIMIT = 20;

/** `VAR=` in a .env file arrives as an empty string and means "unset" */
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema.optional()
  );
}

const EnvZ = z.object({
  VITE_API_BASE_URL: optionalEnv(z.string().url()),
  VITE_LOG_LEVEL: optionalEnv(z.enum(['debug', 'info', 'warn', 'error'])),
});

/**
 * Build the app configuration from Vite env variables.
 * Throws when a variable is present but malformed.
 */
export function resolveAppConfig(env: Record<string, unknown>): AppConfig {
  const result = EnvZ.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return {
    api: { baseUrl: result.data.VITE_API_BASE_URL ?? DEFAULT_API_BASE_URL },
    logLevel: result.data.VITE_LOG_LEVEL ?? 'info',
  };
}
