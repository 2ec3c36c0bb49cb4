/**
 * Errors raised by the analysis API client.
 *
 * - `transport`: the request never produced a usable response (network
 *   failure, body that is not the JSON we expect)
 * - `server`: the backend answered but reported a failure (non-2xx status, or
 *   `success: false`)
 */
export type AnalysisApiErrorKind = 'transport' | 'server';

export const GENERIC_TRANSPORT_MESSAGE =
  'Could not reach the analysis server. Check your connection and try again.';

export const GENERIC_SERVER_MESSAGE = 'Analysis failed. Please try again.';

export class AnalysisApiError extends Error {
  readonly kind: AnalysisApiErrorKind;
  /** HTTP status when the server answered, otherwise null */
  readonly status: number | null;

  constructor(
    kind: AnalysisApiErrorKind,
    message: string,
    options: { status?: number | null; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'AnalysisApiError';
    this.kind = kind;
    this.status = options.status ?? null;
  }
}

export function isAnalysisApiError(error: unknown): error is AnalysisApiError {
  return error instanceof AnalysisApiError;
}

/**
 * Message to show the user for any error thrown while talking to the API.
 */
export function describeApiError(error: unknown): string {
  if (isAnalysisApiError(error)) return error.message;
  return GENERIC_TRANSPORT_MESSAGE;
}
