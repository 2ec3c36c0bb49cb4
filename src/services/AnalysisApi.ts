/**
 * AnalysisApi - HTTP client for the exercise analysis backend
 *
 * Every call the app makes goes through here. Responses are decoded with zod
 * and failures surface as AnalysisApiError so callers only deal with one
 * error shape.
 */

import type { z } from 'zod';
import { type ApiConfig, HISTORY_RESULT_LIMIT } from '../config/apiConfig';
import {
  type AnalysisReport,
  AnalyzeResponseZ,
  ErrorBodyZ,
  type HealthStatus,
  HealthStatusZ,
  type TestResultDetail,
  TestResultDetailZ,
  TestResultListZ,
  type TestResultSummary,
  toAnalysisReport,
  type UploadRequest,
  type UserStats,
  UserStatsZ,
  type WorkoutPlan,
  WorkoutPlanZ,
} from '../types/analysis';
import { toWireToken } from '../types/exercise';
import { createLogger } from '../utils/logger';
import { endpointUrl, joinUrl } from '../utils/url';
import {
  AnalysisApiError,
  GENERIC_SERVER_MESSAGE,
  GENERIC_TRANSPORT_MESSAGE,
} from './AnalysisApiError';

const log = createLogger({ component: 'AnalysisApi' });

export type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

export interface AnalysisApiOptions {
  config: ApiConfig;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

/** A file fetched from one of the download endpoints */
export interface DownloadedFile {
  blob: Blob;
  fileName: string;
}

export const ENDPOINTS = {
  analyseTest: 'test/analysetest',
  downloadReport: 'test/download/report',
  downloadAnalyzedVideo: 'test/download/analyzed-video',
  results: 'test/results',
  result: 'test/result',
  stats: 'test/stats',
  workoutPlan: 'test/workout-plan',
  health: 'test/health',
} as const;

/** Form values for numeric fields left blank */
const EMPTY_NUMBER = '0';

/**
 * Assemble the multipart body for an analysis upload.
 *
 * The backend reads the athlete name from `user_name`; `name` is sent too so
 * the documented contract holds.
 */
export function buildUploadForm(request: UploadRequest): FormData {
  const form = new FormData();
  form.append('video', request.video, request.fileName);
  form.append('user_id', request.userId.trim());
  form.append('exercise_type', toWireToken(request.exercise));
  form.append('age', request.age.trim() || EMPTY_NUMBER);
  form.append('height', request.height.trim() || EMPTY_NUMBER);
  form.append('weight', request.weight.trim() || EMPTY_NUMBER);
  form.append('name', request.name.trim());
  form.append('user_name', request.name.trim());
  return form;
}

/**
 * Pull a filename out of a Content-Disposition header.
 */
export function parseContentDispositionFilename(
  header: string | null
): string | null {
  if (!header) return null;
  const encoded = /filename\*=UTF-8''([^;]+)/i.exec(header);
  if (encoded?.[1]) {
    try {
      return decodeURIComponent(encoded[1]);
    } catch {
      return encoded[1];
    }
  }
  const quoted = /filename="([^"]+)"/i.exec(header);
  if (quoted?.[1]) return quoted[1];
  const bare = /filename=([^;]+)/i.exec(header);
  return bare?.[1]?.trim() ?? null;
}

export class AnalysisApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: AnalysisApiOptions) {
    this.baseUrl = options.config.baseUrl;
    this.fetchImpl =
      options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  // ============================================
  // URLs
  // ============================================

  /** Playable URL for a server-relative analyzed-video path */
  analyzedVideoUrl(videoPath: string): string {
    return joinUrl(this.baseUrl, videoPath);
  }

  reportDownloadUrl(testId: string): string {
    return endpointUrl(this.baseUrl, ENDPOINTS.downloadReport, testId);
  }

  analyzedVideoDownloadUrl(testId: string): string {
    return endpointUrl(this.baseUrl, ENDPOINTS.downloadAnalyzedVideo, testId);
  }

  // ============================================
  // Analysis
  // ============================================

  /**
   * Upload a video for analysis and wait for the report.
   * Resolves only when the backend reports success.
   */
  async analyseTest(request: UploadRequest): Promise<AnalysisReport> {
    const url = joinUrl(this.baseUrl, ENDPOINTS.analyseTest);
    log.info(
      `Uploading ${request.fileName} for ${toWireToken(request.exercise)}`,
      { action: 'analyseTest' }
    );

    const response = await this.send(url, {
      method: 'POST',
      body: buildUploadForm(request),
    });

    if (!response.ok) {
      throw await this.httpError(response, 'Upload failed');
    }

    const body = await this.decode(response, AnalyzeResponseZ);
    if (!body.success) {
      throw new AnalysisApiError(
        'server',
        body.message?.trim() || GENERIC_SERVER_MESSAGE,
        { status: response.status }
      );
    }

    return toAnalysisReport(body);
  }

  // ============================================
  // Downloads
  // ============================================

  downloadReport(testId: string): Promise<DownloadedFile> {
    return this.download(
      this.reportDownloadUrl(testId),
      `exercise_report_${testId}.pdf`,
      'Report download failed'
    );
  }

  downloadAnalyzedVideo(testId: string): Promise<DownloadedFile> {
    return this.download(
      this.analyzedVideoDownloadUrl(testId),
      `analyzed_video_${testId}.mp4`,
      'Video download failed'
    );
  }

  // ============================================
  // History
  // ============================================

  getUserResults(
    userId: string,
    limit: number = HISTORY_RESULT_LIMIT
  ): Promise<TestResultSummary[]> {
    const url = `${endpointUrl(this.baseUrl, ENDPOINTS.results, userId)}?limit=${limit}`;
    return this.getJson(url, TestResultListZ, 'Failed to fetch results');
  }

  getUserStats(userId: string): Promise<UserStats> {
    return this.getJson(
      endpointUrl(this.baseUrl, ENDPOINTS.stats, userId),
      UserStatsZ,
      'Failed to fetch stats'
    );
  }

  getTestResult(testId: string): Promise<TestResultDetail> {
    return this.getJson(
      endpointUrl(this.baseUrl, ENDPOINTS.result, testId),
      TestResultDetailZ,
      'Failed to fetch test result'
    );
  }

  getWorkoutPlan(userId: string, testId?: string): Promise<WorkoutPlan> {
    const base = endpointUrl(this.baseUrl, ENDPOINTS.workoutPlan, userId);
    const url = testId
      ? `${base}?test_id=${encodeURIComponent(testId)}`
      : base;
    return this.getJson(url, WorkoutPlanZ, 'Failed to fetch workout plan');
  }

  /**
   * Probe the backend. Never throws; any failure reads as unhealthy.
   */
  async healthCheck(): Promise<HealthStatus | null> {
    try {
      return await this.getJson(
        joinUrl(this.baseUrl, ENDPOINTS.health),
        HealthStatusZ,
        'Health check failed'
      );
    } catch (error) {
      log.warn(`Backend unavailable: ${String(error)}`, {
        action: 'healthCheck',
      });
      return null;
    }
  }

  // ============================================
  // Plumbing
  // ============================================

  private async send(url: string, init?: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      log.error(`Request to ${url} failed`, error, { action: 'send' });
      throw new AnalysisApiError('transport', GENERIC_TRANSPORT_MESSAGE, {
        cause: error,
      });
    }
  }

  private async getJson<T extends z.ZodTypeAny>(
    url: string,
    schema: T,
    failurePrefix: string
  ): Promise<z.output<T>> {
    const response = await this.send(url);
    if (!response.ok) {
      throw await this.httpError(response, failurePrefix);
    }
    return this.decode(response, schema);
  }

  private async download(
    url: string,
    fallbackName: string,
    failurePrefix: string
  ): Promise<DownloadedFile> {
    const response = await this.send(url);
    if (!response.ok) {
      throw await this.httpError(response, failurePrefix);
    }

    let blob: Blob;
    try {
      blob = await response.blob();
    } catch (error) {
      throw new AnalysisApiError('transport', GENERIC_TRANSPORT_MESSAGE, {
        status: response.status,
        cause: error,
      });
    }

    const fileName =
      parseContentDispositionFilename(
        response.headers.get('content-disposition')
      ) ?? fallbackName;
    return { blob, fileName };
  }

  private async decode<T extends z.ZodTypeAny>(
    response: Response,
    schema: T
  ): Promise<z.output<T>> {
    let raw: unknown;
    try {
      raw = JSON.parse(await response.text());
    } catch (error) {
      log.error('Response body is not JSON', error, { action: 'decode' });
      throw new AnalysisApiError('transport', GENERIC_TRANSPORT_MESSAGE, {
        status: response.status,
        cause: error,
      });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      log.error('Response body has an unexpected shape', parsed.error, {
        action: 'decode',
      });
      throw new AnalysisApiError('transport', GENERIC_TRANSPORT_MESSAGE, {
        status: response.status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * Error for a non-2xx response: the server's own message when the body
   * carries one, otherwise a generic line with the status code.
   */
  private async httpError(
    response: Response,
    failurePrefix: string
  ): Promise<AnalysisApiError> {
    let serverMessage: string | null = null;
    try {
      const parsed = ErrorBodyZ.safeParse(JSON.parse(await response.text()));
      if (parsed.success) {
        serverMessage =
          parsed.data.message?.trim() || parsed.data.detail?.trim() || null;
      }
    } catch {
      // Body is not JSON; fall through to the generic message
    }

    log.warn(`${failurePrefix}: HTTP ${response.status}`, {
      action: 'httpError',
    });
    return new AnalysisApiError(
      'server',
      serverMessage ?? `${failurePrefix} (HTTP ${response.status}).`,
      { status: response.status }
    );
  }
}
