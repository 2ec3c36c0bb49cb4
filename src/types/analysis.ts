/**
 * Analysis API payloads
 *
 * Zod schemas for everything the analysis backend returns, plus the
 * camelCase domain types the rest of the app works with. Every metric is
 * optional: the backend omits fields it could not compute.
 */

import { z } from 'zod';
import type { ExerciseType } from './exercise';

// ============================================
// Wire schemas
// ============================================

/** Feedback items are free text; anything else is stringified. */
const FeedbackZ = z
  .array(z.unknown())
  .transform((items) =>
    items.map((item) => (typeof item === 'string' ? item : String(item)))
  );

const PerformanceZ = z
  .object({
    overall_score: z.number().nullish(),
    grade: z.string().nullish(),
    rep_count: z.number().nullish(),
    form_accuracy: z.number().nullish(),
    duration_seconds: z.number().nullish(),
  })
  .passthrough();

const ReportDataZ = z
  .object({
    performance: PerformanceZ.nullish(),
    // Older backends send a summary object here instead of a list
    feedback: FeedbackZ.nullish().catch(null),
    exercise_details: z
      .object({
        type: z.string().nullish(),
        duration: z.number().nullish(),
        date: z.string().nullish(),
      })
      .passthrough()
      .nullish()
      .catch(null),
  })
  .passthrough();

export const AnalyzeResponseZ = z
  .object({
    success: z.boolean(),
    message: z.string().nullish(),
    test_id: z.string().nullish(),
    video_path: z.string().nullish(),
    pdf_path: z.string().nullish(),
    report_data: ReportDataZ.nullish(),
    feedback: FeedbackZ.nullish().catch(null),
  })
  .passthrough();

export type AnalyzeResponse = z.infer<typeof AnalyzeResponseZ>;

/** Error bodies: our own `{ message }` or FastAPI's `{ detail }` */
export const ErrorBodyZ = z
  .object({
    message: z.string().optional(),
    detail: z.string().optional(),
  })
  .passthrough();

export const TestResultSummaryZ = z
  .object({
    test_id: z.string(),
    user_id: z.string().nullish(),
    score: z.number().nullish(),
    timestamp: z.string().nullish(),
    exercise_type: z.string().nullish(),
    video_path: z.string().nullish(),
    report_path: z.string().nullish(),
    feedback: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const TestResultListZ = z.array(TestResultSummaryZ);

export type TestResultSummary = z.infer<typeof TestResultSummaryZ>;

export const UserStatsZ = z
  .object({
    total_tests: z.number(),
    avg_score: z.number().nullish(),
    max_score: z.number().nullish(),
    min_score: z.number().nullish(),
    latest_test: z.string().nullish(),
    progress_trend: z.string().nullish(),
    recent_scores: z.array(z.number()).nullish(),
  })
  .passthrough();

export type UserStats = z.infer<typeof UserStatsZ>;

/** Stored rule-based feedback of one result; malformed parts are dropped */
const ResultFeedbackZ = z
  .object({
    summary: z.string().nullish().catch(null),
    rule_based_summary: z.string().nullish().catch(null),
    key_findings: FeedbackZ.nullish().catch(null),
    recommendations: FeedbackZ.nullish().catch(null),
    form_errors_breakdown: z.record(z.number()).nullish().catch(null),
  })
  .passthrough();

export const TestResultDetailZ = TestResultSummaryZ.extend({
  feedback: ResultFeedbackZ.nullish().catch(null),
});

export type TestResultDetail = z.infer<typeof TestResultDetailZ>;

export const WorkoutPlanZ = z
  .object({
    user: z.string().nullish(),
    fitness_level: z.string().nullish(),
    level: z.string().nullish(),
    recommendations: z.array(z.string()).default([]),
  })
  .passthrough();

export type WorkoutPlan = z.infer<typeof WorkoutPlanZ>;

export const HealthStatusZ = z
  .object({
    status: z.string(),
    timestamp: z.string().nullish(),
    database_connected: z.boolean().nullish(),
  })
  .passthrough();

export type HealthStatus = z.infer<typeof HealthStatusZ>;

// ============================================
// Domain types
// ============================================

export interface PerformanceRecord {
  /** 0-100 */
  overallScore: number | null;
  grade: string | null;
  repCount: number | null;
  /** Percentage of frames with correct form */
  formAccuracy: number | null;
  durationSeconds: number | null;
}

export interface AnalysisReport {
  message: string;
  testId: string | null;
  /** Server-relative path; join with the base URL before use */
  videoPath: string | null;
  performance: PerformanceRecord;
  feedback: string[];
}

/** Athlete metadata sent alongside the video */
export interface UploadProfile {
  userId: string;
  name: string;
  age: string;
  height: string;
  weight: string;
}

export interface UploadRequest extends UploadProfile {
  exercise: ExerciseType;
  video: Blob;
  fileName: string;
}

export const DEFAULT_SUCCESS_MESSAGE = 'Analysis complete.';

/**
 * Unpack a successful analysis response. Feedback is read from
 * `report_data.feedback`, falling back to a top-level `feedback` list.
 */
export function toAnalysisReport(response: AnalyzeResponse): AnalysisReport {
  const reportData = response.report_data ?? null;
  const performance = reportData?.performance ?? null;

  return {
    message: response.message ?? DEFAULT_SUCCESS_MESSAGE,
    testId: response.test_id ?? null,
    videoPath: response.video_path ?? null,
    performance: {
      overallScore: performance?.overall_score ?? null,
      grade: performance?.grade ?? null,
      repCount: performance?.rep_count ?? null,
      formAccuracy: performance?.form_accuracy ?? null,
      durationSeconds:
        performance?.duration_seconds ??
        reportData?.exercise_details?.duration ??
        null,
    },
    feedback: reportData?.feedback ?? response.feedback ?? [],
  };
}
