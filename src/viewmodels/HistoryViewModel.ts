/**
 * Display helpers for the test history screen
 */

import type {
  TestResultDetail,
  TestResultSummary,
  UserStats,
} from '../types/analysis';
import { formatExerciseToken } from '../types/exercise';
import { NOT_AVAILABLE } from './ReportViewModel';

export type ScoreBand = 'excellent' | 'good' | 'fair' | 'poor' | 'unknown';

/** Mantine colour per band */
export const SCORE_BAND_COLORS: Record<ScoreBand, string> = {
  excellent: 'green',
  good: 'yellow',
  fair: 'orange',
  poor: 'red',
  unknown: 'gray',
};

export function scoreBand(score: number | null | undefined): ScoreBand {
  if (score === null || score === undefined) return 'unknown';
  if (score >= 85) return 'excellent';
  if (score >= 70) return 'good';
  if (score >= 50) return 'fair';
  return 'poor';
}

/**
 * `D/M/YYYY H:MM` in local time; anything unparseable is returned as-is.
 */
export function formatTimestamp(value: string | null | undefined): string {
  if (!value) return NOT_AVAILABLE;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${date.getDate()}/${date.getMonth() + 1}/${date.getFullYear()} ${date.getHours()}:${minutes}`;
}

const SUMMARY_PREVIEW_LENGTH = 60;

/**
 * First line of a result's feedback, cut to fit a list row
 */
export function feedbackPreview(result: TestResultSummary): string | null {
  const summary = result.feedback?.['rule_based_summary'] ?? result.feedback?.['summary'];
  if (summary === undefined || summary === null) return null;
  const text = String(summary);
  return text.length > SUMMARY_PREVIEW_LENGTH
    ? `${text.substring(0, SUMMARY_PREVIEW_LENGTH)}...`
    : text;
}

export interface ResultRow {
  testId: string;
  title: string;
  score: string;
  scoreLabel: string;
  band: ScoreBand;
  date: string;
  preview: string | null;
}

export function buildResultRow(result: TestResultSummary): ResultRow {
  const score = result.score ?? null;
  return {
    testId: result.test_id,
    title: formatExerciseToken(result.exercise_type),
    score: score === null ? NOT_AVAILABLE : `${score.toFixed(1)}/100`,
    scoreLabel: score === null ? '0' : String(Math.trunc(score)),
    band: scoreBand(score),
    date: formatTimestamp(result.timestamp),
    preview: feedbackPreview(result),
  };
}

export type TrendTone = 'positive' | 'negative' | 'neutral';

export function trendTone(trend: string | null | undefined): TrendTone {
  if (trend === 'improving') return 'positive';
  if (trend === 'declining') return 'negative';
  return 'neutral';
}

export interface StatsView {
  totalTests: string;
  averageScore: string;
  bestScore: string;
  trend: string;
  tone: TrendTone;
}

export function buildStatsView(stats: UserStats): StatsView {
  const fixed = (value: number | null | undefined) =>
    value === null || value === undefined ? NOT_AVAILABLE : value.toFixed(1);
  return {
    totalTests: String(stats.total_tests),
    averageScore: fixed(stats.avg_score),
    bestScore: fixed(stats.max_score),
    trend: stats.progress_trend ?? NOT_AVAILABLE,
    tone: trendTone(stats.progress_trend),
  };
}

export const NO_SUMMARY = 'No summary available';

export interface ResultDetailView {
  testId: string;
  title: string;
  score: string;
  date: string;
  summary: string;
  keyFindings: string[];
  recommendations: string[];
  /** `"<issue>: <n> times"` for every issue that occurred */
  formIssues: string[];
}

export function buildResultDetailView(detail: TestResultDetail): ResultDetailView {
  const feedback = detail.feedback ?? null;
  const breakdown = feedback?.form_errors_breakdown ?? {};
  return {
    testId: detail.test_id,
    title: `${formatExerciseToken(detail.exercise_type)} Analysis`,
    score:
      detail.score === null || detail.score === undefined
        ? NOT_AVAILABLE
        : `${detail.score.toFixed(1)}/100`,
    date: formatTimestamp(detail.timestamp),
    summary: feedback?.summary ?? feedback?.rule_based_summary ?? NO_SUMMARY,
    keyFindings: feedback?.key_findings ?? [],
    recommendations: feedback?.recommendations ?? [],
    formIssues: Object.entries(breakdown)
      .filter(([, count]) => count > 0)
      .map(([issue, count]) => `${issue.replace(/_/g, ' ')}: ${count} times`),
  };
}
