/**
 * ViewModel for the analysis report
 *
 * Pure mapping from a completed analysis to the strings the report card
 * shows, plus which follow-up actions are available and where they point.
 */

import type { AnalysisReport } from '../types/analysis';
import { getExerciseDisplayName } from '../types/exercise';
import type { CompletedAnalysis } from '../session/UploadSession';
import { endpointUrl, joinUrl } from '../utils/url';
import { ENDPOINTS } from '../services/AnalysisApi';
import {
  canDownloadAnalyzedVideo,
  canDownloadReport,
  canViewAnalyzedVideo,
} from '../services/PostReportActions';

export const NOT_AVAILABLE = 'N/A';
export const NO_FEEDBACK_MESSAGE = 'No specific feedback provided.';

export interface ReportRow {
  label: string;
  value: string;
}

/** URLs for the post-report actions; null means the action is disabled */
export interface ReportActions {
  analyzedVideoUrl: string | null;
  reportDownloadUrl: string | null;
  videoDownloadUrl: string | null;
}

export interface ReportView {
  testId: string;
  exercise: string;
  userName: string;
  score: string;
  grade: string;
  reps: string;
  formAccuracy: string;
  duration: string;
  /** Always at least one line */
  feedback: string[];
  hasFeedback: boolean;
  actions: ReportActions;
}

function formatFixed(value: number | null, suffix: string): string {
  return value === null ? NOT_AVAILABLE : `${value.toFixed(1)}${suffix}`;
}

function textOrPlaceholder(value: string | null): string {
  return value && value.trim() ? value : NOT_AVAILABLE;
}

export function buildReportActions(
  report: AnalysisReport,
  baseUrl: string
): ReportActions {
  return {
    analyzedVideoUrl: canViewAnalyzedVideo(report)
      ? joinUrl(baseUrl, report.videoPath)
      : null,
    reportDownloadUrl: canDownloadReport(report)
      ? endpointUrl(baseUrl, ENDPOINTS.downloadReport, report.testId)
      : null,
    videoDownloadUrl: canDownloadAnalyzedVideo(report)
      ? endpointUrl(baseUrl, ENDPOINTS.downloadAnalyzedVideo, report.testId)
      : null,
  };
}

export function buildReportView(
  analysis: CompletedAnalysis,
  baseUrl: string
): ReportView {
  const { report } = analysis;
  const { performance } = report;
  const hasFeedback = report.feedback.length > 0;

  return {
    testId: textOrPlaceholder(report.testId),
    exercise: getExerciseDisplayName(analysis.exercise),
    userName: textOrPlaceholder(analysis.userName),
    score: formatFixed(performance.overallScore, '/100'),
    grade: textOrPlaceholder(performance.grade),
    reps:
      performance.repCount === null
        ? NOT_AVAILABLE
        : String(performance.repCount),
    formAccuracy: formatFixed(performance.formAccuracy, '%'),
    duration: formatFixed(performance.durationSeconds, 's'),
    feedback: hasFeedback ? report.feedback : [NO_FEEDBACK_MESSAGE],
    hasFeedback,
    actions: buildReportActions(report, baseUrl),
  };
}

export function buildReportRows(view: ReportView): ReportRow[] {
  return [
    { label: 'Overall Score', value: view.score },
    { label: 'Grade', value: view.grade },
    { label: 'Repetitions', value: view.reps },
    { label: 'Form Accuracy', value: view.formAccuracy },
    { label: 'Duration', value: view.duration },
  ];
}

/**
 * Multi-line summary shown in the status panel after an analysis
 */
export function buildStatusSummary(view: ReportView): string {
  return [
    'Analysis Complete!',
    `Score: ${view.score}`,
    `Grade: ${view.grade}`,
    `Reps: ${view.reps}`,
    `Form Accuracy: ${view.formAccuracy}`,
  ].join('\n');
}
