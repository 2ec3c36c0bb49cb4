/**
 * PostReportActions - follow-ups available once a report is on screen
 *
 * Three independent actions: play the analyzed video, download the PDF
 * report, download the analyzed video. Each one reports its own outcome and
 * never changes the report.
 */

import { type Observable, Subject } from 'rxjs';
import type { AnalysisReport } from '../types/analysis';
import type { Notice } from '../session/UploadSession';
import { createLogger } from '../utils/logger';
import type { DownloadedFile } from './AnalysisApi';
import { describeApiError } from './AnalysisApiError';

const log = createLogger({ component: 'PostReportActions' });

export const PLAYBACK_FAILED_MESSAGE = 'Could not play the analyzed video.';

export type ActionResult<T = void> =
  | { status: 'done'; value: T }
  | { status: 'unavailable' }
  | { status: 'failed'; message: string };

export interface ReportDownloader {
  analyzedVideoUrl(videoPath: string): string;
  downloadReport(testId: string): Promise<DownloadedFile>;
  downloadAnalyzedVideo(testId: string): Promise<DownloadedFile>;
}

/** Hands a downloaded file to the user */
export interface FileSaver {
  save(file: DownloadedFile): void;
}

export interface PostReportActionsConfig {
  api: ReportDownloader;
  saver: FileSaver;
}

type WithVideo = AnalysisReport & { videoPath: string };
type WithTestId = AnalysisReport & { testId: string };

export function canViewAnalyzedVideo(report: AnalysisReport): report is WithVideo {
  return Boolean(report.videoPath);
}

export function canDownloadReport(report: AnalysisReport): report is WithTestId {
  return Boolean(report.testId);
}

export function canDownloadAnalyzedVideo(
  report: AnalysisReport
): report is WithTestId & WithVideo {
  return Boolean(report.testId && report.videoPath);
}

export class PostReportActions {
  private readonly api: ReportDownloader;
  private readonly saver: FileSaver;
  private readonly noticeSubject = new Subject<Notice>();
  private disposed = false;

  constructor(config: PostReportActionsConfig) {
    this.api = config.api;
    this.saver = config.saver;
  }

  get notices$(): Observable<Notice> {
    return this.noticeSubject.asObservable();
  }

  /**
   * Resolve the playable URL of the analyzed video.
   */
  viewAnalyzedVideo(report: AnalysisReport): ActionResult<string> {
    if (!canViewAnalyzedVideo(report)) return { status: 'unavailable' };
    return { status: 'done', value: this.api.analyzedVideoUrl(report.videoPath) };
  }

  downloadReport(report: AnalysisReport): Promise<ActionResult> {
    if (!canDownloadReport(report)) return Promise.resolve({ status: 'unavailable' });
    return this.downloadStoredReport(report.testId);
  }

  /**
   * Download the PDF of any stored result, e.g. a row of the history list.
   */
  downloadStoredReport(testId: string): Promise<ActionResult> {
    return this.runDownload(
      () => this.api.downloadReport(testId),
      'Report downloaded.',
      'Could not download the report'
    );
  }

  downloadAnalyzedVideo(report: AnalysisReport): Promise<ActionResult> {
    if (!canDownloadAnalyzedVideo(report)) {
      return Promise.resolve({ status: 'unavailable' });
    }
    const { testId } = report;
    return this.runDownload(
      () => this.api.downloadAnalyzedVideo(testId),
      'Analyzed video downloaded.',
      'Could not download the analyzed video'
    );
  }

  /**
   * The player could not load the analyzed video. Only a notice is raised;
   * the report stays on screen.
   */
  reportPlaybackFailed(): ActionResult {
    log.warn(PLAYBACK_FAILED_MESSAGE, { action: 'play' });
    this.notify({ level: 'error', message: PLAYBACK_FAILED_MESSAGE });
    return { status: 'failed', message: PLAYBACK_FAILED_MESSAGE };
  }

  dispose(): void {
    this.disposed = true;
    this.noticeSubject.complete();
  }

  private async runDownload(
    fetchFile: () => Promise<DownloadedFile>,
    successMessage: string,
    failurePrefix: string
  ): Promise<ActionResult> {
    let file: DownloadedFile;
    try {
      file = await fetchFile();
    } catch (error) {
      log.error(failurePrefix, error, { action: 'download' });
      const message = `${failurePrefix}: ${describeApiError(error)}`;
      this.notify({ level: 'error', message });
      return { status: 'failed', message };
    }

    if (this.disposed) return { status: 'done', value: undefined };

    this.saver.save(file);
    this.notify({ level: 'success', message: successMessage });
    return { status: 'done', value: undefined };
  }

  private notify(notice: Notice): void {
    if (this.disposed) return;
    this.noticeSubject.next(notice);
  }
}

/**
 * Saves through a temporary object URL and a clicked `<a download>`.
 */
export function createBrowserFileSaver(doc: Document = document): FileSaver {
  return {
    save(file) {
      const url = URL.createObjectURL(file.blob);
      const anchor = doc.createElement('a');
      anchor.href = url;
      anchor.download = file.fileName;
      anchor.style.display = 'none';
      doc.body.appendChild(anchor);
      anchor.click();
      anchor.remove();
      setTimeout(() => URL.revokeObjectURL(url), 0);
    },
  };
}
