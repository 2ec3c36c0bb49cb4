/**
 * UploadSession - State machine for one visit to the upload screen
 *
 * This is the single source of truth for the upload workflow. It owns:
 * - the exercise selection
 * - the acquired video (and releasing it when replaced)
 * - the in-flight upload and the report it produced
 *
 * Every change goes through `commit()`, so the phase union is the only place
 * where "busy" and "reported" live and they can never both be true.
 */

import { BehaviorSubject, type Observable, Subject } from 'rxjs';
import type {
  AnalysisReport,
  UploadProfile,
  UploadRequest,
} from '../types/analysis';
import type { ExerciseType } from '../types/exercise';
import {
  GENERIC_TRANSPORT_MESSAGE,
  isAnalysisApiError,
} from '../services/AnalysisApiError';
import {
  type AcquiredMedia,
  MediaAcquisitionError,
  type MediaSourceKind,
  READ_FAILED_MESSAGE,
} from '../services/MediaAcquirer';
import { createLogger } from '../utils/logger';
import {
  formatIssues,
  type ValidationIssue,
  type ValidationMode,
  validateSubmission,
} from '../utils/validation';

const log = createLogger({ component: 'UploadSession' });

export const SUCCESS_NOTICE = 'Video analyzed successfully!';

/**
 * A report together with what was submitted to get it
 */
export interface CompletedAnalysis {
  report: AnalysisReport;
  exercise: ExerciseType;
  userName: string;
}

export type UploadError =
  | { kind: 'transport'; message: string }
  | { kind: 'server'; message: string; status: number | null };

/**
 * Lifecycle of the screen. `submitting` and `failed` keep the analysis that
 * was on screen before, so a failed re-submission does not wipe it.
 */
export type UploadPhase =
  | { type: 'idle' }
  | { type: 'awaiting-media'; source: MediaSourceKind; previous: SettledPhase }
  | { type: 'ready'; media: AcquiredMedia }
  | {
      type: 'submitting';
      media: AcquiredMedia;
      request: UploadRequest;
      previous: CompletedAnalysis | null;
    }
  | { type: 'reported'; media: AcquiredMedia; analysis: CompletedAnalysis }
  | {
      type: 'failed';
      media: AcquiredMedia;
      error: UploadError;
      previous: CompletedAnalysis | null;
    };

type AwaitingMediaPhase = Extract<UploadPhase, { type: 'awaiting-media' }>;

/** Phases that are not waiting on anything */
export type SettledPhase = Exclude<
  UploadPhase,
  { type: 'awaiting-media' } | { type: 'submitting' }
>;

export interface UploadSessionState {
  phase: UploadPhase;
  exercise: ExerciseType | null;
}

export type NoticeLevel = 'success' | 'error' | 'info';

export interface Notice {
  level: NoticeLevel;
  message: string;
}

export type SubmitOutcome =
  | { status: 'ignored' }
  | { status: 'invalid'; issues: ValidationIssue[] }
  | { status: 'reported'; analysis: CompletedAnalysis }
  | { status: 'failed'; error: UploadError };

/** The parts of the API client the session needs */
export interface AnalysisUploader {
  analyseTest(request: UploadRequest): Promise<AnalysisReport>;
}

export interface VideoAcquirer {
  acquire(source: MediaSourceKind): Promise<AcquiredMedia | null>;
}

export interface UploadSessionConfig {
  api: AnalysisUploader;
  acquirer: VideoAcquirer;
  /** Defaults to 'permissive' */
  validationMode?: ValidationMode;
}

/**
 * Media currently attached to the session, if any
 */
export function mediaOf(phase: UploadPhase): AcquiredMedia | null {
  switch (phase.type) {
    case 'idle':
      return null;
    case 'awaiting-media':
      return mediaOf(phase.previous);
    default:
      return phase.media;
  }
}

/**
 * Analysis to display. Hidden while a new upload is running, restored if it
 * fails.
 */
export function displayedAnalysis(phase: UploadPhase): CompletedAnalysis | null {
  switch (phase.type) {
    case 'reported':
      return phase.analysis;
    case 'failed':
      return phase.previous;
    case 'awaiting-media':
      return displayedAnalysis(phase.previous);
    default:
      return null;
  }
}

export function isBusy(phase: UploadPhase): boolean {
  return phase.type === 'submitting';
}

function toUploadError(error: unknown): UploadError {
  if (isAnalysisApiError(error)) {
    return error.kind === 'server'
      ? { kind: 'server', message: error.message, status: error.status }
      : { kind: 'transport', message: error.message };
  }
  return { kind: 'transport', message: GENERIC_TRANSPORT_MESSAGE };
}

export class UploadSession {
  private readonly stateSubject: BehaviorSubject<UploadSessionState>;
  private readonly noticeSubject = new Subject<Notice>();

  private readonly api: AnalysisUploader;
  private readonly acquirer: VideoAcquirer;
  private readonly validationMode: ValidationMode;

  private disposed = false;
  /** Bumped by every pick so a superseded one can tell it lost */
  private acquisitionToken = 0;

  constructor(config: UploadSessionConfig) {
    this.api = config.api;
    this.acquirer = config.acquirer;
    this.validationMode = config.validationMode ?? 'permissive';
    this.stateSubject = new BehaviorSubject<UploadSessionState>({
      phase: { type: 'idle' },
      exercise: null,
    });
  }

  /**
   * Current session state
   */
  get state(): UploadSessionState {
    return this.stateSubject.getValue();
  }

  get state$(): Observable<UploadSessionState> {
    return this.stateSubject.asObservable();
  }

  /**
   * User-facing messages (snackbar style)
   */
  get notices$(): Observable<Notice> {
    return this.noticeSubject.asObservable();
  }

  // ============================================
  // Exercise selection
  // ============================================

  /**
   * Select exactly one exercise (or none). Replaces any previous selection.
   */
  selectExercise(exercise: ExerciseType | null): void {
    this.commit({ exercise });
  }

  /**
   * Chip behaviour: picking the active exercise again clears it.
   */
  toggleExercise(exercise: ExerciseType): void {
    this.selectExercise(this.state.exercise === exercise ? null : exercise);
  }

  // ============================================
  // Media
  // ============================================

  /**
   * Ask the user for a video. A new video replaces (and releases) the
   * previous one along with any report. Cancelling or failing restores the
   * phase the session was in before.
   *
   * A pick that is still open is abandoned: whatever it yields later is
   * released and ignored.
   */
  async acquireMedia(source: MediaSourceKind): Promise<AcquiredMedia | null> {
    const { phase } = this.state;
    if (this.disposed || phase.type === 'submitting') {
      return null;
    }

    const settled = phase.type === 'awaiting-media' ? phase.previous : phase;
    this.acquisitionToken += 1;
    const token = this.acquisitionToken;
    this.commit({ phase: { type: 'awaiting-media', source, previous: settled } });

    let media: AcquiredMedia | null;
    try {
      media = await this.acquirer.acquire(source);
    } catch (error) {
      if (token !== this.acquisitionToken) return null;
      const message =
        error instanceof MediaAcquisitionError
          ? error.message
          : READ_FAILED_MESSAGE;
      log.warn(`Could not acquire video: ${message}`, { action: 'acquireMedia' });
      this.commit({ phase: settled });
      this.notify('error', message);
      return null;
    }

    if (this.disposed || token !== this.acquisitionToken) {
      media?.release();
      return null;
    }

    if (!media) {
      this.commit({ phase: settled });
      return null;
    }

    mediaOf(settled)?.release();
    this.commit({ phase: { type: 'ready', media } });
    return media;
  }

  /**
   * Give up on an open pick and return to the phase before it.
   */
  private abandonPendingPick(phase: AwaitingMediaPhase): SettledPhase {
    log.debug(`Abandoning open ${phase.source} pick`, { action: 'acquireMedia' });
    this.acquisitionToken += 1;
    this.commit({ phase: phase.previous });
    return phase.previous;
  }

  // ============================================
  // Upload
  // ============================================

  /**
   * Upload the current video for analysis.
   *
   * A call while an upload is running is ignored. A pick still open is
   * abandoned first. Validation failures never reach the network.
   */
  async submit(profile: UploadProfile): Promise<SubmitOutcome> {
    const { phase: current, exercise } = this.state;
    if (this.disposed || current.type === 'submitting') {
      return { status: 'ignored' };
    }
    const phase =
      current.type === 'awaiting-media' ? this.abandonPendingPick(current) : current;

    const media = mediaOf(phase);
    const issues = validateSubmission({
      hasVideo: media !== null,
      exercise,
      profile,
      mode: this.validationMode,
    });
    if (issues.length > 0 || media === null || exercise === null) {
      this.notify('error', formatIssues(issues));
      return { status: 'invalid', issues };
    }

    const request: UploadRequest = {
      ...profile,
      exercise,
      video: media.blob,
      fileName: media.fileName,
    };
    const previous = displayedAnalysis(phase);

    this.commit({ phase: { type: 'submitting', media, request, previous } });
    this.notify('info', 'Uploading and analyzing video...');

    let outcome: SubmitOutcome = {
      status: 'failed',
      error: { kind: 'transport', message: GENERIC_TRANSPORT_MESSAGE },
    };
    try {
      const report = await this.api.analyseTest(request);
      const analysis: CompletedAnalysis = {
        report,
        exercise,
        userName: profile.name.trim(),
      };
      this.commit({ phase: { type: 'reported', media, analysis } });
      this.notify('success', SUCCESS_NOTICE);
      outcome = { status: 'reported', analysis };
    } catch (error) {
      log.error('Upload failed', error, { action: 'submit' });
      const uploadError = toUploadError(error);
      this.commit({
        phase: { type: 'failed', media, error: uploadError, previous },
      });
      this.notify('error', uploadError.message);
      outcome = { status: 'failed', error: uploadError };
    } finally {
      if (isBusy(this.state.phase)) {
        this.commit({
          phase: {
            type: 'failed',
            media,
            error: { kind: 'transport', message: GENERIC_TRANSPORT_MESSAGE },
            previous,
          },
        });
      }
    }
    return outcome;
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Release the video and stop emitting. Results that arrive afterwards are
   * dropped.
   */
  dispose(): void {
    if (this.disposed) return;
    mediaOf(this.state.phase)?.release();
    this.disposed = true;
    this.stateSubject.complete();
    this.noticeSubject.complete();
  }

  private commit(patch: Partial<UploadSessionState>): void {
    if (this.disposed) return;
    this.stateSubject.next({ ...this.state, ...patch });
  }

  private notify(level: NoticeLevel, message: string): void {
    if (this.disposed) return;
    this.noticeSubject.next({ level, message });
  }
}
