/**
 * useUploadSession - React hook for the upload screen
 *
 * Thin wrapper around UploadSession and PostReportActions that:
 * - creates both for the lifetime of the component
 * - exposes their state as React state
 * - disposes them on unmount so late responses are dropped
 */

import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { merge } from 'rxjs';
import { useServices } from '../contexts/ServicesContext';
import type { MediaSourceKind } from '../services/MediaAcquirer';
import {
  type ActionResult,
  PostReportActions,
} from '../services/PostReportActions';
import {
  type CompletedAnalysis,
  displayedAnalysis,
  isBusy,
  mediaOf,
  type Notice,
  type SubmitOutcome,
  UploadSession,
  type UploadSessionState,
} from '../session/UploadSession';
import type { UploadProfile } from '../types/analysis';
import type { ExerciseType } from '../types/exercise';
import {
  buildReportView,
  buildStatusSummary,
  type ReportView,
} from '../viewmodels/ReportViewModel';

const INITIAL_STATE: UploadSessionState = {
  phase: { type: 'idle' },
  exercise: null,
};

export interface UseUploadSessionReturn {
  state: UploadSessionState;
  exercise: ExerciseType | null;
  isBusy: boolean;
  /** Name of the acquired video, if any */
  videoName: string | null;
  videoPreviewUrl: string | null;
  analysis: CompletedAnalysis | null;
  reportView: ReportView | null;
  /** Text for the status panel */
  statusMessage: string | null;
  /** Most recent notice from the session or an action */
  notice: Notice | null;
  /** Set once "view analyzed video" resolved a URL */
  playerUrl: string | null;
  toggleExercise: (exercise: ExerciseType) => void;
  acquireMedia: (source: MediaSourceKind) => Promise<void>;
  submit: (profile: UploadProfile) => Promise<SubmitOutcome>;
  viewAnalyzedVideo: () => void;
  /** The player failed to load `playerUrl` */
  reportPlaybackFailed: () => void;
  downloadReport: () => Promise<ActionResult | null>;
  downloadAnalyzedVideo: () => Promise<ActionResult | null>;
  dismissNotice: () => void;
}

/**
 * Status panel text for a phase
 */
export function statusMessageFor(
  state: UploadSessionState,
  reportView: ReportView | null
): string | null {
  const { phase } = state;
  switch (phase.type) {
    case 'submitting':
      return 'Uploading and analyzing video...';
    case 'reported':
      return reportView ? buildStatusSummary(reportView) : phase.analysis.report.message;
    case 'failed':
      return `Error: ${phase.error.message}`;
    default:
      return null;
  }
}

export function useUploadSession(): UseUploadSessionReturn {
  const { api, acquirer, saver, config, validationMode } = useServices();

  const sessionRef = useRef<UploadSession | null>(null);
  const actionsRef = useRef<PostReportActions | null>(null);

  const [state, setState] = useState<UploadSessionState>(INITIAL_STATE);
  const [notice, setNotice] = useState<Notice | null>(null);
  const [playerUrl, setPlayerUrl] = useState<string | null>(null);

  useEffect(() => {
    const session = new UploadSession({ api, acquirer, validationMode });
    const actions = new PostReportActions({ api, saver });
    sessionRef.current = session;
    actionsRef.current = actions;

    const stateSubscription = session.state$.subscribe(setState);
    const noticeSubscription = merge(
      session.notices$,
      actions.notices$
    ).subscribe(setNotice);

    return () => {
      stateSubscription.unsubscribe();
      noticeSubscription.unsubscribe();
      session.dispose();
      actions.dispose();
      sessionRef.current = null;
      actionsRef.current = null;
    };
  }, [api, acquirer, saver, validationMode]);

  const analysis = useMemo(() => displayedAnalysis(state.phase), [state.phase]);
  const media = mediaOf(state.phase);

  const reportView = useMemo(
    () => (analysis ? buildReportView(analysis, config.baseUrl) : null),
    [analysis, config.baseUrl]
  );

  // A new upload or a new video drops the player
  useEffect(() => {
    setPlayerUrl(null);
  }, [analysis]);

  const toggleExercise = useCallback((exercise: ExerciseType) => {
    sessionRef.current?.toggleExercise(exercise);
  }, []);

  const acquireMedia = useCallback(async (source: MediaSourceKind) => {
    await sessionRef.current?.acquireMedia(source);
  }, []);

  const submit = useCallback(
    async (profile: UploadProfile): Promise<SubmitOutcome> => {
      const session = sessionRef.current;
      if (!session) return { status: 'ignored' };
      return session.submit(profile);
    },
    []
  );

  const viewAnalyzedVideo = useCallback(() => {
    if (!analysis || !actionsRef.current) return;
    const result = actionsRef.current.viewAnalyzedVideo(analysis.report);
    if (result.status === 'done') {
      setPlayerUrl(result.value);
    }
  }, [analysis]);

  const reportPlaybackFailed = useCallback(() => {
    setPlayerUrl(null);
    actionsRef.current?.reportPlaybackFailed();
  }, []);

  const downloadReport = useCallback(async () => {
    if (!analysis || !actionsRef.current) return null;
    return actionsRef.current.downloadReport(analysis.report);
  }, [analysis]);

  const downloadAnalyzedVideo = useCallback(async () => {
    if (!analysis || !actionsRef.current) return null;
    return actionsRef.current.downloadAnalyzedVideo(analysis.report);
  }, [analysis]);

  const dismissNotice = useCallback(() => setNotice(null), []);

  return {
    state,
    exercise: state.exercise,
    isBusy: isBusy(state.phase),
    videoName: media?.fileName ?? null,
    videoPreviewUrl: media?.previewUrl ?? null,
    analysis,
    reportView,
    statusMessage: statusMessageFor(state, reportView),
    notice,
    playerUrl,
    toggleExercise,
    acquireMedia,
    submit,
    viewAnalyzedVideo,
    reportPlaybackFailed,
    downloadReport,
    downloadAnalyzedVideo,
    dismissNotice,
  };
}
