/**
 * useTestHistory - loads a user's past results, stats and workout plan,
 * and the detail or PDF of a single result
 */

import { useCallback, useEffect, useRef, useState } from 'react';
import { useServices } from '../contexts/ServicesContext';
import { describeApiError } from '../services/AnalysisApiError';
import {
  type ActionResult,
  PostReportActions,
} from '../services/PostReportActions';
import type { Notice } from '../session/UploadSession';
import type {
  TestResultDetail,
  TestResultSummary,
  UserStats,
  WorkoutPlan,
} from '../types/analysis';
import { createLogger } from '../utils/logger';

const log = createLogger({ component: 'useTestHistory' });

export const MISSING_USER_ID_MESSAGE = 'Please enter a User ID';

export interface UseTestHistoryReturn {
  results: TestResultSummary[];
  stats: UserStats | null;
  /** User whose history is on screen */
  loadedUserId: string | null;
  workoutPlan: WorkoutPlan | null;
  resultDetail: TestResultDetail | null;
  isLoading: boolean;
  errorMessage: string | null;
  /** Outcome of the last report download */
  notice: Notice | null;
  loadHistory: (userId: string) => Promise<void>;
  loadWorkoutPlan: (userId: string, testId?: string) => Promise<void>;
  loadResultDetail: (testId: string) => Promise<void>;
  closeResultDetail: () => void;
  downloadReport: (testId: string) => Promise<ActionResult | null>;
  dismissNotice: () => void;
}

export function useTestHistory(): UseTestHistoryReturn {
  const { api, saver } = useServices();

  const [results, setResults] = useState<TestResultSummary[]>([]);
  const [stats, setStats] = useState<UserStats | null>(null);
  const [loadedUserId, setLoadedUserId] = useState<string | null>(null);
  const [workoutPlan, setWorkoutPlan] = useState<WorkoutPlan | null>(null);
  const [resultDetail, setResultDetail] = useState<TestResultDetail | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [errorMessage, setErrorMessage] = useState<string | null>(null);
  const [notice, setNotice] = useState<Notice | null>(null);

  // Responses that land after unmount are dropped
  const mountedRef = useRef(true);
  useEffect(() => {
    mountedRef.current = true;
    return () => {
      mountedRef.current = false;
    };
  }, []);

  // Only the newest request of each kind may write state
  const historyRequestRef = useRef(0);
  const planRequestRef = useRef(0);
  const detailRequestRef = useRef(0);

  const actionsRef = useRef<PostReportActions | null>(null);
  useEffect(() => {
    const actions = new PostReportActions({ api, saver });
    actionsRef.current = actions;
    const subscription = actions.notices$.subscribe(setNotice);
    return () => {
      subscription.unsubscribe();
      actions.dispose();
      actionsRef.current = null;
    };
  }, [api, saver]);

  const loadHistory = useCallback(
    async (userId: string) => {
      const trimmed = userId.trim();
      if (!trimmed) {
        setErrorMessage(MISSING_USER_ID_MESSAGE);
        return;
      }

      historyRequestRef.current += 1;
      planRequestRef.current += 1;
      detailRequestRef.current += 1;
      const request = historyRequestRef.current;
      const isCurrent = () =>
        mountedRef.current && request === historyRequestRef.current;

      setIsLoading(true);
      setErrorMessage(null);
      setResults([]);
      setStats(null);
      setLoadedUserId(null);
      setWorkoutPlan(null);
      setResultDetail(null);

      try {
        const [nextResults, nextStats] = await Promise.all([
          api.getUserResults(trimmed),
          api.getUserStats(trimmed),
        ]);
        if (!isCurrent()) return;
        setResults(nextResults);
        setStats(nextStats);
        setLoadedUserId(trimmed);
      } catch (error) {
        log.error('Failed to load history', error, { action: 'loadHistory' });
        if (!isCurrent()) return;
        setErrorMessage(describeApiError(error));
      } finally {
        if (isCurrent()) {
          setIsLoading(false);
        }
      }
    },
    [api]
  );

  const loadWorkoutPlan = useCallback(
    async (userId: string, testId?: string) => {
      planRequestRef.current += 1;
      const request = planRequestRef.current;
      const isCurrent = () => mountedRef.current && request === planRequestRef.current;
      try {
        const plan = await api.getWorkoutPlan(userId.trim(), testId);
        if (isCurrent()) setWorkoutPlan(plan);
      } catch (error) {
        log.error('Failed to load workout plan', error, {
          action: 'loadWorkoutPlan',
        });
        if (isCurrent()) setErrorMessage(describeApiError(error));
      }
    },
    [api]
  );

  const loadResultDetail = useCallback(
    async (testId: string) => {
      detailRequestRef.current += 1;
      const request = detailRequestRef.current;
      const isCurrent = () =>
        mountedRef.current && request === detailRequestRef.current;
      try {
        const detail = await api.getTestResult(testId);
        if (isCurrent()) setResultDetail(detail);
      } catch (error) {
        log.error('Failed to load result detail', error, {
          action: 'loadResultDetail',
        });
        if (isCurrent()) setErrorMessage(describeApiError(error));
      }
    },
    [api]
  );

  const closeResultDetail = useCallback(() => {
    detailRequestRef.current += 1;
    setResultDetail(null);
  }, []);

  const downloadReport = useCallback(async (testId: string) => {
    const actions = actionsRef.current;
    if (!actions) return null;
    return actions.downloadStoredReport(testId);
  }, []);

  const dismissNotice = useCallback(() => setNotice(null), []);

  return {
    results,
    stats,
    loadedUserId,
    workoutPlan,
    resultDetail,
    isLoading,
    errorMessage,
    notice,
    loadHistory,
    loadWorkoutPlan,
    loadResultDetail,
    closeResultDetail,
    downloadReport,
    dismissNotice,
  };
}
