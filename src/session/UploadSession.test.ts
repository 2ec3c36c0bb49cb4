import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AnalysisApiError, GENERIC_TRANSPORT_MESSAGE } from '../services/AnalysisApiError';
import {
  MediaAcquirer,
  PERMISSION_DENIED_MESSAGE,
} from '../services/MediaAcquirer';
import {
  createPreviewUrls,
  createQueuedPicker,
  deferred,
  videoFile,
} from '../test-utils/fakes';
import type { AnalysisReport, UploadProfile, UploadRequest } from '../types/analysis';
import { ExerciseType } from '../types/exercise';
import {
  type AnalysisUploader,
  displayedAnalysis,
  isBusy,
  mediaOf,
  type Notice,
  SUCCESS_NOTICE,
  UploadSession,
} from './UploadSession';

const profile: UploadProfile = {
  userId: 'u1',
  name: 'Sam',
  age: '30',
  height: '175',
  weight: '70',
};

function makeReport(overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  return {
    message: 'ok',
    testId: 't1',
    videoPath: 'analyzed_videos/t1.mp4',
    performance: {
      overallScore: 80,
      grade: 'B',
      repCount: 10,
      formAccuracy: 90,
      durationSeconds: 30,
    },
    feedback: ['Nice'],
    ...overrides,
  };
}

function setup(options: { validationMode?: 'permissive' | 'strict' } = {}) {
  const picker = createQueuedPicker();
  const { previews, revoked } = createPreviewUrls();
  const analyseTest = vi.fn<(request: UploadRequest) => Promise<AnalysisReport>>();
  const api: AnalysisUploader = { analyseTest };
  const session = new UploadSession({
    api,
    acquirer: new MediaAcquirer({ picker: picker.picker, previews }),
    validationMode: options.validationMode,
  });
  const notices: Notice[] = [];
  session.notices$.subscribe((notice) => notices.push(notice));
  return { session, picker, revoked, analyseTest, notices };
}

async function readySession(exercise = ExerciseType.Squats) {
  const context = setup();
  context.picker.resolveWith(videoFile('first.mp4'));
  await context.session.acquireMedia('library');
  context.session.selectExercise(exercise);
  return context;
}

describe('UploadSession', () => {
  describe('exercise selection', () => {
    it('starts idle with nothing selected', () => {
      const { session } = setup();
      expect(session.state).toEqual({ phase: { type: 'idle' }, exercise: null });
    });

    it('keeps exactly the last selected exercise', () => {
      const { session } = setup();
      session.selectExercise(ExerciseType.Pushups);
      session.selectExercise(ExerciseType.Situps);
      expect(session.state.exercise).toBe(ExerciseType.Situps);
    });

    it('clears the selection when the active exercise is toggled', () => {
      const { session } = setup();
      session.toggleExercise(ExerciseType.Pushups);
      session.toggleExercise(ExerciseType.Pushups);
      expect(session.state.exercise).toBeNull();
    });

    it('switches the selection when another exercise is toggled', () => {
      const { session } = setup();
      session.toggleExercise(ExerciseType.Pushups);
      session.toggleExercise(ExerciseType.PlankHold);
      expect(session.state.exercise).toBe(ExerciseType.PlankHold);
    });
  });

  describe('acquireMedia', () => {
    it('moves to ready with the picked video', async () => {
      const { session, picker } = setup();
      picker.resolveWith(videoFile('clip.mp4'));

      const media = await session.acquireMedia('capture');

      expect(media?.fileName).toBe('clip.mp4');
      expect(session.state.phase.type).toBe('ready');
      expect(mediaOf(session.state.phase)?.source).toBe('capture');
    });

    it('waits in awaiting-media while the picker is open', async () => {
      const { session, picker } = setup();
      const pending = deferred<File | null>();
      picker.picker.pickVideo = () => pending.promise;

      const acquiring = session.acquireMedia('library');
      expect(session.state.phase.type).toBe('awaiting-media');

      pending.resolve(null);
      await acquiring;
      expect(session.state.phase.type).toBe('idle');
    });

    it('keeps the previous video when the picker is cancelled', async () => {
      const { session, picker, revoked } = await readySession();
      picker.resolveWith(null);

      expect(await session.acquireMedia('library')).toBeNull();

      expect(session.state.phase.type).toBe('ready');
      expect(mediaOf(session.state.phase)?.fileName).toBe('first.mp4');
      expect(revoked).toEqual([]);
    });

    it('replaces and releases the previous video', async () => {
      const { session, picker, revoked } = await readySession();
      picker.resolveWith(videoFile('second.mp4'));

      await session.acquireMedia('library');

      expect(mediaOf(session.state.phase)?.fileName).toBe('second.mp4');
      expect(revoked).toEqual(['blob:preview-1']);
    });

    it('reports a denied permission and restores the phase', async () => {
      const { session, picker, notices } = setup();
      picker.rejectWith(Object.assign(new Error('denied'), { name: 'NotAllowedError' }));

      expect(await session.acquireMedia('capture')).toBeNull();

      expect(session.state.phase.type).toBe('idle');
      expect(notices).toEqual([
        { level: 'error', message: PERMISSION_DENIED_MESSAGE },
      ]);
    });

    it('replaces a pick that never settles', async () => {
      const { session, picker } = setup();
      picker.hang();
      picker.resolveWith(videoFile('second.mp4'));

      void session.acquireMedia('library');
      expect(session.state.phase.type).toBe('awaiting-media');
      const media = await session.acquireMedia('capture');

      expect(media?.fileName).toBe('second.mp4');
      expect(session.state.phase.type).toBe('ready');
      expect(picker.calls).toEqual(['library', 'capture']);
    });

    it('releases a superseded pick that settles late', async () => {
      const { session, picker, revoked } = setup();
      const late = deferred<File | null>();
      picker.resolveFrom(late.promise);
      picker.resolveWith(null);

      const first = session.acquireMedia('library');
      expect(await session.acquireMedia('capture')).toBeNull();
      late.resolve(videoFile('late.mp4'));

      expect(await first).toBeNull();
      expect(session.state.phase).toEqual({ type: 'idle' });
      expect(revoked).toEqual(['blob:preview-1']);
    });

    it('restores the video from before a pick that was replaced', async () => {
      const { session, picker, revoked } = await readySession();
      picker.hang();
      picker.resolveWith(null);

      void session.acquireMedia('library');
      expect(await session.acquireMedia('library')).toBeNull();

      expect(session.state.phase.type).toBe('ready');
      expect(mediaOf(session.state.phase)?.fileName).toBe('first.mp4');
      expect(revoked).toEqual([]);
    });

    it('clears a displayed report when a new video arrives', async () => {
      const { session, picker, analyseTest } = await readySession();
      analyseTest.mockResolvedValue(makeReport());
      await session.submit(profile);
      picker.resolveWith(videoFile('next.mp4'));

      await session.acquireMedia('library');

      expect(session.state.phase.type).toBe('ready');
      expect(displayedAnalysis(session.state.phase)).toBeNull();
    });
  });

  describe('submit', () => {
    it('rejects without a video and makes no request', async () => {
      const { session, analyseTest, notices } = setup();
      session.selectExercise(ExerciseType.Squats);

      const outcome = await session.submit(profile);

      expect(outcome.status).toBe('invalid');
      expect(analyseTest).not.toHaveBeenCalled();
      expect(session.state.phase.type).toBe('idle');
      expect(notices).toEqual([
        { level: 'error', message: 'Select a video to analyze.' },
      ]);
    });

    it('rejects without an exercise and makes no request', async () => {
      const { session, picker, analyseTest } = setup();
      picker.resolveWith(videoFile());
      await session.acquireMedia('library');

      const outcome = await session.submit(profile);

      expect(outcome).toEqual({
        status: 'invalid',
        issues: [{ field: 'exercise', message: 'Select an exercise type.' }],
      });
      expect(analyseTest).not.toHaveBeenCalled();
      expect(session.state.phase.type).toBe('ready');
    });

    it('requires the profile in strict mode', async () => {
      const context = setup({ validationMode: 'strict' });
      context.picker.resolveWith(videoFile());
      await context.session.acquireMedia('library');
      context.session.selectExercise(ExerciseType.Squats);

      const outcome = await context.session.submit({ ...profile, weight: '' });

      expect(outcome.status).toBe('invalid');
      expect(context.analyseTest).not.toHaveBeenCalled();
    });

    it('sends the selected exercise, profile and video', async () => {
      const { session, analyseTest } = await readySession(ExerciseType.PlankHold);
      analyseTest.mockResolvedValue(makeReport());

      await session.submit(profile);

      const request = analyseTest.mock.calls[0]?.[0];
      expect(request?.exercise).toBe(ExerciseType.PlankHold);
      expect(request?.userId).toBe('u1');
      expect(request?.fileName).toBe('first.mp4');
    });

    it('reports a successful analysis', async () => {
      const { session, analyseTest, notices } = await readySession();
      const report = makeReport();
      analyseTest.mockResolvedValue(report);

      const outcome = await session.submit(profile);

      expect(outcome).toEqual({
        status: 'reported',
        analysis: { report, exercise: ExerciseType.Squats, userName: 'Sam' },
      });
      expect(session.state.phase.type).toBe('reported');
      expect(notices.map((n) => n.message)).toEqual([
        'Uploading and analyzing video...',
        SUCCESS_NOTICE,
      ]);
    });

    it('ignores submit while an upload is in flight', async () => {
      const { session, analyseTest } = await readySession();
      const pending = deferred<AnalysisReport>();
      analyseTest.mockReturnValue(pending.promise);

      const first = session.submit(profile);
      const second = await session.submit(profile);

      expect(second).toEqual({ status: 'ignored' });
      expect(analyseTest).toHaveBeenCalledTimes(1);
      expect(session.state.phase.type).toBe('submitting');

      pending.resolve(makeReport());
      await first;
    });

    it('ignores media acquisition while an upload is in flight', async () => {
      const { session, analyseTest, picker } = await readySession();
      const pending = deferred<AnalysisReport>();
      analyseTest.mockReturnValue(pending.promise);

      const first = session.submit(profile);
      expect(await session.acquireMedia('library')).toBeNull();
      expect(picker.calls).toEqual(['library']);

      pending.resolve(makeReport());
      await first;
    });

    it('abandons a pick that never settles and uploads the current video', async () => {
      const { session, picker, analyseTest } = await readySession();
      picker.hang();
      analyseTest.mockResolvedValue(makeReport());

      void session.acquireMedia('library');
      const outcome = await session.submit(profile);

      expect(outcome.status).toBe('reported');
      expect(analyseTest.mock.calls[0]?.[0].fileName).toBe('first.mp4');
      expect(session.state.phase.type).toBe('reported');
    });

    it('clears busy after a successful upload', async () => {
      const { session, analyseTest } = await readySession();
      const busy: boolean[] = [];
      session.state$.subscribe((state) => busy.push(isBusy(state.phase)));
      analyseTest.mockResolvedValue(makeReport());

      await session.submit(profile);

      expect(busy).toEqual([false, true, false]);
    });

    it('clears busy and shows the server message on failure', async () => {
      const { session, analyseTest, notices } = await readySession();
      analyseTest.mockRejectedValue(
        new AnalysisApiError('server', 'exercise not detected', { status: 200 })
      );

      const outcome = await session.submit(profile);

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'server', message: 'exercise not detected', status: 200 },
      });
      expect(session.state.phase.type).toBe('failed');
      expect(displayedAnalysis(session.state.phase)).toBeNull();
      expect(notices.at(-1)).toEqual({
        level: 'error',
        message: 'exercise not detected',
      });
    });

    it('uses the generic message for unexpected errors', async () => {
      const { session, analyseTest } = await readySession();
      analyseTest.mockRejectedValue(new Error('boom'));

      const outcome = await session.submit(profile);

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'transport', message: GENERIC_TRANSPORT_MESSAGE },
      });
    });

    it('replaces the previous report on re-submission', async () => {
      const { session, analyseTest } = await readySession();
      analyseTest.mockResolvedValueOnce(makeReport({ testId: 'old' }));
      await session.submit(profile);

      const fresh = makeReport({
        testId: 'new',
        videoPath: null,
        feedback: [],
        performance: {
          overallScore: null,
          grade: null,
          repCount: null,
          formAccuracy: null,
          durationSeconds: null,
        },
      });
      analyseTest.mockResolvedValueOnce(fresh);
      await session.submit(profile);

      expect(displayedAnalysis(session.state.phase)?.report).toBe(fresh);
    });

    it('hides the previous report while re-submitting', async () => {
      const { session, analyseTest } = await readySession();
      analyseTest.mockResolvedValueOnce(makeReport());
      await session.submit(profile);
      const pending = deferred<AnalysisReport>();
      analyseTest.mockReturnValueOnce(pending.promise);

      const running = session.submit(profile);
      expect(displayedAnalysis(session.state.phase)).toBeNull();

      pending.resolve(makeReport({ testId: 't2' }));
      await running;
    });

    it('keeps the previous report when a re-submission fails', async () => {
      const { session, analyseTest } = await readySession();
      const first = makeReport({ testId: 'kept' });
      analyseTest.mockResolvedValueOnce(first);
      await session.submit(profile);
      analyseTest.mockRejectedValueOnce(
        new AnalysisApiError('transport', GENERIC_TRANSPORT_MESSAGE)
      );

      await session.submit(profile);

      expect(session.state.phase.type).toBe('failed');
      expect(displayedAnalysis(session.state.phase)?.report).toBe(first);
    });
  });

  describe('dispose', () => {
    let context: Awaited<ReturnType<typeof readySession>>;

    beforeEach(async () => {
      context = await readySession();
    });

    it('releases the video', () => {
      context.session.dispose();
      expect(context.revoked).toEqual(['blob:preview-1']);
    });

    it('drops a response that arrives after teardown', async () => {
      const pending = deferred<AnalysisReport>();
      context.analyseTest.mockReturnValue(pending.promise);
      const states: string[] = [];
      context.session.state$.subscribe((s) => states.push(s.phase.type));

      const running = context.session.submit(profile);
      context.session.dispose();
      pending.resolve(makeReport());
      await running;

      expect(states).toEqual(['ready', 'submitting']);
      expect(context.notices.map((n) => n.level)).toEqual(['info']);
    });

    it('ignores calls after teardown', async () => {
      context.session.dispose();
      expect(await context.session.submit(profile)).toEqual({ status: 'ignored' });
      expect(context.analyseTest).not.toHaveBeenCalled();
    });
  });
});
