import { describe, expect, it } from 'vitest';
import {
  createFakeFetch,
  jsonResponse,
  textResponse,
  videoFile,
} from '../test-utils/fakes';
import type { UploadRequest } from '../types/analysis';
import { ExerciseType } from '../types/exercise';
import {
  AnalysisApi,
  buildUploadForm,
  parseContentDispositionFilename,
} from './AnalysisApi';
import {
  AnalysisApiError,
  GENERIC_SERVER_MESSAGE,
  GENERIC_TRANSPORT_MESSAGE,
} from './AnalysisApiError';

const BASE_URL = 'http://api.test.local';

function uploadRequest(overrides: Partial<UploadRequest> = {}): UploadRequest {
  return {
    userId: 'u1',
    name: 'Sam',
    age: '30',
    height: '',
    weight: '70',
    exercise: ExerciseType.Squats,
    video: videoFile('clip.mp4'),
    fileName: 'clip.mp4',
    ...overrides,
  };
}

const successBody = {
  success: true,
  message: 'ok',
  test_id: 't123',
  video_path: '/analyzed_videos/t123.mp4',
  report_data: {
    performance: {
      overall_score: 72.34,
      grade: 'B',
      rep_count: 15,
      form_accuracy: 88,
      duration_seconds: 42.5,
    },
    feedback: ['Keep back straight'],
  },
};

async function captureError(promise: Promise<unknown>): Promise<AnalysisApiError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AnalysisApiError) return error;
    throw error;
  }
  throw new Error('Expected the call to fail');
}

describe('buildUploadForm', () => {
  it('sends the wire token, profile fields and the video', () => {
    const form = buildUploadForm(uploadRequest());

    expect(form.get('exercise_type')).toBe('SQUATS');
    expect(form.get('user_id')).toBe('u1');
    expect(form.get('age')).toBe('30');
    expect(form.get('height')).toBe('0');
    expect(form.get('weight')).toBe('70');
    expect(form.get('name')).toBe('Sam');
    expect(form.get('user_name')).toBe('Sam');

    const video = form.get('video');
    expect(video).toBeInstanceOf(File);
    expect(video instanceof File ? video.name : null).toBe('clip.mp4');
  });

  it('trims whitespace from text fields', () => {
    const form = buildUploadForm(uploadRequest({ userId: ' u2 ', name: ' Kim ' }));
    expect(form.get('user_id')).toBe('u2');
    expect(form.get('user_name')).toBe('Kim');
  });
});

describe('parseContentDispositionFilename', () => {
  it('reads quoted, bare and encoded names', () => {
    expect(parseContentDispositionFilename('attachment; filename="r.pdf"')).toBe(
      'r.pdf'
    );
    expect(parseContentDispositionFilename('attachment; filename=r.pdf')).toBe(
      'r.pdf'
    );
    expect(
      parseContentDispositionFilename(
        "attachment; filename*=UTF-8''my%20report.pdf"
      )
    ).toBe('my report.pdf');
  });

  it('returns null without a filename', () => {
    expect(parseContentDispositionFilename(null)).toBeNull();
    expect(parseContentDispositionFilename('inline')).toBeNull();
  });
});

describe('AnalysisApi', () => {
  describe('analyseTest', () => {
    it('posts multipart data to the analysis endpoint', async () => {
      const { fetch, requests } = createFakeFetch(() => jsonResponse(successBody));
      const api = new AnalysisApi({ config: { baseUrl: `${BASE_URL}/` }, fetch });

      await api.analyseTest(uploadRequest());

      expect(requests).toHaveLength(1);
      expect(requests[0]?.url).toBe(`${BASE_URL}/test/analysetest`);
      expect(requests[0]?.method).toBe('POST');
      expect(requests[0]?.body?.get('exercise_type')).toBe('SQUATS');
    });

    it('returns the decoded report on success', async () => {
      const { fetch } = createFakeFetch(() => jsonResponse(successBody));
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const report = await api.analyseTest(uploadRequest());

      expect(report.testId).toBe('t123');
      expect(report.videoPath).toBe('/analyzed_videos/t123.mp4');
      expect(report.performance.overallScore).toBe(72.34);
      expect(report.feedback).toEqual(['Keep back straight']);
    });

    it('surfaces the server message when success is false', async () => {
      const { fetch } = createFakeFetch(() =>
        jsonResponse({ success: false, message: 'exercise not detected' })
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.analyseTest(uploadRequest()));

      expect(error.kind).toBe('server');
      expect(error.message).toBe('exercise not detected');
      expect(error.status).toBe(200);
    });

    it('falls back to a generic message when success is false without one', async () => {
      const { fetch } = createFakeFetch(() => jsonResponse({ success: false }));
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.analyseTest(uploadRequest()));

      expect(error.message).toBe(GENERIC_SERVER_MESSAGE);
    });

    it('reports an HTTP error with an unparseable body', async () => {
      const { fetch } = createFakeFetch(() =>
        textResponse('<html>Internal Server Error</html>', 500)
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.analyseTest(uploadRequest()));

      expect(error.kind).toBe('server');
      expect(error.status).toBe(500);
      expect(error.message).toBe('Upload failed (HTTP 500).');
    });

    it('uses the detail field of an HTTP error body', async () => {
      const { fetch } = createFakeFetch(() =>
        jsonResponse({ detail: 'Invalid exercise type' }, 400)
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.analyseTest(uploadRequest()));

      expect(error.message).toBe('Invalid exercise type');
      expect(error.status).toBe(400);
    });

    it('maps a network failure to a transport error', async () => {
      const { fetch } = createFakeFetch(() => {
        throw new TypeError('Failed to fetch');
      });
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.analyseTest(uploadRequest()));

      expect(error.kind).toBe('transport');
      expect(error.message).toBe(GENERIC_TRANSPORT_MESSAGE);
      expect(error.status).toBeNull();
    });

    it('treats a malformed success body as a transport error', async () => {
      const { fetch } = createFakeFetch(() => textResponse('not json'));
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.analyseTest(uploadRequest()));

      expect(error.kind).toBe('transport');
      expect(error.status).toBe(200);
    });

    it('treats a body without success as a transport error', async () => {
      const { fetch } = createFakeFetch(() => jsonResponse({ message: 'ok' }));
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.analyseTest(uploadRequest()));

      expect(error.kind).toBe('transport');
    });
  });

  describe('URLs', () => {
    const api = new AnalysisApi({
      config: { baseUrl: BASE_URL },
      fetch: createFakeFetch(() => jsonResponse({})).fetch,
    });

    it('joins the analyzed video path onto the base URL', () => {
      expect(api.analyzedVideoUrl('/analyzed_videos/t123.mp4')).toBe(
        `${BASE_URL}/analyzed_videos/t123.mp4`
      );
    });

    it('encodes timestamp test ids in download URLs', () => {
      expect(api.reportDownloadUrl('2024-05-01T10:00:00')).toBe(
        `${BASE_URL}/test/download/report/2024-05-01T10%3A00%3A00`
      );
      expect(api.analyzedVideoDownloadUrl('2024-05-01T10:00:00')).toBe(
        `${BASE_URL}/test/download/analyzed-video/2024-05-01T10%3A00%3A00`
      );
    });
  });

  describe('downloads', () => {
    it('names the report after the Content-Disposition header', async () => {
      const { fetch, requests } = createFakeFetch(() =>
        textResponse('PDFDATA', 200, {
          'Content-Disposition': 'attachment; filename="report_t1.pdf"',
        })
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const file = await api.downloadReport('t1');

      expect(requests[0]?.url).toBe(`${BASE_URL}/test/download/report/t1`);
      expect(file.fileName).toBe('report_t1.pdf');
      expect(file.blob.size).toBe(7);
    });

    it('falls back to a generated name', async () => {
      const { fetch } = createFakeFetch(() => textResponse('VIDEO'));
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const file = await api.downloadAnalyzedVideo('t1');

      expect(file.fileName).toBe('analyzed_video_t1.mp4');
    });

    it('fails on a 404', async () => {
      const { fetch } = createFakeFetch(() =>
        jsonResponse({ detail: 'Report not found' }, 404)
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const error = await captureError(api.downloadReport('t1'));

      expect(error.kind).toBe('server');
      expect(error.message).toBe('Report not found');
    });
  });

  describe('history', () => {
    it('requests results with the default limit', async () => {
      const { fetch, requests } = createFakeFetch(() =>
        jsonResponse([{ test_id: 'a', score: 90 }])
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const results = await api.getUserResults('user 1');

      expect(requests[0]?.url).toBe(`${BASE_URL}/test/results/user%201?limit=20`);
      expect(results).toHaveLength(1);
    });

    it('requests stats for a user', async () => {
      const { fetch, requests } = createFakeFetch(() =>
        jsonResponse({ total_tests: 3, avg_score: 71.2, progress_trend: 'improving' })
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const stats = await api.getUserStats('u1');

      expect(requests[0]?.url).toBe(`${BASE_URL}/test/stats/u1`);
      expect(stats.total_tests).toBe(3);
    });

    it('fetches a single result', async () => {
      const { fetch, requests } = createFakeFetch(() =>
        jsonResponse({
          test_id: 't1',
          score: 55,
          feedback: { summary: 'Solid', key_findings: ['Depth ok'], form_errors_breakdown: 'n/a' },
        })
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const detail = await api.getTestResult('t1');

      expect(requests[0]?.url).toBe(`${BASE_URL}/test/result/t1`);
      expect(detail.score).toBe(55);
      expect(detail.feedback?.key_findings).toEqual(['Depth ok']);
      expect(detail.feedback?.form_errors_breakdown).toBeNull();
    });

    it('passes the test id to the workout plan as a query parameter', async () => {
      const { fetch, requests } = createFakeFetch(() =>
        jsonResponse({ fitness_level: 'intermediate', recommendations: ['Plank'] })
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      const plan = await api.getWorkoutPlan('u1', '2024-05-01T10:00:00');

      expect(requests[0]?.url).toBe(
        `${BASE_URL}/test/workout-plan/u1?test_id=2024-05-01T10%3A00%3A00`
      );
      expect(plan.recommendations).toEqual(['Plank']);
    });
  });

  describe('healthCheck', () => {
    it('returns the status when the backend answers', async () => {
      const { fetch } = createFakeFetch(() =>
        jsonResponse({ status: 'healthy', database_connected: true })
      );
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      expect((await api.healthCheck())?.status).toBe('healthy');
    });

    it('returns null instead of throwing when the backend is down', async () => {
      const { fetch } = createFakeFetch(() => {
        throw new TypeError('Failed to fetch');
      });
      const api = new AnalysisApi({ config: { baseUrl: BASE_URL }, fetch });

      expect(await api.healthCheck()).toBeNull();
    });
  });
});
