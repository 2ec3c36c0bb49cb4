/**
 * In-process stand-ins for the network, the media picker and the file saver
 */

import { vi } from 'vitest';
import type { FetchLike } from '../services/AnalysisApi';
import type {
  MediaPicker,
  MediaSourceKind,
  PreviewUrlFactory,
} from '../services/MediaAcquirer';
import type { FileSaver } from '../services/PostReportActions';
import type { DownloadedFile } from '../services/AnalysisApi';

export interface RecordedRequest {
  url: string;
  method: string;
  body: FormData | null;
}

export type FakeRoute = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * fetch replacement that records every call and answers from `respond`.
 */
export function createFakeFetch(respond: FakeRoute) {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (input, init) => {
    const body = init?.body instanceof FormData ? init.body : null;
    const request: RecordedRequest = {
      url: String(input),
      method: init?.method ?? 'GET',
      body,
    };
    requests.push(request);
    return respond(request);
  };
  return { fetch, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(
  body: string,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(body, { status, headers });
}

export function videoFile(name = 'squat.mp4'): File {
  return new File(['fake-video-bytes'], name, { type: 'video/mp4' });
}

/**
 * Picker whose answers are queued by the test, one per call.
 */
export function createQueuedPicker() {
  const answers: Array<() => Promise<File | null>> = [];
  const calls: MediaSourceKind[] = [];
  const picker: MediaPicker = {
    pickVideo(source) {
      calls.push(source);
      const next = answers.shift();
      return next ? next() : Promise.resolve(null);
    },
  };
  return {
    picker,
    calls,
    resolveWith(file: File | null) {
      answers.push(() => Promise.resolve(file));
    },
    rejectWith(error: unknown) {
      answers.push(() => Promise.reject(error));
    },
    /** Answer once `answer` settles, e.g. a `deferred()` promise */
    resolveFrom(answer: Promise<File | null>) {
      answers.push(() => answer);
    },
    /** A dialog dismissed without any event: never settles */
    hang() {
      answers.push(() => new Promise<File | null>(() => {}));
    },
  };
}

export function createPreviewUrls() {
  let counter = 0;
  const revoked: string[] = [];
  const previews: PreviewUrlFactory = {
    create: vi.fn(() => {
      counter += 1;
      return `blob:preview-${counter}`;
    }),
    revoke: vi.fn((url: string) => {
      revoked.push(url);
    }),
  };
  return { previews, revoked };
}

export function createRecordingSaver() {
  const saved: DownloadedFile[] = [];
  const saver: FileSaver = {
    save(file) {
      saved.push(file);
    },
  };
  return { saver, saved };
}

/**
 * A promise the test settles by hand, for holding a request in flight.
 */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
