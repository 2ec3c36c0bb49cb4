/**
 * URL helpers for turning server-relative paths into absolute URLs.
 */

const ABSOLUTE_URL = /^[a-z][a-z\d+\-.]*:\/\//i;

/**
 * Join a base URL and a server-relative path.
 *
 * Windows separators in the path become `/`, runs of slashes inside the path
 * collapse to one, and exactly one slash separates base and path.
 *
 * @example
 * joinUrl('http://h/', '/a/b.mp4'); // 'http://h/a/b.mp4'
 * joinUrl('http://h', 'analyzed_videos\\t1.mp4'); // 'http://h/analyzed_videos/t1.mp4'
 */
export function joinUrl(baseUrl: string, path: string): string {
  const normalizedPath = path.replace(/\\/g, '/');
  if (ABSOLUTE_URL.test(normalizedPath)) {
    return normalizedPath;
  }

  const trimmedBase = baseUrl.replace(/\/+$/, '');
  const trimmedPath = normalizedPath.replace(/\/{2,}/g, '/').replace(/^\//, '');

  if (!trimmedPath) return trimmedBase;
  return `${trimmedBase}/${trimmedPath}`;
}

/**
 * Build an endpoint URL from fixed path text and dynamic segments. Segments
 * are percent-encoded; test ids are ISO timestamps and contain `:`.
 */
export function endpointUrl(
  baseUrl: string,
  path: string,
  ...segments: string[]
): string {
  const encoded = segments.map((segment) => encodeURIComponent(segment));
  return joinUrl(baseUrl, [path, ...encoded].join('/'));
}
