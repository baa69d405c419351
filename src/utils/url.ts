// src/utils/url.ts

/**
 * Join a base URL and a relative path with exactly one slash between them.
 *
 * Only one trailing slash is removed from the base and one leading slash from
 * the path, so `joinUrl('https://api.example.com/', '/v1/servers')` and
 * `joinUrl('https://api.example.com', 'v1/servers')` both give
 * `https://api.example.com/v1/servers`.
 */
export function joinUrl(base: string, path: string): string {
  const trimmedBase = base.endsWith('/') ? base.slice(0, -1) : base;
  const trimmedPath = path.startsWith('/') ? path.slice(1) : path;
  return `${trimmedBase}/${trimmedPath}`;
}
