import type { ContentKind, HeaderMap } from '../types/index.js';

const HTML_TYPES = new Set(['text/html', 'application/xhtml+xml']);

const JSON_TYPES = new Set(['application/json', 'text/json']);

export function normalizeContentType(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined) return undefined;

  const mediaType = raw.split(';')[0]?.trim().toLowerCase();
  return mediaType ? mediaType : undefined;
}

export function routeContent(headers: Readonly<HeaderMap>): ContentKind {
  const mediaType = normalizeContentType(headers['content-type']);
  if (!mediaType) return 'opaque';

  if (HTML_TYPES.has(mediaType)) return 'html';
  if (JSON_TYPES.has(mediaType) || /^application\/[\w.-]+\+json$/.test(mediaType)) return 'json';

  return 'opaque';
}
