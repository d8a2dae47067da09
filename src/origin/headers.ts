import type { ClassificationVerdict, HeaderMap, HeaderValue, IncomingRequest } from '../types/index.js';

// Connection-scoped headers that an intermediary must not forward
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

// undici refuses these on outgoing requests
const NEVER_FORWARDED_REQUEST_HEADERS: ReadonlySet<string> = new Set(['expect', 'host']);

function asList(value: HeaderValue | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

// Header names listed in the Connection header are hop-by-hop as well
export function connectionScopedHeaders(headers: Readonly<HeaderMap>): Set<string> {
  const names = new Set(HOP_BY_HOP_HEADERS);
  for (const value of asList(headers['connection'])) {
    for (const token of value.split(',')) {
      const name = token.trim().toLowerCase();
      if (name) names.add(name);
    }
  }
  return names;
}

export function stripHopByHop(headers: Readonly<HeaderMap>): Record<string, HeaderValue> {
  const excluded = connectionScopedHeaders(headers);
  const result: Record<string, HeaderValue> = {};

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    if (excluded.has(key)) continue;
    result[key] = value;
  }

  return result;
}

export function buildForwardHeaders(
  request: IncomingRequest,
  upstreamHost: string,
  verdict: ClassificationVerdict
): Record<string, HeaderValue> {
  const headers = stripHopByHop(request.headers);

  for (const name of NEVER_FORWARDED_REQUEST_HEADERS) {
    delete headers[name];
  }
  headers['host'] = upstreamHost;

  // Transformable bodies must arrive uncompressed
  if (verdict === 'obfuscate') {
    headers['accept-encoding'] = 'identity';
  }

  return headers;
}
