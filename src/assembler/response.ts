import type { ObfuscationResult, OriginResponse, OutgoingResponse } from '../types/index.js';
import { stripHopByHop } from '../origin/headers.js';

// Headers describing the exact byte representation, stale once the body is rewritten
export const REPRESENTATION_HEADERS: readonly string[] = [
  'content-length',
  'content-encoding',
  'etag',
  'last-modified',
  'content-md5',
  'digest',
  'content-digest',
  'repr-digest',
  'content-range',
  'accept-ranges'
];

export function assembleResponse(origin: OriginResponse, result?: ObfuscationResult): OutgoingResponse {
  const headers = stripHopByHop(origin.headers);

  if (result?.transformed) {
    for (const name of REPRESENTATION_HEADERS) {
      delete headers[name];
    }
    headers['content-length'] = String(result.body.length);

    return { statusCode: origin.statusCode, headers, body: result.body };
  }

  if (result) {
    return { statusCode: origin.statusCode, headers, body: result.body };
  }

  const body = origin.body.kind === 'buffered' ? origin.body.bytes : origin.body.stream;
  return { statusCode: origin.statusCode, headers, body };
}
