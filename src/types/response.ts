import type { Readable } from 'node:stream';
import type { HeaderMap } from './request.js';

export type ContentKind = 'html' | 'json' | 'opaque';

export type ResponseBody =
  | { kind: 'buffered'; bytes: Buffer }
  | { kind: 'stream'; stream: Readable };

export interface OriginResponse {
  statusCode: number;
  headers: HeaderMap;
  body: ResponseBody;
}

export interface ObfuscationResult {
  body: Buffer;
  transformed: boolean;
}

export interface OutgoingResponse {
  statusCode: number;
  headers: HeaderMap;
  body: Buffer | Readable;
}
