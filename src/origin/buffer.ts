import { Readable } from 'node:stream';
import { brotliDecompressSync, gunzipSync, inflateRawSync, inflateSync } from 'node:zlib';
import { err, ok, type Result, type TransportError } from '../types/index.js';
import { OversizeBodyError, toTransportError } from './transport.js';

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  return Buffer.from(String(chunk));
}

// Already-read chunks first, then whatever the origin still has to send
function replayStream(head: Buffer[], rest: AsyncIterator<unknown>): Readable {
  async function* replay(): AsyncGenerator<Buffer> {
    try {
      yield* head;
      while (true) {
        const next = await rest.next();
        if (next.done) return;
        yield toBuffer(next.value);
      }
    } finally {
      await rest.return?.();
    }
  }

  return Readable.from(replay(), { objectMode: false });
}

export interface BufferOptions {
  maxBytes: number;
  declaredLength?: number;
  deadlineExpired?: () => boolean;
}

/**
 * Reads a response body into memory, up to `maxBytes`.
 *
 * Past the ceiling the result is an OversizeBodyError whose `replay` stream
 * yields the complete original body, so the caller can still stream it through.
 */
export async function bufferBody(stream: Readable, options: BufferOptions): Promise<Result<Buffer, TransportError>> {
  const { maxBytes, declaredLength } = options;

  if (declaredLength !== undefined && declaredLength > maxBytes) {
    return err(new OversizeBodyError(`Declared body of ${declaredLength} bytes exceeds ${maxBytes}`, stream));
  }

  const iterator: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();
  const chunks: Buffer[] = [];
  let total = 0;

  try {
    while (true) {
      const next = await iterator.next();
      if (next.done) break;

      const chunk = toBuffer(next.value);
      chunks.push(chunk);
      total += chunk.length;

      if (total > maxBytes) {
        return err(new OversizeBodyError(`Body exceeds ${maxBytes} bytes`, replayStream(chunks, iterator)));
      }
    }
  } catch (error) {
    return err(toTransportError(error, options.deadlineExpired?.() ?? false));
  }

  return ok(Buffer.concat(chunks, total));
}

export function parseContentLength(value: string | string[] | undefined): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  return Number(raw.trim());
}

type Decoder = (bytes: Buffer, maxOutputLength: number) => Buffer;

const DECODERS: ReadonlyMap<string, Decoder> = new Map<string, Decoder>([
  ['gzip', (bytes, maxOutputLength) => gunzipSync(bytes, { maxOutputLength })],
  ['x-gzip', (bytes, maxOutputLength) => gunzipSync(bytes, { maxOutputLength })],
  ['br', (bytes, maxOutputLength) => brotliDecompressSync(bytes, { maxOutputLength })],
  [
    'deflate',
    (bytes, maxOutputLength) => {
      // Some servers send raw deflate without the zlib wrapper
      try {
        return inflateSync(bytes, { maxOutputLength });
      } catch {
        return inflateRawSync(bytes, { maxOutputLength });
      }
    }
  ]
]);

export type DecodeOutcome =
  | { kind: 'identity'; bytes: Buffer }
  | { kind: 'decoded'; bytes: Buffer }
  | { kind: 'unsupported'; encoding: string }
  | { kind: 'failed'; error: Error };

export function decodeBody(bytes: Buffer, contentEncoding: string | undefined, maxBytes: number): DecodeOutcome {
  const encodings = (contentEncoding ?? '')
    .split(',')
    .map(token => token.trim().toLowerCase())
    .filter(token => token && token !== 'identity');

  if (encodings.length === 0) return { kind: 'identity', bytes };

  let current = bytes;
  // Codings are listed in the order they were applied
  for (const encoding of encodings.reverse()) {
    const decoder = DECODERS.get(encoding);
    if (!decoder) return { kind: 'unsupported', encoding };

    try {
      current = decoder(current, maxBytes);
    } catch (error) {
      return { kind: 'failed', error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  return { kind: 'decoded', bytes: current };
}
