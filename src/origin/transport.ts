import type { Readable } from 'node:stream';
import { TransportError } from '../types/index.js';

const TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'ETIMEDOUT'
]);

// Carries the origin body so it can still be streamed to the client unmodified
export class OversizeBodyError extends TransportError {
  readonly replay: Readable;

  constructor(message: string, replay: Readable) {
    super('TOO_LARGE', message);
    this.name = 'OversizeBodyError';
    this.replay = replay;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof TransportError) return error.code === 'TIMEOUT';
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) return true;
  const code = errorCode(error);
  return code !== undefined && TIMEOUT_CODES.has(code);
}

export function toTransportError(error: unknown, deadlineExpired = false): TransportError {
  if (error instanceof TransportError) return error;

  const message = error instanceof Error ? error.message : String(error);

  if (deadlineExpired || isTimeoutError(error)) {
    return new TransportError('TIMEOUT', `Upstream timed out: ${message}`, { cause: error });
  }

  return new TransportError('UNREACHABLE', `Upstream unreachable: ${message}`, { cause: error });
}

// Per-request deadline; aborts the origin exchange when it expires
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private expiredFlag = false;

  constructor(readonly timeoutMs: number) {
    this.timer = setTimeout(() => {
      this.expiredFlag = true;
      this.controller.abort(new TransportError('TIMEOUT', `Upstream deadline of ${timeoutMs}ms expired`));
    }, timeoutMs);
    this.timer.unref();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.expiredFlag;
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}
