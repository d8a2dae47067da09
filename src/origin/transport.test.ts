import { errors } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TransportError } from '../types/index.js';
import { Deadline, toTransportError } from './transport.js';

describe('Deadline', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts its signal with a timeout once the budget is spent', () => {
    const deadline = new Deadline(100);

    vi.advanceTimersByTime(99);
    expect(deadline.expired).toBe(false);
    expect(deadline.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(deadline.expired).toBe(true);
    expect(deadline.signal.aborted).toBe(true);

    const reason: unknown = deadline.signal.reason;
    expect(reason).toBeInstanceOf(TransportError);
    if (reason instanceof TransportError) {
      expect(reason.code).toBe('TIMEOUT');
      expect(reason.message).toBe('Upstream deadline of 100ms expired');
    }
  });

  it('never fires once cleared', () => {
    const deadline = new Deadline(100);
    deadline.clear();

    vi.advanceTimersByTime(1_000);
    expect(deadline.expired).toBe(false);
    expect(deadline.signal.aborted).toBe(false);
  });
});

describe('toTransportError', () => {
  it('classifies undici timeouts', () => {
    expect(toTransportError(new errors.HeadersTimeoutError()).code).toBe('TIMEOUT');
    expect(toTransportError(new errors.BodyTimeoutError()).code).toBe('TIMEOUT');
  });

  it('treats any failure after the deadline as a timeout', () => {
    expect(toTransportError(new Error('socket hang up'), true).code).toBe('TIMEOUT');
    expect(toTransportError(new Error('socket hang up')).code).toBe('UNREACHABLE');
  });

  it('passes transport errors through', () => {
    const original = new TransportError('TOO_LARGE', 'too big');
    expect(toTransportError(original)).toBe(original);
  });
});
