import { describe, it, expect, vi } from 'vitest';

vi.mock('../services/get-log.js', () => ({
  getLog: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn() }),
}));

const { computeBackoffDelay, isRetryableError, withRetry } = await import('./retry.js');
const { TransportError, CancelledError } = await import('../types/errors.js');

const NO_JITTER = { initialDelayMs: 1000, maxDelayMs: 120_000, multiplier: 2, jitter: false };

// ---------------------------------------------------------------------------
// computeBackoffDelay
// ---------------------------------------------------------------------------

describe('computeBackoffDelay', () => {
  it('grows exponentially', () => {
    expect(computeBackoffDelay(0, NO_JITTER)).toBe(1000);
    expect(computeBackoffDelay(1, NO_JITTER)).toBe(2000);
    expect(computeBackoffDelay(4, NO_JITTER)).toBe(16000);
  });

  it('caps at maxDelayMs', () => {
    expect(computeBackoffDelay(10, NO_JITTER)).toBe(120_000);
  });

  it('applies up to 25% jitter either way', () => {
    const policy = { ...NO_JITTER, jitter: true };
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(750);
    expect(computeBackoffDelay(0, policy, () => 0.5)).toBe(1000);
    expect(computeBackoffDelay(0, policy, () => 1)).toBe(1250);
  });
});

// ---------------------------------------------------------------------------
// isRetryableError
// ---------------------------------------------------------------------------

describe('isRetryableError', () => {
  it('follows TransportError.retryable', () => {
    expect(isRetryableError(new TransportError('reset'))).toBe(true);
    expect(isRetryableError(new TransportError('gone', { status: 404 }))).toBe(false);
  });

  it('rejects anything else', () => {
    expect(isRetryableError(new Error('network'))).toBe(false);
    expect(isRetryableError(null)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// withRetry
// ---------------------------------------------------------------------------

describe('withRetry', () => {
  const fast = { initialDelayMs: 1, maxDelayMs: 1, multiplier: 1, jitter: false };

  it('returns the first success', async () => {
    const operation = vi.fn(async () => 'done');
    await expect(withRetry(operation, { maxRetries: 2 })).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries retryable failures and reports each retry', async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new TransportError('flaky', { status: 503 });
      return attempt;
    });

    await expect(withRetry(operation, { maxRetries: 2, backoff: fast, onRetry })).resolves.toBe(2);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
    expect(onRetry.mock.calls[1]?.[0]).toBe(2);
  });

  it('gives up after maxRetries', async () => {
    const failure = new TransportError('down', { status: 500 });
    const operation = vi.fn(async () => {
      throw failure;
    });

    await expect(withRetry(operation, { maxRetries: 1, backoff: fast })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry permanent failures', async () => {
    const operation = vi.fn(async () => {
      throw new TransportError('forbidden', { status: 403 });
    });

    await expect(withRetry(operation, { maxRetries: 5, backoff: fast })).rejects.toThrow('forbidden');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('honours a custom retryable predicate', async () => {
    const operation = vi.fn(async (attempt: number) => {
      if (attempt === 0) throw new Error('try again');
      return 'second';
    });

    await expect(
      withRetry(operation, { maxRetries: 1, backoff: fast, retryable: () => true })
    ).resolves.toBe('second');
  });

  it('stops waiting when the signal fires', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      throw new TransportError('flaky');
    });

    const pending = withRetry(operation, {
      maxRetries: 3,
      backoff: { initialDelayMs: 60_000, jitter: false },
      signal: controller.signal,
    });
    await Promise.resolve();
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
