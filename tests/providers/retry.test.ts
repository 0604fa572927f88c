import { describe, expect, it, vi } from 'vitest';
import { AuthError, NetworkError, RateLimitedError, RequestError, ServerError, UserAbortedError } from '../../src/errors.js';
import { backoffDelay, errorForStatus, parseRetryAfter, withRetry, DEFAULT_RETRY_POLICY } from '../../src/providers/retry.js';

function policy() {
  return { sleep: vi.fn(async (_ms: number, _signal?: AbortSignal) => {}), random: () => 0 };
}

describe('parseRetryAfter', () => {
  it('reads seconds', () => {
    expect(parseRetryAfter('5')).toBe(5000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.UTC(2024, 0, 1, 0, 0, 0);
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:03 GMT', now)).toBe(3000);
  });

  it('ignores missing or unparseable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('errorForStatus', () => {
  it('maps statuses to the error taxonomy', () => {
    expect(errorForStatus(401, 'bad key')).toBeInstanceOf(AuthError);
    expect(errorForStatus(403, '')).toBeInstanceOf(AuthError);
    expect(errorForStatus(429, '', 2000)).toBeInstanceOf(RateLimitedError);
    expect(errorForStatus(503, '')).toBeInstanceOf(ServerError);
    expect(errorForStatus(400, 'diff too large')).toBeInstanceOf(RequestError);
  });

  it('only marks transient failures as retryable', () => {
    expect(errorForStatus(401, '').retryable).toBe(false);
    expect(errorForStatus(400, '').retryable).toBe(false);
    expect(errorForStatus(429, '').retryable).toBe(true);
    expect(errorForStatus(502, '').retryable).toBe(true);
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt and adds jitter below the base delay', () => {
    const base = { ...DEFAULT_RETRY_POLICY, random: () => 0.5 };

    expect(backoffDelay(1, base)).toBe(1500);
    expect(backoffDelay(2, base)).toBe(2500);
    expect(backoffDelay(3, base)).toBe(4500);
  });
});

describe('withRetry', () => {
  it('retries transient failures until success', async () => {
    const retry = policy();
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ServerError('Server error (503)', 503))
      .mockRejectedValueOnce(new ServerError('Server error (503)', 503))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(task, { policy: retry })).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
    expect(task.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(retry.sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('does not retry non-retryable failures', async () => {
    const retry = policy();
    const task = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new AuthError('Request was rejected (401)', 401));

    await expect(withRetry(task, { policy: retry })).rejects.toBeInstanceOf(AuthError);
    expect(task).toHaveBeenCalledTimes(1);
    expect(retry.sleep).not.toHaveBeenCalled();
  });

  it('gives up after the attempt ceiling with the last error', async () => {
    const task = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new NetworkError('Network error: fetch failed'));

    await expect(withRetry(task, { policy: policy() })).rejects.toThrow('Network error: fetch failed');
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('honours retry-after, capped at the maximum', async () => {
    const retry = policy();
    const task = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError('Rate limited (429)', 2000))
      .mockRejectedValueOnce(new RateLimitedError('Rate limited (429)', 120_000))
      .mockResolvedValueOnce('ok');

    await withRetry(task, { policy: retry });

    expect(retry.sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 60_000]);
  });

  it('stops before the first attempt when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn<(attempt: number) => Promise<string>>();

    await expect(withRetry(task, { policy: policy(), signal: controller.signal })).rejects.toBeInstanceOf(UserAbortedError);
    expect(task).not.toHaveBeenCalled();
  });
});
