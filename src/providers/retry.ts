import { AuthError, CommitsmithError, NetworkError, RateLimitedError, RequestError, ServerError, UserAbortedError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('retry');

export const MAX_ATTEMPTS = 3;
export const BASE_DELAY_MS = 1000;
export const MAX_RETRY_AFTER_MS = 60_000;

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxRetryAfterMs: number;
  /** Returns a value in [0, 1). */
  random: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new UserAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new UserAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: MAX_ATTEMPTS,
  baseDelayMs: BASE_DELAY_MS,
  maxRetryAfterMs: MAX_RETRY_AFTER_MS,
  random: Math.random,
  sleep: abortableSleep
};

/**
 * Parses a Retry-After value (seconds or an HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.ceil(seconds * 1000) : undefined;
  }

  const date = new Date(value).getTime();
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/**
 * Maps an HTTP status to the error taxonomy. 401/403 are auth failures, 429 is
 * rate limiting, 5xx server errors and every other 4xx a request error.
 */
export function errorForStatus(status: number, detail: string, retryAfterMs?: number): CommitsmithError {
  const suffix = detail ? `: ${detail}` : '';

  if (status === 401 || status === 403) {
    return new AuthError(`Request was rejected (${status})${suffix}`, status);
  }
  if (status === 429) {
    return new RateLimitedError(`Rate limited (429)${suffix}`, retryAfterMs);
  }
  if (status >= 500) {
    return new ServerError(`Server error (${status})${suffix}`, status);
  }
  return new RequestError(`Request failed (${status})${suffix}`, status);
}

export function isRetryable(error: unknown): boolean {
  return error instanceof CommitsmithError && error.retryable;
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const jitter = Math.floor(policy.random() * policy.baseDelayMs);
  return exponential + jitter;
}

function delayFor(error: unknown, attempt: number, policy: RetryPolicy): number {
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, policy.maxRetryAfterMs);
  }
  return backoffDelay(attempt, policy);
}

/**
 * Runs `task` until it succeeds, fails with a non-retryable error, or the
 * attempt ceiling is reached. Attempt counting is local to this call.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: { policy?: Partial<RetryPolicy>; signal?: AbortSignal; label?: string } = {}
): Promise<T> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
  const label = options.label ?? 'request';

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new UserAbortedError();
    }

    try {
      return await task(attempt);
    } catch (error) {
      if (!isRetryable(error) || attempt >= policy.maxAttempts) {
        throw error;
      }

      const delay = delayFor(error, attempt, policy);
      const reason = error instanceof Error ? error.message : String(error);
      log.debug(`${label} attempt ${attempt}/${policy.maxAttempts} failed (${reason}); retrying in ${delay} ms`);
      await policy.sleep(delay, options.signal);
    }
  }
}

export function networkError(error: unknown): NetworkError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : '';
  return new NetworkError(`Network error: ${message}${cause}`, { cause: error });
}
