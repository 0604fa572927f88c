import { z } from 'zod';
import { MalformedResponseError, NetworkError, UserAbortedError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Prompt } from '../types.js';
import { errorForStatus, networkError, parseRetryAfter, withRetry, type RetryPolicy } from './retry.js';
import type { HealthStatus, ProviderClient } from './types.js';

const log = createLogger('relay');

const commitResponseSchema = z.object({ message: z.string() });
const suggestionsResponseSchema = z.object({ suggestions: z.array(z.string()) });
const commandResponseSchema = z.object({ suggestion: z.string() });
const healthResponseSchema = z.object({ status: z.string(), version: z.string() });
const errorBodySchema = z.object({ error: z.string() });

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RelayProviderOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
  retry?: Partial<RetryPolicy>;
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    body = undefined;
  }
  const parsed = errorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.error : text.trim().slice(0, 200);
}

/**
 * Hosted relay backend. Unauthenticated JSON over HTTPS; the relay holds the
 * provider credentials.
 */
export class RelayProvider implements ProviderClient {
  readonly mode = 'relay' as const;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: RelayProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  private async request(route: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(`${this.baseUrl}${route}`, { ...init, signal: controller.signal });
      } catch (error) {
        if (signal?.aborted) {
          throw new UserAbortedError();
        }
        throw timedOut
          ? new NetworkError(`Request to ${route} timed out after ${this.options.timeoutMs} ms`, { cause: error })
          : networkError(error);
      }

      if (!response.ok) {
        const detail = await readErrorDetail(response);
        throw errorForStatus(response.status, detail, parseRetryAfter(response.headers.get('retry-after')));
      }

      try {
        return await response.json();
      } catch (error) {
        throw new MalformedResponseError(`Relay returned invalid JSON for ${route}`, { cause: error });
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private post(route: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return withRetry(
      () =>
        this.request(
          route,
          {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
            body: JSON.stringify(body)
          },
          signal
        ),
      { policy: this.options.retry, signal, label: `POST ${route}` }
    );
  }

  async send(prompt: Prompt, count: number, signal?: AbortSignal): Promise<string[]> {
    const { route } = prompt.relay;
    log.debug(`POST ${route} (count ${count})`);

    switch (prompt.relay.route) {
      case '/api/commit': {
        const data = commitResponseSchema.safeParse(await this.post(route, prompt.relay.body, signal));
        if (!data.success) {
          throw new MalformedResponseError('Relay response is missing "message"');
        }
        return [data.data.message];
      }
      case '/api/commit/suggestions': {
        const body = { ...prompt.relay.body, count };
        const data = suggestionsResponseSchema.safeParse(await this.post(route, body, signal));
        if (!data.success) {
          throw new MalformedResponseError('Relay response is missing "suggestions"');
        }
        return data.data.suggestions;
      }
      case '/api/command': {
        const data = commandResponseSchema.safeParse(await this.post(route, prompt.relay.body, signal));
        if (!data.success) {
          throw new MalformedResponseError('Relay response is missing "suggestion"');
        }
        return [data.data.suggestion];
      }
    }
  }

  async health(signal?: AbortSignal): Promise<HealthStatus> {
    const data = await withRetry(
      () => this.request('/api/health', { method: 'GET', headers: { Accept: 'application/json' } }, signal),
      { policy: this.options.retry, signal, label: 'GET /api/health' }
    );
    const parsed = healthResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedResponseError('Relay health response is missing "status" or "version"');
    }
    return parsed.data;
  }
}
