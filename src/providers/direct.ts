import OpenAI from 'openai';
import { ConfigError, MalformedResponseError, UserAbortedError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Prompt } from '../types.js';
import { splitSuggestions } from '../validate.js';
import { errorForStatus, networkError, parseRetryAfter, withRetry, type RetryPolicy } from './retry.js';
import type { ProviderClient } from './types.js';

const log = createLogger('direct');

/** The slice of the OpenAI client this provider calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export interface DirectProviderOptions {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
  client?: ChatClient;
  retry?: Partial<RetryPolicy>;
}

/**
 * Converts whatever the SDK threw into the shared error taxonomy so the
 * retry loop can classify it.
 */
export function mapSdkError(error: unknown, signal?: AbortSignal): unknown {
  if (signal?.aborted || error instanceof OpenAI.APIUserAbortError) {
    return new UserAbortedError();
  }
  if (error instanceof OpenAI.APIError) {
    if (error.status === undefined) {
      return networkError(error);
    }
    const retryAfter = parseRetryAfter(error.headers?.['retry-after']);
    return errorForStatus(error.status, error.message, retryAfter);
  }
  return error;
}

/**
 * Calls an OpenAI-compatible chat completions endpoint with the user's key.
 * SDK retries are disabled; `withRetry` owns the policy.
 */
export class DirectProvider implements ProviderClient {
  readonly mode = 'direct' as const;
  private readonly client: ChatClient;

  constructor(private readonly options: DirectProviderOptions) {
    if (!options.apiKey && !options.client) {
      throw new ConfigError('Direct mode requires an API key. Set COMMITSMITH_API_KEY or run: commitsmith config --api-key <key>');
    }
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0
      });
  }

  private async complete(prompt: Prompt, signal?: AbortSignal): Promise<string[]> {
    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user }
          ],
          temperature: prompt.task.kind === 'command-explain' ? 0.2 : 0.7,
          max_tokens: 500
        },
        { signal }
      );
    } catch (error) {
      throw mapSdkError(error, signal);
    }

    const texts = response.choices
      .map(choice => choice.message.content ?? '')
      .filter(text => text.trim().length > 0);

    if (texts.length === 0) {
      throw new MalformedResponseError(`Empty response from ${this.options.model}`);
    }
    return texts;
  }

  /**
   * Suggestions are requested as one numbered list in a single completion and
   * split here, so callers get one text per candidate.
   */
  async send(prompt: Prompt, count: number, signal?: AbortSignal): Promise<string[]> {
    log.debug(`chat.completions.create model=${this.options.model} task=${prompt.task.kind} count=${count}`);
    const texts = await withRetry(() => this.complete(prompt, signal), {
      policy: this.options.retry,
      signal,
      label: 'chat completion'
    });

    if (prompt.task.kind === 'suggestions' && count > 1 && texts.length === 1) {
      return splitSuggestions(texts[0] ?? '');
    }
    return texts;
  }
}
