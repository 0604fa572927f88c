import OpenAI from 'openai';
import { describe, expect, it, vi } from 'vitest';
import { AuthError, ConfigError, MalformedResponseError, NetworkError } from '../../src/errors.js';
import { buildPrompt } from '../../src/prompt.js';
import { DirectProvider, type ChatClient } from '../../src/providers/direct.js';
import { createProvider } from '../../src/providers/index.js';
import type { ChangeSet, DiffText, MessageRules } from '../../src/types.js';

const rules: MessageRules = { maxSubjectLength: 72, defaultType: 'chore' };

const changes: ChangeSet = {
  added: ['src/cache.ts'],
  modified: [],
  deleted: [],
  renamed: [],
  stats: { filesChanged: 1, insertions: 12, deletions: 0 }
};

const diff: DiffText = { text: '+export const cache = new Map();', lineCount: 1, truncated: false };

function completion(...contents: Array<string | null>): OpenAI.Chat.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    choices: contents.map((content, index): OpenAI.Chat.ChatCompletion.Choice => ({
      index,
      finish_reason: 'stop',
      logprobs: null,
      message: { role: 'assistant', content, refusal: null }
    }))
  };
}

function setup() {
  const create = vi.fn<ChatClient['chat']['completions']['create']>();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const provider = new DirectProvider({
    apiKey: 'test-secret',
    model: 'gpt-4o-mini',
    timeoutMs: 5000,
    client: { chat: { completions: { create } } },
    retry: { sleep, random: () => 0 }
  });
  return { create, sleep, provider };
}

describe('DirectProvider', () => {
  it('sends the system and user prompt to chat completions', async () => {
    const { create, provider } = setup();
    create.mockResolvedValueOnce(completion('feat(cache): add in-memory cache'));
    const prompt = buildPrompt(changes, diff, { kind: 'commit-message' }, rules);

    const texts = await provider.send(prompt, 1);

    expect(texts).toEqual(['feat(cache): add in-memory cache']);
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toMatchObject({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user }
      ],
      temperature: 0.7,
      max_tokens: 500
    });
  });

  it('fails with AuthError after a single 401', async () => {
    const { create, sleep, provider } = setup();
    create.mockRejectedValue(new OpenAI.APIError(401, undefined, 'invalid key', undefined));

    await expect(
      provider.send(buildPrompt(changes, diff, { kind: 'commit-message' }, rules), 1)
    ).rejects.toBeInstanceOf(AuthError);
    expect(create).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries a rate limit using the retry-after header', async () => {
    const { create, sleep, provider } = setup();
    create
      .mockRejectedValueOnce(new OpenAI.APIError(429, undefined, 'slow down', { 'retry-after': '2' }))
      .mockResolvedValueOnce(completion('fix: retry later'));

    await expect(
      provider.send(buildPrompt(changes, diff, { kind: 'commit-message' }, rules), 1)
    ).resolves.toEqual(['fix: retry later']);
    expect(create).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls[0]?.[0]).toBe(2000);
  });

  it('treats errors without a status as network failures', async () => {
    const { create, provider } = setup();
    create.mockRejectedValue(new OpenAI.APIError(undefined, undefined, 'Connection error.', undefined));

    await expect(
      provider.send(buildPrompt(changes, diff, { kind: 'commit-message' }, rules), 1)
    ).rejects.toBeInstanceOf(NetworkError);
    expect(create).toHaveBeenCalledTimes(3);
  });

  it('rejects a completion without text', async () => {
    const { create, provider } = setup();
    create.mockResolvedValueOnce(completion(null, '   '));

    await expect(
      provider.send(buildPrompt(changes, diff, { kind: 'commit-message' }, rules), 1)
    ).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('uses a lower temperature for command suggestions', async () => {
    const { create, provider } = setup();
    create.mockResolvedValueOnce(completion('COMMAND: git status'));

    await provider.send(buildPrompt(changes, diff, { kind: 'command-explain', description: 'what changed' }, rules), 1);

    expect(create.mock.calls[0]?.[0]).toMatchObject({ temperature: 0.2 });
  });

  it('splits a numbered list into one text per suggestion', async () => {
    const { create, provider } = setup();
    create.mockResolvedValueOnce(completion('1. feat: add cache\n2. perf: cache responses\n3. refactor: extract cache module'));

    const texts = await provider.send(buildPrompt(changes, diff, { kind: 'suggestions', count: 3 }, rules), 3);

    expect(texts).toEqual(['feat: add cache', 'perf: cache responses', 'refactor: extract cache module']);
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('requires an API key', () => {
    expect(() => new DirectProvider({ model: 'gpt-4o-mini', timeoutMs: 5000 })).toThrow(ConfigError);
  });
});

describe('createProvider', () => {
  const base = {
    model: 'gpt-4o-mini',
    maxDiffSize: 1000,
    maxSubjectLength: 72,
    relayUrl: 'https://relay.test',
    timeoutMs: 5000
  };

  it('picks the backend from the configured mode', () => {
    expect(createProvider({ ...base, mode: 'relay' }).mode).toBe('relay');
    expect(createProvider({ ...base, mode: 'direct', apiKey: 'test-secret' }).mode).toBe('direct');
  });

  it('does not fall back to the relay when direct mode has no key', () => {
    expect(() => createProvider({ ...base, mode: 'direct' })).toThrow(ConfigError);
  });
});
