import type { BackendConfig } from '../types.js';
import { DirectProvider, type ChatClient } from './direct.js';
import { RelayProvider, type FetchLike } from './relay.js';
import type { RetryPolicy } from './retry.js';
import type { ProviderClient } from './types.js';

export { DirectProvider, mapSdkError, type ChatClient } from './direct.js';
export { RelayProvider, type FetchLike } from './relay.js';
export { withRetry, errorForStatus, parseRetryAfter, DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry.js';
export type { HealthStatus, ProviderClient } from './types.js';

export interface ProviderOverrides {
  fetch?: FetchLike;
  client?: ChatClient;
  retry?: Partial<RetryPolicy>;
}

/**
 * Picks the backend once, from configuration alone. There is no fallback
 * from one backend to the other.
 */
export function createProvider(config: BackendConfig, overrides: ProviderOverrides = {}): ProviderClient {
  switch (config.mode) {
    case 'relay':
      return new RelayProvider({
        baseUrl: config.relayUrl,
        timeoutMs: config.timeoutMs,
        fetch: overrides.fetch,
        retry: overrides.retry
      });
    case 'direct':
      return new DirectProvider({
        apiKey: config.apiKey,
        model: config.model,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
        client: overrides.client,
        retry: overrides.retry
      });
  }
}
