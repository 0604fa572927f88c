import type { BackendMode, Prompt } from '../types.js';

export interface HealthStatus {
  status: string;
  version: string;
}

/**
 * One capability over two backends: send a prompt, get back `count` raw texts
 * in the order the backend produced them.
 */
export interface ProviderClient {
  readonly mode: BackendMode;
  send(prompt: Prompt, count: number, signal?: AbortSignal): Promise<string[]>;
}
