export type ErrorCode =
  | 'REPOSITORY'
  | 'NO_STAGED_CHANGES'
  | 'CONFIG'
  | 'NETWORK'
  | 'AUTH'
  | 'RATE_LIMITED'
  | 'SERVER'
  | 'REQUEST'
  | 'MALFORMED_RESPONSE'
  | 'VALIDATION'
  | 'USER_ABORTED'
  | 'INDEX_LOCK_CONFLICT'
  | 'EDITOR';

/**
 * Base class for every failure the pipeline reports. `retryable` tells the
 * provider retry loop whether another attempt may succeed.
 */
export class CommitsmithError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly retryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommitsmithError';
  }
}

export class RepositoryError extends CommitsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'REPOSITORY', false, options);
    this.name = 'RepositoryError';
  }
}

export class NoStagedChangesError extends CommitsmithError {
  constructor() {
    super('No staged changes found', 'NO_STAGED_CHANGES');
    this.name = 'NoStagedChangesError';
  }
}

export class ConfigError extends CommitsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG', false, options);
    this.name = 'ConfigError';
  }
}

export class NetworkError extends CommitsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NETWORK', true, options);
    this.name = 'NetworkError';
  }
}

export class AuthError extends CommitsmithError {
  constructor(message: string, public readonly status: number) {
    super(message, 'AUTH');
    this.name = 'AuthError';
  }
}

export class RateLimitedError extends CommitsmithError {
  constructor(message: string, public readonly retryAfterMs?: number) {
    super(message, 'RATE_LIMITED', true);
    this.name = 'RateLimitedError';
  }
}

export class ServerError extends CommitsmithError {
  constructor(message: string, public readonly status: number) {
    super(message, 'SERVER', true);
    this.name = 'ServerError';
  }
}

/** 4xx other than 401, 403 and 429. Never retried. */
export class RequestError extends CommitsmithError {
  constructor(message: string, public readonly status: number) {
    super(message, 'REQUEST');
    this.name = 'RequestError';
  }
}

export class MalformedResponseError extends CommitsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MALFORMED_RESPONSE', false, options);
    this.name = 'MalformedResponseError';
  }
}

/** Normalization had to degrade the message. Reported, never fatal. */
export class ValidationError extends CommitsmithError {
  constructor(message: string) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export class UserAbortedError extends CommitsmithError {
  constructor(message = 'Cancelled by user') {
    super(message, 'USER_ABORTED');
    this.name = 'UserAbortedError';
  }
}

export class IndexLockConflictError extends CommitsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INDEX_LOCK_CONFLICT', false, options);
    this.name = 'IndexLockConflictError';
  }
}

export class EditorError extends CommitsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EDITOR', false, options);
    this.name = 'EditorError';
  }
}

export function isCommitsmithError(error: unknown): error is CommitsmithError {
  return error instanceof CommitsmithError;
}

/**
 * One-line, human readable cause for the error channel.
 */
export function describeError(error: unknown): string {
  if (error instanceof AuthError) {
    return `Authentication failed (${error.status}). Check your API key with: commitsmith config --api-key <key>`;
  }
  if (error instanceof IndexLockConflictError) {
    return `${error.message}. Another git process may be committing; try again once it finishes.`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
