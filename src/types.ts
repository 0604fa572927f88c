export type CommitType =
  | 'feat'
  | 'fix'
  | 'docs'
  | 'style'
  | 'refactor'
  | 'perf'
  | 'test'
  | 'build'
  | 'ci'
  | 'chore';

export const VALID_COMMIT_TYPES: readonly CommitType[] = [
  'feat', 'fix', 'docs', 'style', 'refactor',
  'perf', 'test', 'build', 'ci', 'chore'
];

export function isCommitType(value: string): value is CommitType {
  return VALID_COMMIT_TYPES.some(type => type === value);
}

export interface DiffStats {
  filesChanged: number;
  insertions: number;
  deletions: number;
}

/**
 * Categorized summary of the staged paths. A path appears in exactly one of
 * added, modified, deleted or the old side of renamed.
 */
export interface ChangeSet {
  added: string[];
  modified: string[];
  deleted: string[];
  renamed: Array<[oldPath: string, newPath: string]>;
  stats: DiffStats;
}

export interface DiffText {
  text: string;
  /** Line count of the diff before any truncation. */
  lineCount: number;
  truncated: boolean;
}

export type TaskKind =
  | { kind: 'commit-message' }
  | { kind: 'suggestions'; count: number }
  | { kind: 'command-explain'; description: string };

export interface GenerationRequest {
  changes: ChangeSet;
  diff: DiffText;
  task: TaskKind;
}

export type BackendMode = 'relay' | 'direct';

/** ChangeSet as the relay expects it on the wire. */
export interface WireChangeSet {
  added: string[];
  modified: string[];
  deleted: string[];
  renamed: Array<[string, string]>;
  stats: {
    files_changed: number;
    insertions: number;
    deletions: number;
  };
}

export type RelayPayload =
  | { route: '/api/commit'; body: { changes: WireChangeSet; diff: string } }
  | { route: '/api/commit/suggestions'; body: { changes: WireChangeSet; diff: string; count: number } }
  | { route: '/api/command'; body: { description: string } };

export interface Prompt {
  system: string;
  user: string;
  task: TaskKind;
  relay: RelayPayload;
}

export interface Candidate {
  text: string;
  backend: BackendMode;
  /** The subject was cut to fit the length ceiling. */
  truncated: boolean;
  /** No conventional type was found and the default type was applied. */
  wrapped: boolean;
}

export interface GenerationResult {
  candidates: Candidate[];
}

export type CommitDecision =
  | { action: 'accept' }
  | { action: 'edit'; text: string }
  | { action: 'reject' };

export interface BackendConfig {
  mode: BackendMode;
  apiKey?: string;
  model: string;
  maxDiffSize: number;
  maxSubjectLength: number;
  relayUrl: string;
  baseUrl?: string;
  timeoutMs: number;
}

export interface MessageRules {
  maxSubjectLength: number;
  defaultType: CommitType;
}
