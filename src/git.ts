import { simpleGit, type SimpleGit } from 'simple-git';
import { IndexLockConflictError, NoStagedChangesError, RepositoryError } from './errors.js';
import { createLogger } from './logger.js';
import type { ChangeSet, DiffStats, DiffText } from './types.js';

const log = createLogger('git');

export const DEFAULT_RENAME_THRESHOLD = 50;

export interface CollectOptions {
  /** Maximum number of diff lines handed to the prompt. */
  maxDiffSize: number;
  /** Similarity (percent) above which a delete + add pair is reported as a rename. */
  renameThreshold?: number;
}

export interface CollectedChanges {
  changes: ChangeSet;
  diff: DiffText;
}

export interface CommitSummary {
  hash: string;
  branch: string;
}

/**
 * The repository operations the workflows need. `GitRepository` is the
 * simple-git backed implementation.
 */
export interface Repository {
  hasStagedChanges(): Promise<boolean>;
  stageTracked(): Promise<void>;
  collect(options: CollectOptions): Promise<CollectedChanges>;
  commit(message: string): Promise<CommitSummary>;
  push(): Promise<void>;
}

export function emptyChangeSet(): ChangeSet {
  return {
    added: [],
    modified: [],
    deleted: [],
    renamed: [],
    stats: { filesChanged: 0, insertions: 0, deletions: 0 }
  };
}

/**
 * Parses `git diff --cached --name-status -M` output into a ChangeSet with
 * zeroed insertion/deletion counts.
 *
 * Format: "M\tpath", "R087\told\tnew", "C100\tsource\tcopy".
 */
export function parseNameStatus(output: string): ChangeSet {
  const changes = emptyChangeSet();
  const seen = new Set<string>();

  const claim = (filePath: string): boolean => {
    if (!filePath || seen.has(filePath)) {
      return false;
    }
    seen.add(filePath);
    return true;
  };

  for (const line of output.split('\n')) {
    if (!line.trim()) {
      continue;
    }

    const [status = '', first = '', second = ''] = line.split('\t');
    const letter = status.charAt(0);

    switch (letter) {
      case 'A':
        if (claim(first)) changes.added.push(first);
        break;
      case 'D':
        if (claim(first)) changes.deleted.push(first);
        break;
      case 'R':
        if (second && claim(first)) {
          seen.add(second);
          changes.renamed.push([first, second]);
        }
        break;
      case 'C':
        // The copy source is untouched; only the new path is a change.
        if (claim(second)) changes.added.push(second);
        break;
      default:
        // M, T (type change), U (unmerged) and anything newer git may report
        if (claim(first)) changes.modified.push(first);
    }
  }

  changes.added.sort();
  changes.modified.sort();
  changes.deleted.sort();
  changes.renamed.sort((a, b) => a[0].localeCompare(b[0]));
  changes.stats.filesChanged =
    changes.added.length + changes.modified.length + changes.deleted.length + changes.renamed.length;

  return changes;
}

export type DiffLineKind = 'header' | 'hunk' | 'added' | 'removed' | 'context';

/**
 * Tags each line of a unified diff. "---"/"+++" only count as file headers
 * between a "diff --git" line and the first "@@" of that file; inside a hunk
 * they are removed or added content.
 */
export function classifyDiffLines(diff: string): Array<[DiffLineKind, string]> {
  const result: Array<[DiffLineKind, string]> = [];
  let inHunk = false;

  for (const line of diff.split('\n')) {
    if (line.startsWith('diff --git ')) {
      inHunk = false;
      result.push(['header', line]);
    } else if (line.startsWith('@@')) {
      inHunk = true;
      result.push(['hunk', line]);
    } else if (!inHunk) {
      result.push(['header', line]);
    } else if (line.startsWith('+')) {
      result.push(['added', line]);
    } else if (line.startsWith('-')) {
      result.push(['removed', line]);
    } else {
      result.push(['context', line]);
    }
  }

  return result;
}

/** Counts added and removed lines of a unified diff. */
export function countDiffLines(diff: string): Pick<DiffStats, 'insertions' | 'deletions'> {
  let insertions = 0;
  let deletions = 0;

  for (const [kind] of classifyDiffLines(diff)) {
    if (kind === 'added') {
      insertions++;
    } else if (kind === 'removed') {
      deletions++;
    }
  }

  return { insertions, deletions };
}

export function truncationMarker(kept: number, total: number): string {
  return `... [diff truncated: showing ${kept} of ${total} lines]`;
}

/**
 * Bounds a diff to `maxLines` lines. When cut, the text holds exactly
 * `maxLines` lines followed by one marker line.
 */
export function boundDiff(raw: string, maxLines: number): DiffText {
  const body = raw.endsWith('\n') ? raw.slice(0, -1) : raw;
  const lines = body ? body.split('\n') : [];

  if (lines.length <= maxLines) {
    return { text: body, lineCount: lines.length, truncated: false };
  }

  const kept = lines.slice(0, maxLines);
  kept.push(truncationMarker(maxLines, lines.length));
  return { text: kept.join('\n'), lineCount: lines.length, truncated: true };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GitRepository implements Repository {
  private readonly git: SimpleGit;

  constructor(private readonly cwd: string = process.cwd()) {
    this.git = simpleGit(cwd);
  }

  private async ensureRepository(): Promise<void> {
    let isRepo: boolean;
    try {
      isRepo = await this.git.checkIsRepo();
    } catch (error) {
      throw new RepositoryError(`Failed to inspect ${this.cwd}: ${messageOf(error)}`, { cause: error });
    }
    if (!isRepo) {
      throw new RepositoryError(`Not a git repository: ${this.cwd}`);
    }
  }

  private async run<T>(action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new RepositoryError(`Failed to ${action}: ${messageOf(error)}`, { cause: error });
    }
  }

  async hasStagedChanges(): Promise<boolean> {
    await this.ensureRepository();
    const names = await this.run('read the index', () => this.git.diff(['--cached', '--name-only']));
    return names.trim().length > 0;
  }

  async stageTracked(): Promise<void> {
    await this.ensureRepository();
    await this.run('stage tracked changes', () => this.git.raw(['add', '--update']));
    log.debug('Staged all tracked changes');
  }

  async collect(options: CollectOptions): Promise<CollectedChanges> {
    await this.ensureRepository();

    const rename = `-M${options.renameThreshold ?? DEFAULT_RENAME_THRESHOLD}%`;
    const [nameStatus, rawDiff] = await this.run('read staged changes', () =>
      Promise.all([
        this.git.diff(['--cached', '--name-status', rename]),
        this.git.diff(['--cached', rename])
      ])
    );

    const changes = parseNameStatus(nameStatus);
    if (changes.stats.filesChanged === 0) {
      throw new NoStagedChangesError();
    }

    const { insertions, deletions } = countDiffLines(rawDiff);
    changes.stats.insertions = insertions;
    changes.stats.deletions = deletions;

    const diff = boundDiff(rawDiff, options.maxDiffSize);
    if (diff.truncated) {
      log.debug(`Diff truncated to ${options.maxDiffSize} of ${diff.lineCount} lines`);
    }

    return { changes, diff };
  }

  async commit(message: string): Promise<CommitSummary> {
    try {
      const result = await this.git.commit(message);
      if (!result.commit) {
        throw new RepositoryError('git did not create a commit');
      }
      return { hash: result.commit, branch: result.branch };
    } catch (error) {
      if (error instanceof RepositoryError) {
        throw error;
      }
      const text = messageOf(error);
      if (text.includes('index.lock')) {
        throw new IndexLockConflictError('The git index is locked by another process', { cause: error });
      }
      throw new RepositoryError(`Failed to commit: ${text}`, { cause: error });
    }
  }

  async push(): Promise<void> {
    await this.run('push', () => this.git.push());
  }
}
