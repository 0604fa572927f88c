import { UserAbortedError, describeError } from './errors.js';
import type { CollectedChanges, Repository } from './git.js';
import { createLogger, type Logger } from './logger.js';
import { buildPrompt } from './prompt.js';
import type { ProviderClient } from './providers/types.js';
import type { Terminal } from './terminal.js';
import type { CommitDecision, GenerationRequest, GenerationResult, MessageRules } from './types.js';
import { toGenerationResult, validationIssues } from './validate.js';

export type WorkflowState =
  | 'collecting'
  | 'generating'
  | 'presenting'
  | 'editing'
  | 'committing'
  | 'committed'
  | 'aborted'
  | 'failed';

export type FinalState = Extract<WorkflowState, 'committed' | 'aborted' | 'failed'>;

export const TRANSITIONS: Readonly<Record<WorkflowState, readonly WorkflowState[]>> = {
  collecting: ['generating', 'aborted', 'failed'],
  generating: ['presenting', 'failed', 'aborted'],
  presenting: ['committing', 'editing', 'aborted', 'failed'],
  editing: ['presenting', 'committing', 'failed', 'aborted'],
  committing: ['committed', 'failed'],
  committed: [],
  aborted: [],
  failed: []
};

export function assertTransition(from: WorkflowState, to: WorkflowState): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new Error(`Illegal workflow transition: ${from} -> ${to}`);
  }
}

export interface WorkflowOutcome {
  state: FinalState;
  message?: string;
  hash?: string;
  error?: unknown;
  /** Set when the commit succeeded but the follow-up push did not. */
  pushError?: unknown;
  trail: WorkflowState[];
}

export function exitCodeFor(outcome: WorkflowOutcome): number {
  return outcome.state === 'failed' ? 1 : 0;
}

export interface WorkflowDeps {
  repository: Repository;
  provider: ProviderClient;
  terminal: Terminal;
  /** Opens the text in an editor and resolves with the edited text. */
  edit: (initial: string) => Promise<string>;
  rules: MessageRules;
  maxDiffSize: number;
  renameThreshold?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface CommitOptions {
  quick?: boolean;
  push?: boolean;
}

export interface SuggestOptions {
  count: number;
  push?: boolean;
}

/**
 * Tracks the current state and the trail of visited states. Every move goes
 * through the transition table; the abort signal is honoured on each move
 * until committing starts.
 */
class WorkflowRun {
  private current: WorkflowState = 'collecting';
  readonly trail: WorkflowState[] = ['collecting'];

  constructor(private readonly signal?: AbortSignal) {}

  to(next: WorkflowState): void {
    if (this.signal?.aborted && this.current !== 'committing' && next !== 'aborted' && next !== 'failed') {
      throw new UserAbortedError();
    }
    assertTransition(this.current, next);
    this.current = next;
    this.trail.push(next);
  }

  finish(state: FinalState, extra: Omit<WorkflowOutcome, 'state' | 'trail'> = {}): WorkflowOutcome {
    this.to(state);
    return { state, ...extra, trail: [...this.trail] };
  }

  /** Ends the run from an error: aborts stay aborts, anything else fails. */
  fail(error: unknown): WorkflowOutcome {
    if (error instanceof UserAbortedError && TRANSITIONS[this.current].includes('aborted')) {
      return this.finish('aborted', { error });
    }
    return this.finish('failed', { error });
  }
}

function loggerOf(deps: WorkflowDeps): Logger {
  return deps.logger ?? createLogger('workflow');
}

/** Collects staged changes, offering to stage tracked files when the index is empty. */
async function collectChanges(deps: WorkflowDeps): Promise<CollectedChanges | undefined> {
  if (!(await deps.repository.hasStagedChanges())) {
    if (!(await deps.terminal.confirmStageAll())) {
      return undefined;
    }
    await deps.repository.stageTracked();
  }

  const spinner = deps.terminal.spinner('Analyzing staged changes...');
  try {
    const collected = await deps.repository.collect({
      maxDiffSize: deps.maxDiffSize,
      renameThreshold: deps.renameThreshold
    });
    const { filesChanged, insertions, deletions } = collected.changes.stats;
    spinner.succeed(`${filesChanged} file(s) changed, +${insertions} -${deletions}`);
    return collected;
  } catch (error) {
    spinner.fail('Failed to read staged changes');
    throw error;
  }
}

async function generate(deps: WorkflowDeps, request: GenerationRequest): Promise<GenerationResult> {
  const { changes, diff, task } = request;
  const prompt = buildPrompt(changes, diff, task, deps.rules);
  const count = task.kind === 'suggestions' ? task.count : 1;
  const spinner = deps.terminal.spinner(`Generating commit message via ${deps.provider.mode}...`);

  let result: GenerationResult;
  try {
    const raws = await deps.provider.send(prompt, count, deps.signal);
    result = toGenerationResult(raws, task, deps.rules, deps.provider.mode);
  } catch (error) {
    spinner.fail('Failed to generate commit message');
    throw error;
  }
  spinner.succeed(count > 1 ? `Generated ${result.candidates.length} suggestions` : 'Generated commit message');

  const log = loggerOf(deps);
  for (const candidate of result.candidates) {
    for (const issue of validationIssues(candidate, deps.rules)) {
      log.warn(issue.message);
    }
  }
  return result;
}

/**
 * The only step that mutates history. The abort signal is no longer checked
 * here; a push failure is reported but the commit stands.
 */
async function commitMessage(
  run: WorkflowRun,
  deps: WorkflowDeps,
  message: string,
  push: boolean
): Promise<WorkflowOutcome> {
  run.to('committing');

  const spinner = deps.terminal.spinner('Committing...');
  let hash: string;
  try {
    ({ hash } = await deps.repository.commit(message));
  } catch (error) {
    spinner.fail('Failed to commit');
    throw error;
  }
  spinner.succeed(`Committed ${hash}`);

  let pushError: unknown;
  if (push) {
    try {
      await deps.repository.push();
    } catch (error) {
      pushError = error;
      loggerOf(deps).warn(`Push failed: ${describeError(error)}. The commit was kept locally.`);
    }
  }

  return run.finish('committed', pushError === undefined ? { message, hash } : { message, hash, pushError });
}

/**
 * Asks the user about `message` until they accept, reject or produce a
 * non-empty edit. An empty edit returns to presenting the same message.
 */
async function decide(run: WorkflowRun, deps: WorkflowDeps, message: string): Promise<CommitDecision> {
  for (;;) {
    const action = await deps.terminal.present(message);
    if (action !== 'edit') {
      return { action };
    }

    run.to('editing');
    const text = (await deps.edit(message)).trim();
    if (text) {
      return { action: 'edit', text };
    }
    run.to('presenting');
  }
}

/**
 * Generates one message and commits it. Quick mode commits the first
 * candidate without asking; otherwise the user accepts, edits or rejects it.
 */
export async function runCommitWorkflow(deps: WorkflowDeps, options: CommitOptions = {}): Promise<WorkflowOutcome> {
  const run = new WorkflowRun(deps.signal);

  try {
    const collected = await collectChanges(deps);
    if (!collected) {
      return run.finish('aborted');
    }

    run.to('generating');
    const result = await generate(deps, { ...collected, task: { kind: 'commit-message' } });
    run.to('presenting');

    let message = result.candidates[0]?.text ?? '';
    if (!options.quick) {
      const decision = await decide(run, deps, message);
      if (decision.action === 'reject') {
        return run.finish('aborted', { message });
      }
      if (decision.action === 'edit') {
        message = decision.text;
      }
    }

    return await commitMessage(run, deps, message, options.push ?? false);
  } catch (error) {
    return run.fail(error);
  }
}

/**
 * Generates several candidates and commits the one the user picks, if any.
 */
export async function runSuggestionWorkflow(deps: WorkflowDeps, options: SuggestOptions): Promise<WorkflowOutcome> {
  const run = new WorkflowRun(deps.signal);

  try {
    const collected = await collectChanges(deps);
    if (!collected) {
      return run.finish('aborted');
    }

    run.to('generating');
    const result = await generate(deps, { ...collected, task: { kind: 'suggestions', count: options.count } });
    run.to('presenting');

    const selected = await deps.terminal.select(result.candidates);
    if (!selected) {
      return run.finish('aborted');
    }

    return await commitMessage(run, deps, selected.text, options.push ?? false);
  } catch (error) {
    return run.fail(error);
  }
}
