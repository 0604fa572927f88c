import { VALID_COMMIT_TYPES } from './types.js';
import type { ChangeSet, DiffText, MessageRules, Prompt, RelayPayload, TaskKind, WireChangeSet } from './types.js';

function commitSystemPrompt(rules: MessageRules): string {
  return `You are an assistant that writes clear and meaningful git commit messages.
Follow these rules:
1. Use the Conventional Commits format: <type>(<scope>): <description>
2. type: one of ${VALID_COMMIT_TYPES.join(', ')}
3. scope: optional, short identifier for the affected area (e.g. "auth", "api"). Omit it if changes span multiple areas
4. Keep the subject line at most ${rules.maxSubjectLength} characters
5. Use the imperative mood ("add" not "added"), lowercase first letter, no period at the end
6. Focus on WHAT changed and WHY, not HOW
7. If there are breaking changes, add a "BREAKING CHANGE:" footer`;
}

const COMMAND_SYSTEM_PROMPT = `You are a git command assistant. Given a natural language description of what the user wants to do, suggest the appropriate git command(s).

Rules:
- Provide clear, concise commands
- Explain briefly what each command does
- If multiple steps are needed, give one block per command in order
- Warn about anything destructive or risky

Format every command as:
COMMAND: <the command>
EXPLANATION: <brief explanation>
NOTE: <optional notes or warnings>`;

function taskInstructions(task: TaskKind): string {
  switch (task.kind) {
    case 'commit-message':
      return 'Return ONLY the commit message, without any preamble, quotes or explanation.';
    case 'suggestions':
      return `Return exactly ${task.count} different commit messages with different wording or focus, one per line, numbered "1." to "${task.count}.". Return nothing else.`;
    case 'command-explain':
      return '';
  }
}

function appendSection(lines: string[], title: string, entries: string[]): void {
  if (entries.length === 0) {
    return;
  }
  lines.push(`${title}:`);
  lines.push(...entries);
  lines.push('');
}

export function describeChanges(changes: ChangeSet): string {
  const lines: string[] = [];
  const { filesChanged, insertions, deletions } = changes.stats;

  lines.push(`${filesChanged} file(s) changed, ${insertions} insertion(s), ${deletions} deletion(s)`);
  lines.push('');
  appendSection(lines, 'Added files', changes.added.map(file => `  + ${file}`));
  appendSection(lines, 'Modified files', changes.modified.map(file => `  * ${file}`));
  appendSection(lines, 'Deleted files', changes.deleted.map(file => `  - ${file}`));
  appendSection(lines, 'Renamed files', changes.renamed.map(([from, to]) => `  ${from} -> ${to}`));

  return lines.join('\n').trimEnd();
}

export function toWireChangeSet(changes: ChangeSet): WireChangeSet {
  return {
    added: [...changes.added],
    modified: [...changes.modified],
    deleted: [...changes.deleted],
    renamed: changes.renamed.map(([from, to]): [string, string] => [from, to]),
    stats: {
      files_changed: changes.stats.filesChanged,
      insertions: changes.stats.insertions,
      deletions: changes.stats.deletions
    }
  };
}

function relayPayload(changes: ChangeSet, diff: DiffText, task: TaskKind): RelayPayload {
  switch (task.kind) {
    case 'commit-message':
      return { route: '/api/commit', body: { changes: toWireChangeSet(changes), diff: diff.text } };
    case 'suggestions':
      return {
        route: '/api/commit/suggestions',
        body: { changes: toWireChangeSet(changes), diff: diff.text, count: task.count }
      };
    case 'command-explain':
      return { route: '/api/command', body: { description: task.description.trim() } };
  }
}

export const TRUNCATION_CAVEAT =
  'NOTE: The diff below was truncated to fit the size limit. Base the message on the file list as well, and do not assume the visible diff is complete.';

/**
 * Builds the provider-agnostic prompt for a task. Pure: the same inputs always
 * give the same output.
 */
export function buildPrompt(changes: ChangeSet, diff: DiffText, task: TaskKind, rules: MessageRules): Prompt {
  const relay = relayPayload(changes, diff, task);

  if (task.kind === 'command-explain') {
    return {
      system: COMMAND_SYSTEM_PROMPT,
      user: task.description.trim(),
      task,
      relay
    };
  }

  const sections = [
    'Here are the staged changes to commit:',
    '',
    describeChanges(changes),
    ''
  ];

  if (diff.truncated) {
    sections.push(TRUNCATION_CAVEAT, '');
  }

  sections.push('Diff:', diff.text || 'No diff available', '', taskInstructions(task));

  return {
    system: commitSystemPrompt(rules),
    user: sections.join('\n'),
    task,
    relay
  };
}

export function commandTask(description: string): TaskKind {
  return { kind: 'command-explain', description };
}

export const EMPTY_DIFF: DiffText = { text: '', lineCount: 0, truncated: false };
