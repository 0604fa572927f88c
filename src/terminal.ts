import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { UserAbortedError } from './errors.js';
import { classifyDiffLines, type DiffLineKind } from './git.js';
import type { Candidate, CommitDecision } from './types.js';

export type PresentAction = CommitDecision['action'];

export interface Spinner {
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
}

/**
 * Everything the workflows ask of the user. The interactive implementation
 * uses inquirer prompts and ora spinners; tests script it.
 */
export interface Terminal {
  confirmStageAll(): Promise<boolean>;
  present(message: string): Promise<PresentAction>;
  select(candidates: Candidate[]): Promise<Candidate | undefined>;
  spinner(text: string): Spinner;
}

/** inquirer rejects with ExitPromptError when the prompt is closed with Ctrl+C. */
function isPromptExit(error: unknown): boolean {
  return error instanceof Error && (error.name === 'ExitPromptError' || /force closed/i.test(error.message));
}

async function ask<T>(question: () => Promise<T>): Promise<T> {
  try {
    return await question();
  } catch (error) {
    if (isPromptExit(error)) {
      throw new UserAbortedError();
    }
    throw error;
  }
}

export function formatMessage(message: string): string {
  const [subject = '', ...body] = message.split('\n');
  const lines = [chalk.bold(subject), ...body.map(line => chalk.gray(line))];
  return lines.map(line => `  ${line}`).join('\n');
}

const DIFF_COLORS: Record<DiffLineKind, (text: string) => string> = {
  header: chalk.bold,
  hunk: chalk.cyan,
  added: chalk.green,
  removed: chalk.red,
  context: chalk.dim
};

/** Colors a unified diff by line origin. */
export function renderDiff(diff: string): string {
  return classifyDiffLines(diff)
    .map(([kind, line]) => (line ? DIFF_COLORS[kind](line) : line))
    .join('\n');
}

export class InteractiveTerminal implements Terminal {
  async confirmStageAll(): Promise<boolean> {
    console.log(chalk.yellow('\nNo staged changes found.'));
    const { stage } = await ask(() =>
      inquirer.prompt<{ stage: boolean }>([
        {
          type: 'confirm',
          name: 'stage',
          message: 'Stage all tracked changes?',
          default: true
        }
      ])
    );
    return stage;
  }

  async present(message: string): Promise<PresentAction> {
    console.log(chalk.blue('\nGenerated commit message:\n'));
    console.log(formatMessage(message));
    console.log();

    const { action } = await ask(() =>
      inquirer.prompt<{ action: PresentAction }>([
        {
          type: 'list',
          name: 'action',
          message: 'Commit with this message?',
          choices: [
            { name: 'Yes, commit', value: 'accept' },
            { name: 'Edit in editor', value: 'edit' },
            { name: chalk.gray('No, cancel'), value: 'reject' }
          ]
        }
      ])
    );
    return action;
  }

  async select(candidates: Candidate[]): Promise<Candidate | undefined> {
    const choices = candidates.map((candidate, index) => ({
      name: `${index + 1}. ${candidate.text.split('\n')[0] ?? ''}`,
      value: index
    }));
    choices.push({ name: chalk.gray('None of these'), value: -1 });

    console.log();
    const { selected } = await ask(() =>
      inquirer.prompt<{ selected: number }>([
        {
          type: 'list',
          name: 'selected',
          message: 'Select a commit message:',
          choices
        }
      ])
    );
    return candidates[selected];
  }

  spinner(text: string): Spinner {
    return ora(text).start();
  }
}
