#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { describeConfig, loadConfig, saveConfig, toBackendConfig, toMessageRules, type Config, type ConfigFile } from './config.js';
import { editInExternalEditor } from './editor.js';
import { NoStagedChangesError, describeError } from './errors.js';
import { parseCommandSuggestion, renderCommandSuggestion } from './explain.js';
import { GitRepository, emptyChangeSet } from './git.js';
import { createLogger } from './logger.js';
import { EMPTY_DIFF, buildPrompt, commandTask, describeChanges } from './prompt.js';
import { RelayProvider, createProvider } from './providers/index.js';
import { InteractiveTerminal, renderDiff } from './terminal.js';
import type { BackendMode } from './types.js';
import {
  exitCodeFor,
  runCommitWorkflow,
  runSuggestionWorkflow,
  type WorkflowDeps,
  type WorkflowOutcome
} from './workflow.js';

const VERSION = '0.1.0';

const log = createLogger('cli');

interface BackendOptions {
  mode?: BackendMode;
  model?: string;
}

function parseMode(value: string): BackendMode {
  if (value !== 'relay' && value !== 'direct') {
    throw new InvalidArgumentError('Expected "relay" or "direct".');
  }
  return value;
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1 || count > 10) {
    throw new InvalidArgumentError('Expected an integer between 1 and 10.');
  }
  return count;
}

function withBackendOptions(command: Command): Command {
  return command
    .option('--mode <mode>', 'Backend to use (relay, direct)', parseMode)
    .option('--model <model>', 'Model to use in direct mode');
}

function loadWithOverrides(options: BackendOptions): Config {
  return loadConfig({ overrides: { mode: options.mode, model: options.model } });
}

/**
 * Aborts the returned signal on the first Ctrl+C. A second Ctrl+C exits
 * immediately.
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });
  return controller.signal;
}

function workflowDeps(config: Config): WorkflowDeps {
  return {
    repository: new GitRepository(),
    provider: createProvider(toBackendConfig(config)),
    terminal: new InteractiveTerminal(),
    edit: initial => editInExternalEditor(initial),
    rules: toMessageRules(config),
    maxDiffSize: config.maxDiffSize,
    renameThreshold: config.renameThreshold,
    signal: interruptSignal()
  };
}

function report(outcome: WorkflowOutcome): void {
  switch (outcome.state) {
    case 'committed': {
      const subject = outcome.message?.split('\n')[0] ?? '';
      console.log(chalk.green(`\n✓ Committed ${outcome.hash ?? ''}: ${subject}`));
      if (outcome.pushError !== undefined) {
        log.warn('Run "git push" once the problem above is resolved.');
      }
      break;
    }
    case 'aborted':
      console.log(chalk.yellow('\nCancelled. Nothing was committed.'));
      break;
    case 'failed':
      log.error(`\n${describeError(outcome.error)}`);
      if (outcome.error instanceof NoStagedChangesError) {
        console.error(chalk.gray('Stage files with: git add <files>'));
      }
      break;
  }
  process.exitCode = exitCodeFor(outcome);
}

async function commitCommand(options: BackendOptions & { quick?: boolean; push?: boolean }): Promise<void> {
  const config = loadWithOverrides(options);
  const outcome = await runCommitWorkflow(workflowDeps(config), { quick: options.quick, push: options.push });
  report(outcome);
}

async function suggestCommand(options: BackendOptions & { count?: number; push?: boolean }): Promise<void> {
  const config = loadWithOverrides(options);
  const outcome = await runSuggestionWorkflow(workflowDeps(config), {
    count: options.count ?? config.suggestionCount,
    push: options.push
  });
  report(outcome);
}

async function explainCommand(words: string[], options: BackendOptions): Promise<void> {
  const description = words.join(' ').trim();
  if (!description) {
    throw new InvalidArgumentError('Describe what you want to do, e.g. commitsmith explain undo my last commit');
  }

  const config = loadWithOverrides(options);
  const provider = createProvider(toBackendConfig(config));
  const prompt = buildPrompt(emptyChangeSet(), EMPTY_DIFF, commandTask(description), toMessageRules(config));

  const spinner = ora('Finding the right git command...').start();
  let raws: string[];
  try {
    raws = await provider.send(prompt, 1, interruptSignal());
  } catch (error) {
    spinner.fail('Failed to get a suggestion');
    throw error;
  }
  spinner.stop();

  console.log();
  console.log(renderCommandSuggestion(parseCommandSuggestion(raws[0] ?? '')));
  console.log();
}

async function diffCommand(): Promise<void> {
  const config = loadConfig();
  const repository = new GitRepository();

  try {
    const { changes, diff } = await repository.collect({
      maxDiffSize: Number.POSITIVE_INFINITY,
      renameThreshold: config.renameThreshold
    });
    console.log(chalk.bold('\nStaged changes\n'));
    console.log(describeChanges(changes));
    console.log(chalk.bold('\nDetailed changes\n'));
    console.log(renderDiff(diff.text));
    if (diff.lineCount > config.maxDiffSize) {
      console.log(chalk.yellow(`\nThe diff has ${diff.lineCount} lines; only the first ${config.maxDiffSize} will be sent.`));
    }
    console.log();
  } catch (error) {
    if (error instanceof NoStagedChangesError) {
      console.log(chalk.yellow('\nNo staged changes found.'));
      console.log(chalk.gray('Stage files with: git add <files>\n'));
      return;
    }
    throw error;
  }
}

async function healthCommand(): Promise<void> {
  const config = loadConfig();
  const relay = new RelayProvider({ baseUrl: config.relayUrl, timeoutMs: config.timeoutMs });

  const spinner = ora(`Checking ${config.relayUrl}...`).start();
  try {
    const health = await relay.health(interruptSignal());
    spinner.succeed(`Relay is ${health.status} (version ${health.version})`);
  } catch (error) {
    spinner.fail('Relay is unreachable');
    throw error;
  }
}

async function promptForConfig(current: Config): Promise<ConfigFile> {
  const { mode } = await inquirer.prompt<{ mode: BackendMode }>([
    {
      type: 'list',
      name: 'mode',
      message: 'Select backend:',
      default: current.mode,
      choices: [
        { name: 'Relay (no API key needed)', value: 'relay' },
        { name: 'Direct (OpenAI-compatible API with your key)', value: 'direct' }
      ]
    }
  ]);

  if (mode === 'relay') {
    return { mode };
  }

  const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
    {
      type: 'password',
      name: 'apiKey',
      message: current.apiKey ? 'API key (leave empty to keep the current one):' : 'Enter your API key:',
      mask: '*'
    }
  ]);

  const { model } = await inquirer.prompt<{ model: string }>([
    {
      type: 'input',
      name: 'model',
      message: 'Model:',
      default: current.model
    }
  ]);

  return { mode, apiKey: apiKey.trim() || undefined, model: model.trim() || undefined };
}

async function configCommand(options: { mode?: BackendMode; apiKey?: string; model?: string; show?: boolean }): Promise<void> {
  if (options.show) {
    console.log();
    console.log(describeConfig(loadConfig()));
    console.log();
    return;
  }

  const update: ConfigFile =
    options.mode || options.apiKey || options.model
      ? { mode: options.mode, apiKey: options.apiKey, model: options.model }
      : await promptForConfig(loadConfig());

  const file = saveConfig(update);
  console.log(chalk.green(`\n✓ Configuration saved to ${file}\n`));
}

const program = new Command();

program
  .name('commitsmith')
  .description('Generate conventional commit messages for staged changes')
  .version(VERSION);

withBackendOptions(
  program
    .command('commit', { isDefault: true })
    .description('Generate a commit message for the staged changes and commit')
    .option('-q, --quick', 'Commit the generated message without asking')
    .option('-p, --push', 'Push after committing')
).action(commitCommand);

withBackendOptions(
  program
    .command('suggest')
    .description('Generate several commit messages and pick one')
    .option('-n, --count <n>', 'Number of suggestions', parseCount)
    .option('-p, --push', 'Push after committing')
).action(suggestCommand);

withBackendOptions(
  program
    .command('explain')
    .description('Suggest git commands for a task described in plain words')
    .argument('<description...>', 'What you want to do')
).action(explainCommand);

program
  .command('diff')
  .description('Show what would be sent: stats and categorized staged paths')
  .action(diffCommand);

program
  .command('health')
  .description('Check that the relay backend is reachable')
  .action(healthCommand);

program
  .command('config')
  .description('Configure the backend, API key and model')
  .option('--mode <mode>', 'Backend to use (relay, direct)', parseMode)
  .option('--api-key <key>', 'API key for direct mode')
  .option('--model <model>', 'Model to use in direct mode')
  .option('--show', 'Print the effective configuration')
  .action(configCommand);

program.parseAsync().catch((error: unknown) => {
  log.error(`\n${describeError(error)}`);
  process.exitCode = 1;
});
