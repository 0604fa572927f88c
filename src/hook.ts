/**
 * Git prepare-commit-msg hook.
 *
 * Usage: commitsmith-hook <commit-msg-file> [<commit-source>] [<sha1>]
 *
 * For a plain `git commit` with an empty message file, writes one generated
 * message above the comment lines git placed there. Never blocks the commit:
 * every failure is logged at debug level and the hook returns normally.
 */

import fs from 'fs';
import { loadConfig, toBackendConfig, toMessageRules, type Config } from './config.js';
import { stripComments } from './editor.js';
import { describeError } from './errors.js';
import { GitRepository, type Repository } from './git.js';
import { createLogger } from './logger.js';
import { buildPrompt } from './prompt.js';
import { createProvider, type ProviderClient } from './providers/index.js';
import { toGenerationResult } from './validate.js';

const log = createLogger('hook');

export interface HookDeps {
  config?: Config;
  repository?: Repository;
  provider?: ProviderClient;
}

function readMessageFile(file: string): string {
  return fs.existsSync(file) ? fs.readFileSync(file, 'utf-8') : '';
}

async function generateMessage(deps: HookDeps): Promise<string> {
  const config = deps.config ?? loadConfig();
  const repository = deps.repository ?? new GitRepository();
  const provider = deps.provider ?? createProvider(toBackendConfig(config));
  const rules = toMessageRules(config);
  const task = { kind: 'commit-message' } as const;

  const { changes, diff } = await repository.collect({
    maxDiffSize: config.maxDiffSize,
    renameThreshold: config.renameThreshold
  });

  log.debug(`Generating commit message via ${provider.mode}...`);
  const raws = await provider.send(buildPrompt(changes, diff, task, rules), 1);
  const [candidate] = toGenerationResult(raws, task, rules, provider.mode).candidates;
  return candidate?.text ?? '';
}

/**
 * Runs the hook for the given arguments. Resolves with true when a message
 * was written.
 */
export async function runHook(args: string[], deps: HookDeps = {}): Promise<boolean> {
  const [messageFile, commitSource] = args;

  if (!messageFile) {
    log.debug('No commit message file provided');
    return false;
  }

  // message, merge, squash and commit sources already carry a message
  if (commitSource && commitSource !== 'template') {
    log.debug(`Skipping - commit source is "${commitSource}"`);
    return false;
  }

  try {
    const existing = readMessageFile(messageFile);
    if (stripComments(existing).length > 0) {
      log.debug('Skipping - commit message already exists');
      return false;
    }

    const message = await generateMessage(deps);
    if (!message) {
      log.debug('No commit message generated');
      return false;
    }

    const comments = existing
      .split('\n')
      .filter(line => line.startsWith('#'))
      .join('\n');

    fs.writeFileSync(messageFile, comments ? `${message}\n\n${comments}\n` : `${message}\n`);
    log.debug(`Generated: ${message}`);
    return true;
  } catch (error) {
    log.debug(`Failed to generate commit message: ${describeError(error)}`);
    return false;
  }
}
