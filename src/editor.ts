import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { spawn } from 'child_process';
import { EditorError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('editor');

/** Starts `editor` (a shell command line) on `file` and resolves with its exit code. */
export type EditorLauncher = (editor: string, file: string) => Promise<number>;

export interface EditorOptions {
  /** Editor command line, e.g. "code --wait". Defaults to $GIT_EDITOR, $VISUAL, $EDITOR, then vi. */
  editor?: string;
  launch?: EditorLauncher;
  tmpDir?: string;
}

export const EDIT_INSTRUCTIONS = [
  '',
  '# Edit the commit message above. Lines starting with "#" are ignored.',
  '# An empty message returns to the previous prompt.'
].join('\n');

export function resolveEditor(env: NodeJS.ProcessEnv = process.env): string {
  return env.GIT_EDITOR || env.VISUAL || env.EDITOR || 'vi';
}

/** Quotes a path for the platform shell. */
export function shellQuote(file: string, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'win32') {
    return `"${file.replace(/"/g, '""')}"`;
  }
  return `'${file.replace(/'/g, `'\\''`)}'`;
}

// The editor setting is a shell command line, as in git.
export const spawnEditor: EditorLauncher = (editor, file) =>
  new Promise((resolve, reject) => {
    const child = spawn(`${editor} ${shellQuote(file)}`, { shell: true, stdio: 'inherit' });
    child.once('error', reject);
    child.once('exit', (code, signal) => {
      if (signal) {
        reject(new EditorError(`Editor was terminated by ${signal}`));
        return;
      }
      resolve(code ?? 1);
    });
  });

export function stripComments(text: string): string {
  return text
    .split('\n')
    .filter(line => !line.startsWith('#'))
    .join('\n')
    .trim();
}

/**
 * Opens `initial` in the user's editor and returns the edited text with
 * comment lines removed. The temporary directory is removed on every path,
 * including an editor crash.
 */
export async function editInExternalEditor(initial: string, options: EditorOptions = {}): Promise<string> {
  const editor = (options.editor ?? resolveEditor()).trim() || 'vi';
  const launch = options.launch ?? spawnEditor;
  const dir = await fs.mkdtemp(path.join(options.tmpDir ?? os.tmpdir(), 'commitsmith-'));
  const file = path.join(dir, 'COMMIT_EDITMSG');

  try {
    await fs.writeFile(file, `${initial}\n${EDIT_INSTRUCTIONS}\n`, 'utf-8');
    log.debug(`Launching ${editor} on ${file}`);

    let exitCode: number;
    try {
      exitCode = await launch(editor, file);
    } catch (error) {
      if (error instanceof EditorError) {
        throw error;
      }
      throw new EditorError(`Could not start editor "${editor}"`, { cause: error });
    }

    if (exitCode !== 0) {
      throw new EditorError(`Editor "${editor}" exited with code ${exitCode}`);
    }

    return stripComments(await fs.readFile(file, 'utf-8'));
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
