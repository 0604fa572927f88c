import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_FILE, DEFAULT_CONFIG, describeConfig, loadConfig, saveConfig, toBackendConfig, type ConfigFile } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('config', () => {
  let home: string;
  let project: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'commitsmith-home-'));
    project = fs.mkdtempSync(path.join(os.tmpdir(), 'commitsmith-project-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
    fs.rmSync(project, { recursive: true, force: true });
  });

  function load(env: NodeJS.ProcessEnv = {}, overrides: ConfigFile = {}) {
    return loadConfig({ cwd: project, homeDir: home, env, overrides, loadDotenv: false });
  }

  function writeRc(dir: string, content: unknown): void {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), typeof content === 'string' ? content : JSON.stringify(content));
  }

  it('falls back to the defaults', () => {
    expect(load()).toEqual(DEFAULT_CONFIG);
  });

  it('layers home file, local file, environment and overrides', () => {
    writeRc(home, { model: 'home-model', maxDiffSize: 200, mode: 'direct' });
    writeRc(project, { model: 'project-model', maxSubjectLength: 60 });

    expect(load()).toMatchObject({ mode: 'direct', model: 'project-model', maxDiffSize: 200, maxSubjectLength: 60 });
    expect(load({ COMMITSMITH_MODEL: 'env-model', COMMITSMITH_MAX_DIFF_SIZE: '300' })).toMatchObject({
      model: 'env-model',
      maxDiffSize: 300
    });
    expect(load({ COMMITSMITH_MODEL: 'env-model' }, { model: 'flag-model' }).model).toBe('flag-model');
  });

  it('ignores overrides that are not set', () => {
    writeRc(home, { mode: 'direct' });

    expect(load({}, { mode: undefined }).mode).toBe('direct');
  });

  it('reads the API key from OPENAI_API_KEY when no dedicated key is set', () => {
    expect(load({ OPENAI_API_KEY: 'test-secret' }).apiKey).toBe('test-secret');
    expect(load({ OPENAI_API_KEY: 'other', COMMITSMITH_API_KEY: 'test-secret' }).apiKey).toBe('test-secret');
  });

  it('rejects a config file that is not JSON', () => {
    writeRc(project, '{ mode: direct');

    expect(() => load()).toThrow(ConfigError);
    expect(() => load()).toThrow(`Config file ${path.join(project, CONFIG_FILE)} is not valid JSON`);
  });

  it('rejects unknown keys and invalid values', () => {
    writeRc(project, { provider: 'openai' });
    expect(() => load()).toThrow(ConfigError);

    writeRc(project, { mode: 'local' });
    expect(() => load()).toThrow(ConfigError);
  });

  it('rejects non-integer numbers in the environment', () => {
    expect(() => load({ COMMITSMITH_TIMEOUT_MS: 'soon' })).toThrow('COMMITSMITH_TIMEOUT_MS must be an integer, got "soon"');
  });

  it('merges saved settings into the home file', () => {
    writeRc(home, { model: 'home-model' });

    const file = saveConfig({ mode: 'direct', apiKey: 'test-secret' }, home);

    expect(file).toBe(path.join(home, CONFIG_FILE));
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
      model: 'home-model',
      mode: 'direct',
      apiKey: 'test-secret'
    });
  });

  it('masks the API key when describing the configuration', () => {
    const description = describeConfig({ ...DEFAULT_CONFIG, apiKey: 'test-secret' });

    expect(description).toContain('  API Key: ********');
    expect(description).not.toContain('test-secret');
  });

  it('derives the backend configuration', () => {
    expect(toBackendConfig({ ...DEFAULT_CONFIG, mode: 'direct', apiKey: 'test-secret' })).toEqual({
      mode: 'direct',
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      maxDiffSize: 1000,
      maxSubjectLength: 72,
      relayUrl: 'https://relay.commitsmith.dev',
      baseUrl: undefined,
      timeoutMs: 30_000
    });
  });
});
