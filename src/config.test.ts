import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG_PATH, defaultConfig, loadConfig, parseConfig, readInputs } from './config.js';

describe('parseConfig', () => {
  it('fills every default for an empty file', () => {
    const config = parseConfig('');
    expect(config).toEqual(defaultConfig());
    expect(config.merge_method).toBe('squash');
    expect(config.checks).toEqual({ max_wait_minutes: 30, poll_interval_seconds: 30, ignore: [] });
    expect(config.opt_in).toEqual({ required: true, label: 'auto-merge' });
    expect(config.restart_keywords).toEqual(['/restart-auto-merge', '/retry-merge']);
  });

  it('merges nested overrides with defaults', () => {
    const config = parseConfig(
      ['required_checks:', '  - lint', '  - tests', 'checks:', '  max_wait_minutes: 10', 'opt_in:', '  required: false'].join(
        '\n'
      )
    );

    expect(config.required_checks).toEqual(['lint', 'tests']);
    expect(config.checks).toEqual({ max_wait_minutes: 10, poll_interval_seconds: 30, ignore: [] });
    expect(config.opt_in).toEqual({ required: false, label: 'auto-merge' });
  });

  it('names the offending field', () => {
    expect(() => parseConfig('checks:\n  max_wait_minutes: 400\n')).toThrow(
      'Invalid merge-gate config: checks.max_wait_minutes: Number must be less than or equal to 360'
    );
  });
});

describe('loadConfig', () => {
  it('uses defaults when the file does not exist', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'merge-gate-'));
    expect(await loadConfig(join(dir, 'missing.yml'))).toEqual(defaultConfig());
  });

  it('reads the file when present', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'merge-gate-'));
    const path = join(dir, 'merge-gate.yml');
    await writeFile(path, 'merge_method: rebase\n');

    expect((await loadConfig(path)).merge_method).toBe('rebase');
  });
});

describe('readInputs', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads the token and optional pull request number', () => {
    vi.stubEnv('INPUT_GITHUB_TOKEN', 'test-secret');
    vi.stubEnv('INPUT_CONFIG_PATH', '');
    vi.stubEnv('INPUT_PR_NUMBER', '15');

    expect(readInputs()).toEqual({ githubToken: 'test-secret', configPath: DEFAULT_CONFIG_PATH, prNumber: 15 });
  });

  it('rejects a malformed pull request number', () => {
    vi.stubEnv('INPUT_GITHUB_TOKEN', 'test-secret');
    vi.stubEnv('INPUT_PR_NUMBER', 'abc');

    expect(() => readInputs()).toThrow('Invalid pr_number input: abc');
  });
});
