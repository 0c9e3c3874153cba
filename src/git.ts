import * as core from '@actions/core';
import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface GitResult {
  ok: boolean;
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[]) => Promise<GitResult>;

export function createGitRunner(cwd?: string): GitRunner {
  return async (args) => {
    core.debug(`git ${args.join(' ')}`);
    try {
      const { stdout, stderr } = await execFileAsync('git', args, {
        cwd,
        maxBuffer: 16 * 1024 * 1024,
      });
      return { ok: true, stdout, stderr };
    } catch (error) {
      return { ok: false, stdout: readStream(error, 'stdout'), stderr: readStream(error, 'stderr') };
    }
  };
}

function readStream(error: unknown, key: 'stdout' | 'stderr'): string {
  if (error instanceof Error && key in error) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'string') return value;
  }
  return error instanceof Error ? error.message : String(error);
}

export type SimulationResult = 'clean' | 'conflicting' | 'unavailable';

export interface GitWorkspaceOptions {
  remote?: string;
  pushUrl?: string;
  botName: string;
  botEmail: string;
}

/**
 * Git operations against the checked-out repository. Every method reports
 * failure through its return value; nothing here throws on a git exit code.
 */
export class GitWorkspace {
  readonly run: GitRunner;
  private remote: string;
  private pushTarget: string;
  private botName: string;
  private botEmail: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(run: GitRunner, options: GitWorkspaceOptions) {
    this.run = run;
    this.remote = options.remote ?? 'origin';
    this.pushTarget = options.pushUrl ?? this.remote;
    this.botName = options.botName;
    this.botEmail = options.botEmail;
  }

  /** Serializes multi-step work on the shared working tree across concurrent cycles. */
  exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(work, work);
    this.queue = result.catch(() => undefined);
    return result;
  }

  remoteRef(branch: string): string {
    return `${this.remote}/${branch}`;
  }

  async configureIdentity(): Promise<void> {
    await this.run(['config', 'user.name', this.botName]);
    await this.run(['config', 'user.email', this.botEmail]);
  }

  async fetch(...branches: string[]): Promise<boolean> {
    const result = await this.run(['fetch', '--force', this.remote, ...branches]);
    if (!result.ok) {
      core.warning(`git fetch ${branches.join(' ')} failed: ${result.stderr.trim()}`);
    }
    return result.ok;
  }

  async countCommitsBehind(baseRef: string, headRef: string): Promise<number | null> {
    if (!(await this.fetch(baseRef, headRef))) {
      return null;
    }
    const result = await this.run([
      'rev-list',
      '--count',
      `${this.remoteRef(headRef)}..${this.remoteRef(baseRef)}`,
    ]);
    const count = Number.parseInt(result.stdout.trim(), 10);
    return result.ok && !Number.isNaN(count) ? count : null;
  }

  async simulateMerge(baseRef: string, headRef: string): Promise<SimulationResult> {
    if (!(await this.fetch(baseRef, headRef))) {
      return 'unavailable';
    }
    const checkout = await this.run(['checkout', '--detach', this.remoteRef(baseRef)]);
    if (!checkout.ok) {
      return 'unavailable';
    }

    const merge = await this.run(['merge', '--no-commit', '--no-ff', this.remoteRef(headRef)]);
    await this.run(['merge', '--abort']);
    return merge.ok ? 'clean' : 'conflicting';
  }

  async push(headRef: string, lease?: { expectedSha: string }): Promise<GitResult> {
    const args = ['push', this.pushTarget, `HEAD:refs/heads/${headRef}`];
    if (lease) {
      args.push(`--force-with-lease=refs/heads/${headRef}:${lease.expectedSha}`);
    }
    return this.run(args);
  }
}
