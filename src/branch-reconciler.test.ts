import { describe, expect, it } from 'vitest';
import { BranchReconciler } from './branch-reconciler.js';
import { GitWorkspace, type GitResult } from './git.js';
import type { PullRequestRef } from './types.js';

const ref: PullRequestRef = { number: 7, headSha: 'abc1234def', baseRef: 'main', headRef: 'feature/login' };

function scriptedGit(responses: Record<string, Partial<GitResult>> = {}) {
  const commands: string[] = [];
  const workspace = new GitWorkspace(
    async (args) => {
      const command = args.join(' ');
      commands.push(command);
      return { ok: true, stdout: '', stderr: '', ...responses[command] };
    },
    { botName: 'gate-bot', botEmail: 'gate-bot@example.com' }
  );
  return { reconciler: new BranchReconciler(workspace), commands };
}

const SETUP = [
  'config user.name gate-bot',
  'config user.email gate-bot@example.com',
  'fetch --force origin main feature/login',
  'checkout -B feature/login origin/feature/login',
  'merge origin/main --no-edit --no-ff',
];

describe('BranchReconciler', () => {
  it('does nothing when the branch is not behind', async () => {
    const git = scriptedGit();
    expect(await git.reconciler.reconcile(ref, 0)).toEqual({ updated: false, conflicted: false, method: 'none' });
    expect(git.commands).toEqual([]);
  });

  it('merges the base branch and pushes without a rebase', async () => {
    const git = scriptedGit();

    expect(await git.reconciler.reconcile(ref, 3)).toEqual({ updated: true, conflicted: false, method: 'merge' });
    expect(git.commands).toEqual([...SETUP, 'push origin HEAD:refs/heads/feature/login']);
    expect(git.commands.some((command) => command.startsWith('rebase'))).toBe(false);
  });

  it('falls back to a rebase pushed with a lease when the merge conflicts', async () => {
    const git = scriptedGit({ 'merge origin/main --no-edit --no-ff': { ok: false, stderr: 'CONFLICT' } });

    expect(await git.reconciler.reconcile(ref, 3)).toEqual({ updated: true, conflicted: false, method: 'rebase' });
    expect(git.commands).toEqual([
      ...SETUP,
      'merge --abort',
      'reset --hard origin/feature/login',
      'rebase origin/main',
      'push origin HEAD:refs/heads/feature/login --force-with-lease=refs/heads/feature/login:abc1234def',
    ]);
  });

  it('reports a conflict when both merge and rebase fail', async () => {
    const git = scriptedGit({
      'merge origin/main --no-edit --no-ff': { ok: false },
      'rebase origin/main': { ok: false },
    });

    expect(await git.reconciler.reconcile(ref, 3)).toEqual({
      updated: false,
      conflicted: true,
      method: 'failed',
      detail: 'feature/login conflicts with main; manual resolution required',
    });
    expect(git.commands.at(-1)).toBe('rebase --abort');
    expect(git.commands.some((command) => command.startsWith('push'))).toBe(false);
  });

  it('reports a rejected lease push without marking a conflict', async () => {
    const git = scriptedGit({
      'merge origin/main --no-edit --no-ff': { ok: false },
      'push origin HEAD:refs/heads/feature/login --force-with-lease=refs/heads/feature/login:abc1234def': {
        ok: false,
        stderr: 'stale info\n',
      },
    });

    expect(await git.reconciler.reconcile(ref, 1)).toEqual({
      updated: false,
      conflicted: false,
      method: 'failed',
      detail: 'force-with-lease push was rejected, the branch moved: stale info',
    });
  });

  it('counts commits behind the base branch', async () => {
    const git = scriptedGit({ 'rev-list --count origin/feature/login..origin/main': { stdout: '3\n' } });

    expect(await git.reconciler.countCommitsBehind(ref)).toBe(3);
  });

  it('returns null when the fetch fails', async () => {
    const git = scriptedGit({ 'fetch --force origin main feature/login': { ok: false, stderr: 'denied' } });

    expect(await git.reconciler.countCommitsBehind(ref)).toBeNull();
  });
});
