import * as core from '@actions/core';
import type { GitWorkspace } from './git.js';
import type { PullRequestRef, ReconcileResult } from './types.js';

export class BranchReconciler {
  private git: GitWorkspace;

  constructor(git: GitWorkspace) {
    this.git = git;
  }

  async countCommitsBehind(ref: PullRequestRef): Promise<number | null> {
    return this.git.exclusive(() => this.git.countCommitsBehind(ref.baseRef, ref.headRef));
  }

  /**
   * Brings the head branch up to date with its base: one merge attempt, then
   * one rebase attempt. A failed rebase is aborted and reported as a conflict;
   * nothing is retried.
   */
  async reconcile(ref: PullRequestRef, commitsBehind: number): Promise<ReconcileResult> {
    if (commitsBehind <= 0) {
      return { updated: false, conflicted: false, method: 'none' };
    }
    return this.git.exclusive(() => this.update(ref, commitsBehind));
  }

  private async update(ref: PullRequestRef, commitsBehind: number): Promise<ReconcileResult> {
    const { run } = this.git;
    const base = this.git.remoteRef(ref.baseRef);
    const head = this.git.remoteRef(ref.headRef);

    core.info(`Branch ${ref.headRef} is ${commitsBehind} commit(s) behind ${ref.baseRef}, updating`);
    await this.git.configureIdentity();
    if (!(await this.git.fetch(ref.baseRef, ref.headRef))) {
      return failed(`could not fetch ${ref.baseRef} and ${ref.headRef}`);
    }

    const checkout = await run(['checkout', '-B', ref.headRef, head]);
    if (!checkout.ok) {
      return failed(`could not check out ${ref.headRef}: ${checkout.stderr.trim()}`);
    }

    const merge = await run(['merge', base, '--no-edit', '--no-ff']);
    if (merge.ok) {
      const push = await this.git.push(ref.headRef);
      if (!push.ok) {
        return failed(`push after merge was rejected: ${push.stderr.trim()}`);
      }
      core.info(`Updated ${ref.headRef} by merging ${ref.baseRef}`);
      return { updated: true, conflicted: false, method: 'merge' };
    }

    core.info(`Merge of ${ref.baseRef} into ${ref.headRef} conflicted, trying rebase`);
    await run(['merge', '--abort']);
    await run(['reset', '--hard', head]);

    const rebase = await run(['rebase', base]);
    if (!rebase.ok) {
      await run(['rebase', '--abort']);
      core.warning(`Both merge and rebase of ${ref.headRef} onto ${ref.baseRef} conflicted`);
      return {
        updated: false,
        conflicted: true,
        method: 'failed',
        detail: `${ref.headRef} conflicts with ${ref.baseRef}; manual resolution required`,
      };
    }

    const push = await this.git.push(ref.headRef, { expectedSha: ref.headSha });
    if (!push.ok) {
      return failed(`force-with-lease push was rejected, the branch moved: ${push.stderr.trim()}`);
    }
    core.info(`Updated ${ref.headRef} by rebasing onto ${ref.baseRef}`);
    return { updated: true, conflicted: false, method: 'rebase' };
  }
}

function failed(detail: string): ReconcileResult {
  core.warning(`Branch update failed: ${detail}`);
  return { updated: false, conflicted: false, method: 'failed', detail };
}
