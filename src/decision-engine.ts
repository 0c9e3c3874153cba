import * as core from '@actions/core';
import { isAutoMergeRequested } from './auto-merge-request.js';
import { BranchReconciler } from './branch-reconciler.js';
import { CheckAggregator, type CheckHost } from './check-aggregator.js';
import type { GateConfig } from './config.js';
import { SupersededError, TransientApiError, describeError } from './errors.js';
import { COMMENT_MARKER, formatDecisionComment } from './format.js';
import type { GitWorkspace } from './git.js';
import { MergeabilityProber } from './mergeability.js';
import { sleep as defaultSleep, type Sleep } from './retry.js';
import { claimContext } from './run-claims.js';
import type {
  CheckAggregation,
  CycleSignals,
  DecisionOutcome,
  IssueCommentEntry,
  MergeabilityProbe,
  PullRequestHost,
  PullRequestRef,
  PullRequestSnapshot,
  ReconcileResult,
  ReviewVerdict,
} from './types.js';
import { findLatestVerdictComment, parseVerdict } from './verdict-parser.js';

const NOT_RECONCILED: ReconcileResult = { updated: false, conflicted: false, method: 'none' };

/**
 * Pure evaluation of one cycle's signals. The first failing gate decides;
 * `merge` is only reachable when every gate passes.
 */
export function decide(signals: CycleSignals): DecisionOutcome {
  const { checks, verdict, mergeability, reconcile } = signals;

  if (checks.cancelled) {
    return wait(
      'superseded',
      'A newer commit was pushed while checks were running. The new head is evaluated separately.'
    );
  }
  if (reconcile.updated) {
    const how = reconcile.method === 'rebase' ? 'Rebased this branch onto' : 'Merged';
    const suffix = reconcile.method === 'rebase' ? 'its base branch' : 'the base branch into this branch';
    return wait('branch_updated', `${how} ${suffix}. Waiting for checks on the new head.`);
  }
  if (!checks.complete) {
    const outstanding = [...checks.pending, ...checks.missing];
    if (checks.timedOut) {
      return wait('checks_timeout', `Required checks did not finish in time: ${outstanding.join(', ')}.`);
    }
    return wait('checks_pending', `Waiting for required checks: ${outstanding.join(', ')}.`);
  }
  if (!checks.allPassed) {
    return block('ci_failed', `Required checks failed: ${checks.failed.join(', ')}.`);
  }

  if (!verdict) {
    return wait('review_pending', 'No reviewer verdict has been posted yet.');
  }
  if (verdict.blockingIssues.length > 0) {
    return block(
      'changes_requested',
      `The reviewer reported ${verdict.blockingIssues.length} blocking issue(s).`
    );
  }
  if (!verdict.approved) {
    return block('changes_requested', 'The reviewer has not approved this pull request.');
  }

  if (reconcile.conflicted) {
    return block('merge_conflict', reconcile.detail ?? 'This branch conflicts with its base branch.');
  }
  return mergeabilityOutcome(mergeability);
}

function mergeabilityOutcome(probe: MergeabilityProbe): DecisionOutcome {
  switch (probe.state) {
    case 'clean':
      return {
        action: 'merge',
        reasonCode: 'ready',
        humanMessage: 'Required checks passed and the reviewer approved. The branch merges cleanly.',
      };
    case 'conflicting':
      return block(
        'merge_conflict',
        probe.source === 'simulation'
          ? 'A local test merge found conflicts with the base branch.'
          : 'This branch conflicts with its base branch.'
      );
    case 'dirty':
      return block('dirty_state', 'GitHub reports the merge state as dirty.');
    case 'blocked':
      return block('blocked_state', 'Branch protection is blocking the merge.');
    case 'behind':
      return block('branch_behind', 'This branch is behind its base branch and was not updated.');
    case 'unknown':
      return block(
        'mergeability_unknown',
        `Mergeability could not be determined (GitHub reported ${probe.hostMergeable}/${probe.hostState}).`
      );
  }
}

function wait(reasonCode: DecisionOutcome['reasonCode'], humanMessage: string): DecisionOutcome {
  return { action: 'wait', reasonCode, humanMessage };
}

function block(reasonCode: DecisionOutcome['reasonCode'], humanMessage: string): DecisionOutcome {
  return { action: 'block', reasonCode, humanMessage };
}

export interface CycleReport {
  prNumber: number;
  headSha: string | null;
  outcome: DecisionOutcome;
  commented: boolean;
}

export interface DecisionEngineOptions {
  host: PullRequestHost;
  config: GateConfig;
  repo: string;
  git?: GitWorkspace | null;
  /** Check names never waited on, such as the job running this action. */
  ignoredChecks?: string[];
  sleep?: Sleep;
  now?: () => number;
}

interface Collected {
  snapshot: PullRequestSnapshot;
  signals: CycleSignals;
}

/**
 * Runs merge-readiness cycles. This is the only component that enables
 * auto-merge, posts the decision comment or sets the gate's commit status.
 */
export class DecisionEngine {
  private host: PullRequestHost;
  private config: GateConfig;
  private repo: string;
  private prober: MergeabilityProber;
  private reconciler: BranchReconciler | null;
  private ignoredChecks: string[];
  private sleep: Sleep;
  private now: () => number;

  constructor(options: DecisionEngineOptions) {
    const { config } = options;
    const git = options.git ?? null;

    this.host = options.host;
    this.config = config;
    this.repo = options.repo;
    this.ignoredChecks = [
      config.status_context,
      claimContext(config.status_context),
      ...config.checks.ignore,
      ...(options.ignoredChecks ?? []),
    ];
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.prober = new MergeabilityProber(this.host, {
      attempts: config.mergeability.probe_attempts,
      delayMs: config.mergeability.probe_delay_seconds * 1000,
      git: config.mergeability.local_simulation ? git : null,
      sleep: this.sleep,
    });
    this.reconciler = git && config.branch_update.enabled ? new BranchReconciler(git) : null;
  }

  async runCycle(prNumber: number): Promise<CycleReport> {
    let headSha: string | null = null;
    try {
      const initial = await this.host.getPullRequest(prNumber);
      headSha = initial.ref.headSha;

      const skipped = this.precheck(initial);
      if (skipped) {
        core.info(`#${prNumber}: ${skipped.humanMessage}`);
        return { prNumber, headSha, outcome: skipped, commented: false };
      }

      const { snapshot, signals } = await this.collect(initial);
      headSha = snapshot.ref.headSha;

      const decided = decide(signals);
      core.info(`#${prNumber} decided ${decided.action} (${decided.reasonCode}): ${decided.humanMessage}`);

      const outcome = decided.action === 'merge' ? await this.enableMerge(snapshot, decided) : decided;
      await this.setStatus(snapshot.ref, outcome);
      const commented = await this.postComment(snapshot.ref, outcome, signals);
      return { prNumber, headSha, outcome, commented };
    } catch (error) {
      return { prNumber, headSha, outcome: failureOutcome(prNumber, error), commented: false };
    }
  }

  private precheck(snapshot: PullRequestSnapshot): DecisionOutcome | null {
    const { number } = snapshot.ref;
    if (snapshot.state === 'closed') {
      return wait('pull_request_closed', `Pull request #${number} is closed.`);
    }
    if (snapshot.draft) {
      return wait('draft', `Pull request #${number} is a draft and is evaluated once it is ready for review.`);
    }

    const { opt_in } = this.config;
    if (opt_in.required && !isAutoMergeRequested(snapshot, opt_in.label)) {
      return wait(
        'not_requested',
        `Auto-merge was not requested. Add the "${opt_in.label}" label or set \`auto_merge: true\` in the description front matter.`
      );
    }
    return null;
  }

  private async collect(initial: PullRequestSnapshot): Promise<Collected> {
    let snapshot = initial;
    let mergeability = await this.prober.probe(snapshot.ref);
    let reconcile = NOT_RECONCILED;

    if (mergeability.state === 'behind' && this.reconciler) {
      reconcile = await this.updateBranch(this.reconciler, snapshot.ref);
      if (reconcile.updated) {
        snapshot = await this.host.getPullRequest(snapshot.ref.number);
        mergeability = await this.prober.probe(snapshot.ref);
      }
    }

    const checks = await this.aggregateChecks(snapshot.ref, reconcile.updated);
    const verdict = await this.readVerdict(snapshot.ref.number);
    return { snapshot, signals: { checks, verdict, mergeability, reconcile } };
  }

  private async updateBranch(reconciler: BranchReconciler, ref: PullRequestRef): Promise<ReconcileResult> {
    const behind = await reconciler.countCommitsBehind(ref);
    if (behind === null) {
      return {
        updated: false,
        conflicted: false,
        method: 'failed',
        detail: `could not count commits between ${ref.baseRef} and ${ref.headRef}`,
      };
    }
    return reconciler.reconcile(ref, behind);
  }

  private async aggregateChecks(ref: PullRequestRef, afterUpdate: boolean): Promise<CheckAggregation> {
    const { checks, required_checks } = this.config;
    const controller = new AbortController();

    // every poll re-reads the head so a new push cancels the wait
    const source: CheckHost = {
      listCheckRuns: async (sha) => {
        await this.watchHead(ref, controller);
        return this.host.listCheckRuns(sha);
      },
      listCommitStatuses: (sha) => this.host.listCommitStatuses(sha),
    };

    const aggregator = new CheckAggregator(source, {
      ignoredContexts: this.ignoredChecks,
      sleep: this.sleep,
      now: this.now,
    });
    return aggregator.waitForRequiredChecks(ref.headSha, required_checks, {
      maxWaitMs: afterUpdate ? 0 : checks.max_wait_minutes * 60_000,
      pollIntervalMs: checks.poll_interval_seconds * 1000,
      signal: controller.signal,
    });
  }

  private async watchHead(ref: PullRequestRef, controller: AbortController): Promise<void> {
    if (controller.signal.aborted) return;
    const latest = await this.host.getPullRequest(ref.number);
    if (latest.ref.headSha !== ref.headSha) {
      const superseded = new SupersededError(ref.headSha, latest.ref.headSha);
      core.info(`#${ref.number}: ${superseded.message}, cancelling the check wait`);
      controller.abort(superseded);
    }
  }

  private async readVerdict(prNumber: number): Promise<ReviewVerdict | null> {
    const comments = await this.host.listComments(prNumber);
    const comment = findLatestVerdictComment(comments, this.config.reviewer_logins);
    if (!comment) {
      return null;
    }

    const verdict = parseVerdict(comment.body);
    core.info(
      `#${prNumber}: verdict from comment ${comment.id} (${verdict.source}): approved=${verdict.approved}, blocking=${verdict.blockingIssues.length}`
    );
    return verdict;
  }

  private async enableMerge(snapshot: PullRequestSnapshot, outcome: DecisionOutcome): Promise<DecisionOutcome> {
    const { ref } = snapshot;
    const method = this.config.merge_method;

    if (snapshot.autoMergeEnabled) {
      core.info(`#${ref.number}: auto-merge already enabled`);
      return outcome;
    }

    try {
      await this.host.enableAutoMerge(snapshot.nodeId, method, ref.headSha);
      core.info(`#${ref.number}: auto-merge enabled (${method})`);
      return outcome;
    } catch (error) {
      if (!/clean status/i.test(describeError(error))) {
        return block('auto_merge_failed', `Auto-merge could not be enabled: ${describeError(error)}`);
      }
    }

    // GitHub refuses auto-merge when the pull request could merge right now
    try {
      await this.host.mergePullRequest(ref.number, method, ref.headSha);
      core.info(`#${ref.number}: merged directly (${method})`);
      return outcome;
    } catch (error) {
      return block('auto_merge_failed', `Direct merge failed: ${describeError(error)}`);
    }
  }

  private async setStatus(ref: PullRequestRef, outcome: DecisionOutcome): Promise<void> {
    if (outcome.action === 'wait') return;

    const state = outcome.action === 'merge' ? 'success' : 'failure';
    const description =
      outcome.action === 'merge' ? 'Ready to merge' : `Blocked: ${outcome.reasonCode}`;
    try {
      await this.host.setCommitStatus(ref.headSha, state, description);
    } catch (error) {
      core.warning(`Failed to update commit status: ${describeError(error)}`);
    }
  }

  private async postComment(
    ref: PullRequestRef,
    outcome: DecisionOutcome,
    signals: CycleSignals
  ): Promise<boolean> {
    if (!shouldComment(outcome)) return false;

    const body = formatDecisionComment(
      {
        repo: this.repo,
        ref,
        restartKeyword: this.config.restart_keywords[0] ?? '/restart-auto-merge',
      },
      outcome,
      signals
    );

    try {
      const previous = latestOwnComment(await this.host.listComments(ref.number));
      if (previous?.body === body) {
        core.info(`#${ref.number}: decision comment unchanged, not posting again`);
        return false;
      }
      await this.host.createComment(ref.number, body);
      return true;
    } catch (error) {
      core.warning(`Failed to post decision comment on #${ref.number}: ${describeError(error)}`);
      return false;
    }
  }
}

function shouldComment(outcome: DecisionOutcome): boolean {
  if (outcome.action !== 'wait') return true;
  return outcome.reasonCode === 'checks_timeout' || outcome.reasonCode === 'branch_updated';
}

export function latestOwnComment(comments: IssueCommentEntry[]): IssueCommentEntry | null {
  let latest: IssueCommentEntry | null = null;
  for (const comment of comments) {
    if (!comment.body.includes(COMMENT_MARKER)) continue;
    if (
      !latest ||
      comment.createdAt > latest.createdAt ||
      (comment.createdAt === latest.createdAt && comment.id > latest.id)
    ) {
      latest = comment;
    }
  }
  return latest;
}

function failureOutcome(prNumber: number, error: unknown): DecisionOutcome {
  if (error instanceof TransientApiError) {
    core.warning(`#${prNumber}: ${error.message}`);
    return wait('api_unavailable', `The GitHub API was unavailable: ${error.message}`);
  }
  core.error(`#${prNumber}: cycle failed: ${describeError(error)}`);
  return wait('internal_error', `The merge gate failed unexpectedly: ${describeError(error)}`);
}
