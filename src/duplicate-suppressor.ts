import * as core from '@actions/core';
import { describeError } from './errors.js';
import type {
  ClaimStore,
  DecisionAction,
  EventKind,
  RunClaim,
  RunIdentity,
  RunRecord,
  RunRegistry,
} from './types.js';

export interface SuppressionDecision {
  suppress: boolean;
  reason: string;
  conflictingRunId?: number;
}

export interface SuppressionWindow {
  now: number;
  lookbackMs: number;
  graceMs: number;
}

const ACTIVE_STATUSES = new Set(['queued', 'pending', 'requested', 'waiting', 'in_progress', 'running']);
const MANUAL_EVENTS = new Set<EventKind>(['restart_comment', 'manual_dispatch']);
const FINAL_DECISIONS = new Set<DecisionAction>(['merge', 'block']);

export function isSameTrigger(identity: RunIdentity, run: RunRecord): boolean {
  if (!run.prNumbers.includes(identity.triggerNumber)) {
    return false;
  }
  return run.headSha === null || identity.headSha === null || run.headSha === identity.headSha;
}

/**
 * Suppresses the current run when an earlier run for the same trigger is
 * still active, or when one reached a merge or block decision within the
 * grace window.
 *
 * `claims` are the notes runs leave on the pull request head before deciding.
 * They tie runs without pull request metadata (schedule, comments, dispatch)
 * to the trigger, and their creation order picks the run that proceeds: a run
 * that missed a peer's claim wrote its own first, so exactly one of two
 * concurrent runs goes ahead. Without claims, start time (then run id) orders
 * the runs the registry links to the pull request.
 */
export function decideSuppression(
  identity: RunIdentity,
  runs: RunRecord[],
  window: SuppressionWindow,
  claims: RunClaim[] | null = null
): SuppressionDecision {
  const trigger = identity.triggerNumber;
  const claimsFor = (runId: number): RunClaim[] =>
    (claims ?? []).filter((claim) => claim.runId === runId && claim.prNumber === trigger);

  const ownClaim = claimsFor(identity.runId).find((claim) => claim.decision === null);
  const self = runs.find((run) => run.id === identity.runId);
  const startedAt = (self?.createdAt ?? identity.startedAt).getTime();
  const cutoff = window.now - window.lookbackMs;

  const peers = runs.filter(
    (run) =>
      run.id !== identity.runId &&
      run.createdAt.getTime() >= cutoff &&
      (isSameTrigger(identity, run) || claimsFor(run.id).length > 0)
  );

  const earlierActive = peers.find((run) => {
    if (!ACTIVE_STATUSES.has(run.status)) return false;

    const peerClaims = claimsFor(run.id);
    if (peerClaims.some((claim) => claim.decision !== null)) return false;
    if (ownClaim) {
      const peerClaim = peerClaims.find((claim) => claim.decision === null);
      return peerClaim !== undefined && peerClaim.id < ownClaim.id;
    }

    const created = run.createdAt.getTime();
    return created < startedAt || (created === startedAt && run.id < identity.runId);
  });
  if (earlierActive) {
    return {
      suppress: true,
      reason: `Active run ${earlierActive.id} (${earlierActive.event}) is already handling #${trigger}`,
      conflictingRunId: earlierActive.id,
    };
  }

  if (!MANUAL_EVENTS.has(identity.eventKind)) {
    const recentDecision = (claims ?? [])
      .filter(
        (claim) =>
          claim.runId !== identity.runId &&
          claim.prNumber === trigger &&
          claim.decision !== null &&
          FINAL_DECISIONS.has(claim.decision) &&
          window.now - claim.createdAt.getTime() <= window.graceMs
      )
      .pop();
    if (recentDecision) {
      return {
        suppress: true,
        reason: `Run ${recentDecision.runId} decided ${recentDecision.decision} for #${trigger} moments ago`,
        conflictingRunId: recentDecision.runId,
      };
    }
  }

  return { suppress: false, reason: 'No overlapping run' };
}

export interface DuplicateSuppressorOptions {
  lookbackMs: number;
  graceMs: number;
  claims?: ClaimStore | null;
  now?: () => number;
}

export class DuplicateSuppressor {
  private registry: RunRegistry;
  private claims: ClaimStore | null;
  private options: DuplicateSuppressorOptions;

  constructor(registry: RunRegistry, options: DuplicateSuppressorOptions) {
    this.registry = registry;
    this.claims = options.claims ?? null;
    this.options = options;
  }

  async evaluate(identity: RunIdentity): Promise<SuppressionDecision> {
    // the claim must be written before the registry is read
    const claims = await this.claimHead(identity);
    const now = (this.options.now ?? Date.now)();

    let runs: RunRecord[];
    try {
      runs = await this.registry.listRecentRuns(new Date(now - this.options.lookbackMs));
    } catch (error) {
      core.warning(`Run registry unavailable, not suppressing: ${describeError(error)}`);
      return { suppress: false, reason: 'Run registry unavailable' };
    }

    return decideSuppression(
      identity,
      runs,
      { now, lookbackMs: this.options.lookbackMs, graceMs: this.options.graceMs },
      claims
    );
  }

  /** Notes the decision a cycle reached, which ends this run's claim. */
  async recordDecision(identity: RunIdentity, decision: DecisionAction): Promise<void> {
    if (!this.claims || identity.headSha === null) return;
    try {
      await this.claims.record(identity.headSha, {
        runId: identity.runId,
        prNumber: identity.triggerNumber,
        decision,
      });
    } catch (error) {
      core.warning(`Could not record the decision for #${identity.triggerNumber}: ${describeError(error)}`);
    }
  }

  private async claimHead(identity: RunIdentity): Promise<RunClaim[] | null> {
    if (!this.claims || identity.headSha === null) return null;
    try {
      await this.claims.record(identity.headSha, {
        runId: identity.runId,
        prNumber: identity.triggerNumber,
        decision: null,
      });
      return await this.claims.list(identity.headSha);
    } catch (error) {
      core.warning(`Could not claim #${identity.triggerNumber}: ${describeError(error)}`);
      return null;
    }
  }
}
