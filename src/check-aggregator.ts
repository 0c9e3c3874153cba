import * as core from '@actions/core';
import { sleep as defaultSleep, type Sleep } from './retry.js';
import type {
  CheckAggregation,
  CheckConclusion,
  CheckResult,
  CheckRunEntry,
  CheckSet,
  PullRequestHost,
  StatusEntry,
} from './types.js';

export type RequiredCheckState = 'missing' | 'pending' | 'failed' | 'passed';

export type CheckHost = Pick<PullRequestHost, 'listCheckRuns' | 'listCommitStatuses'>;

export interface WaitForChecksOptions {
  maxWaitMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
}

export interface CheckAggregatorOptions {
  ignoredContexts?: string[];
  sleep?: Sleep;
  now?: () => number;
}

export const NO_CHECKS_REPORTED = '(no checks reported yet)';

const FAILURE_CONCLUSIONS = new Set([
  'failure',
  'cancelled',
  'timed_out',
  'action_required',
  'stale',
  'startup_failure',
]);

export function normalizeCheckRun(entry: CheckRunEntry): CheckResult {
  if (entry.status !== 'completed') {
    return { name: entry.name, status: 'pending', conclusion: 'unknown', source: 'check_run' };
  }

  let conclusion: CheckConclusion = 'unknown';
  if (entry.conclusion === 'success') conclusion = 'success';
  else if (entry.conclusion === 'skipped' || entry.conclusion === 'neutral') conclusion = 'skipped';
  else if (entry.conclusion && FAILURE_CONCLUSIONS.has(entry.conclusion)) conclusion = 'failure';

  return { name: entry.name, status: 'completed', conclusion, source: 'check_run' };
}

export function normalizeStatus(entry: StatusEntry): CheckResult {
  const state = entry.state.toLowerCase();
  if (state === 'pending') {
    return { name: entry.context, status: 'pending', conclusion: 'unknown', source: 'status' };
  }

  let conclusion: CheckConclusion = 'unknown';
  if (state === 'success') conclusion = 'success';
  else if (state === 'failure' || state === 'error') conclusion = 'failure';

  return { name: entry.context, status: 'completed', conclusion, source: 'status' };
}

/**
 * Merges check-runs and legacy commit statuses into one name-keyed set.
 * The newest check-run wins for a repeated name; statuses only fill names
 * no check-run reported.
 */
export function mergeCheckSources(
  checkRuns: CheckRunEntry[],
  statuses: StatusEntry[],
  ignoredContexts: string[] = []
): CheckSet {
  const ignored = new Set(ignoredContexts);
  const newestRuns = new Map<string, CheckRunEntry>();
  for (const run of checkRuns) {
    if (ignored.has(run.name)) continue;
    const existing = newestRuns.get(run.name);
    if (!existing || run.id > existing.id) {
      newestRuns.set(run.name, run);
    }
  }

  const checkSet: CheckSet = new Map();
  for (const [name, run] of newestRuns) {
    checkSet.set(name, normalizeCheckRun(run));
  }
  for (const status of statuses) {
    if (ignored.has(status.context) || checkSet.has(status.context)) continue;
    checkSet.set(status.context, normalizeStatus(status));
  }
  return checkSet;
}

export function matchRequiredCheck(checkSet: CheckSet, requiredName: string): CheckResult[] {
  const exact = checkSet.get(requiredName);
  if (exact) {
    return [exact];
  }

  const needle = requiredName.toLowerCase();
  return [...checkSet.values()].filter((check) => {
    const name = check.name.toLowerCase();
    return name.includes(needle) || needle.includes(name);
  });
}

export function classifyRequiredCheck(checkSet: CheckSet, requiredName: string): RequiredCheckState {
  const matches = matchRequiredCheck(checkSet, requiredName);
  if (matches.length === 0) return 'missing';
  if (matches.some((check) => check.status === 'completed' && !isPassing(check))) return 'failed';
  if (matches.some((check) => check.status === 'pending')) return 'pending';
  return 'passed';
}

export function summarizeRequiredChecks(checkSet: CheckSet, requiredNames: string[]): CheckAggregation {
  const summary: CheckAggregation = {
    complete: false,
    allPassed: false,
    missing: [],
    pending: [],
    failed: [],
    passed: [],
    timedOut: false,
    cancelled: false,
  };

  const names = requiredNames.length > 0 ? requiredNames : [...checkSet.keys()];
  if (names.length === 0) {
    summary.missing.push(NO_CHECKS_REPORTED);
    return summary;
  }

  for (const name of names) {
    summary[classifyRequiredCheck(checkSet, name)].push(name);
  }

  const resolved = summary.missing.length === 0 && summary.pending.length === 0;
  summary.complete = summary.failed.length > 0 || resolved;
  summary.allPassed = summary.failed.length === 0 && resolved;
  return summary;
}

function isPassing(check: CheckResult): boolean {
  return check.conclusion === 'success' || check.conclusion === 'skipped';
}

export class CheckAggregator {
  private host: CheckHost;
  private ignoredContexts: string[];
  private sleep: Sleep;
  private now: () => number;

  constructor(host: CheckHost, options: CheckAggregatorOptions = {}) {
    this.host = host;
    this.ignoredContexts = options.ignoredContexts ?? [];
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async fetchCheckSet(headSha: string): Promise<CheckSet> {
    const [checkRuns, statuses] = await Promise.all([
      this.host.listCheckRuns(headSha),
      this.host.listCommitStatuses(headSha),
    ]);
    return mergeCheckSources(checkRuns, statuses, this.ignoredContexts);
  }

  async waitForRequiredChecks(
    headSha: string,
    requiredNames: string[],
    options: WaitForChecksOptions
  ): Promise<CheckAggregation> {
    const { signal } = options;
    const startedAt = this.now();

    for (let poll = 1; ; poll++) {
      const summary = summarizeRequiredChecks(await this.fetchCheckSet(headSha), requiredNames);
      if (signal?.aborted) {
        return { ...summary, complete: false, allPassed: false, cancelled: true };
      }
      if (summary.complete) {
        core.info(
          `Checks resolved for ${headSha.slice(0, 7)} after ${poll} poll(s): ${summary.passed.length} passed, ${summary.failed.length} failed`
        );
        return summary;
      }

      const elapsed = this.now() - startedAt;
      if (elapsed >= options.maxWaitMs) {
        return { ...summary, timedOut: options.maxWaitMs > 0 };
      }

      core.info(
        `Waiting on ${summary.pending.length} pending and ${summary.missing.length} missing check(s) for ${headSha.slice(0, 7)}`
      );
      try {
        await this.sleep(Math.min(options.pollIntervalMs, options.maxWaitMs - elapsed), signal);
      } catch (error) {
        if (signal?.aborted) {
          return { ...summary, cancelled: true };
        }
        throw error;
      }
    }
  }
}
