import * as core from '@actions/core';
import type { GitWorkspace } from './git.js';
import { sleep as defaultSleep, type Sleep } from './retry.js';
import type {
  MergeabilityProbe,
  MergeabilitySignal,
  MergeabilityState,
  PullRequestHost,
  PullRequestRef,
} from './types.js';

export function classifyMergeability(signal: MergeabilitySignal): MergeabilityState {
  const mergeable = signal.mergeable.toUpperCase();
  const state = signal.mergeStateStatus.toUpperCase();

  if (mergeable === 'CONFLICTING') return 'conflicting';

  switch (state) {
    case 'DIRTY':
      return 'dirty';
    case 'BLOCKED':
      return 'blocked';
    case 'BEHIND':
      return 'behind';
    // UNSTABLE only reflects non-required checks; required ones are judged by the aggregator
    case 'CLEAN':
    case 'UNSTABLE':
    case 'HAS_HOOKS':
      return mergeable === 'MERGEABLE' ? 'clean' : 'unknown';
    default:
      return 'unknown';
  }
}

export interface MergeabilityProberOptions {
  attempts: number;
  delayMs: number;
  git?: GitWorkspace | null;
  sleep?: Sleep;
}

export class MergeabilityProber {
  private host: Pick<PullRequestHost, 'getMergeabilitySignal'>;
  private options: MergeabilityProberOptions;
  private sleep: Sleep;

  constructor(
    host: Pick<PullRequestHost, 'getMergeabilitySignal'>,
    options: MergeabilityProberOptions
  ) {
    this.host = host;
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async probe(ref: PullRequestRef): Promise<MergeabilityProbe> {
    const attempts = Math.max(1, this.options.attempts);
    let signal: MergeabilitySignal = { mergeable: 'UNKNOWN', mergeStateStatus: 'UNKNOWN' };
    let state: MergeabilityState = 'unknown';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      signal = await this.host.getMergeabilitySignal(ref.number);
      state = classifyMergeability(signal);
      if (state !== 'unknown' || attempt === attempts) break;

      core.info(
        `Mergeability of #${ref.number} not settled (${signal.mergeable}/${signal.mergeStateStatus}), re-probing`
      );
      await this.sleep(this.options.delayMs);
    }

    const probe: MergeabilityProbe = {
      state,
      source: 'host',
      hostMergeable: signal.mergeable,
      hostState: signal.mergeStateStatus,
    };

    const { git } = this.options;
    if (git && (state === 'clean' || state === 'unknown')) {
      const simulation = await git.exclusive(() => git.simulateMerge(ref.baseRef, ref.headRef));
      core.info(`Local merge simulation for #${ref.number}: ${simulation}`);
      if (simulation === 'conflicting') {
        return { ...probe, state: 'conflicting', source: 'simulation' };
      }
    }

    return probe;
  }
}
