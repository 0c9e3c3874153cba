import { describe, expect, it } from 'vitest';
import { defaultConfig, type GateConfig } from './config.js';
import { DecisionEngine, decide, latestOwnComment } from './decision-engine.js';
import { TransientApiError } from './errors.js';
import { COMMENT_MARKER } from './format.js';
import { GitWorkspace } from './git.js';
import type {
  CheckAggregation,
  CheckRunEntry,
  CommitState,
  CycleSignals,
  IssueCommentEntry,
  MergeMethod,
  MergeabilitySignal,
  PullRequestHost,
  PullRequestSnapshot,
  StatusEntry,
} from './types.js';

const HEAD = 'abc1234def5678';
const UPDATED_HEAD = 'fff0000aaa1111';

function snapshot(overrides: Partial<PullRequestSnapshot> = {}, headSha = HEAD): PullRequestSnapshot {
  return {
    ref: { number: 17, headSha, baseRef: 'main', headRef: 'feature/cache' },
    nodeId: 'PR_node17',
    state: 'open',
    draft: false,
    title: 'Cache lookups',
    body: '',
    labels: [],
    autoMergeEnabled: false,
    ...overrides,
  };
}

const APPROVED_VERDICT = ['```yaml', 'verdict: APPROVE', 'issues:', '  blocking: []', '```'].join('\n');

function verdictComment(body: string): IssueCommentEntry {
  return { id: 1, body, author: 'github-actions[bot]', authorType: 'Bot', createdAt: '2026-03-01T10:00:00Z' };
}

const passing = (): CheckRunEntry[] => [
  { id: 1, name: 'lint', status: 'completed', conclusion: 'success' },
  { id: 2, name: 'tests', status: 'completed', conclusion: 'success' },
];

class FakeHost implements PullRequestHost {
  snapshots: PullRequestSnapshot[] = [snapshot()];
  signals: MergeabilitySignal[] = [{ mergeable: 'MERGEABLE', mergeStateStatus: 'CLEAN' }];
  checkRuns: CheckRunEntry[] = passing();
  statuses: StatusEntry[] = [];
  comments: IssueCommentEntry[] = [verdictComment(APPROVED_VERDICT)];
  enableError: Error | null = null;
  pullRequestError: Error | null = null;

  pullRequestCalls = 0;
  signalCalls = 0;
  posted: string[] = [];
  commitStatuses: Array<[string, CommitState, string]> = [];
  autoMerges: Array<[string, MergeMethod, string]> = [];
  merges: Array<[number, MergeMethod, string]> = [];

  async getPullRequest(): Promise<PullRequestSnapshot> {
    if (this.pullRequestError) throw this.pullRequestError;
    const current = this.snapshots[Math.min(this.pullRequestCalls, this.snapshots.length - 1)];
    this.pullRequestCalls++;
    return current;
  }

  async getMergeabilitySignal(): Promise<MergeabilitySignal> {
    const signal = this.signals[Math.min(this.signalCalls, this.signals.length - 1)];
    this.signalCalls++;
    return signal;
  }

  async listCheckRuns(): Promise<CheckRunEntry[]> {
    return this.checkRuns;
  }

  async listCommitStatuses(): Promise<StatusEntry[]> {
    return this.statuses;
  }

  async listComments(): Promise<IssueCommentEntry[]> {
    return [...this.comments];
  }

  async createComment(_prNumber: number, body: string): Promise<void> {
    this.posted.push(body);
    this.comments.push({
      id: 100 + this.posted.length,
      body,
      author: 'merge-gate[bot]',
      authorType: 'Bot',
      createdAt: `2026-03-01T11:00:0${this.posted.length}Z`,
    });
  }

  async setCommitStatus(sha: string, state: CommitState, description: string): Promise<void> {
    this.commitStatuses.push([sha, state, description]);
  }

  async enableAutoMerge(nodeId: string, method: MergeMethod, expectedHeadSha: string): Promise<void> {
    if (this.enableError) throw this.enableError;
    this.autoMerges.push([nodeId, method, expectedHeadSha]);
  }

  async mergePullRequest(prNumber: number, method: MergeMethod, sha: string): Promise<void> {
    this.merges.push([prNumber, method, sha]);
  }
}

function testConfig(): GateConfig {
  const base = defaultConfig();
  return {
    ...base,
    required_checks: ['lint', 'tests'],
    checks: { ...base.checks, max_wait_minutes: 30, poll_interval_seconds: 600 },
    opt_in: { ...base.opt_in, required: false },
    mergeability: { ...base.mergeability, probe_attempts: 1, local_simulation: false },
  };
}

function engineFor(
  host: FakeHost,
  config = testConfig(),
  git: GitWorkspace | null = null,
  ignoredChecks: string[] = []
) {
  let time = 0;
  return new DecisionEngine({
    host,
    config,
    repo: 'acme/widgets',
    git,
    ignoredChecks,
    now: () => time,
    sleep: async (ms) => {
      time += ms;
    },
  });
}

describe('DecisionEngine.runCycle', () => {
  it('enables auto-merge when checks pass, the reviewer approves and the branch is clean', async () => {
    const host = new FakeHost();

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome).toEqual({
      action: 'merge',
      reasonCode: 'ready',
      humanMessage: 'Required checks passed and the reviewer approved. The branch merges cleanly.',
    });
    expect(host.autoMerges).toEqual([['PR_node17', 'squash', HEAD]]);
    expect(host.commitStatuses).toEqual([[HEAD, 'success', 'Ready to merge']]);
    expect(host.posted).toHaveLength(1);
    expect(host.posted[0]).toContain('### Status: READY (auto-merge enabled) (`ready`)');
  });

  it('does not wait on its own job when every reported check is required', async () => {
    const host = new FakeHost();
    host.checkRuns = [...passing(), { id: 3, name: 'gate', status: 'in_progress', conclusion: null }];
    const config = { ...testConfig(), required_checks: [] };

    const report = await engineFor(host, config, null, ['gate']).runCycle(17);

    expect(report.outcome.action).toBe('merge');
    expect(host.autoMerges).toEqual([['PR_node17', 'squash', HEAD]]);
  });

  it('skips claim records and configured checks when every reported check is required', async () => {
    const host = new FakeHost();
    host.checkRuns = [...passing(), { id: 4, name: 'preview-deploy', status: 'queued', conclusion: null }];
    host.statuses = [{ context: 'merge-gate/claims', state: 'success' }];
    const base = testConfig();
    const config = { ...base, required_checks: [], checks: { ...base.checks, ignore: ['preview-deploy'] } };

    expect((await engineFor(host, config).runCycle(17)).outcome.reasonCode).toBe('ready');
  });

  it('blocks an approval that still lists blocking issues', async () => {
    const host = new FakeHost();
    host.comments = [
      verdictComment(['```yaml', 'verdict: APPROVE', 'blocking:', '  - description: missing tests', '```'].join('\n')),
    ];

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome).toEqual({
      action: 'block',
      reasonCode: 'changes_requested',
      humanMessage: 'The reviewer reported 1 blocking issue(s).',
    });
    expect(host.autoMerges).toEqual([]);
    expect(host.commitStatuses).toEqual([[HEAD, 'failure', 'Blocked: changes_requested']]);
    expect(host.posted[0]).toContain('- **missing tests**');
  });

  it('blocks on a failed required check', async () => {
    const host = new FakeHost();
    host.checkRuns = [
      { id: 1, name: 'lint', status: 'completed', conclusion: 'success' },
      { id: 2, name: 'tests', status: 'completed', conclusion: 'failure' },
    ];

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome).toEqual({
      action: 'block',
      reasonCode: 'ci_failed',
      humanMessage: 'Required checks failed: tests.',
    });
  });

  it('waits on a timeout and does not repeat an identical comment', async () => {
    const host = new FakeHost();
    host.checkRuns = [
      { id: 1, name: 'lint', status: 'in_progress', conclusion: null },
      { id: 2, name: 'tests', status: 'queued', conclusion: null },
    ];

    const first = await engineFor(host).runCycle(17);
    const second = await engineFor(host).runCycle(17);

    expect(first.outcome).toEqual({
      action: 'wait',
      reasonCode: 'checks_timeout',
      humanMessage: 'Required checks did not finish in time: lint, tests.',
    });
    expect(first.commented).toBe(true);
    expect(second.outcome.reasonCode).toBe('checks_timeout');
    expect(second.commented).toBe(false);
    expect(host.posted).toHaveLength(1);
    expect(host.commitStatuses).toEqual([]);
  });

  it('updates a lagging branch by merge and re-probes before deciding', async () => {
    const host = new FakeHost();
    host.snapshots = [snapshot(), snapshot({}, UPDATED_HEAD)];
    host.signals = [
      { mergeable: 'MERGEABLE', mergeStateStatus: 'BEHIND' },
      { mergeable: 'MERGEABLE', mergeStateStatus: 'CLEAN' },
    ];
    const commands: string[] = [];
    const git = new GitWorkspace(
      async (args) => {
        const command = args.join(' ');
        commands.push(command);
        const stdout = command === 'rev-list --count origin/feature/cache..origin/main' ? '3\n' : '';
        return { ok: true, stdout, stderr: '' };
      },
      { botName: 'gate-bot', botEmail: 'gate-bot@example.com' }
    );

    const report = await engineFor(host, testConfig(), git).runCycle(17);

    expect(report.outcome).toEqual({
      action: 'wait',
      reasonCode: 'branch_updated',
      humanMessage: 'Merged the base branch into this branch. Waiting for checks on the new head.',
    });
    expect(report.headSha).toBe(UPDATED_HEAD);
    expect(host.signalCalls).toBe(2);
    expect(commands).toContain('merge origin/main --no-edit --no-ff');
    expect(commands).toContain('push origin HEAD:refs/heads/feature/cache');
    expect(commands.some((command) => command.startsWith('rebase'))).toBe(false);
    expect(host.autoMerges).toEqual([]);
    expect(host.posted).toHaveLength(1);
  });

  it('cancels the check wait when a new commit arrives', async () => {
    const host = new FakeHost();
    host.snapshots = [snapshot(), snapshot(), snapshot({}, UPDATED_HEAD)];
    host.checkRuns = [{ id: 1, name: 'lint', status: 'in_progress', conclusion: null }];

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome.action).toBe('wait');
    expect(report.outcome.reasonCode).toBe('superseded');
    expect(host.posted).toEqual([]);
    expect(host.commitStatuses).toEqual([]);
  });

  it('leaves drafts alone', async () => {
    const host = new FakeHost();
    host.snapshots = [snapshot({ draft: true })];

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome.reasonCode).toBe('draft');
    expect(host.signalCalls).toBe(0);
    expect(host.posted).toEqual([]);
  });

  it('requires an opt-in when configured', async () => {
    const host = new FakeHost();
    const config = testConfig();
    config.opt_in = { required: true, label: 'auto-merge' };

    expect((await engineFor(host, config).runCycle(17)).outcome.reasonCode).toBe('not_requested');

    host.snapshots = [snapshot({ labels: ['auto-merge'] })];
    expect((await engineFor(host, config).runCycle(17)).outcome.reasonCode).toBe('ready');
  });

  it('does not re-enable an auto-merge that is already on', async () => {
    const host = new FakeHost();
    host.snapshots = [snapshot({ autoMergeEnabled: true })];

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome.action).toBe('merge');
    expect(host.autoMerges).toEqual([]);
  });

  it('merges directly when GitHub reports the pull request is already clean', async () => {
    const host = new FakeHost();
    host.enableError = new Error('Pull request Pull request is in clean status');

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome.action).toBe('merge');
    expect(host.merges).toEqual([[17, 'squash', HEAD]]);
  });

  it('blocks when auto-merge cannot be enabled', async () => {
    const host = new FakeHost();
    host.enableError = new Error('Auto merge is not allowed for this repository');

    const report = await engineFor(host).runCycle(17);

    expect(report.outcome).toEqual({
      action: 'block',
      reasonCode: 'auto_merge_failed',
      humanMessage: 'Auto-merge could not be enabled: Auto merge is not allowed for this repository',
    });
    expect(host.commitStatuses).toEqual([[HEAD, 'failure', 'Blocked: auto_merge_failed']]);
  });

  it('waits when the API stays unavailable', async () => {
    const host = new FakeHost();
    host.pullRequestError = new TransientApiError('get pull request #17', 4, new Error('Service Unavailable'));

    const report = await engineFor(host).runCycle(17);

    expect(report).toEqual({
      prNumber: 17,
      headSha: null,
      commented: false,
      outcome: {
        action: 'wait',
        reasonCode: 'api_unavailable',
        humanMessage:
          'The GitHub API was unavailable: get pull request #17 failed after 4 attempt(s): Service Unavailable',
      },
    });
  });
});

describe('decide', () => {
  const complete: CheckAggregation = {
    complete: true,
    allPassed: true,
    missing: [],
    pending: [],
    failed: [],
    passed: ['lint', 'tests'],
    timedOut: false,
    cancelled: false,
  };

  const ready: CycleSignals = {
    checks: complete,
    verdict: { approved: true, blockingIssues: [], warnings: [], nits: [], source: 'structured' },
    mergeability: { state: 'clean', source: 'host', hostMergeable: 'MERGEABLE', hostState: 'CLEAN' },
    reconcile: { updated: false, conflicted: false, method: 'none' },
  };

  it('merges only when every gate passes', () => {
    expect(decide(ready).action).toBe('merge');
  });

  it('never merges with incomplete checks', () => {
    const incomplete: CheckAggregation[] = [
      { ...complete, complete: false, allPassed: false, pending: ['lint'] },
      { ...complete, complete: false, allPassed: false, missing: ['tests'], timedOut: true },
      { ...complete, complete: false, allPassed: false, cancelled: true },
    ];
    for (const checks of incomplete) {
      expect(decide({ ...ready, checks }).action).toBe('wait');
    }
  });

  it('never merges with blocking issues, whatever the verdict says', () => {
    const verdict = {
      approved: true,
      blockingIssues: [{ description: 'missing tests' }],
      warnings: [],
      nits: [],
      source: 'structured' as const,
    };
    expect(decide({ ...ready, verdict })).toMatchObject({ action: 'block', reasonCode: 'changes_requested' });
  });

  it('waits for a verdict that has not been posted', () => {
    expect(decide({ ...ready, verdict: null }).reasonCode).toBe('review_pending');
  });

  it('fails closed on unknown mergeability', () => {
    const mergeability = { state: 'unknown' as const, source: 'host' as const, hostMergeable: 'UNKNOWN', hostState: 'UNKNOWN' };
    expect(decide({ ...ready, mergeability })).toEqual({
      action: 'block',
      reasonCode: 'mergeability_unknown',
      humanMessage: 'Mergeability could not be determined (GitHub reported UNKNOWN/UNKNOWN).',
    });
  });

  it('reports a reconcile conflict before the host state', () => {
    const reconcile = {
      updated: false,
      conflicted: true,
      method: 'failed' as const,
      detail: 'feature/cache conflicts with main; manual resolution required',
    };
    const mergeability = { ...ready.mergeability, state: 'behind' as const };
    expect(decide({ ...ready, reconcile, mergeability })).toEqual({
      action: 'block',
      reasonCode: 'merge_conflict',
      humanMessage: 'feature/cache conflicts with main; manual resolution required',
    });
  });
});

describe('latestOwnComment', () => {
  it('returns the newest comment carrying the marker', () => {
    const comments: IssueCommentEntry[] = [
      { id: 5, body: `${COMMENT_MARKER}\nold`, author: 'bot', authorType: 'Bot', createdAt: '2026-03-01T09:00:00Z' },
      { id: 6, body: 'human reply', author: 'dev', authorType: 'User', createdAt: '2026-03-01T12:00:00Z' },
      { id: 7, body: `${COMMENT_MARKER}\nnew`, author: 'bot', authorType: 'Bot', createdAt: '2026-03-01T10:00:00Z' },
    ];
    expect(latestOwnComment(comments)?.id).toBe(7);
  });
});
