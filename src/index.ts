import * as core from '@actions/core';
import * as github from '@actions/github';
import { loadConfig, readInputs, type GateConfig } from './config.js';
import { DecisionEngine, type CycleReport } from './decision-engine.js';
import { DuplicateSuppressor } from './duplicate-suppressor.js';
import { describeError } from './errors.js';
import { resolveTriggers, type Trigger } from './events.js';
import { GitWorkspace, createGitRunner } from './git.js';
import { GitHubClient } from './github.js';
import { CommitStatusClaimStore } from './run-claims.js';
import { WorkflowRunRegistry } from './run-registry.js';
import type { RunIdentity } from './types.js';

async function openWorkspace(token: string, config: GateConfig): Promise<GitWorkspace | null> {
  const run = createGitRunner();
  const probe = await run(['rev-parse', '--is-inside-work-tree']);
  if (!probe.ok) {
    core.info('No git checkout found; branch updates and local merge simulation are disabled');
    return null;
  }

  const { owner, repo } = github.context.repo;
  const host = new URL(github.context.serverUrl).host;
  return new GitWorkspace(run, {
    pushUrl: `https://x-access-token:${token}@${host}/${owner}/${repo}.git`,
    botName: config.branch_update.bot_name,
    botEmail: config.branch_update.bot_email,
  });
}

// comment and dispatch events carry no head commit; claims need one
async function resolveHead(client: GitHubClient, trigger: Trigger): Promise<string | null> {
  if (trigger.headSha !== null) return trigger.headSha;
  try {
    return (await client.getPullRequest(trigger.prNumber)).ref.headSha;
  } catch (error) {
    core.warning(`Could not read the head of #${trigger.prNumber}: ${describeError(error)}`);
    return null;
  }
}

async function evaluate(
  trigger: Trigger,
  client: GitHubClient,
  suppressor: DuplicateSuppressor,
  engine: DecisionEngine
): Promise<CycleReport | null> {
  const identity: RunIdentity = {
    runId: github.context.runId,
    triggerNumber: trigger.prNumber,
    eventKind: trigger.eventKind,
    startedAt: new Date(),
    headSha: await resolveHead(client, trigger),
  };

  const suppression = await suppressor.evaluate(identity);
  if (suppression.suppress) {
    core.info(`Skipping #${trigger.prNumber}: ${suppression.reason}`);
    return null;
  }

  const report = await engine.runCycle(trigger.prNumber);
  await suppressor.recordDecision(identity, report.outcome.action);
  return report;
}

async function writeSummary(reports: CycleReport[]): Promise<void> {
  const rows = reports.map((report) => [
    `#${report.prNumber}`,
    report.headSha ? report.headSha.slice(0, 7) : '-',
    report.outcome.action,
    report.outcome.reasonCode,
    report.outcome.humanMessage,
  ]);

  await core.summary
    .addHeading('Merge Gate', 2)
    .addTable([
      [
        { data: 'Pull request', header: true },
        { data: 'Head', header: true },
        { data: 'Action', header: true },
        { data: 'Reason', header: true },
        { data: 'Details', header: true },
      ],
      ...rows,
    ])
    .write();
}

export async function run(): Promise<void> {
  try {
    const inputs = readInputs();
    const config = await loadConfig(inputs.configPath);

    const client = new GitHubClient(inputs.githubToken, {
      statusContext: config.status_context,
      retries: config.api.retries,
      backoffMs: config.api.backoff_ms,
    });

    const triggers = await resolveTriggers(
      { eventName: github.context.eventName, payload: github.context.payload },
      {
        prNumberInput: inputs.prNumber,
        restartKeywords: config.restart_keywords,
        statusContext: config.status_context,
      },
      client
    );
    if (triggers.length === 0) {
      core.info(`No pull request to evaluate for ${github.context.eventName}`);
      return;
    }
    core.info(`Evaluating ${triggers.map((trigger) => `#${trigger.prNumber}`).join(', ')}`);

    const suppressor = new DuplicateSuppressor(new WorkflowRunRegistry(client, github.context.runId), {
      lookbackMs: config.duplicates.lookback_hours * 3_600_000,
      graceMs: config.duplicates.grace_minutes * 60_000,
      claims: new CommitStatusClaimStore(client, config.status_context),
    });
    const engine = new DecisionEngine({
      host: client,
      config,
      repo: client.repository,
      git: await openWorkspace(inputs.githubToken, config),
      // the job running this gate reports as a check on the head commit
      ignoredChecks: [github.context.job],
    });

    const results = await Promise.all(
      triggers.map((trigger) => evaluate(trigger, client, suppressor, engine))
    );
    const reports = results.filter((report): report is CycleReport => report !== null);
    if (reports.length === 0) {
      core.info('Every trigger was handled by another run');
      return;
    }

    // single-PR runs expose that PR's decision; schedule runs expose the first
    const [first] = reports;
    core.setOutput('action', first.outcome.action);
    core.setOutput('reason', first.outcome.reasonCode);
    core.setOutput('message', first.outcome.humanMessage);
    await writeSummary(reports);

    const failed = reports.filter(
      (report) => report.outcome.action === 'block' || report.outcome.reasonCode === 'internal_error'
    );
    if (failed.length > 0) {
      core.setFailed(
        failed
          .map((report) => `#${report.prNumber} ${report.outcome.reasonCode}: ${report.outcome.humanMessage}`)
          .join('\n')
      );
    }
  } catch (error) {
    core.setFailed(`Merge gate failed: ${describeError(error)}`);
  }
}

void run();
