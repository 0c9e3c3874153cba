import * as core from '@actions/core';
import { z } from 'zod';
import { COMMENT_MARKER } from './format.js';
import type { EventKind } from './types.js';

export interface Trigger {
  prNumber: number;
  eventKind: EventKind;
  headSha: string | null;
}

export interface EventContext {
  eventName: string;
  payload: unknown;
}

export interface TriggerOptions {
  prNumberInput: number | null;
  restartKeywords: string[];
  statusContext: string;
}

export interface PullRequestLookup {
  listPullRequestsForCommit(sha: string): Promise<number[]>;
  listOpenPullRequests(): Promise<number[]>;
}

const PULL_REQUEST_ACTIONS = ['opened', 'synchronize', 'reopened', 'ready_for_review', 'labeled'];

const PullRequestPayload = z.object({
  action: z.string(),
  pull_request: z.object({
    number: z.number(),
    head: z.object({ sha: z.string() }),
  }),
});

const LinkedPullRequests = z
  .array(z.object({ number: z.number() }))
  .nullish()
  .transform((pulls) => (pulls ?? []).map((pr) => pr.number));

const CheckSuitePayload = z.object({
  action: z.string(),
  check_suite: z.object({ head_sha: z.string(), pull_requests: LinkedPullRequests }),
});

const CheckRunPayload = z.object({
  action: z.string(),
  check_run: z.object({ head_sha: z.string(), pull_requests: LinkedPullRequests }),
});

const WorkflowRunPayload = z.object({
  action: z.string(),
  workflow_run: z.object({ head_sha: z.string(), pull_requests: LinkedPullRequests }),
});

const StatusPayload = z.object({
  sha: z.string(),
  state: z.string(),
  context: z.string(),
});

const IssueCommentPayload = z.object({
  action: z.string(),
  issue: z.object({
    number: z.number(),
    pull_request: z.unknown().optional(),
  }),
  comment: z.object({ body: z.string().nullish() }),
});

const DispatchPayload = z.object({
  inputs: z
    .object({ pr_number: z.union([z.string(), z.number()]).optional() })
    .nullish(),
});

/**
 * Maps the inbound webhook event to the pull requests a cycle should run for.
 * An explicit `pr_number` input always wins. Events that do not concern an
 * open pull request resolve to an empty list.
 */
export async function resolveTriggers(
  context: EventContext,
  options: TriggerOptions,
  lookup: PullRequestLookup
): Promise<Trigger[]> {
  if (options.prNumberInput !== null) {
    return [{ prNumber: options.prNumberInput, eventKind: 'manual_dispatch', headSha: null }];
  }

  const triggers = await triggersForEvent(context, options, lookup);
  const seen = new Set<number>();
  return triggers.filter((trigger) => {
    if (seen.has(trigger.prNumber)) return false;
    seen.add(trigger.prNumber);
    return true;
  });
}

async function triggersForEvent(
  context: EventContext,
  options: TriggerOptions,
  lookup: PullRequestLookup
): Promise<Trigger[]> {
  const { eventName, payload } = context;

  switch (eventName) {
    case 'pull_request':
    case 'pull_request_target': {
      const event = PullRequestPayload.parse(payload);
      if (!PULL_REQUEST_ACTIONS.includes(event.action)) {
        core.info(`Ignoring pull_request action "${event.action}"`);
        return [];
      }
      return [single(event.pull_request.number, 'pull_request', event.pull_request.head.sha)];
    }

    case 'pull_request_review': {
      const event = PullRequestPayload.parse(payload);
      if (event.action !== 'submitted') return [];
      return [single(event.pull_request.number, 'review', event.pull_request.head.sha)];
    }

    case 'check_suite': {
      const event = CheckSuitePayload.parse(payload);
      if (event.action !== 'completed') return [];
      return linked(event.check_suite.head_sha, event.check_suite.pull_requests, lookup);
    }

    case 'check_run': {
      const event = CheckRunPayload.parse(payload);
      if (event.action !== 'completed') return [];
      return linked(event.check_run.head_sha, event.check_run.pull_requests, lookup);
    }

    case 'workflow_run': {
      const event = WorkflowRunPayload.parse(payload);
      if (event.action !== 'completed') return [];
      return linked(event.workflow_run.head_sha, event.workflow_run.pull_requests, lookup);
    }

    case 'status': {
      const event = StatusPayload.parse(payload);
      if (event.state === 'pending') return [];
      const own = event.context === options.statusContext || event.context.startsWith(`${options.statusContext}/`);
      if (own) {
        core.info(`Ignoring status event from own context "${event.context}"`);
        return [];
      }
      const numbers = await lookup.listPullRequestsForCommit(event.sha);
      return numbers.map((number) => single(number, 'status', event.sha));
    }

    case 'issue_comment': {
      const event = IssueCommentPayload.parse(payload);
      const body = event.comment.body ?? '';
      if (event.action !== 'created' || event.issue.pull_request === undefined) return [];
      if (body.includes(COMMENT_MARKER)) return [];
      if (!options.restartKeywords.some((keyword) => body.includes(keyword))) return [];
      return [single(event.issue.number, 'restart_comment', null)];
    }

    case 'workflow_dispatch': {
      const event = DispatchPayload.parse(payload);
      const raw = event.inputs?.pr_number;
      const prNumber = typeof raw === 'number' ? raw : Number.parseInt(raw ?? '', 10);
      if (!Number.isInteger(prNumber) || prNumber <= 0) {
        throw new Error('workflow_dispatch requires a pr_number input');
      }
      return [single(prNumber, 'manual_dispatch', null)];
    }

    case 'schedule': {
      const numbers = await lookup.listOpenPullRequests();
      return numbers.map((number) => single(number, 'schedule', null));
    }

    default:
      core.info(`Event "${eventName}" does not trigger a merge-readiness cycle`);
      return [];
  }
}

function single(prNumber: number, eventKind: EventKind, headSha: string | null): Trigger {
  return { prNumber, eventKind, headSha };
}

async function linked(
  headSha: string,
  prNumbers: number[],
  lookup: PullRequestLookup
): Promise<Trigger[]> {
  // fork pull requests are not linked in check payloads
  const numbers = prNumbers.length > 0 ? prNumbers : await lookup.listPullRequestsForCommit(headSha);
  return numbers.map((number) => single(number, 'check_completed', headSha));
}
