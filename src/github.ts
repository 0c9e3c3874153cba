import * as github from '@actions/github';
import { z } from 'zod';
import { withRetry } from './retry.js';
import type { ClaimStatusSource, StatusHistoryEntry } from './run-claims.js';
import type { WorkflowRunSource } from './run-registry.js';
import type {
  CheckRunEntry,
  CommitState,
  IssueCommentEntry,
  MergeMethod,
  MergeabilitySignal,
  PullRequestHost,
  PullRequestSnapshot,
  RunRecord,
  StatusEntry,
} from './types.js';

type Octokit = ReturnType<typeof github.getOctokit>;

export interface GitHubClientOptions {
  statusContext: string;
  retries: number;
  backoffMs: number;
}

const MERGEABILITY_QUERY = `
  query($owner: String!, $repo: String!, $number: Int!) {
    repository(owner: $owner, name: $repo) {
      pullRequest(number: $number) {
        mergeable
        mergeStateStatus
      }
    }
  }
`;

const ENABLE_AUTO_MERGE_MUTATION = `
  mutation($pullRequestId: ID!, $mergeMethod: PullRequestMergeMethod!, $expectedHeadOid: GitObjectID) {
    enablePullRequestAutoMerge(
      input: { pullRequestId: $pullRequestId, mergeMethod: $mergeMethod, expectedHeadOid: $expectedHeadOid }
    ) {
      pullRequest {
        number
      }
    }
  }
`;

const MergeabilityResponseSchema = z.object({
  repository: z.object({
    pullRequest: z.object({
      mergeable: z.string(),
      mergeStateStatus: z.string(),
    }),
  }),
});

// commit status descriptions are capped by the API
const MAX_STATUS_DESCRIPTION = 140;

export class GitHubClient implements PullRequestHost, WorkflowRunSource, ClaimStatusSource {
  private octokit: Octokit;
  private owner: string;
  private repo: string;
  private options: GitHubClientOptions;

  constructor(token: string, options: GitHubClientOptions) {
    this.octokit = github.getOctokit(token);
    this.owner = github.context.repo.owner;
    this.repo = github.context.repo.repo;
    this.options = options;
  }

  get repository(): string {
    return `${this.owner}/${this.repo}`;
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, {
      retries: this.options.retries,
      backoffMs: this.options.backoffMs,
    });
  }

  async getPullRequest(prNumber: number): Promise<PullRequestSnapshot> {
    const { data } = await this.call(`get pull request #${prNumber}`, () =>
      this.octokit.rest.pulls.get({
        owner: this.owner,
        repo: this.repo,
        pull_number: prNumber,
      })
    );

    return {
      ref: {
        number: data.number,
        headSha: data.head.sha,
        baseRef: data.base.ref,
        headRef: data.head.ref,
      },
      nodeId: data.node_id,
      state: data.state === 'closed' ? 'closed' : 'open',
      draft: data.draft ?? false,
      title: data.title,
      body: data.body ?? '',
      labels: data.labels.map((label) => label.name),
      autoMergeEnabled: data.auto_merge !== null,
    };
  }

  async getMergeabilitySignal(prNumber: number): Promise<MergeabilitySignal> {
    const response: unknown = await this.call(`query mergeability of #${prNumber}`, () =>
      this.octokit.graphql(MERGEABILITY_QUERY, {
        owner: this.owner,
        repo: this.repo,
        number: prNumber,
      })
    );

    const parsed = MergeabilityResponseSchema.safeParse(response);
    if (!parsed.success) {
      return { mergeable: 'UNKNOWN', mergeStateStatus: 'UNKNOWN' };
    }
    return parsed.data.repository.pullRequest;
  }

  async listCheckRuns(sha: string): Promise<CheckRunEntry[]> {
    const runs = await this.call(`list check runs for ${sha.slice(0, 7)}`, () =>
      this.octokit.paginate(this.octokit.rest.checks.listForRef, {
        owner: this.owner,
        repo: this.repo,
        ref: sha,
        per_page: 100,
      })
    );

    return runs.map((run) => ({
      id: run.id,
      name: run.name,
      status: run.status,
      conclusion: run.conclusion ?? null,
    }));
  }

  async listCommitStatuses(sha: string): Promise<StatusEntry[]> {
    const { data } = await this.call(`get combined status for ${sha.slice(0, 7)}`, () =>
      this.octokit.rest.repos.getCombinedStatusForRef({
        owner: this.owner,
        repo: this.repo,
        ref: sha,
        per_page: 100,
      })
    );

    return data.statuses.map((status) => ({ context: status.context, state: status.state }));
  }

  async listComments(prNumber: number): Promise<IssueCommentEntry[]> {
    const comments = await this.call(`list comments on #${prNumber}`, () =>
      this.octokit.paginate(this.octokit.rest.issues.listComments, {
        owner: this.owner,
        repo: this.repo,
        issue_number: prNumber,
        per_page: 100,
      })
    );

    return comments.map((comment) => ({
      id: comment.id,
      body: comment.body ?? '',
      author: comment.user?.login ?? '',
      authorType: comment.user?.type ?? '',
      createdAt: comment.created_at,
    }));
  }

  async createComment(prNumber: number, body: string): Promise<void> {
    await this.call(`comment on #${prNumber}`, () =>
      this.octokit.rest.issues.createComment({
        owner: this.owner,
        repo: this.repo,
        issue_number: prNumber,
        body,
      })
    );
  }

  async setCommitStatus(sha: string, state: CommitState, description: string): Promise<void> {
    await this.call(`set ${this.options.statusContext} status on ${sha.slice(0, 7)}`, () =>
      this.octokit.rest.repos.createCommitStatus({
        owner: this.owner,
        repo: this.repo,
        sha,
        state,
        description: description.slice(0, MAX_STATUS_DESCRIPTION),
        context: this.options.statusContext,
      })
    );
  }

  async createClaimStatus(sha: string, context: string, description: string): Promise<void> {
    await this.call(`set ${context} status on ${sha.slice(0, 7)}`, () =>
      this.octokit.rest.repos.createCommitStatus({
        owner: this.owner,
        repo: this.repo,
        sha,
        state: 'success',
        description: description.slice(0, MAX_STATUS_DESCRIPTION),
        context,
      })
    );
  }

  async listStatusHistory(sha: string): Promise<StatusHistoryEntry[]> {
    const statuses = await this.call(`list statuses for ${sha.slice(0, 7)}`, () =>
      this.octokit.paginate(this.octokit.rest.repos.listCommitStatusesForRef, {
        owner: this.owner,
        repo: this.repo,
        ref: sha,
        per_page: 100,
      })
    );

    return statuses.map((status) => ({
      id: status.id,
      context: status.context,
      description: status.description ?? '',
      createdAt: status.created_at,
    }));
  }

  async enableAutoMerge(
    pullRequestNodeId: string,
    method: MergeMethod,
    expectedHeadSha: string
  ): Promise<void> {
    await this.call('enable auto-merge', () =>
      this.octokit.graphql(ENABLE_AUTO_MERGE_MUTATION, {
        pullRequestId: pullRequestNodeId,
        mergeMethod: method.toUpperCase(),
        expectedHeadOid: expectedHeadSha,
      })
    );
  }

  async mergePullRequest(prNumber: number, method: MergeMethod, sha: string): Promise<void> {
    await this.call(`merge #${prNumber}`, () =>
      this.octokit.rest.pulls.merge({
        owner: this.owner,
        repo: this.repo,
        pull_number: prNumber,
        merge_method: method,
        sha,
      })
    );
  }

  async listPullRequestsForCommit(sha: string): Promise<number[]> {
    const { data } = await this.call(`list pull requests for ${sha.slice(0, 7)}`, () =>
      this.octokit.rest.repos.listPullRequestsAssociatedWithCommit({
        owner: this.owner,
        repo: this.repo,
        commit_sha: sha,
      })
    );

    return data.filter((pr) => pr.state === 'open').map((pr) => pr.number);
  }

  async listOpenPullRequests(): Promise<number[]> {
    const pulls = await this.call('list open pull requests', () =>
      this.octokit.paginate(this.octokit.rest.pulls.list, {
        owner: this.owner,
        repo: this.repo,
        state: 'open',
        per_page: 100,
      })
    );

    return pulls.map((pr) => pr.number);
  }

  async getWorkflowIdForRun(runId: number): Promise<number> {
    const { data } = await this.call(`get workflow run ${runId}`, () =>
      this.octokit.rest.actions.getWorkflowRun({
        owner: this.owner,
        repo: this.repo,
        run_id: runId,
      })
    );
    return data.workflow_id;
  }

  async listWorkflowRuns(workflowId: number, since: Date): Promise<RunRecord[]> {
    const { data } = await this.call(`list runs of workflow ${workflowId}`, () =>
      this.octokit.rest.actions.listWorkflowRuns({
        owner: this.owner,
        repo: this.repo,
        workflow_id: workflowId,
        created: `>=${since.toISOString()}`,
        per_page: 100,
      })
    );

    return data.workflow_runs.map((run) => {
      const pullRequests = run.pull_requests ?? [];
      return {
        id: run.id,
        prNumbers: pullRequests.map((pr) => pr.number),
        headSha: pullRequests.length > 0 ? run.head_sha : null,
        status: run.status ?? 'unknown',
        conclusion: run.conclusion ?? null,
        createdAt: new Date(run.created_at),
        event: run.event,
      };
    });
  }
}
