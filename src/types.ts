export type MergeMethod = 'merge' | 'squash' | 'rebase';

export interface PullRequestRef {
  number: number;
  headSha: string;
  baseRef: string;
  headRef: string;
}

export interface PullRequestSnapshot {
  ref: PullRequestRef;
  nodeId: string;
  state: 'open' | 'closed';
  draft: boolean;
  title: string;
  body: string;
  labels: string[];
  autoMergeEnabled: boolean;
}

export type CheckStatus = 'pending' | 'completed';
export type CheckConclusion = 'success' | 'failure' | 'skipped' | 'unknown';

export interface CheckResult {
  name: string;
  status: CheckStatus;
  conclusion: CheckConclusion;
  source: 'check_run' | 'status';
}

export type CheckSet = Map<string, CheckResult>;

export interface CheckRunEntry {
  id: number;
  name: string;
  status: string;
  conclusion: string | null;
}

export interface StatusEntry {
  context: string;
  state: string;
}

export interface CheckAggregation {
  complete: boolean;
  allPassed: boolean;
  missing: string[];
  pending: string[];
  failed: string[];
  passed: string[];
  timedOut: boolean;
  cancelled: boolean;
}

export interface Issue {
  description: string;
  file?: string;
  line?: number;
  category?: string;
  fixGuidance?: string;
}

export interface ReviewVerdict {
  approved: boolean;
  blockingIssues: Issue[];
  warnings: Issue[];
  nits: Issue[];
  summary?: string;
  source: 'structured' | 'fallback' | 'unparseable';
}

export interface IssueCommentEntry {
  id: number;
  body: string;
  author: string;
  authorType: string;
  createdAt: string;
}

export type MergeabilityState =
  | 'clean'
  | 'conflicting'
  | 'dirty'
  | 'blocked'
  | 'behind'
  | 'unknown';

export interface MergeabilitySignal {
  mergeable: string;
  mergeStateStatus: string;
}

export interface MergeabilityProbe {
  state: MergeabilityState;
  source: 'host' | 'simulation';
  hostMergeable: string;
  hostState: string;
}

export type ReconcileMethod = 'none' | 'merge' | 'rebase' | 'failed';

export interface ReconcileResult {
  updated: boolean;
  conflicted: boolean;
  method: ReconcileMethod;
  detail?: string;
}

export type DecisionAction = 'merge' | 'block' | 'wait';

export type ReasonCode =
  | 'ready'
  | 'checks_pending'
  | 'checks_timeout'
  | 'branch_updated'
  | 'superseded'
  | 'review_pending'
  | 'ci_failed'
  | 'changes_requested'
  | 'merge_conflict'
  | 'dirty_state'
  | 'blocked_state'
  | 'branch_behind'
  | 'mergeability_unknown'
  | 'auto_merge_failed'
  | 'api_unavailable'
  | 'pull_request_closed'
  | 'draft'
  | 'not_requested'
  | 'internal_error';

export interface DecisionOutcome {
  action: DecisionAction;
  reasonCode: ReasonCode;
  humanMessage: string;
}

export interface CycleSignals {
  checks: CheckAggregation;
  verdict: ReviewVerdict | null;
  mergeability: MergeabilityProbe;
  reconcile: ReconcileResult;
}

export type EventKind =
  | 'pull_request'
  | 'check_completed'
  | 'status'
  | 'review'
  | 'restart_comment'
  | 'manual_dispatch'
  | 'schedule';

export interface RunIdentity {
  runId: number;
  triggerNumber: number;
  eventKind: EventKind;
  startedAt: Date;
  headSha: string | null;
}

export interface RunRecord {
  id: number;
  prNumbers: number[];
  headSha: string | null;
  status: string;
  conclusion: string | null;
  createdAt: Date;
  event: string;
}

export interface RunRegistry {
  listRecentRuns(since: Date): Promise<RunRecord[]>;
}

/**
 * A run's note that it is evaluating a pull request head, or what it decided
 * there. Claim ids grow in creation order.
 */
export interface RunClaim {
  id: number;
  runId: number;
  prNumber: number;
  decision: DecisionAction | null;
  createdAt: Date;
}

export type ClaimInput = Pick<RunClaim, 'runId' | 'prNumber' | 'decision'>;

export interface ClaimStore {
  record(headSha: string, claim: ClaimInput): Promise<void>;
  list(headSha: string): Promise<RunClaim[]>;
}

export type CommitState = 'error' | 'success' | 'failure' | 'pending';

export interface PullRequestHost {
  getPullRequest(prNumber: number): Promise<PullRequestSnapshot>;
  getMergeabilitySignal(prNumber: number): Promise<MergeabilitySignal>;
  listCheckRuns(sha: string): Promise<CheckRunEntry[]>;
  listCommitStatuses(sha: string): Promise<StatusEntry[]>;
  listComments(prNumber: number): Promise<IssueCommentEntry[]>;
  createComment(prNumber: number, body: string): Promise<void>;
  setCommitStatus(sha: string, state: CommitState, description: string): Promise<void>;
  enableAutoMerge(pullRequestNodeId: string, method: MergeMethod, expectedHeadSha: string): Promise<void>;
  mergePullRequest(prNumber: number, method: MergeMethod, sha: string): Promise<void>;
}
