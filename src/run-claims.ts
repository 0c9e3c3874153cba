import type { ClaimInput, ClaimStore, DecisionAction, RunClaim } from './types.js';

export interface StatusHistoryEntry {
  id: number;
  context: string;
  description: string;
  createdAt: string;
}

export interface ClaimStatusSource {
  createClaimStatus(sha: string, context: string, description: string): Promise<void>;
  listStatusHistory(sha: string): Promise<StatusHistoryEntry[]>;
}

const CLAIM_PATTERN = /^run (\d+) (?:evaluating|decided (merge|block|wait) for) #(\d+)$/;

export function claimContext(statusContext: string): string {
  return `${statusContext}/claims`;
}

export function describeClaim(claim: ClaimInput): string {
  const what = claim.decision ? `decided ${claim.decision} for` : 'evaluating';
  return `run ${claim.runId} ${what} #${claim.prNumber}`;
}

export function parseClaim(entry: StatusHistoryEntry): RunClaim | null {
  const match = entry.description.match(CLAIM_PATTERN);
  if (!match) {
    return null;
  }

  return {
    id: entry.id,
    runId: Number(match[1]),
    prNumber: Number(match[3]),
    decision: toDecision(match[2]),
    createdAt: new Date(entry.createdAt),
  };
}

function toDecision(value: string | undefined): DecisionAction | null {
  if (value === 'merge' || value === 'block' || value === 'wait') {
    return value;
  }
  return null;
}

/**
 * Keeps claims as commit statuses on the pull request head. Every run of the
 * workflow can read them whatever event started it, and status ids order
 * them by creation.
 */
export class CommitStatusClaimStore implements ClaimStore {
  private source: ClaimStatusSource;
  private context: string;

  constructor(source: ClaimStatusSource, statusContext: string) {
    this.source = source;
    this.context = claimContext(statusContext);
  }

  async record(headSha: string, claim: ClaimInput): Promise<void> {
    await this.source.createClaimStatus(headSha, this.context, describeClaim(claim));
  }

  async list(headSha: string): Promise<RunClaim[]> {
    const entries = await this.source.listStatusHistory(headSha);
    return entries
      .filter((entry) => entry.context === this.context)
      .map(parseClaim)
      .filter((claim): claim is RunClaim => claim !== null)
      .sort((left, right) => left.id - right.id);
  }
}
