import type { RunRecord, RunRegistry } from './types.js';

export interface WorkflowRunSource {
  getWorkflowIdForRun(runId: number): Promise<number>;
  listWorkflowRuns(workflowId: number, since: Date): Promise<RunRecord[]>;
}

/**
 * Treats the workflow-runs API as the shared record of which runs exist for
 * this workflow. Every run of the action sees the same list, so no state
 * needs to live inside a single process.
 */
export class WorkflowRunRegistry implements RunRegistry {
  private source: WorkflowRunSource;
  private runId: number;
  private workflowId: number | null = null;

  constructor(source: WorkflowRunSource, runId: number) {
    this.source = source;
    this.runId = runId;
  }

  async listRecentRuns(since: Date): Promise<RunRecord[]> {
    if (this.workflowId === null) {
      this.workflowId = await this.source.getWorkflowIdForRun(this.runId);
    }
    const runs = await this.source.listWorkflowRuns(this.workflowId, since);
    return runs.filter((run) => run.createdAt.getTime() >= since.getTime());
  }
}
