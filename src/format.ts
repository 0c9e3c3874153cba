import type { CycleSignals, DecisionOutcome, Issue, PullRequestRef, ReasonCode } from './types.js';

export const COMMENT_MARKER = '<!-- MERGE_GATE_BOT -->';

export interface CommentContext {
  repo: string;
  ref: PullRequestRef;
  restartKeyword: string;
}

const STATUS_LABELS: Record<DecisionOutcome['action'], string> = {
  merge: 'READY (auto-merge enabled)',
  block: 'BLOCKED',
  wait: 'WAITING',
};

export function formatDecisionComment(
  context: CommentContext,
  outcome: DecisionOutcome,
  signals: CycleSignals | null
): string {
  const lines: string[] = [
    COMMENT_MARKER,
    `<!-- MERGE_GATE_REASON: ${outcome.reasonCode} -->`,
    '',
    `## Merge Gate: ${context.repo} #${context.ref.number}`,
    '',
    `### Status: ${STATUS_LABELS[outcome.action]} (\`${outcome.reasonCode}\`)`,
    '',
    outcome.humanMessage,
    '',
    `Evaluated commit: \`${context.ref.headSha.slice(0, 7)}\``,
    '',
  ];

  if (signals) {
    lines.push(...formatCheckSections(outcome.reasonCode, signals));
    lines.push(...formatVerdictSections(signals));
  }

  const steps = resolutionSteps(outcome.reasonCode, context, signals);
  if (steps.length > 0) {
    lines.push('### How to resolve', '', ...steps, '');
  }

  return lines.join('\n');
}

function formatCheckSections(reasonCode: ReasonCode, signals: CycleSignals): string[] {
  const { checks } = signals;
  const lines: string[] = [];

  if (checks.failed.length > 0) {
    lines.push(`### Failed Checks (${checks.failed.length})`, '', ...bulletList(checks.failed), '');
  }
  if (reasonCode === 'checks_timeout' || reasonCode === 'checks_pending') {
    if (checks.pending.length > 0) {
      lines.push(`### Pending Checks (${checks.pending.length})`, '', ...bulletList(checks.pending), '');
    }
    if (checks.missing.length > 0) {
      lines.push(`### Missing Checks (${checks.missing.length})`, '', ...bulletList(checks.missing), '');
    }
  }
  return lines;
}

function formatVerdictSections(signals: CycleSignals): string[] {
  const { verdict } = signals;
  if (!verdict) {
    return [];
  }

  const lines: string[] = [];
  if (verdict.blockingIssues.length > 0) {
    lines.push(`### Blocking Issues (${verdict.blockingIssues.length})`, '');
    for (const issue of verdict.blockingIssues) {
      lines.push(formatIssue(issue));
    }
    lines.push('');
  }
  if (verdict.warnings.length > 0) {
    lines.push(`### Warnings (${verdict.warnings.length})`, '');
    for (const issue of verdict.warnings) {
      lines.push(formatIssue(issue));
    }
    lines.push('');
  }
  return lines;
}

export function formatIssue(issue: Issue): string {
  const parts = [`- **${issue.description}**`];
  if (issue.file) {
    parts.push(issue.line ? `\`${issue.file}:${issue.line}\`` : `\`${issue.file}\``);
  }
  if (issue.category) {
    parts.push(`category: ${issue.category}`);
  }

  let text = parts.join(' | ');
  if (issue.fixGuidance) {
    text += `\n  Fix: ${issue.fixGuidance}`;
  }
  return text;
}

function bulletList(names: string[]): string[] {
  return names.map((name) => `- \`${name}\``);
}

function resolutionSteps(
  reasonCode: ReasonCode,
  context: CommentContext,
  signals: CycleSignals | null
): string[] {
  const { baseRef, headRef } = context.ref;
  const restart = `Comment \`${context.restartKeyword}\` to re-run the gate.`;

  switch (reasonCode) {
    case 'ci_failed':
      return ['Fix the failing checks listed above and push. The gate re-evaluates when CI completes.'];
    case 'changes_requested':
      return [
        'Address the blocking issues above and push a new commit. The reviewer posts a fresh verdict on the next run.',
        restart,
      ];
    case 'merge_conflict':
    case 'dirty_state':
      return conflictSteps(baseRef, headRef);
    case 'branch_behind':
      return [
        signals?.reconcile.detail
          ? `Automatic update did not complete: ${signals.reconcile.detail}`
          : 'Automatic branch updates are disabled for this repository.',
        '',
        ...conflictSteps(baseRef, headRef),
      ];
    case 'blocked_state':
      return [
        'Branch protection is holding the merge. Check required reviews and required status checks in the repository settings.',
        restart,
      ];
    case 'mergeability_unknown':
      return [
        'GitHub has not finished computing mergeability or reported an unexpected state.',
        restart,
      ];
    case 'auto_merge_failed':
      return [
        'Enable "Allow auto-merge" in the repository settings and confirm the token can write pull requests.',
        restart,
      ];
    case 'checks_timeout':
      return ['Re-run the stuck checks. The gate re-evaluates when they complete.', restart];
    case 'branch_updated':
      return ['No action needed. CI runs on the updated branch and the gate re-evaluates afterwards.'];
    default:
      return [];
  }
}

function conflictSteps(baseRef: string, headRef: string): string[] {
  return [
    'Resolve the conflicts locally:',
    '',
    '```bash',
    `git fetch origin ${baseRef}`,
    `git checkout ${headRef}`,
    `git merge origin/${baseRef}`,
    '# resolve conflicts in your editor',
    'git add .',
    'git commit',
    `git push origin ${headRef}`,
    '```',
    '',
    'Or rebase instead:',
    '',
    '```bash',
    `git fetch origin ${baseRef}`,
    `git checkout ${headRef}`,
    `git rebase origin/${baseRef}`,
    '# resolve conflicts, then',
    'git add .',
    'git rebase --continue',
    `git push origin ${headRef} --force-with-lease`,
    '```',
  ];
}
