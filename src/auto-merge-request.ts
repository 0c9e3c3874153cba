import { parse as parseYaml } from 'yaml';
import type { PullRequestSnapshot } from './types.js';

const FRONT_MATTER_PATTERN = /^---[ \t]*\r?\n([\s\S]*?)\r?\n(?:---|\.\.\.)[ \t]*(?:\r?\n|$)/;

export function readFrontMatter(body: string): Record<string, unknown> | null {
  const match = FRONT_MATTER_PATTERN.exec(body.trimStart());
  if (!match) {
    return null;
  }

  try {
    const parsed: unknown = parseYaml(match[1]);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnabled(value: unknown): boolean {
  return value === true || (typeof value === 'string' && /^(true|yes|on)$/i.test(value.trim()));
}

function frontMatterRequestsAutoMerge(frontMatter: Record<string, unknown>): boolean {
  if (isEnabled(frontMatter.auto_merge) || isEnabled(frontMatter['auto-merge'])) {
    return true;
  }

  const metadata = frontMatter.pr_metadata;
  if (!isRecord(metadata)) return false;
  const flags = metadata.automation_flags;
  return isRecord(flags) && isEnabled(flags.auto_merge);
}

export function isAutoMergeRequested(snapshot: PullRequestSnapshot, label: string): boolean {
  const wanted = label.toLowerCase();
  if (snapshot.labels.some((name) => name.toLowerCase() === wanted)) {
    return true;
  }

  const frontMatter = readFrontMatter(snapshot.body);
  return frontMatter !== null && frontMatterRequestsAutoMerge(frontMatter);
}
