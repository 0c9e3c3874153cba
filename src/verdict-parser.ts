import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { COMMENT_MARKER } from './format.js';
import type { Issue, IssueCommentEntry, ReviewVerdict } from './types.js';

const IssueListSchema = z.array(z.unknown()).nullish();

const VerdictDocumentSchema = z
  .object({
    verdict: z.string().nullish(),
    summary: z.string().nullish(),
    issues: z
      .object({
        blocking: IssueListSchema,
        warnings: IssueListSchema,
        nits: IssueListSchema,
      })
      .passthrough()
      .nullish(),
    blocking: IssueListSchema,
    warnings: IssueListSchema,
    nits: IssueListSchema,
  })
  .passthrough();

type VerdictDocument = z.infer<typeof VerdictDocumentSchema>;

const FENCE_PATTERN = /```[^\n]*\n([\s\S]*?)```/g;
const VERDICT_MENTION = /\bverdict\b/i;
const VERDICT_PATTERN = /verdict\W{0,6}\s*["']?(APPROVED?|REQUEST_CHANGES|CHANGES_REQUESTED)\b/i;
const EMPTY_SECTION_VALUES = new Set(['', '[]', 'null', '~', 'none', 'n/a', '-']);
const LIST_MARKER = /^\s*(?:-|\*(?!\*)|\d+[.)])\s+/;
const ISSUE_FIELD = /^(description|title|message|file|line|category|fix_guidance):\s*(.*)$/i;

export const UNPARSEABLE_WARNING =
  'Reviewer verdict could not be parsed; treating the pull request as not approved';

export function parseVerdict(body: string): ReviewVerdict {
  const candidate = selectCandidate(body);

  const structured = parseStructured(candidate);
  if (structured) {
    return structured;
  }

  const recovered = parseFallback(candidate) ?? (candidate !== body ? parseFallback(body) : null);
  if (recovered) {
    return recovered;
  }

  return {
    approved: false,
    blockingIssues: [],
    warnings: [{ description: UNPARSEABLE_WARNING, category: 'parser' }],
    nits: [],
    source: 'unparseable',
  };
}

export function findLatestVerdictComment(
  comments: IssueCommentEntry[],
  reviewerLogins: string[]
): IssueCommentEntry | null {
  const reviewers = new Set(reviewerLogins.map((login) => login.toLowerCase()));
  const newestFirst = [...comments].sort(
    (left, right) => right.createdAt.localeCompare(left.createdAt) || right.id - left.id
  );

  for (const comment of newestFirst) {
    if (!reviewers.has(comment.author.toLowerCase())) continue;
    if (comment.body.includes(COMMENT_MARKER)) continue;
    if (VERDICT_MENTION.test(comment.body)) {
      return comment;
    }
  }
  return null;
}

function selectCandidate(body: string): string {
  const fences = [...body.matchAll(FENCE_PATTERN)].map((match) => match[1]);
  const verdictFence = fences.find((block) => VERDICT_MENTION.test(block));
  if (verdictFence !== undefined) {
    return verdictFence;
  }

  return extractDocument(body) ?? fences[0] ?? body;
}

function extractDocument(body: string): string | null {
  const lines = body.split(/\r?\n/);
  const start = lines.findIndex((line) => /^---\s*$/.test(line));
  if (start === -1) {
    return null;
  }

  const rest = lines.slice(start + 1);
  const end = rest.findIndex((line) => /^(?:---|\.\.\.)\s*$/.test(line));
  return (end === -1 ? rest : rest.slice(0, end)).join('\n');
}

function parseStructured(text: string): ReviewVerdict | null {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch {
    return null;
  }

  if (!isRecord(raw)) {
    return null;
  }

  const result = VerdictDocumentSchema.safeParse(raw);
  if (!result.success || !looksLikeVerdict(result.data)) {
    return null;
  }

  const document = result.data;
  const warnings = normalizeIssues(document.issues?.warnings ?? document.warnings);
  if (!document.verdict) {
    warnings.push({
      description: 'Reviewer output has no verdict field; treating as not approved',
      category: 'parser',
    });
  }

  return {
    approved: isApproval(document.verdict ?? ''),
    blockingIssues: normalizeIssues(document.issues?.blocking ?? document.blocking),
    warnings,
    nits: normalizeIssues(document.issues?.nits ?? document.nits),
    ...(document.summary ? { summary: document.summary } : {}),
    source: 'structured',
  };
}

function looksLikeVerdict(document: VerdictDocument): boolean {
  return (
    document.verdict != null ||
    document.issues != null ||
    document.blocking != null ||
    document.warnings != null
  );
}

function parseFallback(text: string): ReviewVerdict | null {
  const verdictMatch = text.match(VERDICT_PATTERN);
  const blocking = extractSection(text, 'blocking');
  const warnings = extractSection(text, 'warnings?');
  const nits = extractSection(text, 'nits?');

  if (!verdictMatch && !blocking && !warnings) {
    return null;
  }

  return {
    approved: verdictMatch ? isApproval(verdictMatch[1]) : false,
    blockingIssues: blocking ?? [],
    warnings: warnings ?? [],
    nits: nits ?? [],
    source: 'fallback',
  };
}

/**
 * Reads one list-valued field out of text that failed strict parsing.
 * Accepts YAML-ish (`blocking:` followed by `- ...` items) and markdown
 * (`**Blocking Issues:**` followed by numbered items). Returns null when the
 * field is absent.
 */
function extractSection(text: string, key: string): Issue[] | null {
  const header = new RegExp(
    `^([ \\t]*)(?:-\\s*)?\\**\\s*${key}(?:[ _]issues)?\\b[^:\\n]*:\\**[ \\t]*(.*)$`,
    'im'
  );
  const match = text.match(header);
  if (!match || match.index === undefined) {
    return null;
  }

  const keyIndent = match[1].length;
  const inline = match[2].trim();

  if (inline.startsWith('[')) {
    const parsed = tryParseYaml(inline);
    if (Array.isArray(parsed)) {
      return normalizeIssues(parsed);
    }
  }
  if (!EMPTY_SECTION_VALUES.has(inline.toLowerCase())) {
    return [{ description: stripQuotes(inline) }];
  }

  const following = text.slice(match.index + match[0].length).split(/\r?\n/).slice(1);
  const block = collectBlock(following, keyIndent);
  if (block.length === 0) {
    return [];
  }

  const parsed = tryParseYaml(dedent(block).join('\n'));
  if (Array.isArray(parsed)) {
    return normalizeIssues(parsed);
  }

  const items = readListItems(block);
  if (items.length === 0) {
    return [unreadableIssue()];
  }
  return items;
}

function unreadableIssue(): Issue {
  return { description: 'Reviewer reported issues that could not be parsed', category: 'parser' };
}

function collectBlock(lines: string[], keyIndent: number): string[] {
  const block: string[] = [];
  for (const line of lines) {
    if (line.trim() === '') {
      block.push(line);
      continue;
    }
    const indent = line.length - line.trimStart().length;
    const isItem = LIST_MARKER.test(line) && indent >= keyIndent;
    if (indent > keyIndent || isItem) {
      block.push(line);
      continue;
    }
    break;
  }

  while (block.length > 0 && block[block.length - 1].trim() === '') {
    block.pop();
  }
  return block;
}

function readListItems(block: string[]): Issue[] {
  const issues: Issue[] = [];
  let fields: Record<string, string> | null = null;
  let scalar: string | null = null;

  const flush = (): void => {
    if (fields && Object.keys(fields).length > 0) {
      const issue = toIssue(fields);
      if (issue) issues.push(issue);
    } else if (scalar) {
      issues.push({ description: scalar });
    }
    fields = null;
    scalar = null;
  };

  for (const line of block) {
    if (line.trim() === '') continue;

    const startsItem = LIST_MARKER.test(line);
    const content = line.replace(LIST_MARKER, '').trim();
    if (startsItem) {
      flush();
    }

    const pair = content.match(ISSUE_FIELD);
    if (pair) {
      fields = fields ?? {};
      fields[pair[1].toLowerCase()] = stripQuotes(pair[2].trim());
    } else if (startsItem) {
      scalar = stripQuotes(content);
    }
  }
  flush();

  return issues;
}

function normalizeIssues(items: unknown[] | null | undefined): Issue[] {
  if (!items) {
    return [];
  }
  const issues: Issue[] = [];
  for (const item of items) {
    const issue = toIssue(item);
    if (issue) issues.push(issue);
  }
  // a non-empty section never reads as "no issues"
  if (items.length > 0 && issues.length === 0) {
    issues.push(unreadableIssue());
  }
  return issues;
}

function toIssue(item: unknown): Issue | null {
  if (item === null || item === undefined) {
    return null;
  }
  if (!isRecord(item)) {
    const description = String(item).trim();
    return description ? { description } : null;
  }

  const issue: Issue = {
    description:
      readString(item.description) ??
      readString(item.title) ??
      readString(item.message) ??
      'Unspecified issue',
  };

  const file = readString(item.file);
  if (file) issue.file = file;

  const line = readLine(item.line);
  if (line !== null) issue.line = line;

  const category = readString(item.category);
  if (category) issue.category = category;

  const fixGuidance = readString(item.fix_guidance) ?? readString(item.fixGuidance);
  if (fixGuidance) issue.fixGuidance = fixGuidance;

  return issue;
}

function readString(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

function readLine(value: unknown): number | null {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed === 'number' && Number.isInteger(parsed) && parsed >= 0) {
    return parsed;
  }
  return null;
}

function isApproval(verdict: string): boolean {
  return /^APPROVED?$/i.test(verdict.trim());
}

function tryParseYaml(text: string): unknown {
  try {
    return parseYaml(text);
  } catch {
    return null;
  }
}

function dedent(lines: string[]): string[] {
  const indents = lines
    .filter((line) => line.trim() !== '')
    .map((line) => line.length - line.trimStart().length);
  const shift = Math.min(...indents);
  return lines.map((line) => line.slice(Math.min(shift, line.length - line.trimStart().length)));
}

function stripQuotes(value: string): string {
  return value.replace(/^["'](.*)["']$/, '$1');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
