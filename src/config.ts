import * as core from '@actions/core';
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const DEFAULT_CONFIG_PATH = '.github/merge-gate.yml';

const GateConfigSchema = z.object({
  required_checks: z.array(z.string().min(1)).default([]),
  reviewer_logins: z.array(z.string().min(1)).default(['github-actions[bot]']),
  restart_keywords: z.array(z.string().min(1)).default(['/restart-auto-merge', '/retry-merge']),
  merge_method: z.enum(['merge', 'squash', 'rebase']).default('squash'),
  status_context: z.string().min(1).default('merge-gate'),
  checks: z
    .object({
      max_wait_minutes: z.number().min(0).max(360).default(30),
      poll_interval_seconds: z.number().min(1).default(30),
      ignore: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  duplicates: z
    .object({
      lookback_hours: z.number().positive().default(2),
      grace_minutes: z.number().min(0).default(5),
    })
    .default({}),
  mergeability: z
    .object({
      probe_attempts: z.number().int().min(1).max(10).default(3),
      probe_delay_seconds: z.number().min(0).default(5),
      local_simulation: z.boolean().default(true),
    })
    .default({}),
  branch_update: z
    .object({
      enabled: z.boolean().default(true),
      bot_name: z.string().default('merge-gate[bot]'),
      bot_email: z.string().default('merge-gate[bot]@users.noreply.github.com'),
    })
    .default({}),
  opt_in: z
    .object({
      required: z.boolean().default(true),
      label: z.string().default('auto-merge'),
    })
    .default({}),
  api: z
    .object({
      retries: z.number().int().min(0).max(10).default(3),
      backoff_ms: z.number().int().min(0).default(1000),
    })
    .default({}),
});

export type GateConfig = z.infer<typeof GateConfigSchema>;

export interface ActionInputs {
  githubToken: string;
  configPath: string;
  prNumber: number | null;
}

export function parseConfig(content: string): GateConfig {
  const raw: unknown = content.trim() === '' ? {} : parseYaml(content);
  const result = GateConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid merge-gate config: ${problems}`);
  }
  return result.data;
}

export function defaultConfig(): GateConfig {
  return GateConfigSchema.parse({});
}

export function readInputs(): ActionInputs {
  const prInput = core.getInput('pr_number');
  const prNumber = prInput === '' ? null : Number.parseInt(prInput, 10);
  if (prNumber !== null && (Number.isNaN(prNumber) || prNumber <= 0)) {
    throw new Error(`Invalid pr_number input: ${prInput}`);
  }

  return {
    githubToken: core.getInput('github_token', { required: true }),
    configPath: core.getInput('config_path') || DEFAULT_CONFIG_PATH,
    prNumber,
  };
}

export async function loadConfig(configPath: string): Promise<GateConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      core.info(`No config at ${configPath}, using defaults`);
      return defaultConfig();
    }
    throw error;
  }
  return parseConfig(content);
}
