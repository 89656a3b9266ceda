import { z } from 'zod';

import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { DEFAULT_CACHE_FILE } from './services/cache.js';
import { DEFAULT_RECENTLY_CLOSED_DAYS, DEFAULT_TIMEOUT_MS } from './services/github.js';
import { DEFAULT_CONCURRENCY } from './handlers/triage.js';
import { DEFAULT_LABELS, type Env, type LabelsConfig } from './types/index.js';

/**
 * Options as they arrive from the command line, before validation.
 */
export interface CliOptions {
  project?: string;
  auth?: boolean;
  labelNeedsWork?: string;
  labelNeedsDecision?: string;
  labelNeedsChampion?: string;
  labelNeedsBackport?: string;
  cacheFile?: string;
  concurrency?: number;
  timeout?: number;
  closedDays?: number;
  evictClosedDays?: number;
  logLevel?: string;
}

export interface AppConfig {
  project: string;
  /** Read the token from stdin instead of the environment. */
  promptForToken: boolean;
  token: string | undefined;
  labels: LabelsConfig;
  cacheFile: string;
  concurrency: number;
  timeoutMs: number;
  recentlyClosedDays: number;
  evictClosedAfterDays: number | undefined;
  logLevel: LogLevel;
}

const labelName = z.string().trim().min(1, 'label name must not be empty');

const configSchema = z.object({
  project: z
    .string({ required_error: 'is required (--project owner/repo, or GITHUB_OWNER and GITHUB_REPO)' })
    .regex(/^[\w.-]+\/[\w.-]+$/, 'must look like owner/repo'),
  promptForToken: z.boolean(),
  token: z.string().trim().min(1).optional(),
  labels: z.object({
    needsWork: labelName,
    needsDecision: labelName,
    needsChampion: labelName,
    needsBackport: labelName,
  }),
  cacheFile: z.string().min(1),
  concurrency: z.number().int().min(1).max(32),
  timeoutMs: z.number().int().positive(),
  recentlyClosedDays: z.number().int().min(0),
  evictClosedAfterDays: z.number().int().positive().optional(),
  logLevel: z.enum(LOG_LEVELS),
});

function projectFromEnv(env: Env): string | undefined {
  if (env.GITHUB_OWNER && env.GITHUB_REPO) {
    return `${env.GITHUB_OWNER}/${env.GITHUB_REPO}`;
  }
  return undefined;
}

/**
 * Merges command-line options with the environment and validates the result.
 *
 * @throws {@link ConfigError} listing every invalid field.
 */
export function loadConfig(options: CliOptions, env: Env = process.env): AppConfig {
  const result = configSchema.safeParse({
    project: options.project ?? projectFromEnv(env),
    promptForToken: options.auth ?? false,
    token: options.auth ? undefined : env.GITHUB_TOKEN || undefined,
    labels: {
      needsWork: options.labelNeedsWork ?? DEFAULT_LABELS.needsWork,
      needsDecision: options.labelNeedsDecision ?? DEFAULT_LABELS.needsDecision,
      needsChampion: options.labelNeedsChampion ?? DEFAULT_LABELS.needsChampion,
      needsBackport: options.labelNeedsBackport ?? DEFAULT_LABELS.needsBackport,
    },
    cacheFile: options.cacheFile ?? DEFAULT_CACHE_FILE,
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    timeoutMs: options.timeout ?? DEFAULT_TIMEOUT_MS,
    recentlyClosedDays: options.closedDays ?? DEFAULT_RECENTLY_CLOSED_DAYS,
    evictClosedAfterDays: options.evictClosedDays,
    logLevel: options.logLevel ?? env.LOG_LEVEL ?? 'info',
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  const config = result.data;
  return {
    ...config,
    token: config.token,
    evictClosedAfterDays: config.evictClosedAfterDays,
  };
}
