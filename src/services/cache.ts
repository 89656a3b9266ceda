import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { gunzipSync, gzipSync } from 'node:zlib';
import { z } from 'zod';

import { CacheCorruptError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CacheEntry, PullRequest } from '../types/index.js';

export const DEFAULT_CACHE_FILE = '.pr-triage-cache.json.gz';

const CACHE_FILE_VERSION = 1;

// =============================================================================
// FILE FORMAT
// =============================================================================

const pullRequestSchema: z.ZodType<PullRequest> = z.object({
  number: z.number().int(),
  title: z.string(),
  html_url: z.string(),
  author: z.string(),
  state: z.enum(['open', 'closed', 'merged']),
  draft: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
  closedAt: z.string().nullable(),
  labels: z.array(z.string()),
  reviews: z.array(
    z.object({
      reviewer: z.string(),
      decision: z.enum(['approved', 'changes-requested', 'commented', 'dismissed']),
      submittedAt: z.string(),
    })
  ),
  commits: z.array(z.string()),
  labelEvents: z.array(z.object({ label: z.string(), createdAt: z.string() })),
});

const cacheFileSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  projects: z.record(
    z.string(),
    z.record(
      z.string().regex(/^\d+$/),
      z.object({
        last_known_updated: z.string(),
        pr_snapshot: pullRequestSchema,
      })
    )
  ),
});

export type CacheFile = z.infer<typeof cacheFileSchema>;

// =============================================================================
// STORE
// =============================================================================

/**
 * In-memory cache of assembled pull requests keyed by project and number.
 *
 * Methods are synchronous, so concurrent assemblies interleave only between
 * calls and every `put` lands whole.
 */
export class CacheStore {
  private readonly projects = new Map<string, Map<number, CacheEntry>>();
  private dirty = false;

  public get(project: string, prNumber: number): CacheEntry | undefined {
    return this.projects.get(project)?.get(prNumber);
  }

  public put(project: string, prNumber: number, entry: CacheEntry): void {
    let entries = this.projects.get(project);
    if (!entries) {
      entries = new Map();
      this.projects.set(project, entries);
    }
    entries.set(prNumber, entry);
    this.dirty = true;
  }

  public isFresh(entry: CacheEntry, liveUpdatedAt: string): boolean {
    return entry.lastKnownUpdated === liveUpdatedAt;
  }

  /**
   * Drops closed or merged pull requests that were closed before `cutoff`.
   *
   * @returns Number of entries removed.
   */
  public evictClosedBefore(cutoff: Date): number {
    let removed = 0;
    for (const entries of this.projects.values()) {
      for (const [prNumber, entry] of entries) {
        const { state, closedAt } = entry.pullRequest;
        if (state !== 'open' && closedAt !== null && Date.parse(closedAt) < cutoff.getTime()) {
          entries.delete(prNumber);
          removed += 1;
        }
      }
    }
    if (removed > 0) {
      this.dirty = true;
    }
    return removed;
  }

  public get size(): number {
    let total = 0;
    for (const entries of this.projects.values()) {
      total += entries.size;
    }
    return total;
  }

  public get isDirty(): boolean {
    return this.dirty;
  }

  public markClean(): void {
    this.dirty = false;
  }

  public toFile(): CacheFile {
    const projects: CacheFile['projects'] = {};
    for (const [project, entries] of this.projects) {
      const serialized: CacheFile['projects'][string] = {};
      for (const [prNumber, entry] of entries) {
        serialized[String(prNumber)] = {
          last_known_updated: entry.lastKnownUpdated,
          pr_snapshot: entry.pullRequest,
        };
      }
      projects[project] = serialized;
    }
    return { version: CACHE_FILE_VERSION, projects };
  }

  public static fromFile(file: CacheFile): CacheStore {
    const store = new CacheStore();
    for (const [project, entries] of Object.entries(file.projects)) {
      for (const [prNumber, entry] of Object.entries(entries)) {
        store.put(project, Number(prNumber), {
          lastKnownUpdated: entry.last_known_updated,
          pullRequest: entry.pr_snapshot,
        });
      }
    }
    store.markClean();
    return store;
  }
}

// =============================================================================
// PERSISTENCE
// =============================================================================

function isGzipPath(filePath: string): boolean {
  return filePath.endsWith('.gz');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parseCacheFile(raw: Buffer, filePath: string): CacheStore {
  try {
    const text = (isGzipPath(filePath) ? gunzipSync(raw) : raw).toString('utf8');
    const parsed = cacheFileSchema.parse(JSON.parse(text));
    return CacheStore.fromFile(parsed);
  } catch (error) {
    throw new CacheCorruptError(filePath, error);
  }
}

/**
 * Loads the cache file. A missing or corrupt file yields an empty store.
 */
export async function loadCacheStore(filePath: string, logger: Logger): Promise<CacheStore> {
  let raw: Buffer;
  try {
    raw = await readFile(filePath);
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug({ cacheFile: filePath }, 'No cache file, starting empty');
    } else {
      logger.warn({ err: new CacheCorruptError(filePath, error) }, 'Cache file unreadable, starting empty');
    }
    return new CacheStore();
  }

  try {
    const store = parseCacheFile(raw, filePath);
    logger.info({ cacheFile: filePath, entries: store.size }, 'Using cache file (remove it for fresh data)');
    return store;
  } catch (error) {
    logger.warn({ err: error }, 'Discarding corrupt cache file');
    return new CacheStore();
  }
}

/**
 * Writes the store to `filePath` through a temp file and rename. Does nothing
 * when the store is clean. Failures are logged, not thrown.
 *
 * @returns `true` when the file is up to date afterwards.
 */
export async function saveCacheStore(
  store: CacheStore,
  filePath: string,
  logger: Logger
): Promise<boolean> {
  if (!store.isDirty) {
    return true;
  }

  const directory = dirname(filePath);
  const tempPath = join(directory, `${basename(filePath)}.new-${randomBytes(6).toString('hex')}`);
  const json = Buffer.from(JSON.stringify(store.toFile()), 'utf8');

  try {
    await mkdir(directory, { recursive: true });
    await writeFile(tempPath, isGzipPath(filePath) ? gzipSync(json) : json);
    await rename(tempPath, filePath);
    store.markClean();
    logger.debug({ cacheFile: filePath, entries: store.size }, 'Saved cache file');
    return true;
  } catch (error) {
    logger.error({ err: error, cacheFile: filePath }, 'Failed to write cache file');
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug({ err: cleanupError, tempPath }, 'Could not remove temp cache file');
    });
    return false;
  }
}
