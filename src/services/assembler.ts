import type { Logger } from '../logger.js';
import type { PullRequest, PullRequestSummary } from '../types/index.js';
import type { CacheStore } from './cache.js';
import type { PullRequestSource } from './github.js';

/**
 * Builds pull request snapshots, serving unchanged ones from the cache.
 */
export class PullRequestAssembler {
  public constructor(
    private readonly source: PullRequestSource,
    private readonly cache: CacheStore,
    private readonly logger: Logger
  ) {}

  /**
   * Returns the cached snapshot when its timestamp matches
   * `summary.updatedAt`, otherwise fetches and caches a fresh one.
   *
   * @throws {@link FetchError} when the detail fetch fails.
   */
  public async assemble(project: string, summary: PullRequestSummary): Promise<PullRequest> {
    const cached = this.cache.get(project, summary.number);
    if (cached && this.cache.isFresh(cached, summary.updatedAt)) {
      this.logger.debug({ pr: summary.number }, 'Cache hit');
      return cached.pullRequest;
    }

    this.logger.debug({ pr: summary.number, stale: cached !== undefined }, 'Fetching pull request');
    const pullRequest = await this.source.getPullRequest(project, summary.number);
    this.cache.put(project, summary.number, {
      lastKnownUpdated: pullRequest.updatedAt,
      pullRequest,
    });
    return pullRequest;
  }
}
