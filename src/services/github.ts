import { throttling } from '@octokit/plugin-throttling';
import { RequestError } from '@octokit/request-error';
import { Octokit } from '@octokit/rest';

import { FetchError } from '../errors.js';
import type { Logger } from '../logger.js';
import type {
  LabelEvent,
  PullRequest,
  PullRequestState,
  PullRequestSummary,
  ReviewDecision,
  ReviewEvent,
} from '../types/index.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RECENTLY_CLOSED_DAYS = 30;
export const DEFAULT_RATE_LIMIT_RETRIES = 2;
// GitHub's primary rate limit resets hourly
export const DEFAULT_MAX_RATE_LIMIT_WAIT_SECONDS = 60 * 60;

const RATE_LIMIT_WARNING_THRESHOLD = 10;

const ThrottledOctokit = Octokit.plugin(throttling);
type ThrottledOctokit = InstanceType<typeof ThrottledOctokit>;

/**
 * Network collaborator consumed by the assembler and the triage handler.
 */
export interface PullRequestSource {
  listPullRequests(project: string): Promise<PullRequestSummary[]>;
  getPullRequest(project: string, prNumber: number): Promise<PullRequest>;
}

export interface GitHubSourceOptions {
  token?: string;
  logger: Logger;
  timeoutMs?: number;
  recentlyClosedDays?: number;
  /** Closed PRs carrying this label are listed even when merged. */
  backportLabel: string;
  /** Retries per request after hitting a rate limit. */
  rateLimitRetries?: number;
  /** Longer waits for a rate-limit reset fail the request instead. */
  maxRateLimitWaitSeconds?: number;
  now?: () => Date;
  /** Replaces the global fetch, used by tests. */
  fetch?: typeof globalThis.fetch;
}

// =============================================================================
// HELPERS
// =============================================================================

export function parseProject(project: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = project.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Project must look like owner/repo, got "${project}"`);
  }
  return { owner, repo };
}

const REVIEW_DECISIONS: Record<string, ReviewDecision> = {
  APPROVED: 'approved',
  CHANGES_REQUESTED: 'changes-requested',
  COMMENTED: 'commented',
  DISMISSED: 'dismissed',
};

interface RawReview {
  user: { login: string } | null;
  state: string;
  submitted_at?: string;
}

/**
 * Maps a GitHub review to a review event. Pending reviews have no
 * submission time and are skipped.
 */
export function toReviewEvent(review: RawReview): ReviewEvent | null {
  const decision = REVIEW_DECISIONS[review.state];
  if (!decision || !review.submitted_at) {
    return null;
  }
  return {
    reviewer: review.user?.login ?? 'unknown',
    decision,
    submittedAt: review.submitted_at,
  };
}

interface RawCommit {
  commit: {
    author: { date?: string } | null;
    committer: { date?: string } | null;
  };
}

/**
 * A rebased commit keeps its author date, so the later of author and
 * committer date is taken.
 */
export function commitTimestamp(commit: RawCommit): string | null {
  const dates = [commit.commit.author?.date, commit.commit.committer?.date].filter(
    (date): date is string => typeof date === 'string'
  );
  if (dates.length === 0) {
    return null;
  }
  return dates.reduce((latest, date) => (Date.parse(date) > Date.parse(latest) ? date : latest));
}

function toState(state: string, mergedAt: string | null): PullRequestState {
  if (mergedAt) {
    return 'merged';
  }
  return state === 'closed' ? 'closed' : 'open';
}

function labelNames(labels: Array<{ name?: string } | string>): string[] {
  return labels
    .map(label => (typeof label === 'string' ? label : label.name))
    .filter((name): name is string => typeof name === 'string' && name.length > 0);
}

/**
 * Gives every HTTP request, including each page and each rate-limit retry,
 * its own timeout.
 */
export function withTimeout(fetchImpl: typeof globalThis.fetch, timeoutMs: number): typeof globalThis.fetch {
  return (input, init) => fetchImpl(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
}

/**
 * Keeps only the most recently updated entry for each pull request number.
 */
export function dedupeSummaries(summaries: PullRequestSummary[]): PullRequestSummary[] {
  const byNumber = new Map<number, PullRequestSummary>();
  for (const summary of summaries) {
    const existing = byNumber.get(summary.number);
    if (!existing || Date.parse(summary.updatedAt) > Date.parse(existing.updatedAt)) {
      byNumber.set(summary.number, summary);
    }
  }
  return [...byNumber.values()];
}

function headerValue(value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Translates anything thrown by Octokit into a {@link FetchError}.
 */
export function toFetchError(
  error: unknown,
  context: { project: string; prNumber?: number }
): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  const target = context.prNumber === undefined ? context.project : `${context.project}#${context.prNumber}`;
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new FetchError('timeout', `Request for ${target} timed out`, { ...context, cause: error });
  }

  if (error instanceof RequestError) {
    const status = error.status;
    const remaining = headerValue(error.response?.headers['x-ratelimit-remaining']);
    const withStatus = { ...context, status, cause: error };

    if (status === 429 || (status === 403 && remaining === 0)) {
      return new FetchError('rate-limit', `Rate limit exceeded fetching ${target}`, withStatus);
    }
    if (status === 401 || status === 403) {
      return new FetchError('auth', `Authentication rejected fetching ${target} (${status})`, withStatus);
    }
    if (status === 404) {
      return new FetchError('not-found', `${target} not found`, withStatus);
    }
    // @octokit/request reports an aborted fetch as a 500 carrying the abort message
    if (/abort|timeout/i.test(details)) {
      return new FetchError('timeout', `Request for ${target} timed out`, withStatus);
    }
    return new FetchError('http', `GitHub API request failed for ${target} (${status}): ${details}`, withStatus);
  }

  return new FetchError('network', `Could not reach GitHub for ${target}: ${details}`, {
    ...context,
    cause: error,
  });
}

// =============================================================================
// GITHUB CLIENT
// =============================================================================

export class GitHubSource implements PullRequestSource {
  private readonly client: ThrottledOctokit;
  private readonly logger: Logger;
  private readonly rateLimitRetries: number;
  private readonly maxRateLimitWaitSeconds: number;
  private readonly recentlyClosedDays: number;
  private readonly backportLabel: string;
  private readonly now: () => Date;

  public constructor(options: GitHubSourceOptions) {
    this.logger = options.logger;
    this.rateLimitRetries = options.rateLimitRetries ?? DEFAULT_RATE_LIMIT_RETRIES;
    this.maxRateLimitWaitSeconds = options.maxRateLimitWaitSeconds ?? DEFAULT_MAX_RATE_LIMIT_WAIT_SECONDS;
    this.recentlyClosedDays = options.recentlyClosedDays ?? DEFAULT_RECENTLY_CLOSED_DAYS;
    this.backportLabel = options.backportLabel;
    this.now = options.now ?? (() => new Date());
    this.client = new ThrottledOctokit({
      auth: options.token,
      userAgent: 'pr-triage',
      request: {
        fetch: withTimeout(options.fetch ?? globalThis.fetch, options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      },
      throttle: {
        onRateLimit: (retryAfter, requestOptions, _octokit, retryCount) =>
          this.shouldRetry('primary', retryAfter, requestOptions, retryCount),
        onSecondaryRateLimit: (retryAfter, requestOptions, _octokit, retryCount) =>
          this.shouldRetry('secondary', retryAfter, requestOptions, retryCount),
      },
      log: {
        debug: () => {},
        info: () => {},
        warn: message => this.logger.warn(message),
        error: message => this.logger.error(message),
      },
    });

    this.client.hook.after('request', response => {
      const remaining = headerValue(response.headers['x-ratelimit-remaining']);
      if (remaining === undefined) {
        return;
      }
      this.logger.debug({ remaining, url: response.url }, 'GitHub rate limit');
      if (remaining < RATE_LIMIT_WARNING_THRESHOLD) {
        this.logger.warn(
          { remaining, reset: response.headers['x-ratelimit-reset'] },
          'GitHub rate limit nearly exhausted'
        );
      }
    });
  }

  private shouldRetry(
    limit: 'primary' | 'secondary',
    retryAfter: number,
    requestOptions: { method: string; url: string },
    retryCount: number
  ): boolean {
    const request = `${requestOptions.method} ${requestOptions.url}`;
    if (retryCount < this.rateLimitRetries && retryAfter <= this.maxRateLimitWaitSeconds) {
      this.logger.warn({ limit, request, retryAfter, retryCount }, 'GitHub rate limit exceeded, waiting to retry');
      return true;
    }
    this.logger.warn({ limit, request, retryAfter, retryCount }, 'GitHub rate limit exceeded, giving up');
    return false;
  }

  /**
   * Open PRs plus PRs closed inside the recently-closed window that are
   * either unmerged or still labeled for backport.
   */
  public async listPullRequests(project: string): Promise<PullRequestSummary[]> {
    const { owner, repo } = parseProject(project);
    const cutoff = this.now().getTime() - this.recentlyClosedDays * 24 * 60 * 60 * 1000;

    try {
      const open = await this.client.paginate(this.client.pulls.list, {
        owner,
        repo,
        state: 'open',
        per_page: 100,
      });

      const closed =
        this.recentlyClosedDays > 0
          ? await this.client.paginate(
              this.client.pulls.list,
              {
                owner,
                repo,
                state: 'closed',
                sort: 'updated',
                direction: 'desc',
                per_page: 100,
              },
              (response, done) => {
                const page = response.data;
                const last = page[page.length - 1];
                if (last && Date.parse(last.updated_at) < cutoff) {
                  done();
                }
                return page.filter(
                  pr =>
                    pr.closed_at !== null &&
                    Date.parse(pr.closed_at) >= cutoff &&
                    (pr.merged_at === null || labelNames(pr.labels).includes(this.backportLabel))
                );
              }
            )
          : [];

      // a PR closed between the two listings, or shifted across a page, shows up twice
      const summaries = dedupeSummaries(
        [...open, ...closed].map(pr => ({ number: pr.number, updatedAt: pr.updated_at }))
      );
      this.logger.info(
        { project, open: open.length, recentlyClosed: closed.length },
        'Listed pull requests'
      );
      return summaries;
    } catch (error) {
      throw toFetchError(error, { project });
    }
  }

  public async getPullRequest(project: string, prNumber: number): Promise<PullRequest> {
    const { owner, repo } = parseProject(project);
    const params = { owner, repo, pull_number: prNumber, per_page: 100 };

    try {
      const { data: pr } = await this.client.pulls.get({
        owner,
        repo,
        pull_number: prNumber,
      });

      const [reviews, commits, events] = await Promise.all([
        this.client.paginate(this.client.pulls.listReviews, params),
        this.client.paginate(this.client.pulls.listCommits, params),
        this.client.paginate(this.client.issues.listEvents, {
          owner,
          repo,
          issue_number: prNumber,
          per_page: 100,
        }),
      ]);

      const labelEvents: LabelEvent[] = [];
      for (const event of events) {
        if (event.event !== 'labeled' || !('label' in event) || !event.label) {
          continue;
        }
        const name = event.label.name;
        if (typeof name === 'string') {
          labelEvents.push({ label: name, createdAt: event.created_at });
        }
      }

      this.logger.debug(
        { project, pr: prNumber, reviews: reviews.length, commits: commits.length },
        'Fetched pull request detail'
      );

      return {
        number: pr.number,
        title: pr.title,
        html_url: pr.html_url,
        author: pr.user?.login ?? 'unknown',
        state: toState(pr.state, pr.merged_at),
        draft: pr.draft ?? false,
        createdAt: pr.created_at,
        updatedAt: pr.updated_at,
        closedAt: pr.closed_at,
        labels: labelNames(pr.labels),
        reviews: reviews.map(toReviewEvent).filter((review): review is ReviewEvent => review !== null),
        commits: commits.map(commitTimestamp).filter((timestamp): timestamp is string => timestamp !== null),
        labelEvents,
      };
    } catch (error) {
      throw toFetchError(error, { project, prNumber });
    }
  }
}
