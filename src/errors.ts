export type FetchErrorKind = 'auth' | 'rate-limit' | 'not-found' | 'timeout' | 'http' | 'network';

export interface FetchErrorContext {
  project: string;
  prNumber?: number;
  status?: number;
  cause?: unknown;
}

/**
 * A failed call to the GitHub API, for the listing (no `prNumber`) or for one
 * pull request.
 */
export class FetchError extends Error {
  public readonly kind: FetchErrorKind;
  public readonly project: string;
  public readonly prNumber: number | undefined;
  public readonly status: number | undefined;

  public constructor(kind: FetchErrorKind, message: string, context: FetchErrorContext) {
    super(message, { cause: context.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.project = context.project;
    this.prNumber = context.prNumber;
    this.status = context.status;
  }
}

/**
 * The cache file exists but could not be read back as a cache.
 */
export class CacheCorruptError extends Error {
  public readonly path: string;

  public constructor(path: string, cause: unknown) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(`Cache file ${path} is corrupt: ${details}`, { cause });
    this.name = 'CacheCorruptError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
