export type ReviewDecision = 'approved' | 'changes-requested' | 'commented' | 'dismissed';

export interface ReviewEvent {
  reviewer: string;
  decision: ReviewDecision;
  submittedAt: string;
}

export interface LabelEvent {
  label: string;
  createdAt: string;
}

export type PullRequestState = 'open' | 'closed' | 'merged';

export interface PullRequest {
  number: number;
  title: string;
  html_url: string;
  author: string;
  state: PullRequestState;
  draft: boolean;
  createdAt: string;
  updatedAt: string;
  closedAt: string | null;
  labels: string[];
  reviews: ReviewEvent[];
  /** Latest of author/committer date per commit, in API order. */
  commits: string[];
  labelEvents: LabelEvent[];
}

/**
 * Listing entry for a pull request. `updatedAt` is the live timestamp the
 * cache is checked against.
 */
export interface PullRequestSummary {
  number: number;
  updatedAt: string;
}

// Precedence order; the report renders sections in this order too.
export const CATEGORIES = [
  'needs-champion',
  'needs-backport',
  'needs-work',
  'needs-decision',
  'unreviewed',
  'updated-since-review',
  'approved-other',
] as const;

export type Category = (typeof CATEGORIES)[number];

export interface LabelsConfig {
  needsWork: string;
  needsDecision: string;
  needsChampion: string;
  needsBackport: string;
}

export const DEFAULT_LABELS: LabelsConfig = {
  needsWork: 'needs-work',
  needsDecision: 'needs-decision',
  needsChampion: 'needs-champion',
  needsBackport: 'needs-backport',
};

export interface ClassifiedPullRequest {
  pullRequest: PullRequest;
  category: Category;
}

export type CategorizedPRs = Record<Category, ClassifiedPullRequest[]>;

export interface UnavailablePullRequest {
  number: number;
  reason: string;
}

export interface TriageResult {
  project: string;
  generatedAt: string;
  classified: ClassifiedPullRequest[];
  unavailable: UnavailablePullRequest[];
}

export interface CacheEntry {
  lastKnownUpdated: string;
  pullRequest: PullRequest;
}

export interface Env {
  GITHUB_TOKEN?: string;
  GITHUB_OWNER?: string;
  GITHUB_REPO?: string;
  LOG_LEVEL?: string;
}
