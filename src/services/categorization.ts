// =============================================================================
// CATEGORIZATION - Pure functions for PR categorization
// =============================================================================

import {
  CATEGORIES,
  type Category,
  type CategorizedPRs,
  type ClassifiedPullRequest,
  type LabelsConfig,
  type PullRequest,
  type ReviewEvent,
} from '../types/index.js';

function toTime(timestamp: string): number {
  return Date.parse(timestamp);
}

function hasLabel(pr: PullRequest, label: string): boolean {
  return pr.labels.includes(label);
}

function activeReviews(pr: PullRequest): ReviewEvent[] {
  return pr.reviews.filter(review => review.decision !== 'dismissed');
}

/**
 * Latest commit time, falling back to the PR's creation time when no commits
 * were fetched.
 */
export function latestCommitTime(pr: PullRequest): number {
  if (pr.commits.length === 0) {
    return toTime(pr.createdAt);
  }
  return Math.max(...pr.commits.map(toTime));
}

/**
 * Reviewers whose most recent approve/request-changes verdict is a change
 * request. Comments do not clear a change request; dismissed reviews are
 * ignored. On equal timestamps the later review in the sequence wins.
 */
export function reviewersRequestingChanges(reviews: ReviewEvent[]): string[] {
  const latest = new Map<string, ReviewEvent>();

  for (const review of reviews) {
    if (review.decision !== 'approved' && review.decision !== 'changes-requested') {
      continue;
    }
    const previous = latest.get(review.reviewer);
    if (!previous || toTime(review.submittedAt) >= toTime(previous.submittedAt)) {
      latest.set(review.reviewer, review);
    }
  }

  return [...latest.values()]
    .filter(review => review.decision === 'changes-requested')
    .map(review => review.reviewer);
}

// =============================================================================
// CATEGORY PREDICATES
// Each predicate answers: "Does this PR belong in category X?"
// They are evaluated in CATEGORIES order; the first match wins.
// =============================================================================

/**
 * Needs Champion
 * - PR is NOT labeled needs-backport
 * - PR was closed without merging, or carries the needs-champion label
 */
export function belongsToNeedsChampion(pr: PullRequest, labels: LabelsConfig): boolean {
  if (hasLabel(pr, labels.needsBackport)) {
    return false;
  }
  const closedUnmerged = pr.state === 'closed';
  return closedUnmerged || hasLabel(pr, labels.needsChampion);
}

/**
 * Needs Backport
 * - PR is labeled needs-backport, whatever its lifecycle state
 */
export function belongsToNeedsBackport(pr: PullRequest, labels: LabelsConfig): boolean {
  return hasLabel(pr, labels.needsBackport);
}

/**
 * Needs Work
 * - PR is a draft, OR
 * - PR is labeled needs-work, OR
 * - some reviewer's latest verdict is a change request
 */
export function belongsToNeedsWork(pr: PullRequest, labels: LabelsConfig): boolean {
  if (pr.draft || hasLabel(pr, labels.needsWork)) {
    return true;
  }
  return reviewersRequestingChanges(activeReviews(pr)).length > 0;
}

export function belongsToNeedsDecision(pr: PullRequest, labels: LabelsConfig): boolean {
  return hasLabel(pr, labels.needsDecision);
}

export function belongsToUnreviewed(pr: PullRequest): boolean {
  return activeReviews(pr).length === 0;
}

/**
 * Updated Since Review
 * - PR has at least one review
 * - a commit landed strictly after the latest review
 */
export function belongsToUpdatedSinceReview(pr: PullRequest): boolean {
  const reviews = activeReviews(pr);
  if (reviews.length === 0) {
    return false;
  }
  const latestReview = Math.max(...reviews.map(review => toTime(review.submittedAt)));
  return latestCommitTime(pr) > latestReview;
}

/**
 * Whether commits were pushed after the PR last received `label`.
 */
export function commitsSinceLabeled(pr: PullRequest, label: string): boolean {
  const labelings = pr.labelEvents.filter(event => event.label === label);
  if (labelings.length === 0) {
    return false;
  }
  const lastLabeled = Math.max(...labelings.map(event => toTime(event.createdAt)));
  return pr.commits.some(commit => toTime(commit) > lastLabeled);
}

// =============================================================================
// MAIN CATEGORIZATION
// =============================================================================

export function classify(pr: PullRequest, labels: LabelsConfig): Category {
  if (belongsToNeedsChampion(pr, labels)) {
    return 'needs-champion';
  }
  if (belongsToNeedsBackport(pr, labels)) {
    return 'needs-backport';
  }
  if (belongsToNeedsWork(pr, labels)) {
    return 'needs-work';
  }
  if (belongsToNeedsDecision(pr, labels)) {
    return 'needs-decision';
  }
  if (belongsToUnreviewed(pr)) {
    return 'unreviewed';
  }
  if (belongsToUpdatedSinceReview(pr)) {
    return 'updated-since-review';
  }
  return 'approved-other';
}

export function groupByCategory(classified: ClassifiedPullRequest[]): CategorizedPRs {
  const result: CategorizedPRs = {
    'needs-champion': [],
    'needs-backport': [],
    'needs-work': [],
    'needs-decision': [],
    unreviewed: [],
    'updated-since-review': [],
    'approved-other': [],
  };

  for (const entry of classified) {
    result[entry.category].push(entry);
  }
  for (const category of CATEGORIES) {
    result[category].sort((a, b) => a.pullRequest.number - b.pullRequest.number);
  }

  return result;
}
