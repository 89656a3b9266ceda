import { pino } from 'pino';

import type { PullRequest, ReviewEvent } from '../../types/index.js';

export const silentLogger = pino({ level: 'silent' });

export const DAY_0 = '2024-03-01T00:00:00Z';
export const DAY_1 = '2024-03-02T00:00:00Z';
export const DAY_2 = '2024-03-03T00:00:00Z';
export const DAY_3 = '2024-03-04T00:00:00Z';

export function makePullRequest(overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    number: 1,
    title: 'Fix integer overflow in parser',
    html_url: 'https://github.com/example/project/pull/1',
    author: 'alice',
    state: 'open',
    draft: false,
    createdAt: DAY_0,
    updatedAt: DAY_0,
    closedAt: null,
    labels: [],
    reviews: [],
    commits: [DAY_0],
    labelEvents: [],
    ...overrides,
  };
}

export function review(
  reviewer: string,
  decision: ReviewEvent['decision'],
  submittedAt: string
): ReviewEvent {
  return { reviewer, decision, submittedAt };
}
