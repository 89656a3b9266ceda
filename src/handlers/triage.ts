import PQueue from 'p-queue';

import { FetchError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { PullRequestAssembler } from '../services/assembler.js';
import { classify } from '../services/categorization.js';
import type { PullRequestSource } from '../services/github.js';
import type {
  ClassifiedPullRequest,
  LabelsConfig,
  TriageResult,
  UnavailablePullRequest,
} from '../types/index.js';

export const DEFAULT_CONCURRENCY = 4;

export interface TriageOptions {
  project: string;
  source: PullRequestSource;
  assembler: PullRequestAssembler;
  labels: LabelsConfig;
  logger: Logger;
  concurrency?: number;
  now?: () => Date;
}

/**
 * Lists the project's pull requests and classifies each one.
 *
 * A listing failure rejects with {@link FetchError}. A failed fetch for a
 * single pull request lands in `unavailable` and the run carries on.
 */
export async function runTriage(options: TriageOptions): Promise<TriageResult> {
  const { project, source, assembler, labels } = options;
  const logger = options.logger.child({ project });
  const now = options.now ?? (() => new Date());

  const summaries = await source.listPullRequests(project);

  const classified: ClassifiedPullRequest[] = [];
  const unavailable: UnavailablePullRequest[] = [];
  const queue = new PQueue({ concurrency: options.concurrency ?? DEFAULT_CONCURRENCY });

  await Promise.all(
    summaries.map(summary =>
      queue.add(async () => {
        try {
          const pullRequest = await assembler.assemble(project, summary);
          classified.push({ pullRequest, category: classify(pullRequest, labels) });
        } catch (error) {
          if (!(error instanceof FetchError)) {
            throw error;
          }
          logger.warn({ pr: summary.number, kind: error.kind, err: error }, 'Pull request unavailable');
          unavailable.push({ number: summary.number, reason: error.message });
        }
      })
    )
  );

  logger.info(
    { classified: classified.length, unavailable: unavailable.length },
    'Triage complete'
  );

  return {
    project,
    generatedAt: now().toISOString(),
    classified,
    unavailable,
  };
}
