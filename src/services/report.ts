import {
  CATEGORIES,
  DEFAULT_LABELS,
  type Category,
  type ClassifiedPullRequest,
  type LabelsConfig,
  type TriageResult,
  type UnavailablePullRequest,
} from '../types/index.js';
import { commitsSinceLabeled, groupByCategory } from './categorization.js';

interface SectionInfo {
  title: string;
  description: string;
}

const SECTIONS: Record<Category, SectionInfo> = {
  'needs-champion': {
    title: 'Needs champion',
    description: 'Closed without merging, or waiting for someone to take them over.',
  },
  'needs-backport': {
    title: 'Needs backport',
    description: 'Labeled for backporting to a maintenance branch.',
  },
  'needs-work': {
    title: 'Needs work',
    description: 'Drafts, PRs labeled as needing work, and PRs with outstanding change requests.',
  },
  'needs-decision': {
    title: 'Needs decision',
    description: 'Waiting for a maintainer decision.',
  },
  unreviewed: {
    title: 'Unreviewed',
    description: 'No reviews yet.',
  },
  'updated-since-review': {
    title: 'Updated since review',
    description: 'New commits were pushed after the latest review.',
  },
  'approved-other': {
    title: 'Approved / other',
    description: 'Reviewed, with nothing outstanding.',
  },
};

export interface RenderOptions {
  labels?: LabelsConfig;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function getTimeAgo(dateString: string, now: Date): string {
  const date = new Date(dateString);
  const diffMs = now.getTime() - date.getTime();
  const diffHours = Math.floor(diffMs / (1000 * 60 * 60));
  const diffDays = Math.floor(diffHours / 24);

  if (diffDays > 0) {
    return `${diffDays}d ago`;
  }
  if (diffHours > 0) {
    return `${diffHours}h ago`;
  }
  return 'just now';
}

function formatPRItem(entry: ClassifiedPullRequest, now: Date, labels: LabelsConfig): string {
  const pr = entry.pullRequest;
  const markers: string[] = [];
  if (pr.draft) {
    markers.push('draft');
  }
  if (pr.state !== 'open') {
    markers.push(pr.state);
  }
  if (entry.category === 'needs-work' && commitsSinceLabeled(pr, labels.needsWork)) {
    markers.push('new commits since labeled');
  }
  const markerText = markers.length > 0 ? ` <em>(${escapeHtml(markers.join(', '))})</em>` : '';

  return (
    `    <li><a href="${escapeHtml(pr.html_url)}">#${pr.number}</a>: ${escapeHtml(pr.title)}` +
    ` <small>by ${escapeHtml(pr.author)} &bull; updated ${getTimeAgo(pr.updatedAt, now)}</small>${markerText}</li>`
  );
}

function createSection(
  category: Category,
  entries: ClassifiedPullRequest[],
  now: Date,
  labels: LabelsConfig
): string[] {
  const { title, description } = SECTIONS[category];
  const items =
    entries.length > 0
      ? entries.map(entry => formatPRItem(entry, now, labels))
      : ['    <li>No pull requests.</li>'];

  return [
    `  <section id="${category}">`,
    `  <h2>${escapeHtml(title)} (${entries.length})</h2>`,
    `  <p>${escapeHtml(description)}</p>`,
    '  <ul>',
    ...items,
    '  </ul>',
    '  </section>',
  ];
}

function createUnavailableSection(unavailable: UnavailablePullRequest[]): string[] {
  if (unavailable.length === 0) {
    return [];
  }
  const sorted = [...unavailable].sort((a, b) => a.number - b.number);
  return [
    '  <section id="unavailable">',
    `  <h2>Classification unavailable (${unavailable.length})</h2>`,
    '  <ul>',
    ...sorted.map(entry => `    <li>#${entry.number}: ${escapeHtml(entry.reason)}</li>`),
    '  </ul>',
    '  </section>',
  ];
}

export function renderReport(result: TriageResult, options: RenderOptions = {}): string {
  const labels = options.labels ?? DEFAULT_LABELS;
  const now = new Date(result.generatedAt);
  const grouped = groupByCategory(result.classified);
  const project = escapeHtml(result.project);
  const total = result.classified.length + result.unavailable.length;

  const lines = [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '  <meta charset="utf-8">',
    `  <title>${project} pull request triage</title>`,
    '</head>',
    '<body>',
    `  <h1>Project <a href="https://github.com/${project}/pulls">${project}</a></h1>`,
    `  <p>${total} pull requests, generated ${escapeHtml(result.generatedAt)}</p>`,
    ...CATEGORIES.flatMap(category => createSection(category, grouped[category], now, labels)),
    ...createUnavailableSection(result.unavailable),
    '</body>',
    '</html>',
  ];

  return `${lines.join('\n')}\n`;
}
