import { describe, expect, it } from 'vitest';

import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('applies defaults around the required project', () => {
    const config = loadConfig({ project: 'scipy/scipy' }, {});

    expect(config).toEqual({
      project: 'scipy/scipy',
      promptForToken: false,
      token: undefined,
      labels: {
        needsWork: 'needs-work',
        needsDecision: 'needs-decision',
        needsChampion: 'needs-champion',
        needsBackport: 'needs-backport',
      },
      cacheFile: '.pr-triage-cache.json.gz',
      concurrency: 4,
      timeoutMs: 30000,
      recentlyClosedDays: 30,
      evictClosedAfterDays: undefined,
      logLevel: 'info',
    });
  });

  it('takes label overrides from the command line', () => {
    const config = loadConfig(
      { project: 'scipy/scipy', labelNeedsWork: 'waiting-on-author', labelNeedsBackport: 'backport-candidate' },
      {}
    );

    expect(config.labels.needsWork).toBe('waiting-on-author');
    expect(config.labels.needsBackport).toBe('backport-candidate');
    expect(config.labels.needsDecision).toBe('needs-decision');
  });

  it('falls back to GITHUB_OWNER and GITHUB_REPO', () => {
    const config = loadConfig({}, { GITHUB_OWNER: 'numpy', GITHUB_REPO: 'numpy' });
    expect(config.project).toBe('numpy/numpy');
  });

  it('uses GITHUB_TOKEN unless --auth is given', () => {
    expect(loadConfig({ project: 'a/b' }, { GITHUB_TOKEN: 'test-token' }).token).toBe('test-token');

    const prompted = loadConfig({ project: 'a/b', auth: true }, { GITHUB_TOKEN: 'test-token' });
    expect(prompted.token).toBeUndefined();
    expect(prompted.promptForToken).toBe(true);
  });

  it('rejects a missing project', () => {
    expect(() => loadConfig({}, {})).toThrow(ConfigError);
  });

  it('lists every invalid field', () => {
    try {
      loadConfig({ project: 'not-a-project', concurrency: 0, labelNeedsWork: ' ' }, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.issues).toEqual([
        'project: must look like owner/repo',
        'labels.needsWork: label name must not be empty',
        'concurrency: Number must be greater than or equal to 1',
      ]);
    }
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ project: 'a/b', logLevel: 'verbose' }, {})).toThrow(/logLevel/);
  });
});
