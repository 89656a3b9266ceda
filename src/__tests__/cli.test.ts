import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough, Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createProgram, EXIT_CONFIG_ERROR, EXIT_FETCH_FAILED, EXIT_OK, main, readTokenFromStdin } from '../cli.js';
import { ConfigError, FetchError } from '../errors.js';
import type { PullRequestSource } from '../services/github.js';
import { makePullRequest, silentLogger } from '../services/__tests__/fixtures.js';

function captureStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

function createSource(): PullRequestSource {
  const pr = makePullRequest({ number: 3, title: 'Add a faster sort' });
  return {
    listPullRequests: vi.fn(async () => [{ number: 3, updatedAt: pr.updatedAt }]),
    getPullRequest: vi.fn(async () => pr),
  };
}

describe('createProgram', () => {
  it('parses label overrides and numeric options', () => {
    const program = createProgram().exitOverride();
    program.parse(
      ['--project', 'scipy/scipy', '--label-needs-decision', 'needs-decision-by-steering', '--concurrency', '8'],
      { from: 'user' }
    );

    expect(program.opts()).toEqual({
      project: 'scipy/scipy',
      labelNeedsDecision: 'needs-decision-by-steering',
      concurrency: 8,
    });
  });
});

describe('readTokenFromStdin', () => {
  it('reads and trims one line', async () => {
    const input = new PassThrough();
    const output = captureStream();
    input.end('  test-token  \n');

    await expect(readTokenFromStdin(input, output.stream)).resolves.toBe('test-token');
    expect(output.text()).toContain('Access token: ');
  });

  it('rejects when input ends before a line arrives', async () => {
    const input = new PassThrough();
    input.end();

    await expect(readTokenFromStdin(input, captureStream().stream)).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a blank line', async () => {
    const input = new PassThrough();
    input.end('   \n');

    await expect(readTokenFromStdin(input, captureStream().stream)).rejects.toThrow(
      'no access token was read from standard input'
    );
  });
});

describe('main', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'pr-triage-cli-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes the report to stdout and saves the cache', async () => {
    const stdout = captureStream();
    const cacheFile = join(directory, 'cache.json');

    const code = await main(['--project', 'example/project', '--cache-file', cacheFile], {
      env: {},
      stdout: stdout.stream,
      logger: silentLogger,
      createSource,
      now: () => new Date('2024-03-05T00:00:00Z'),
    });

    expect(code).toBe(EXIT_OK);
    expect(stdout.text()).toContain('  <h2>Unreviewed (1)</h2>');
    expect(stdout.text()).toContain('#3</a>: Add a faster sort');
    const saved = JSON.parse(await readFile(cacheFile, 'utf8'));
    expect(Object.keys(saved.projects['example/project'])).toEqual(['3']);
  });

  it('passes the token read from stdin to the source', async () => {
    const createSourceSpy = vi.fn((_config: unknown, _token: string | undefined) => createSource());

    const code = await main(['--project', 'example/project', '--auth', '--cache-file', join(directory, 'c.json')], {
      env: { GITHUB_TOKEN: 'ignored-token' },
      stdout: captureStream().stream,
      logger: silentLogger,
      readToken: async () => 'test-token',
      createSource: createSourceSpy,
    });

    expect(code).toBe(EXIT_OK);
    expect(createSourceSpy.mock.calls[0]?.[1]).toBe('test-token');
  });

  it('exits with the config error code when the project is missing', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const listPullRequests = vi.fn();

    const code = await main([], {
      env: {},
      logger: silentLogger,
      createSource: () => ({ listPullRequests, getPullRequest: vi.fn() }),
    });

    expect(code).toBe(EXIT_CONFIG_ERROR);
    expect(listPullRequests).not.toHaveBeenCalled();
    stderr.mockRestore();
  });

  it('exits with the fetch error code when the listing fails', async () => {
    const stdout = captureStream();

    const code = await main(['--project', 'example/project', '--cache-file', join(directory, 'c.json')], {
      env: {},
      stdout: stdout.stream,
      logger: silentLogger,
      createSource: () => ({
        listPullRequests: vi.fn(async () => {
          throw new FetchError('auth', 'Authentication rejected fetching example/project (401)', {
            project: 'example/project',
            status: 401,
          });
        }),
        getPullRequest: vi.fn(),
      }),
    });

    expect(code).toBe(EXIT_FETCH_FAILED);
    expect(stdout.text()).toBe('');
  });
});
