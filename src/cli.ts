#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { fileURLToPath } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';

import { loadConfig, type AppConfig, type CliOptions } from './config.js';
import { ConfigError, FetchError } from './errors.js';
import { runTriage } from './handlers/triage.js';
import { createLogger, type Logger } from './logger.js';
import { PullRequestAssembler } from './services/assembler.js';
import { loadCacheStore, saveCacheStore } from './services/cache.js';
import { GitHubSource, type PullRequestSource } from './services/github.js';
import { renderReport } from './services/report.js';

export const EXIT_OK = 0;
export const EXIT_FETCH_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function createProgram(): Command {
  return new Command()
    .name('pr-triage')
    .description('Classify a GitHub project\'s pull requests by review status and print an HTML report')
    .option('--project <owner/repo>', 'GitHub project to triage')
    .option('--auth', 'read a GitHub access token from standard input')
    .option('--label-needs-work <name>', 'label meaning "needs work"')
    .option('--label-needs-decision <name>', 'label meaning "needs decision"')
    .option('--label-needs-champion <name>', 'label meaning "needs champion"')
    .option('--label-needs-backport <name>', 'label meaning "needs backport"')
    .option('--cache-file <path>', 'cache file location (gzip when it ends in .gz)')
    .option('--concurrency <n>', 'pull requests fetched in parallel', parseInteger)
    .option('--timeout <ms>', 'timeout for each GitHub request', parseInteger)
    .option('--closed-days <n>', 'include PRs closed within this many days', parseInteger)
    .option('--evict-closed-days <n>', 'drop cached PRs closed more than this many days ago', parseInteger)
    .option('--log-level <level>', 'log level (fatal, error, warn, info, debug, trace, silent)');
}

export async function readTokenFromStdin(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Promise<string> {
  output.write(
    'Input a GitHub API access token.\n' +
      'Personal tokens can be created at https://github.com/settings/tokens\n' +
      'No permissions are required for public projects.\n'
  );
  output.write('Access token: ');

  // stdin may end before a line arrives
  const rl = createInterface({ input, terminal: false });
  let firstLine: string | undefined;
  try {
    for await (const line of rl) {
      firstLine = line;
      break;
    }
  } finally {
    rl.close();
  }

  const token = firstLine?.trim();
  if (!token) {
    throw new ConfigError(['token: no access token was read from standard input']);
  }
  return token;
}

export interface MainDependencies {
  env?: NodeJS.ProcessEnv;
  stdout?: NodeJS.WritableStream;
  logger?: Logger;
  readToken?: () => Promise<string>;
  createSource?: (config: AppConfig, token: string | undefined, logger: Logger) => PullRequestSource;
  now?: () => Date;
}

function defaultSource(config: AppConfig, token: string | undefined, logger: Logger): PullRequestSource {
  return new GitHubSource({
    token,
    logger,
    timeoutMs: config.timeoutMs,
    recentlyClosedDays: config.recentlyClosedDays,
    backportLabel: config.labels.needsBackport,
  });
}

/**
 * Runs one triage pass and writes the report.
 *
 * @returns Process exit code.
 */
export async function main(argv: string[], deps: MainDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? process.stdout;
  const now = deps.now ?? (() => new Date());

  let config: AppConfig;
  let logger: Logger;
  try {
    const program = createProgram().exitOverride();
    program.parse(argv, { from: 'user' });
    config = loadConfig(program.opts<CliOptions>(), env);
    logger = deps.logger ?? createLogger(config.logLevel);
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`);
      return EXIT_CONFIG_ERROR;
    }
    if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
      // commander already printed usage or the parse error
      return error.exitCode === 0 ? EXIT_OK : EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  let token = config.token;
  if (config.promptForToken) {
    try {
      token = await (deps.readToken ?? readTokenFromStdin)();
    } catch (error) {
      logger.error({ err: error }, 'Could not read access token');
      return EXIT_CONFIG_ERROR;
    }
  }

  const cache = await loadCacheStore(config.cacheFile, logger);
  const source = (deps.createSource ?? defaultSource)(config, token, logger);
  const assembler = new PullRequestAssembler(source, cache, logger.child({ project: config.project }));

  try {
    const result = await runTriage({
      project: config.project,
      source,
      assembler,
      labels: config.labels,
      logger,
      concurrency: config.concurrency,
      now,
    });
    stdout.write(renderReport(result, { labels: config.labels }));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof FetchError) {
      logger.error({ err: error, kind: error.kind }, 'Could not list pull requests');
      return EXIT_FETCH_FAILED;
    }
    throw error;
  } finally {
    if (config.evictClosedAfterDays !== undefined) {
      const cutoff = new Date(now().getTime() - config.evictClosedAfterDays * 24 * 60 * 60 * 1000);
      const removed = cache.evictClosedBefore(cutoff);
      logger.info({ removed }, 'Evicted closed pull requests from cache');
    }
    await saveCacheStore(cache, config.cacheFile, logger);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Unexpected error:', error);
      process.exitCode = 1;
    });
}
