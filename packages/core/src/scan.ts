import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import {
  ConsoleLogger,
  UsageError,
  createEvent,
  getErrorCode,
  type Config,
  type Logger,
} from '@leakscan/shared';
import {
  IgnoreSet,
  LineScanner,
  RetryPolicy,
  ScanCoordinator,
  buildIgnoreRules,
  buildRuleSet,
  enumerateFiles,
  loadIgnoreRules,
  type FileScanner,
  type ScanReport,
  type Sleep,
} from '@leakscan/scanner';

export interface RunScanOptions {
  root: string;
  config: Config;
  logger?: Logger;
  runId?: string;
  /** Replaces the line scanner, e.g. to simulate filesystem failures */
  scanner?: FileScanner;
  /** Replaces the retry backoff timer */
  sleep?: Sleep;
}

async function assertDirectory(root: string): Promise<void> {
  try {
    const stat = await fs.stat(root);
    if (!stat.isDirectory()) {
      throw new UsageError(`Not a directory: ${root}`);
    }
  } catch (error) {
    if (error instanceof UsageError) throw error;
    if (getErrorCode(error) === 'ENOENT') {
      throw new UsageError(`Directory not found: ${root}`, { cause: error });
    }
    throw new UsageError(`Cannot access directory: ${root}`, { cause: error });
  }
}

/**
 * Runs one scan of `root`: loads the ignore source and rule set, enumerates
 * candidate files and scans them in batches.
 */
export async function runScan(options: RunScanOptions): Promise<ScanReport> {
  const { config } = options;
  const root = path.resolve(options.root);
  const runId = options.runId ?? randomUUID();
  const logger = options.logger ?? new ConsoleLogger();
  const startTime = Date.now();

  await assertDirectory(root);

  const sourceRules = await loadIgnoreRules(path.resolve(root, config.ignore.file));
  const ignoreRules = buildIgnoreRules({
    sourceRules,
    extraPatterns: config.ignore.patterns,
    outputBasename: config.output.basename,
  });
  const ignoreSet = new IgnoreSet(ignoreRules, { substringMatch: config.ignore.substringMatch });
  const rules = buildRuleSet(config.rules);

  await logger.log(
    createEvent(runId, {
      type: 'ScanStarted',
      payload: {
        root,
        ignoreRuleCount: ignoreRules.length,
        ruleCount: rules.length,
        concurrency: config.scan.concurrency,
      },
    }),
  );

  const enumerateStart = Date.now();
  const candidates = await enumerateFiles(root, ignoreSet, {
    skipBinaryExtensions: config.scan.skipBinaryExtensions,
    logger,
    runId,
  });
  await logger.log(
    createEvent(runId, {
      type: 'FilesEnumerated',
      payload: { fileCount: candidates.length, durationMs: Date.now() - enumerateStart },
    }),
  );

  const scanner =
    options.scanner ??
    new LineScanner({
      encoding: config.scan.encoding,
      previewLength: config.scan.previewLength,
    });
  const coordinator = new ScanCoordinator(scanner, {
    concurrency: config.scan.concurrency,
    retryPolicy: new RetryPolicy({
      maxAttempts: config.retry.maxAttempts,
      delayMs: config.retry.delayMs,
      sleep: options.sleep,
    }),
    onExhausted: config.retry.onExhausted,
    logger,
    runId,
  });
  const result = await coordinator.scan(candidates, rules);

  const durationMs = Date.now() - startTime;
  await logger.log(
    createEvent(runId, {
      type: 'ScanFinished',
      payload: {
        filesScanned: result.stats.filesScanned,
        filesSkipped: result.stats.filesSkipped,
        matchesFound: result.stats.matchesFound,
        retries: result.stats.retries,
        durationMs,
      },
    }),
  );

  return {
    runId,
    root,
    ignoreRules,
    matches: result.matches,
    outcomes: result.outcomes,
    skipped: result.skipped,
    stats: { ...result.stats, durationMs },
  };
}
