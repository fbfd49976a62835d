import { randomUUID } from 'node:crypto';
import {
  ConsoleLogger,
  ResourceExhaustedError,
  UsageError,
  createEvent,
  type Logger,
} from '@leakscan/shared';
import { LineScanner, type LineScannerOptions } from '../line-scanner';
import type {
  FileCandidate,
  FileScanResult,
  MatchRecord,
  ScanOutcome,
  ScanReport,
  ScanRule,
  SkippedFile,
} from '../types';
import { RetryPolicy } from './retry-policy';

export * from './retry-policy';

/** Anything that scans one file; {@link LineScanner} in production. */
export interface FileScanner {
  scan(candidate: FileCandidate, rules: readonly ScanRule[]): Promise<FileScanResult>;
}

export type ExhaustedPolicy = 'skip' | 'abort';

export interface ScanCoordinatorOptions {
  /** Batch size and ceiling of concurrent scans. Defaults to 100. */
  concurrency?: number;
  retryPolicy?: RetryPolicy;
  /** What to do with a file still exhausted after its last attempt. Defaults to 'skip'. */
  onExhausted?: ExhaustedPolicy;
  logger?: Logger;
  runId?: string;
}

export type CoordinatorResult = Pick<ScanReport, 'matches' | 'outcomes' | 'skipped' | 'stats'>;

function isSkipped(outcome: ScanOutcome): outcome is SkippedFile & { attempts: number } {
  return outcome.status === 'skipped';
}

/**
 * Runs a file scanner over a candidate list in fixed-size batches.
 *
 * Every scan of a batch runs concurrently and the next batch starts once all
 * of them have settled, so no more than `concurrency` files are open at a
 * time. A failing scan does not cancel its siblings.
 */
export class ScanCoordinator {
  readonly concurrency: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly onExhausted: ExhaustedPolicy;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(
    private readonly scanner: FileScanner,
    options: ScanCoordinatorOptions = {},
  ) {
    this.concurrency = options.concurrency ?? 100;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new UsageError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.onExhausted = options.onExhausted ?? 'skip';
    this.logger = options.logger ?? new ConsoleLogger();
    this.runId = options.runId ?? randomUUID();
  }

  async scan(
    candidates: readonly FileCandidate[],
    rules: readonly ScanRule[],
  ): Promise<CoordinatorResult> {
    const startTime = Date.now();
    const outcomes: ScanOutcome[] = [];

    for (let start = 0, index = 0; start < candidates.length; start += this.concurrency, index++) {
      const batch = candidates.slice(start, start + this.concurrency);
      const settled = await Promise.allSettled(batch.map((c) => this.scanOne(c, rules)));

      const failures: unknown[] = [];
      let matchesFound = 0;
      for (const result of settled) {
        if (result.status === 'fulfilled') {
          outcomes.push(result.value);
          if (result.value.status === 'scanned') matchesFound += result.value.matches.length;
        } else {
          failures.push(result.reason);
        }
      }

      await this.logger.log(
        createEvent(this.runId, {
          type: 'BatchCompleted',
          payload: { index, size: batch.length, matchesFound },
        }),
      );

      if (failures.length > 0) {
        throw failures[0];
      }
    }

    const matches: MatchRecord[] = outcomes.flatMap((o) => (o.status === 'scanned' ? o.matches : []));
    const skipped = outcomes.filter(isSkipped);

    return {
      matches,
      outcomes,
      skipped,
      stats: {
        filesEnumerated: candidates.length,
        filesScanned: outcomes.length - skipped.length,
        filesSkipped: skipped.length,
        matchesFound: matches.length,
        retries: outcomes.reduce((sum, o) => sum + o.attempts - 1, 0),
        durationMs: Date.now() - startTime,
      },
    };
  }

  private async scanOne(candidate: FileCandidate, rules: readonly ScanRule[]): Promise<ScanOutcome> {
    let outcome: ScanOutcome;
    try {
      const { value, attempts } = await this.retryPolicy.run(
        () => this.scanner.scan(candidate, rules),
        (error, attempt) =>
          this.logger.log(
            createEvent(this.runId, {
              type: 'FileScanRetried',
              payload: {
                file: candidate.path,
                attempt,
                delayMs: this.retryPolicy.delayMs,
                errno: error.errno,
              },
            }),
          ),
      );
      outcome = { ...value, attempts };
    } catch (error) {
      if (!(error instanceof ResourceExhaustedError) || this.onExhausted === 'abort') {
        throw error;
      }
      outcome = {
        status: 'skipped',
        file: candidate.path,
        reason: 'resource-exhausted',
        message: error.message,
        attempts: this.retryPolicy.maxAttempts,
      };
    }

    if (outcome.status === 'skipped') {
      await this.logger.log(
        createEvent(this.runId, {
          type: 'FileSkipped',
          payload: { file: outcome.file, reason: outcome.reason, message: outcome.message },
        }),
      );
    }
    return outcome;
  }
}

export interface ScanTreeOptions extends ScanCoordinatorOptions {
  scanner?: LineScannerOptions;
}

/**
 * Scans every candidate with a {@link LineScanner} and returns the flat list
 * of records. Order across files is not defined.
 */
export async function scanTree(
  candidates: readonly FileCandidate[],
  rules: readonly ScanRule[],
  options: ScanTreeOptions = {},
): Promise<MatchRecord[]> {
  const coordinator = new ScanCoordinator(new LineScanner(options.scanner), options);
  const { matches } = await coordinator.scan(candidates, rules);
  return matches;
}
