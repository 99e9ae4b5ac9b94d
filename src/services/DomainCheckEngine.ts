import pLimit from 'p-limit';
import type { ICheckResult, IDomainRecord } from '../models';
import { DomainStatus } from '../models/DomainStatus';
import { clampWorkers } from '../config/CheckerConfig';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

/** Anything that can check one domain */
export interface IDomainChecker {
  check(record: IDomainRecord): Promise<ICheckResult>;
}

export type ProgressListener = (completed: number, total: number, result: ICheckResult) => void;

export interface IEngineOptions {
  /** Concurrent checks, clamped to [1, 50] */
  workers: number;
  onProgress?: ProgressListener;
  now?: () => Date;
}

export interface IRunOutcome {
  /** Results sorted by score (highest first), then domain name */
  results: ICheckResult[];
  /** Domains whose check failed unexpectedly, in completion order */
  failedDomains: string[];
}

/**
 * Order results by recommendation score descending, then domain ascending
 */
export function compareResults(a: ICheckResult, b: ICheckResult): number {
  const byScore = b.recommendation.score - a.recommendation.score;
  if (byScore !== 0) {
    return byScore;
  }
  return a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0;
}

/**
 * Result recorded for a domain whose check threw
 */
export function createErrorResult(record: IDomainRecord, error: unknown, checkedAt: Date): ICheckResult {
  return {
    domain: record.domain,
    yearsPopular: [...record.years],
    status: DomainStatus.ERROR,
    isParked: false,
    isForSale: false,
    whois: {},
    recommendation: {
      score: 1,
      reason: `Check failed: ${describeError(error)}`,
      estimatedValue: 'Unknown'
    },
    checkedAt: checkedAt.toISOString()
  };
}

/**
 * Logs an info line each time another tenth of the run completes
 */
export function createProgressLogger(total: number): ProgressListener {
  const step = Math.max(1, Math.ceil(total / 10));
  return (completed) => {
    if (completed % step === 0 || completed === total) {
      const percent = total === 0 ? 100 : Math.floor((completed / total) * 100);
      logger.info(`Progress: ${completed}/${total} domains checked (${percent}%)`);
    }
  };
}

/**
 * Domain Check Engine - runs domain checks through a bounded worker pool
 */
export class DomainCheckEngine {
  private readonly workers: number;
  private readonly onProgress: ProgressListener | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly checker: IDomainChecker,
    options: IEngineOptions
  ) {
    this.workers = clampWorkers(options.workers);
    this.onProgress = options.onProgress;
    this.now = options.now ?? (() => new Date());
  }

  getWorkers(): number {
    return this.workers;
  }

  /**
   * Check every record. A check that throws is logged and recorded as an error result;
   * the run itself never rejects because of a single domain.
   * @param records - Domains to check
   */
  async run(records: readonly IDomainRecord[]): Promise<IRunOutcome> {
    const limit = pLimit(this.workers);
    const total = records.length;
    const results: ICheckResult[] = [];
    const failedDomains: string[] = [];
    let completed = 0;

    const tasks = records.map((record) =>
      limit(async () => {
        let result: ICheckResult;
        try {
          result = await this.checker.check(record);
        } catch (error) {
          logger.error(`Unhandled error checking ${record.domain}: ${describeError(error)}`);
          failedDomains.push(record.domain);
          result = createErrorResult(record, error, this.now());
        }
        results.push(result);
        completed++;
        this.onProgress?.(completed, total, result);
      })
    );

    await Promise.all(tasks);

    return {
      results: results.sort(compareResults),
      failedDomains
    };
  }
}
