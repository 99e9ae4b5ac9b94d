import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { DomainsByYear, IDomainRecord } from '../models';
import { describeError, SourceListError } from '../utils/errors';
import { logger } from '../utils/logger';
import { DomainNameValidator } from '../validators/DomainNameValidator';

/** Domains taken per year in quick mode */
export const QUICK_MODE_LIMIT = 5;

export interface IIndexOptions {
  /** Restrict the index to a single year */
  year?: number;
  /** Take only the first few domains of each year */
  quick?: boolean;
}

const sourceSchema = z.record(
  z.string().regex(/^\d+$/, 'year keys must be numeric'),
  z.array(z.string())
);

/**
 * Read and validate a year -> domains JSON file
 * @param path - Path to the source list
 * @throws SourceListError when the file cannot be read or has the wrong shape
 */
export async function loadDomainSource(path: string): Promise<DomainsByYear> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new SourceListError(`Cannot read domain source ${path}: ${describeError(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SourceListError(`Domain source ${path} is not valid JSON: ${describeError(error)}`);
  }

  const parsed = sourceSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SourceListError(`Invalid domain source ${path}${where}: ${issue?.message ?? 'unknown problem'}`);
  }
  return parsed.data;
}

/**
 * Years present in a source list, ascending
 */
export function getAvailableYears(source: DomainsByYear): number[] {
  return Object.keys(source)
    .map(Number)
    .sort((a, b) => a - b);
}

/**
 * Domain Index Builder - turns the year-indexed source list into one record per unique domain
 */
export class DomainIndexBuilder {
  private readonly validator = new DomainNameValidator();

  /**
   * Build the domain index
   * @param source - Year -> ordered domain names
   * @param options - Year filter and quick mode
   * @returns Records sorted by domain, each with its ascending unique years
   * @throws SourceListError when the requested year is not in the source
   */
  build(source: DomainsByYear, options: IIndexOptions = {}): IDomainRecord[] {
    const availableYears = getAvailableYears(source);
    if (options.year !== undefined && !availableYears.includes(options.year)) {
      throw new SourceListError(
        `Year ${options.year} not found in domain lists. Available years: ${availableYears.join(', ')}`
      );
    }

    const years = options.year !== undefined ? [options.year] : availableYears;
    const domainYears = new Map<string, Set<number>>();

    for (const year of years) {
      const listed = source[String(year)] ?? [];
      const domains = options.quick ? listed.slice(0, QUICK_MODE_LIMIT) : listed;

      for (const entry of domains) {
        const domain = entry.trim().toLowerCase();
        if (!domain) {
          continue;
        }
        const validation = this.validator.validate(domain);
        if (!validation.isValid) {
          logger.warn(`Skipping invalid domain "${domain}" (${year}): ${validation.errorMessage ?? 'invalid'}`);
          continue;
        }
        const seen = domainYears.get(domain) ?? new Set<number>();
        seen.add(year);
        domainYears.set(domain, seen);
      }
    }

    return [...domainYears.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([domain, seen]) => ({
        domain,
        years: [...seen].sort((a, b) => a - b)
      }));
  }
}
