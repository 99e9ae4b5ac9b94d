/**
 * A domain from the historical source list together with the years it appeared
 */
export interface IDomainRecord {
  /** Lowercase, trimmed domain name (e.g. "example.com") */
  readonly domain: string;
  /** Ascending, de-duplicated years the domain appeared in the source */
  readonly years: readonly number[];
}

/**
 * Year-indexed source list: year -> ordered domain names
 */
export type DomainsByYear = Readonly<Record<string, readonly string[]>>;
