import type { DomainStatus } from './DomainStatus';
import type { IRecommendation } from './IRecommendation';
import type { IWhoisRecord } from './IWhoisRecord';

/**
 * Everything learned about one domain during a run
 */
export interface ICheckResult {
  domain: string;
  yearsPopular: number[];
  status: DomainStatus;
  httpStatusCode?: number;
  redirectUrl?: string;
  pageTitle?: string;
  isParked: boolean;
  isForSale: boolean;
  salePlatform?: string;
  /** Probe failure description, kept for inspection */
  probeError?: string;
  whois: IWhoisRecord;
  recommendation: IRecommendation;
  /** ISO-8601 UTC timestamp */
  checkedAt: string;
}
