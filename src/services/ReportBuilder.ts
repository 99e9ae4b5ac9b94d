import type { ICheckResult, IReport, ISerializedCheckResult, StatusSummary } from '../models';
import { DomainStatus } from '../models/DomainStatus';

/** Statuses always present in the summary, in display order */
const SUMMARY_KEYS = [
  DomainStatus.ACTIVE,
  DomainStatus.PARKED,
  DomainStatus.FOR_SALE,
  DomainStatus.EXPIRED,
  DomainStatus.AVAILABLE,
  DomainStatus.REDIRECT,
  DomainStatus.ERROR,
  'unknown'
] as const;

/** Statuses under which a domain may be obtainable */
const ACQUIRABLE: readonly string[] = [DomainStatus.FOR_SALE, DomainStatus.AVAILABLE, DomainStatus.EXPIRED];

/** Errored domains listed by name before the rest are counted */
export const MAX_LISTED_ERRORS = 10;

/**
 * Convert a check result to its published JSON shape
 */
export function serializeResult(result: ICheckResult): ISerializedCheckResult {
  return {
    domain: result.domain,
    years_popular: [...result.yearsPopular],
    status: result.status,
    http_status_code: result.httpStatusCode ?? null,
    redirect_url: result.redirectUrl ?? null,
    page_title: result.pageTitle ?? null,
    is_parked: result.isParked,
    is_for_sale: result.isForSale,
    sale_platform: result.salePlatform ?? null,
    probe_error: result.probeError ?? null,
    whois: {
      registrar: result.whois.registrar ?? null,
      creation_date: result.whois.creationDate ?? null,
      expiration_date: result.whois.expirationDate ?? null,
      name_servers: [...(result.whois.nameServers ?? [])],
      registrant: result.whois.registrant ?? null,
      registrant_email: result.whois.registrantEmail ?? null
    },
    recommendation: {
      score: result.recommendation.score,
      reason: result.recommendation.reason,
      estimated_value: result.recommendation.estimatedValue
    },
    checked_at: result.checkedAt
  };
}

/**
 * Count results per status
 */
export function buildSummary(results: readonly ICheckResult[]): StatusSummary {
  const summary: StatusSummary = {};
  for (const key of SUMMARY_KEYS) {
    summary[key] = 0;
  }
  for (const result of results) {
    summary[result.status] = (summary[result.status] ?? 0) + 1;
  }
  return summary;
}

/**
 * Assemble the output document
 * @param results - Results in report order
 * @param generatedAt - Time the report was produced
 */
export function buildReport(results: readonly ICheckResult[], generatedAt: Date = new Date()): IReport {
  return {
    generated_at: generatedAt.toISOString(),
    total_domains: results.length,
    summary: buildSummary(results),
    results: results.map(serializeResult)
  };
}

/**
 * Number of domains that are for sale, available or expired
 */
export function countAcquirable(summary: StatusSummary): number {
  return ACQUIRABLE.reduce((sum, status) => sum + (summary[status] ?? 0), 0);
}

/**
 * Human-readable run summary
 * @param summary - Counts per status
 * @param failedDomains - Domains whose check failed
 * @returns Lines to print
 */
export function formatSummary(summary: StatusSummary, failedDomains: readonly string[]): string[] {
  const count = (status: string): number => summary[status] ?? 0;
  const total = Object.values(summary).reduce((sum, value) => sum + value, 0);
  const rule = '='.repeat(60);

  const lines = [
    '',
    rule,
    'DOMAIN CHECK SUMMARY',
    rule,
    `  Total checked:  ${total}`,
    `  Active:         ${count(DomainStatus.ACTIVE)}`,
    `  Parked:         ${count(DomainStatus.PARKED)}`,
    `  For Sale:       ${count(DomainStatus.FOR_SALE)}`,
    `  Redirect:       ${count(DomainStatus.REDIRECT)}`,
    `  Expired:        ${count(DomainStatus.EXPIRED)}`,
    `  Available:      ${count(DomainStatus.AVAILABLE)}`,
    `  Errors:         ${count(DomainStatus.ERROR)}`,
    rule
  ];

  const acquirable = countAcquirable(summary);
  if (acquirable > 0) {
    lines.push('', `  ** ${acquirable} domains may be acquirable! Check the JSON output for details. **`);
  }

  if (failedDomains.length > 0) {
    lines.push('', `  Domains with errors: ${failedDomains.slice(0, MAX_LISTED_ERRORS).join(', ')}`);
    if (failedDomains.length > MAX_LISTED_ERRORS) {
      lines.push(`    ... and ${failedDomains.length - MAX_LISTED_ERRORS} more`);
    }
  }

  lines.push('');
  return lines;
}
