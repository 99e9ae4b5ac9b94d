import heuristics from '../data/heuristics.json';
import { DomainStatus } from '../models/DomainStatus';
import type { IRecommendation, IWhoisRecord } from '../models';
import { parseIsoDate } from '../utils/dates';
import { extractNameLabel } from '../utils/domainNames';

export const BASE_SCORE = 5.0;
export const MIN_SCORE = 1;
export const MAX_SCORE = 10;
export const AVAILABLE_VALUE = '$10-$15 (registration cost)';
const FALLBACK_VALUE = '$1,000-$5,000';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DAYS_PER_YEAR = 365.25;

/**
 * Ordered tables the scorer reads
 */
export interface IScoringTables {
  /** Keywords worth a bonus when they appear in the name label; listed in match order */
  highValueKeywords: readonly string[];
  /** Score ("1".."10") -> estimated dollar range */
  valueRanges: Readonly<Record<string, string>>;
}

export const DEFAULT_SCORING_TABLES: IScoringTables = {
  highValueKeywords: heuristics.highValueKeywords,
  valueRanges: heuristics.valueRanges
};

/**
 * Round to the nearest integer, ties to the even neighbour (10.5 -> 10, 9.5 -> 10)
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Age in Julian years from whole elapsed days, or undefined without a usable creation date
 */
export function domainAgeYears(creationDate: string | undefined, now: Date): number | undefined {
  const created = parseIsoDate(creationDate);
  if (!created) {
    return undefined;
  }
  const days = Math.floor((now.getTime() - created.getTime()) / MS_PER_DAY);
  return days / DAYS_PER_YEAR;
}

interface IAdjustment {
  delta: number;
  reason: string;
}

/**
 * Recommendation Scorer - rates how worthwhile a domain is to pursue, from 1 to 10
 */
export class RecommendationScorer {
  constructor(private readonly tables: IScoringTables = DEFAULT_SCORING_TABLES) {}

  /**
   * Score a domain
   * @param domain - Lowercase domain name
   * @param yearsPopular - Years the domain appeared in the source list
   * @param status - Resolved lifecycle status
   * @param whois - Normalized WHOIS record (only the creation date is read)
   * @param now - Reference time for the age calculation
   */
  score(
    domain: string,
    yearsPopular: readonly number[],
    status: DomainStatus,
    whois: IWhoisRecord,
    now: Date = new Date()
  ): IRecommendation {
    const name = extractNameLabel(domain);
    const adjustments = [
      this.ageAdjustment(domainAgeYears(whois.creationDate, now)),
      this.lengthAdjustment(name.length),
      this.tldAdjustment(domain),
      this.popularityAdjustment(yearsPopular.length),
      this.keywordAdjustment(name),
      this.brandabilityAdjustment(name),
      this.statusAdjustment(status)
    ].filter((adjustment): adjustment is IAdjustment => adjustment !== undefined);

    const total = adjustments.reduce((sum, adjustment) => sum + adjustment.delta, BASE_SCORE);
    const score = Math.max(MIN_SCORE, Math.min(MAX_SCORE, roundHalfEven(total)));
    const reasons = adjustments.map((adjustment) => adjustment.reason);

    return {
      score,
      reason: reasons.length > 0 ? reasons.join('; ') : 'Standard domain',
      estimatedValue: this.estimateValue(score, status)
    };
  }

  /**
   * Dollar range for a score; registration cost when the domain is available
   */
  estimateValue(score: number, status: DomainStatus): string {
    if (status === DomainStatus.AVAILABLE) {
      return AVAILABLE_VALUE;
    }
    return this.tables.valueRanges[String(score)] ?? FALLBACK_VALUE;
  }

  private ageAdjustment(ageYears: number | undefined): IAdjustment | undefined {
    if (ageYears === undefined) {
      return undefined;
    }
    const wholeYears = Math.trunc(ageYears);
    if (ageYears >= 20) {
      return { delta: 2.0, reason: `Very old domain (${wholeYears} years)` };
    }
    if (ageYears >= 10) {
      return { delta: 1.5, reason: `Established domain (${wholeYears} years)` };
    }
    if (ageYears >= 5) {
      return { delta: 0.5, reason: `Moderate age (${wholeYears} years)` };
    }
    return undefined;
  }

  private lengthAdjustment(length: number): IAdjustment | undefined {
    if (length <= 3) {
      return { delta: 2.0, reason: `Ultra-short name (${length} chars)` };
    }
    if (length <= 5) {
      return { delta: 1.5, reason: `Short name (${length} chars)` };
    }
    if (length <= 8) {
      return { delta: 0.5, reason: 'Concise name' };
    }
    if (length >= 15) {
      return { delta: -1.0, reason: 'Long name reduces memorability' };
    }
    return undefined;
  }

  private tldAdjustment(domain: string): IAdjustment | undefined {
    if (domain.endsWith('.com')) {
      return { delta: 1.0, reason: '.com TLD premium' };
    }
    const desirable = ['.io', '.ai', '.co'].find((tld) => domain.endsWith(tld));
    if (desirable) {
      return { delta: 0.5, reason: `Desirable TLD (${desirable.slice(1)})` };
    }
    return undefined;
  }

  private popularityAdjustment(yearCount: number): IAdjustment | undefined {
    const reason = `Appeared in ${yearCount} years of top lists`;
    if (yearCount >= 5) {
      return { delta: 1.5, reason };
    }
    if (yearCount >= 3) {
      return { delta: 1.0, reason };
    }
    if (yearCount >= 2) {
      return { delta: 0.5, reason };
    }
    return undefined;
  }

  private keywordAdjustment(name: string): IAdjustment | undefined {
    const matched = this.tables.highValueKeywords.filter((keyword) => name.includes(keyword));
    if (matched.length === 0) {
      return undefined;
    }
    return {
      delta: Math.min(matched.length * 0.5, 1.5),
      reason: `High-value keywords: ${matched.slice(0, 3).join(', ')}`
    };
  }

  private brandabilityAdjustment(name: string): IAdjustment | undefined {
    const chars = [...name];
    const vowelRatio = chars.filter((c) => 'aeiou'.includes(c)).length / Math.max(chars.length, 1);
    const hyphens = chars.filter((c) => c === '-').length;
    const digits = chars.filter((c) => c >= '0' && c <= '9').length;

    if (vowelRatio >= 0.2 && vowelRatio <= 0.6 && hyphens === 0 && digits === 0) {
      return { delta: 0.5, reason: 'Good brandability (pronounceable, clean)' };
    }
    if (hyphens >= 2 || digits >= 3) {
      return { delta: -0.5, reason: 'Low brandability (hyphens/digits)' };
    }
    return undefined;
  }

  private statusAdjustment(status: DomainStatus): IAdjustment | undefined {
    switch (status) {
      case DomainStatus.AVAILABLE:
        return { delta: 0.5, reason: 'Potentially available for registration' };
      case DomainStatus.FOR_SALE:
        return { delta: 0, reason: 'Listed for sale -- acquisition possible' };
      case DomainStatus.ACTIVE:
        return { delta: -0.5, reason: 'Currently active -- acquisition unlikely' };
      default:
        return undefined;
    }
  }
}

const defaultScorer = new RecommendationScorer();

/**
 * Score a domain with the default tables
 */
export function scoreDomain(
  domain: string,
  yearsPopular: readonly number[],
  status: DomainStatus,
  whois: IWhoisRecord,
  now: Date = new Date()
): IRecommendation {
  return defaultScorer.score(domain, yearsPopular, status, whois, now);
}
