import * as fc from 'fast-check';
import heuristics from '../../../src/data/heuristics.json';
import { DomainStatus } from '../../../src/models/DomainStatus';
import { AVAILABLE_VALUE, roundHalfEven, scoreDomain } from '../../../src/services/RecommendationScorer';

const NOW = new Date('2026-01-01T00:00:00Z');

const nameLabel = fc.stringOf(fc.constantFrom(...'abcdefghijklmnopqrstuvwxyz0123456789-'.split('')), {
  minLength: 1,
  maxLength: 30
});
const tld = fc.constantFrom('.com', '.net', '.org', '.io', '.ai', '.co', '.biz');
const domainName = fc.tuple(nameLabel, tld).map(([name, suffix]) => `${name}${suffix}`);
const years = fc.uniqueArray(fc.integer({ min: 1995, max: 2025 }), { maxLength: 12 });
const status = fc.constantFrom(...Object.values(DomainStatus));
const creationDate = fc.option(
  fc.date({ min: new Date('1985-01-01T00:00:00Z'), max: new Date('2030-12-31T00:00:00Z') }).map((date) =>
    date.toISOString().slice(0, 10)
  ),
  { nil: undefined }
);

describe('RecommendationScorer Property Tests', () => {
  /**
   * **Property 1: Score range**
   * Every score is an integer in [1, 10], however extreme the input
   */
  describe('Property 1: Score range', () => {
    test('should always produce an integer between 1 and 10', () => {
      fc.assert(
        fc.property(domainName, years, status, creationDate, (domain, popular, verdict, created) => {
          const { score } = scoreDomain(domain, popular, verdict, created ? { creationDate: created } : {}, NOW);

          expect(Number.isInteger(score)).toBe(true);
          expect(score).toBeGreaterThanOrEqual(1);
          expect(score).toBeLessThanOrEqual(10);
        }),
        { numRuns: 300 }
      );
    });
  });

  /**
   * **Property 2: Value estimate**
   * Available domains are valued at registration cost; others come from the score table
   */
  describe('Property 2: Value estimate', () => {
    test('should value available domains at registration cost', () => {
      fc.assert(
        fc.property(domainName, years, (domain, popular) => {
          expect(scoreDomain(domain, popular, DomainStatus.AVAILABLE, {}, NOW).estimatedValue).toBe(AVAILABLE_VALUE);
        }),
        { numRuns: 50 }
      );
    });

    test('should read other values from the score table', () => {
      const ranges: Record<string, string> = heuristics.valueRanges;
      fc.assert(
        fc.property(domainName, years, (domain, popular) => {
          const { score, estimatedValue } = scoreDomain(domain, popular, DomainStatus.PARKED, {}, NOW);
          expect(estimatedValue).toBe(ranges[String(score)]);
        }),
        { numRuns: 50 }
      );
    });
  });

  /**
   * **Property 3: Reasons**
   * The reason is never empty
   */
  describe('Property 3: Reasons', () => {
    test('should always explain the score', () => {
      fc.assert(
        fc.property(domainName, years, status, (domain, popular, verdict) => {
          expect(scoreDomain(domain, popular, verdict, {}, NOW).reason.length).toBeGreaterThan(0);
        }),
        { numRuns: 100 }
      );
    });
  });

  /**
   * **Property 4: Half-even rounding**
   */
  describe('Property 4: Half-even rounding', () => {
    test('should round halves to an even integer and stay within half a unit', () => {
      fc.assert(
        fc.property(fc.integer({ min: -40, max: 40 }), (halves) => {
          const value = halves / 2;
          const rounded = roundHalfEven(value);

          expect(Math.abs(rounded - value)).toBeLessThanOrEqual(0.5);
          if (!Number.isInteger(value)) {
            expect(Math.abs(rounded % 2)).toBe(0);
          }
        }),
        { numRuns: 100 }
      );
    });
  });
});
