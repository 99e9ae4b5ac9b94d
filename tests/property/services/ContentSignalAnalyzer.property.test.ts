import * as fc from 'fast-check';
import heuristics from '../../../src/data/heuristics.json';
import { analyzeContent } from '../../../src/services/ContentSignalAnalyzer';

const vocabulary = [
  ...heuristics.parkedPhrases,
  ...heuristics.salePlatforms,
  ...heuristics.strongSalePhrases,
  'welcome',
  'our products',
  'contact us'
];

/** Page text assembled from parking phrases, ordinary words and filler */
const pageText = fc
  .tuple(fc.array(fc.constantFrom(...vocabulary), { maxLength: 8 }), fc.integer({ min: 0, max: 7000 }))
  .map(([phrases, filler]) => `${phrases.join(' ')} ${'x'.repeat(filler)}`.trim());

const pageTitle = fc.option(
  fc.constantFrom('Acme Corp', 'Coming Soon', 'example.com is for sale', 'Domain Parked', 'Welcome', ''),
  { nil: undefined }
);

describe('ContentSignalAnalyzer Property Tests', () => {
  /**
   * **Property 1: For-sale implies parked**
   * Any page flagged for sale is also flagged parked
   */
  describe('Property 1: For-sale implies parked', () => {
    test('should never flag a page for sale without flagging it parked', () => {
      fc.assert(
        fc.property(pageTitle, pageText, (title, body) => {
          const signals = analyzeContent(title, body);
          if (signals.isForSale) {
            expect(signals.isParked).toBe(true);
          }
        }),
        { numRuns: 200 }
      );
    });

    test('should hold for arbitrary text', () => {
      fc.assert(
        fc.property(fc.option(fc.string(), { nil: undefined }), fc.string({ maxLength: 300 }), (title, body) => {
          const signals = analyzeContent(title, body.toLowerCase());
          expect(!signals.isForSale || signals.isParked).toBe(true);
        }),
        { numRuns: 200 }
      );
    });
  });

  /**
   * **Property 2: Determinism**
   * The same title and text always give the same flags
   */
  describe('Property 2: Determinism', () => {
    test('should return identical flags for identical input', () => {
      fc.assert(
        fc.property(pageTitle, pageText, (title, body) => {
          expect(analyzeContent(title, body)).toEqual(analyzeContent(title, body));
        }),
        { numRuns: 100 }
      );
    });
  });

  /**
   * **Property 3: Sale platform only with for-sale**
   * A reported marketplace always comes with the for-sale flag and appears in the text
   */
  describe('Property 3: Sale platform consistency', () => {
    test('should only report platforms that appear in the text', () => {
      fc.assert(
        fc.property(pageTitle, pageText, (title, body) => {
          const signals = analyzeContent(title, body);
          if (signals.salePlatform !== undefined) {
            expect(signals.isForSale).toBe(true);
            expect(body).toContain(signals.salePlatform);
          }
        }),
        { numRuns: 200 }
      );
    });
  });

  /**
   * **Property 4: Real-site guard**
   * Large pages with an ordinary title are never flagged
   */
  describe('Property 4: Real-site guard', () => {
    test('should leave large pages with ordinary titles unflagged', () => {
      fc.assert(
        fc.property(fc.array(fc.constantFrom(...vocabulary), { maxLength: 8 }), (phrases) => {
          const body = `${phrases.join(' ')} ${'x'.repeat(5001)}`;
          expect(analyzeContent('Acme Corp', body)).toEqual({ isParked: false, isForSale: false });
        }),
        { numRuns: 50 }
      );
    });
  });
});
