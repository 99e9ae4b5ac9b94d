import * as fc from 'fast-check';
import { DomainNameValidator } from '../../../src/validators/DomainNameValidator';

const labelChars = 'abcdefghijklmnopqrstuvwxyz0123456789'.split('');
const validLabel = fc
  .tuple(
    fc.constantFrom(...labelChars),
    fc.stringOf(fc.constantFrom(...labelChars, '-'), { maxLength: 20 }),
    fc.constantFrom(...labelChars)
  )
  .map(([head, middle, tail]) => `${head}${middle}${tail}`);

describe('DomainNameValidator Property Tests', () => {
  let validator: DomainNameValidator;

  beforeEach(() => {
    validator = new DomainNameValidator();
  });

  /**
   * **Property 1: Well-formed names are accepted**
   */
  describe('Property 1: Well-formed names', () => {
    test('should accept any name built from valid labels', () => {
      fc.assert(
        fc.property(fc.array(validLabel, { minLength: 2, maxLength: 4 }), (labels) => {
          const domain = labels.join('.');
          const result = validator.validate(domain.toUpperCase());

          expect(result.isValid).toBe(true);
          expect(result.sanitizedDomain).toBe(domain);
          expect(result.errors).toHaveLength(0);
        }),
        { numRuns: 100 }
      );
    });
  });

  /**
   * **Property 2: Malformed names are rejected with a reason**
   */
  describe('Property 2: Malformed names', () => {
    test('should reject names with a bad label', () => {
      fc.assert(
        fc.property(
          validLabel,
          fc.constantFrom('-start', 'end-', 'under_score', 'sp ace', 'a'.repeat(64), ''),
          (good, bad) => {
            const result = validator.validate(`${good}.${bad}.com`);

            expect(result.isValid).toBe(false);
            expect(result.errors.length).toBeGreaterThan(0);
            expect(result.errorMessage).toBeDefined();
          }
        ),
        { numRuns: 50 }
      );
    });
  });

  /**
   * **Property 3: Sanitization**
   * Sanitizing is deterministic and idempotent
   */
  describe('Property 3: Sanitization', () => {
    test('should sanitize consistently', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 50 }), (input) => {
          const once = validator.sanitize(input);

          expect(validator.sanitize(input)).toBe(once);
          expect(validator.sanitize(once)).toBe(once);
        }),
        { numRuns: 100 }
      );
    });
  });
});
