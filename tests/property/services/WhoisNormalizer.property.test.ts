import * as fc from 'fast-check';
import { normalizeWhoisFields } from '../../../src/services/WhoisNormalizer';
import type { RawWhoisFields } from '../../../src/utils/WhoisTextParser';

const rawValue = fc.oneof(fc.string({ maxLength: 20 }), fc.array(fc.string({ maxLength: 20 }), { maxLength: 4 }));

const rawFields: fc.Arbitrary<RawWhoisFields> = fc.record(
  {
    registrar: rawValue,
    creation_date: rawValue,
    expiration_date: rawValue,
    name_servers: rawValue,
    org: rawValue,
    name: rawValue,
    registrant_name: rawValue,
    emails: rawValue,
    registrant_email: rawValue
  },
  { requiredKeys: [] }
);

describe('WhoisNormalizer Property Tests', () => {
  /**
   * **Property 1: No empty strings**
   * Absent means unknown: a normalized record never holds a blank value
   */
  describe('Property 1: No empty strings', () => {
    test('should never keep blank values', () => {
      fc.assert(
        fc.property(rawFields, (raw) => {
          const record = normalizeWhoisFields(raw);
          for (const value of [
            record.registrar,
            record.creationDate,
            record.expirationDate,
            record.registrant,
            record.registrantEmail
          ]) {
            if (value !== undefined) {
              expect(value.trim()).toBe(value);
              expect(value.length).toBeGreaterThan(0);
            }
          }
        }),
        { numRuns: 200 }
      );
    });
  });

  /**
   * **Property 2: Nameservers**
   * Nameservers are lowercase, non-empty and never an empty list
   */
  describe('Property 2: Nameservers', () => {
    test('should lowercase nameservers and drop empty lists', () => {
      fc.assert(
        fc.property(rawFields, (raw) => {
          const { nameServers } = normalizeWhoisFields(raw);
          if (nameServers !== undefined) {
            expect(nameServers.length).toBeGreaterThan(0);
            for (const server of nameServers) {
              expect(server).toBe(server.toLowerCase());
              expect(server.length).toBeGreaterThan(0);
            }
          }
        }),
        { numRuns: 200 }
      );
    });
  });
});
