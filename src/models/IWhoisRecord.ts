/**
 * Normalized registration data. Every field is optional: absent means unknown.
 */
export interface IWhoisRecord {
  registrar?: string;
  /** ISO calendar date (YYYY-MM-DD), or the raw value when it could not be parsed */
  creationDate?: string;
  /** ISO calendar date (YYYY-MM-DD), or the raw value when it could not be parsed */
  expirationDate?: string;
  /** Lowercase nameservers in registry order */
  nameServers?: string[];
  registrant?: string;
  registrantEmail?: string;
}

/**
 * How a WHOIS lookup ended
 */
export type WhoisOutcome = 'found' | 'not_found' | 'failed';

export interface IWhoisLookupResult {
  domain: string;
  outcome: WhoisOutcome;
  record: IWhoisRecord;
  /** Failure description when outcome is 'failed' */
  error?: string;
}
