import { lookup } from 'whois';
import type { IWhoisLookupResult, IWhoisRecord } from '../models';
import { computeRetryDelay, type ILookupStrategy, type IStrategyConfig } from '../patterns/strategy/ILookupStrategy';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep, type SleepFn } from '../utils/sleep';
import { isNotFoundResponse, parseWhoisText } from '../utils/WhoisTextParser';
import { DomainNameValidator } from '../validators/DomainNameValidator';
import { normalizeWhoisFields } from './WhoisNormalizer';

/**
 * WHOIS Lookup Service - queries registration data for a domain and normalizes it
 * A lookup never rejects: unregistered domains and failed lookups both yield an empty record
 */
export class WhoisLookupService implements ILookupStrategy<IWhoisLookupResult> {
  private config: IStrategyConfig = {
    timeoutMs: 10000, // 10 second timeout for WHOIS queries
    maxRetries: 1,
    retryDelayMs: 1000,
    useExponentialBackoff: true
  };

  private readonly validator = new DomainNameValidator();

  constructor(private readonly sleepFn: SleepFn = sleep) {}

  /**
   * Look up a domain and return only the normalized record
   * @param domain - Full domain name
   */
  async lookup(domain: string): Promise<IWhoisRecord> {
    const result = await this.execute(domain);
    return result.record;
  }

  /**
   * Execute a WHOIS lookup
   * @param domain - Full domain name
   * @returns Promise resolving to the lookup outcome and normalized record
   */
  async execute(domain: string): Promise<IWhoisLookupResult> {
    if (!this.validator.validate(domain).isValid) {
      return { domain, outcome: 'failed', record: {}, error: 'Invalid domain format' };
    }

    try {
      const text = await this.performWhoisLookup(domain);
      const fields = parseWhoisText(text);

      if (isNotFoundResponse(text, fields)) {
        logger.debug(`WHOIS: ${domain} is not registered`);
        return { domain, outcome: 'not_found', record: {} };
      }

      return { domain, outcome: 'found', record: normalizeWhoisFields(fields) };
    } catch (error) {
      const message = describeError(error);
      logger.debug(`WHOIS error for ${domain}: ${message}`);
      return { domain, outcome: 'failed', record: {}, error: message };
    }
  }

  getName(): string {
    return 'WhoisLookupService';
  }

  /**
   * Get the current configuration
   */
  getConfig(): IStrategyConfig {
    return { ...this.config };
  }

  /**
   * Set configuration options
   * @param config - Configuration object
   */
  setConfig(config: Partial<IStrategyConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Perform WHOIS lookup with timeout and retry logic
   * @param domain - Domain to look up
   * @returns Raw WHOIS response text
   */
  private async performWhoisLookup(domain: string): Promise<string> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await this.whoisLookupWithTimeout(domain);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error('WHOIS lookup failed');

        if (attempt < this.config.maxRetries) {
          await this.sleepFn(computeRetryDelay(this.config, attempt));
        }
      }
    }

    throw lastError ?? new Error('WHOIS lookup failed after all retries');
  }

  /**
   * Perform WHOIS lookup with timeout. The client gets the same timeout so it
   * closes its socket when the server stalls.
   * @param domain - Domain to look up
   */
  private whoisLookupWithTimeout(domain: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        reject(new Error(`WHOIS lookup timeout after ${this.config.timeoutMs}ms`));
      }, this.config.timeoutMs);

      lookup(domain, { timeout: this.config.timeoutMs }, (error, data) => {
        clearTimeout(timeoutId);

        if (error) {
          reject(error);
        } else {
          // Verbose lookups return one entry per server queried
          resolve(Array.isArray(data) ? data.map((entry) => entry.data).join('\n') : data);
        }
      });
    });
  }
}
