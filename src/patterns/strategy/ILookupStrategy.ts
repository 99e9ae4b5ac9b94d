/**
 * Interface for per-domain network lookups (HTTP probe, WHOIS query)
 * Implementations never reject: failures are reported inside the result
 */
export interface ILookupStrategy<TResult> {
  /**
   * Run the lookup for a single domain
   * @param domain - Full domain name to look up
   * @returns Promise resolving to the lookup result
   */
  execute(domain: string): Promise<TResult>;

  /**
   * Get the name/identifier of this strategy
   */
  getName(): string;

  /**
   * Get strategy-specific configuration
   */
  getConfig(): IStrategyConfig;

  /**
   * Set strategy configuration
   * @param config - Partial configuration merged over the current one
   */
  setConfig(config: Partial<IStrategyConfig>): void;
}

/**
 * Configuration for lookup strategies
 */
export interface IStrategyConfig {
  /** Timeout in milliseconds for a single attempt */
  timeoutMs: number;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before a retry in milliseconds */
  retryDelayMs: number;
  /** Whether to double the retry delay on each further attempt */
  useExponentialBackoff: boolean;
}

/**
 * Delay to wait before the given retry
 * @param config - Strategy configuration
 * @param retry - Zero-based retry number
 */
export function computeRetryDelay(config: IStrategyConfig, retry: number): number {
  if (!config.useExponentialBackoff) {
    return config.retryDelayMs;
  }
  return Math.min(config.retryDelayMs * Math.pow(2, retry), 5000);
}
