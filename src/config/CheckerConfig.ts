import { z } from 'zod';
import heuristics from '../data/heuristics.json';
import { ConfigurationError } from '../utils/errors';

export const MIN_WORKERS = 1;
export const MAX_WORKERS = 50;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/120.0.0.0 Safari/537.36';

/**
 * Run-wide settings for the domain checker
 */
export interface ICheckerConfig {
  /** Concurrent domain checks, clamped to [1, 50] */
  workers: number;
  /** Delay each task spends holding the shared rate gate */
  requestDelayMs: number;
  httpTimeoutMs: number;
  whoisTimeoutMs: number;
  userAgent: string;
  /** Domains that block automated probes but are known to be live */
  knownActiveDomains: string[];
  logLevel: string;
}

export const DEFAULT_CHECKER_CONFIG: Readonly<ICheckerConfig> = {
  workers: 10,
  requestDelayMs: 500,
  httpTimeoutMs: 15000,
  whoisTimeoutMs: 10000,
  userAgent: DEFAULT_USER_AGENT,
  knownActiveDomains: [...heuristics.knownActiveDomains],
  logLevel: 'info'
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  DOMAIN_CHECKER_WORKERS: positiveInt.optional(),
  DOMAIN_CHECKER_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  DOMAIN_CHECKER_HTTP_TIMEOUT_MS: positiveInt.optional(),
  DOMAIN_CHECKER_WHOIS_TIMEOUT_MS: positiveInt.optional(),
  DOMAIN_CHECKER_USER_AGENT: z.string().min(1).optional(),
  DOMAIN_CHECKER_KNOWN_ACTIVE: z.string().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).optional()
});

/**
 * Clamp a requested worker count into the supported range
 */
export function clampWorkers(workers: number): number {
  if (!Number.isFinite(workers)) {
    return DEFAULT_CHECKER_CONFIG.workers;
  }
  return Math.max(MIN_WORKERS, Math.min(Math.trunc(workers), MAX_WORKERS));
}

/**
 * Build the checker configuration from defaults and environment variables
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError when a variable holds an invalid value
 */
export function loadCheckerConfig(env: NodeJS.ProcessEnv = process.env): ICheckerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ConfigurationError(`Invalid ${variable}: ${issue?.message ?? 'unknown problem'}`);
  }

  const vars = parsed.data;
  const extraActive = (vars.DOMAIN_CHECKER_KNOWN_ACTIVE ?? '')
    .split(',')
    .map((domain) => domain.trim().toLowerCase())
    .filter((domain) => domain.length > 0);

  return {
    workers: clampWorkers(vars.DOMAIN_CHECKER_WORKERS ?? DEFAULT_CHECKER_CONFIG.workers),
    requestDelayMs: vars.DOMAIN_CHECKER_REQUEST_DELAY_MS ?? DEFAULT_CHECKER_CONFIG.requestDelayMs,
    httpTimeoutMs: vars.DOMAIN_CHECKER_HTTP_TIMEOUT_MS ?? DEFAULT_CHECKER_CONFIG.httpTimeoutMs,
    whoisTimeoutMs: vars.DOMAIN_CHECKER_WHOIS_TIMEOUT_MS ?? DEFAULT_CHECKER_CONFIG.whoisTimeoutMs,
    userAgent: vars.DOMAIN_CHECKER_USER_AGENT ?? DEFAULT_CHECKER_CONFIG.userAgent,
    knownActiveDomains: [...new Set([...DEFAULT_CHECKER_CONFIG.knownActiveDomains, ...extraActive])],
    logLevel: vars.LOG_LEVEL ?? DEFAULT_CHECKER_CONFIG.logLevel
  };
}
