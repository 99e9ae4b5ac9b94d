import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { DEFAULT_USER_AGENT } from '../config/CheckerConfig';
import type { IProbeResult, ProbeErrorKind } from '../models';
import { computeRetryDelay, type ILookupStrategy, type IStrategyConfig } from '../patterns/strategy/ILookupStrategy';
import { hostOf, toRegistrableDomain } from '../utils/domainNames';
import { describeError } from '../utils/errors';
import { extractPage } from '../utils/HtmlTextExtractor';
import { logger } from '../utils/logger';
import { sleep, type SleepFn } from '../utils/sleep';
import { ContentSignalAnalyzer } from './ContentSignalAnalyzer';

export const MAX_BODY_TEXT_LENGTH = 5000;
export const MAX_ERROR_LENGTH = 200;

/** The part of an axios instance the prober uses */
export type HttpGetter = Pick<AxiosInstance, 'get'>;

export interface IHttpProbeOptions {
  client?: HttpGetter;
  userAgent?: string;
  maxRedirects?: number;
  analyzer?: ContentSignalAnalyzer;
  sleepFn?: SleepFn;
}

interface IProbeFailure {
  error: string;
  errorKind: ProbeErrorKind;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH'
]);
const TLS_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'EPROTO'
]);

function errorCode(error: unknown): string | undefined {
  if (axios.isAxiosError(error)) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a request failure onto the probe's error taxonomy
 */
export function classifyProbeError(error: unknown): ProbeErrorKind {
  const code = errorCode(error);
  if (code === undefined) {
    return 'transport';
  }
  if (TIMEOUT_CODES.has(code)) {
    return 'timeout';
  }
  if (CONNECTION_CODES.has(code)) {
    return 'connection';
  }
  if (TLS_CODES.has(code) || code.startsWith('CERT_') || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_')) {
    return 'tls';
  }
  return 'transport';
}

function describeFailure(kind: ProbeErrorKind, error: unknown): string {
  switch (kind) {
    case 'connection':
      return 'Connection refused';
    case 'timeout':
      return 'Timeout';
    case 'tls':
      return 'SSL error';
    case 'transport':
      return describeError(error).slice(0, MAX_ERROR_LENGTH);
  }
}

/**
 * URL of the last hop after redirects (follow-redirects exposes it on the native response)
 */
function resolveFinalUrl(response: AxiosResponse<unknown>, requestedUrl: string): string {
  const request: unknown = response.request;
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res: unknown = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return requestedUrl;
}

/**
 * HTTP Prober - fetches a domain over HTTPS, then HTTP, and reads the landing page
 * A probe never rejects: transport failures are recorded on the result
 */
export class HttpProbeService implements ILookupStrategy<IProbeResult> {
  private config: IStrategyConfig = {
    timeoutMs: 15000,
    maxRetries: 1,
    retryDelayMs: 1000,
    useExponentialBackoff: false
  };

  private readonly client: HttpGetter;
  private readonly userAgent: string;
  private readonly maxRedirects: number;
  private readonly analyzer: ContentSignalAnalyzer;
  private readonly sleepFn: SleepFn;

  constructor(options: IHttpProbeOptions = {}) {
    this.client = options.client ?? axios.create();
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxRedirects = options.maxRedirects ?? 30;
    this.analyzer = options.analyzer ?? new ContentSignalAnalyzer();
    this.sleepFn = options.sleepFn ?? sleep;
  }

  /**
   * Probe a domain (alias for execute)
   * @param domain - Domain name without scheme
   */
  async probe(domain: string): Promise<IProbeResult> {
    return this.execute(domain);
  }

  /**
   * Try https://<domain>, and http://<domain> only when HTTPS fails outright.
   * Connection and timeout errors are retried after a backoff; a TLS failure
   * moves straight on to HTTP.
   * @param domain - Domain name without scheme
   */
  async execute(domain: string): Promise<IProbeResult> {
    const urls = [`https://${domain}`, `http://${domain}`];
    let failure: IProbeFailure | undefined;

    for (const url of urls) {
      for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
        try {
          const response = await this.client.get<unknown>(url, {
            timeout: this.config.timeoutMs,
            maxRedirects: this.maxRedirects,
            responseType: 'text',
            validateStatus: () => true,
            headers: {
              'User-Agent': this.userAgent,
              Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'
            }
          });
          return this.readResponse(domain, url, response);
        } catch (error) {
          const errorKind = classifyProbeError(error);
          failure = { error: describeFailure(errorKind, error), errorKind };
          logger.debug(`Probe ${url} attempt ${attempt + 1} failed (${errorKind}): ${describeError(error)}`);

          if (errorKind === 'tls' && url.startsWith('https://')) {
            break;
          }
          if (attempt < this.config.maxRetries) {
            await this.sleepFn(computeRetryDelay(this.config, attempt));
          }
        }
      }
    }

    return {
      bodyText: '',
      isParked: false,
      isForSale: false,
      ...failure
    };
  }

  getName(): string {
    return 'HttpProbeService';
  }

  getConfig(): IStrategyConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<IStrategyConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Turn a response into a probe result: redirect check on every response,
   * page extraction and content analysis on non-empty 200 responses
   */
  private readResponse(domain: string, requestedUrl: string, response: AxiosResponse<unknown>): IProbeResult {
    const finalUrl = resolveFinalUrl(response, requestedUrl);
    const finalHost = hostOf(finalUrl);
    const isRedirect = finalHost !== undefined && toRegistrableDomain(finalHost) !== toRegistrableDomain(domain);

    const result: IProbeResult = {
      statusCode: response.status,
      finalUrl,
      ...(isRedirect && { redirectUrl: finalUrl }),
      bodyText: '',
      isParked: false,
      isForSale: false
    };

    const body = typeof response.data === 'string' ? response.data : '';
    if (response.status !== 200 || body.length === 0) {
      return result;
    }

    try {
      const page = extractPage(body);
      const signals = this.analyzer.analyze(page.title, page.text);
      return {
        ...result,
        ...(page.title && { pageTitle: page.title }),
        bodyText: page.text.slice(0, MAX_BODY_TEXT_LENGTH),
        ...signals
      };
    } catch (error) {
      logger.debug(`Could not parse page for ${domain}: ${describeError(error)}`);
      return {
        ...result,
        error: `Parse error: ${describeError(error)}`.slice(0, MAX_ERROR_LENGTH),
        errorKind: 'transport'
      };
    }
  }
}
