import type { ICheckResult, IDomainRecord, IProbeResult, IWhoisRecord } from '../models';
import type { IRateGate } from '../utils/RateGate';
import { RecommendationScorer } from './RecommendationScorer';
import { StatusResolver } from './StatusResolver';

/** Anything that can probe a domain over HTTP */
export interface IHttpProber {
  probe(domain: string): Promise<IProbeResult>;
}

/** Anything that can fetch a normalized WHOIS record */
export interface IWhoisLookup {
  lookup(domain: string): Promise<IWhoisRecord>;
}

export interface IDomainCheckDependencies {
  gate: IRateGate;
  prober: IHttpProber;
  whois: IWhoisLookup;
  resolver: StatusResolver;
  scorer?: RecommendationScorer;
  /** Clock used for expiration checks, age scoring and timestamps */
  now?: () => Date;
}

/**
 * Domain Check Service - runs the full pipeline for one domain:
 * rate gate, HTTP probe, WHOIS lookup, status resolution and scoring
 */
export class DomainCheckService {
  private readonly gate: IRateGate;
  private readonly prober: IHttpProber;
  private readonly whois: IWhoisLookup;
  private readonly resolver: StatusResolver;
  private readonly scorer: RecommendationScorer;
  private readonly now: () => Date;

  constructor(dependencies: IDomainCheckDependencies) {
    this.gate = dependencies.gate;
    this.prober = dependencies.prober;
    this.whois = dependencies.whois;
    this.resolver = dependencies.resolver;
    this.scorer = dependencies.scorer ?? new RecommendationScorer();
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Check a single domain
   * @param record - Domain and the years it appeared in
   * @returns Result for the domain; probe and WHOIS failures are recorded, not thrown
   */
  async check(record: IDomainRecord): Promise<ICheckResult> {
    await this.gate.pass();

    const probe = await this.prober.probe(record.domain);
    const whois = await this.whois.lookup(record.domain);

    const now = this.now();
    const status = this.resolver.resolve(probe, whois, record.domain, now);
    const recommendation = this.scorer.score(record.domain, record.years, status, whois, now);

    return {
      domain: record.domain,
      yearsPopular: [...record.years],
      status,
      ...(probe.statusCode !== undefined && { httpStatusCode: probe.statusCode }),
      ...(probe.redirectUrl && { redirectUrl: probe.redirectUrl }),
      ...(probe.pageTitle && { pageTitle: probe.pageTitle }),
      isParked: probe.isParked,
      isForSale: probe.isForSale,
      ...(probe.salePlatform && { salePlatform: probe.salePlatform }),
      ...(probe.error && { probeError: probe.error }),
      whois,
      recommendation,
      checkedAt: this.now().toISOString()
    };
  }
}
