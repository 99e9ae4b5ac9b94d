import type { ICheckerConfig } from '../../config/CheckerConfig';
import { DomainCheckEngine, type IDomainChecker, type ProgressListener } from '../../services/DomainCheckEngine';
import { DomainCheckService, type IHttpProber, type IWhoisLookup } from '../../services/DomainCheckService';
import { HttpProbeService } from '../../services/HttpProbeService';
import { RecommendationScorer } from '../../services/RecommendationScorer';
import { StatusResolver } from '../../services/StatusResolver';
import { WhoisLookupService } from '../../services/WhoisLookupService';
import { RateGate, type IRateGate } from '../../utils/RateGate';

/**
 * Replacements for the networked parts of the pipeline
 */
export interface IServiceOverrides {
  prober?: IHttpProber;
  whois?: IWhoisLookup;
  gate?: IRateGate;
  now?: () => Date;
}

/**
 * Service Factory - wires the checking pipeline from one checker configuration
 */
export class ServiceFactory {
  constructor(private readonly config: ICheckerConfig) {}

  /**
   * Create the HTTP prober with the configured timeout and user agent
   */
  createProbeService(): HttpProbeService {
    const service = new HttpProbeService({ userAgent: this.config.userAgent });
    service.setConfig({ timeoutMs: this.config.httpTimeoutMs });
    return service;
  }

  /**
   * Create the WHOIS lookup service with the configured timeout
   */
  createWhoisService(): WhoisLookupService {
    const service = new WhoisLookupService();
    service.setConfig({ timeoutMs: this.config.whoisTimeoutMs });
    return service;
  }

  /**
   * Create the gate shared by every worker of a run
   */
  createRateGate(): IRateGate {
    return new RateGate(this.config.requestDelayMs);
  }

  createStatusResolver(): StatusResolver {
    return new StatusResolver(this.config.knownActiveDomains);
  }

  /**
   * Create the per-domain check service
   * @param overrides - Optional stand-ins for the prober, WHOIS client, gate or clock
   */
  createCheckService(overrides: IServiceOverrides = {}): DomainCheckService {
    return new DomainCheckService({
      gate: overrides.gate ?? this.createRateGate(),
      prober: overrides.prober ?? this.createProbeService(),
      whois: overrides.whois ?? this.createWhoisService(),
      resolver: this.createStatusResolver(),
      scorer: new RecommendationScorer(),
      ...(overrides.now && { now: overrides.now })
    });
  }

  /**
   * Create the worker pool that drives a run
   * @param checker - Per-domain checker
   * @param onProgress - Called after each completed domain
   */
  createEngine(checker: IDomainChecker, onProgress?: ProgressListener): DomainCheckEngine {
    return new DomainCheckEngine(checker, {
      workers: this.config.workers,
      ...(onProgress && { onProgress })
    });
  }
}
