export * from './models';
export { loadCheckerConfig, clampWorkers, DEFAULT_CHECKER_CONFIG, type ICheckerConfig } from './config/CheckerConfig';
export { HttpProbeService, classifyProbeError, type IHttpProbeOptions } from './services/HttpProbeService';
export { ContentSignalAnalyzer, analyzeContent, type IContentVocabulary } from './services/ContentSignalAnalyzer';
export { WhoisLookupService } from './services/WhoisLookupService';
export { normalizeWhoisFields, hasWhoisSignal } from './services/WhoisNormalizer';
export { StatusResolver, resolveStatus, type ProbeSignals } from './services/StatusResolver';
export { RecommendationScorer, scoreDomain, roundHalfEven, type IScoringTables } from './services/RecommendationScorer';
export { DomainIndexBuilder, loadDomainSource, getAvailableYears, type IIndexOptions } from './services/DomainIndexBuilder';
export { DomainCheckService, type IHttpProber, type IWhoisLookup } from './services/DomainCheckService';
export { DomainCheckEngine, compareResults, createErrorResult, type IRunOutcome } from './services/DomainCheckEngine';
export { buildReport, buildSummary, serializeResult, formatSummary } from './services/ReportBuilder';
export { ServiceFactory } from './patterns/factory/ServiceFactory';
export { RateGate, type IRateGate } from './utils/RateGate';
export { parseWhoisText, isNotFoundResponse } from './utils/WhoisTextParser';
export { DomainNameValidator } from './validators/DomainNameValidator';
export { DomainCheckerError, ConfigurationError, SourceListError } from './utils/errors';
