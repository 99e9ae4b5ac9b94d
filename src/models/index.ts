// Core enums
export { DomainStatus } from './DomainStatus';

// Core interfaces
export type { IDomainRecord, DomainsByYear } from './IDomainRecord';
export type { IProbeResult, IContentSignals, ProbeErrorKind } from './IProbeResult';
export type { IWhoisRecord, IWhoisLookupResult, WhoisOutcome } from './IWhoisRecord';
export type { IRecommendation } from './IRecommendation';
export type { ICheckResult } from './ICheckResult';

// Report format
export type {
  IReport,
  ISerializedCheckResult,
  ISerializedWhois,
  ISerializedRecommendation,
  StatusSummary
} from './IReport';
