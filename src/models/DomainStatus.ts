/**
 * Lifecycle verdict assigned to a domain for a single run
 */
export enum DomainStatus {
  ACTIVE = 'active',
  PARKED = 'parked',
  FOR_SALE = 'for_sale',
  REDIRECT = 'redirect',
  EXPIRED = 'expired',
  AVAILABLE = 'available',
  /** The check itself failed before a verdict could be reached */
  ERROR = 'error'
}
