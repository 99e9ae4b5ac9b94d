import { DomainStatus } from '../models/DomainStatus';
import type { IProbeResult, IWhoisRecord } from '../models';
import { parseIsoDate } from '../utils/dates';
import { hasWhoisSignal } from './WhoisNormalizer';

/**
 * Inputs the resolver reads from a probe
 */
export type ProbeSignals = Pick<IProbeResult, 'statusCode' | 'redirectUrl' | 'isParked' | 'isForSale'>;

/**
 * Resolve a domain's lifecycle verdict. Rules are evaluated in order; the first match wins.
 *
 * 1. allow-listed domain            -> active
 * 2. cross-domain redirect          -> redirect
 * 3. for-sale page                  -> for_sale
 * 4. parked page                    -> parked
 * 5. HTTP status in [200, 400)      -> active
 * 6. no HTTP, expiration passed     -> expired
 * 7. no HTTP, expiration ahead      -> parked (registered but unreachable)
 * 8. no HTTP, no WHOIS signal       -> available
 * 9. no HTTP, WHOIS but no usable expiration -> expired
 * 10. otherwise                     -> active
 *
 * @param probe - HTTP probe outcome
 * @param whois - Normalized WHOIS record
 * @param domain - Domain being resolved
 * @param knownActiveDomains - Domains that block probes but are known to be live
 * @param now - Reference time for expiration checks
 */
export function resolveStatus(
  probe: ProbeSignals,
  whois: IWhoisRecord,
  domain: string,
  knownActiveDomains: ReadonlySet<string>,
  now: Date = new Date()
): DomainStatus {
  if (knownActiveDomains.has(domain.toLowerCase())) {
    return DomainStatus.ACTIVE;
  }
  if (probe.redirectUrl) {
    return DomainStatus.REDIRECT;
  }
  if (probe.isForSale) {
    return DomainStatus.FOR_SALE;
  }
  if (probe.isParked) {
    return DomainStatus.PARKED;
  }

  if (probe.statusCode !== undefined) {
    // Rule 5 (2xx/3xx) and the fallback both give active once any response came back
    return DomainStatus.ACTIVE;
  }

  const expiration = parseIsoDate(whois.expirationDate);
  if (expiration) {
    return expiration.getTime() < now.getTime() ? DomainStatus.EXPIRED : DomainStatus.PARKED;
  }

  return hasWhoisSignal(whois) ? DomainStatus.EXPIRED : DomainStatus.AVAILABLE;
}

/**
 * Status Resolver bound to an allow-list of known-active domains
 */
export class StatusResolver {
  private readonly knownActive: ReadonlySet<string>;

  constructor(knownActiveDomains: Iterable<string>) {
    this.knownActive = new Set([...knownActiveDomains].map((domain) => domain.toLowerCase()));
  }

  resolve(probe: ProbeSignals, whois: IWhoisRecord, domain: string, now: Date = new Date()): DomainStatus {
    return resolveStatus(probe, whois, domain, this.knownActive, now);
  }
}
