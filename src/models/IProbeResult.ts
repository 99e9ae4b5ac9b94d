/**
 * Transport failure categories recorded by the HTTP probe
 */
export type ProbeErrorKind = 'tls' | 'connection' | 'timeout' | 'transport';

/**
 * Parked / for-sale flags derived from page content
 */
export interface IContentSignals {
  isParked: boolean;
  isForSale: boolean;
  /** Marketplace brand found on a thin page */
  salePlatform?: string;
}

/**
 * Outcome of one HTTPS-then-HTTP probe sequence for a domain
 */
export interface IProbeResult extends IContentSignals {
  /** Status code of the last response received */
  statusCode?: number;
  /** URL of the final response after redirects */
  finalUrl?: string;
  /** Final URL, set only when it lives on a different registrable domain */
  redirectUrl?: string;
  /** Page title, trimmed and at most 200 characters */
  pageTitle?: string;
  /** Lowercase, whitespace-normalized visible text, at most 5000 characters */
  bodyText: string;
  /** Description of the last transport failure, at most 200 characters */
  error?: string;
  errorKind?: ProbeErrorKind;
}
