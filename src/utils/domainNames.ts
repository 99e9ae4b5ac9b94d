/**
 * Host with one leading "www." label removed, lowercased
 * @param host - Host name or domain
 */
export function toRegistrableDomain(host: string): string {
  const lower = host.trim().toLowerCase();
  return lower.startsWith('www.') ? lower.slice(4) : lower;
}

/**
 * Host part of a URL, or undefined when the URL cannot be parsed
 */
export function hostOf(url: string): string | undefined {
  try {
    return new URL(url).host;
  } catch {
    return undefined;
  }
}

/**
 * Name label of a domain: everything before the first dot
 */
export function extractNameLabel(domain: string): string {
  return domain.toLowerCase().split('.')[0] ?? '';
}
