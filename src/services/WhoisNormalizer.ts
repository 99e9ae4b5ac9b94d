import type { IWhoisRecord } from '../models';
import { toIsoDate } from '../utils/dates';
import type { RawWhoisFields } from '../utils/WhoisTextParser';

function first(value: string | string[] | undefined): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  const trimmed = candidate?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeDate(value: string | string[] | undefined): string | undefined {
  const raw = first(value);
  if (raw === undefined) {
    return undefined;
  }
  // Unparseable dates are kept verbatim; consumers treat them as unusable
  return toIsoDate(raw) ?? raw;
}

function normalizeNameServers(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const servers = (Array.isArray(value) ? value : [value])
    .map((server) => server.trim().toLowerCase())
    .filter((server) => server.length > 0);
  return servers.length > 0 ? servers : undefined;
}

/**
 * Collapse raw registry fields into the fixed-shape WHOIS record.
 *
 * - list-valued fields contribute their first element
 * - dates become ISO calendar dates
 * - registrant: organization, then registrant name, then generic registrant field
 * - registrant e-mail: first collected e-mail, then the registrant e-mail field
 * - nameservers are lowercased and keep their order
 */
export function normalizeWhoisFields(raw: RawWhoisFields): IWhoisRecord {
  const registrar = first(raw.registrar);
  const creationDate = normalizeDate(raw.creation_date);
  const expirationDate = normalizeDate(raw.expiration_date);
  const nameServers = normalizeNameServers(raw.name_servers);
  const registrant = first(raw.org) ?? first(raw.name) ?? first(raw.registrant_name);
  const registrantEmail = first(raw.emails) ?? first(raw.registrant_email);

  return {
    ...(registrar && { registrar }),
    ...(creationDate && { creationDate }),
    ...(expirationDate && { expirationDate }),
    ...(nameServers && { nameServers }),
    ...(registrant && { registrant }),
    ...(registrantEmail && { registrantEmail })
  };
}

/**
 * Whether the record carries any registration signal used for status resolution
 */
export function hasWhoisSignal(record: IWhoisRecord): boolean {
  return Boolean(
    record.registrar ||
      record.creationDate ||
      record.expirationDate ||
      (record.nameServers && record.nameServers.length > 0)
  );
}
