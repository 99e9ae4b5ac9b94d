/**
 * Fields extracted from a raw WHOIS response. Registries differ in which labels they
 * print and how often, so each field holds a single string or a list of strings.
 */
export type RawWhoisField =
  | 'registrar'
  | 'creation_date'
  | 'expiration_date'
  | 'name_servers'
  | 'org'
  | 'name'
  | 'registrant_name'
  | 'emails'
  | 'registrant_email';

export type RawWhoisFields = Partial<Record<RawWhoisField, string | string[]>>;

/** Response label (lowercase, without the colon) -> field */
const LABELS: ReadonlyMap<string, RawWhoisField> = new Map<string, RawWhoisField>([
  ['registrar', 'registrar'],
  ['sponsoring registrar', 'registrar'],
  ['registrar name', 'registrar'],
  ['creation date', 'creation_date'],
  ['created', 'creation_date'],
  ['created on', 'creation_date'],
  ['registered', 'creation_date'],
  ['registered on', 'creation_date'],
  ['registration time', 'creation_date'],
  ['domain registration date', 'creation_date'],
  ['registry expiry date', 'expiration_date'],
  ['registrar registration expiration date', 'expiration_date'],
  ['expiry date', 'expiration_date'],
  ['expiration date', 'expiration_date'],
  ['expiration time', 'expiration_date'],
  ['expires', 'expiration_date'],
  ['expires on', 'expiration_date'],
  ['paid-till', 'expiration_date'],
  ['name server', 'name_servers'],
  ['nameserver', 'name_servers'],
  ['nserver', 'name_servers'],
  ['registrant organization', 'org'],
  ['registrant organisation', 'org'],
  ['org', 'org'],
  ['registrant name', 'name'],
  ['registrant', 'registrant_name'],
  ['registrant contact name', 'registrant_name'],
  ['registrant email', 'registrant_email'],
  ['registrant e-mail', 'registrant_email']
]);

const LINE_PATTERN = /^\s*([A-Za-z][A-Za-z0-9 '/_-]*?)\s*:\s*(.*?)\s*$/;
const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g;

/** Phrases registries print when a name is not registered */
const NOT_FOUND_PATTERNS = [
  'no match',
  'not found',
  'no entries found',
  'no data found',
  'not registered',
  'no matching record',
  'status: available',
  'status: free',
  'no object found'
];

function appendValue(fields: RawWhoisFields, field: RawWhoisField, value: string): void {
  const current = fields[field];
  if (current === undefined) {
    fields[field] = value;
  } else if (Array.isArray(current)) {
    current.push(value);
  } else {
    fields[field] = [current, value];
  }
}

/**
 * Parse "Label: value" lines of a WHOIS response into raw fields.
 * Repeated labels become lists; every e-mail address in the text is collected under "emails".
 * @param text - Raw WHOIS response
 */
export function parseWhoisText(text: string): RawWhoisFields {
  const fields: RawWhoisFields = {};

  for (const line of text.split(/\r?\n/)) {
    if (line.trimStart().startsWith('%') || line.trimStart().startsWith('#')) {
      continue;
    }
    const match = LINE_PATTERN.exec(line);
    if (!match?.[1] || !match[2]) {
      continue;
    }
    const field = LABELS.get(match[1].toLowerCase());
    if (field) {
      appendValue(fields, field, match[2]);
    }
  }

  const emails = [...new Set((text.match(EMAIL_PATTERN) ?? []).map((email) => email.toLowerCase()))];
  if (emails.length === 1 && emails[0]) {
    fields.emails = emails[0];
  } else if (emails.length > 1) {
    fields.emails = emails;
  }

  return fields;
}

/**
 * Whether a response says the domain is not registered
 * @param text - Raw WHOIS response
 * @param fields - Fields already parsed from the same response
 */
export function isNotFoundResponse(text: string, fields: RawWhoisFields): boolean {
  if (fields.registrar !== undefined || fields.creation_date !== undefined) {
    return false;
  }
  const lower = text.trim().toLowerCase();
  return lower.length === 0 || NOT_FOUND_PATTERNS.some((pattern) => lower.includes(pattern));
}
