const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december'
];

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;
const DOTTED_YMD = /^(\d{4})[./](\d{2})[./](\d{2})/;
const DAY_MONTH_NAME_YEAR = /^(\d{1,2})[- ]([a-z]{3,9})\.?[- ](\d{4})\b/i;
// "March 2, 1999", "Mar 02 1999", "Tue Mar 02 1999"
const MONTH_NAME_DAY_YEAR = /^(?:[a-z]{3},?\s+)?([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})\b/i;
const DOTTED_DMY = /^(\d{2})[./](\d{2})[./](\d{4})/;
const ISO_DATE_OR_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Two-digit month for a full or abbreviated English month name
 */
function monthNumber(name: string): string | undefined {
  const lower = name.toLowerCase();
  const index = lower.length >= 3 ? MONTH_NAMES.findIndex((month) => month.startsWith(lower)) : -1;
  return index >= 0 ? String(index + 1).padStart(2, '0') : undefined;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function formatIsoDate(year: string, month: string, day: string): string | undefined {
  return isCalendarDate(Number(year), Number(month), Number(day)) ? `${year}-${month}-${day}` : undefined;
}

/**
 * Convert a registry date string to an ISO calendar date (YYYY-MM-DD), dropping the time of day
 * @param value - Date as printed by a WHOIS server
 * @returns ISO date, or undefined when the value is not a recognizable date
 */
export function toIsoDate(value: string): string | undefined {
  const trimmed = value.trim();

  let match = ISO_DATE_PREFIX.exec(trimmed) ?? DOTTED_YMD.exec(trimmed);
  if (match?.[1] && match[2] && match[3]) {
    return formatIsoDate(match[1], match[2], match[3]);
  }

  match = DAY_MONTH_NAME_YEAR.exec(trimmed);
  if (match?.[1] && match[2] && match[3]) {
    const month = monthNumber(match[2]);
    return month ? formatIsoDate(match[3], month, match[1].padStart(2, '0')) : undefined;
  }

  match = MONTH_NAME_DAY_YEAR.exec(trimmed);
  if (match?.[1] && match[2] && match[3]) {
    const month = monthNumber(match[1]);
    return month ? formatIsoDate(match[3], month, match[2].padStart(2, '0')) : undefined;
  }

  match = DOTTED_DMY.exec(trimmed);
  if (match?.[1] && match[2] && match[3]) {
    return formatIsoDate(match[3], match[2], match[1]);
  }

  return undefined;
}

/**
 * Parse a normalized WHOIS date (ISO date or datetime) into a UTC Date
 * @returns The date, or undefined when the value is not ISO-formatted
 */
export function parseIsoDate(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const match = ISO_DATE_OR_DATETIME.exec(value.trim());
  if (!match?.[1] || !match[2] || !match[3]) {
    return undefined;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isCalendarDate(year, month, day)) {
    return undefined;
  }
  return new Date(Date.UTC(year, month - 1, day));
}
