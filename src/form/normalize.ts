import { getStateTable } from './tables.js';

/**
 * Resolve a state name or abbreviation to its two-letter code.
 * Returns null when the input is neither a known name nor a known code.
 */
export function normalizeState(input: string | undefined): string | null {
  if (!input) return null;
  const key = input.trim().replace(/\s+/g, ' ').toUpperCase();
  if (!key) return null;

  const table = getStateTable();
  if (key.length === 2) {
    return Object.values(table).includes(key) ? key : null;
  }
  return table[key] ?? null;
}

/** Full state name in title case for a two-letter code, or null. */
export function stateName(code: string): string | null {
  const upper = code.trim().toUpperCase();
  const entry = Object.entries(getStateTable()).find(([, abbr]) => abbr === upper);
  if (!entry) return null;
  return entry[0]
    .toLowerCase()
    .split(' ')
    .map((word) => (word === 'of' ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join(' ');
}

export function normalizePostalCode(input: string | undefined): string {
  if (!input) return '';
  return input.replace(/\D/g, '').slice(0, 5);
}

/**
 * Strip everything outside letters, digits, space, hyphen, ampersand and
 * slash, then collapse whitespace. cleanText(cleanText(x)) === cleanText(x).
 */
export function cleanText(input: string | undefined): string {
  if (!input) return '';
  return input
    .replace(/[^A-Za-z0-9 \-&/]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Names accept the same set minus slash and ampersand. */
export function cleanName(input: string | undefined): string {
  return cleanText(input).replace(/[&/]/g, ' ').replace(/\s+/g, ' ').trim();
}

export function normalizePhone(input: string | undefined): string {
  if (!input) return '';
  const digits = input.replace(/\D/g, '');
  return digits.length === 11 && digits.startsWith('1') ? digits.slice(1) : digits;
}

export interface MonthYear {
  month: number;
  year: number;
}

const DATE_FORMATS: { pattern: RegExp; order: 'ymd' | 'mdy' }[] = [
  { pattern: /^(\d{4})-(\d{2})-(\d{2})(?:T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z?)?$/, order: 'ymd' },
  { pattern: /^(\d{2})\/(\d{2})\/(\d{4})$/, order: 'mdy' },
  { pattern: /^(\d{4})\/(\d{2})\/(\d{2})$/, order: 'ymd' },
];

/**
 * Month and year of a formation date in one of the accepted layouts.
 * Calendar-invalid dates (2024-02-30) yield null.
 */
export function parseFormationDate(input: string | undefined): MonthYear | null {
  if (!input) return null;
  const text = input.trim();

  for (const { pattern, order } of DATE_FORMATS) {
    const match = text.match(pattern);
    if (!match) continue;

    const [year, month, day] =
      order === 'ymd'
        ? [Number(match[1]), Number(match[2]), Number(match[3])]
        : [Number(match[3]), Number(match[1]), Number(match[2])];

    const date = new Date(Date.UTC(year, month - 1, day));
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      return null;
    }
    return { month, year };
  }

  return null;
}
