import type { DropdownOption } from '../engines/browser-control.js';

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export type DropdownMatchRule = 'value' | 'text' | 'textIgnoreCase' | 'substring' | 'month';

export interface DropdownMatch {
  option: DropdownOption;
  rule: DropdownMatchRule;
}

/**
 * 1–12 for a month number, full name or three-letter abbreviation, any case.
 * null otherwise.
 */
export function monthIndex(input: string): number | null {
  const text = input.trim();
  if (/^\d{1,2}$/.test(text)) {
    const n = Number(text);
    return n >= 1 && n <= 12 ? n : null;
  }
  const lowered = text.toLowerCase().replace(/\.$/, '');
  const index = MONTHS.findIndex(
    (name) => name.toLowerCase() === lowered || name.slice(0, 3).toLowerCase() === lowered,
  );
  return index >= 0 ? index + 1 : null;
}

export function monthCandidates(month: number): string[] {
  const name = MONTHS[month - 1];
  const abbrev = name.slice(0, 3);
  return [
    name,
    name.toUpperCase(),
    name.charAt(0) + name.slice(1).toLowerCase(),
    abbrev,
    abbrev.toUpperCase(),
    String(month).padStart(2, '0'),
    String(month),
  ];
}

/**
 * Pick the option for `requested`. Rules run in order and the first hit
 * wins: exact value, exact text, text ignoring case, substring of text or
 * value, month candidates. Digit-only input skips the substring rule so
 * "0" or "13" never lands on "10" or "01".
 */
export function matchDropdownOption(options: DropdownOption[], requested: string): DropdownMatch | null {
  const wanted = requested.trim();
  if (!wanted) return null;
  const lowered = wanted.toLowerCase();

  const byValue = options.find((o) => o.value === wanted);
  if (byValue) return { option: byValue, rule: 'value' };

  const byText = options.find((o) => o.text.trim() === wanted);
  if (byText) return { option: byText, rule: 'text' };

  const byTextIgnoreCase = options.find((o) => o.text.trim().toLowerCase() === lowered);
  if (byTextIgnoreCase) return { option: byTextIgnoreCase, rule: 'textIgnoreCase' };

  if (!/^\d+$/.test(wanted)) {
    const partial = options.find(
      (o) =>
        (o.value !== '' && o.text.toLowerCase().includes(lowered)) ||
        (o.value !== '' && o.value.toLowerCase().includes(lowered)),
    );
    if (partial) return { option: partial, rule: 'substring' };
  }

  const month = monthIndex(wanted);
  if (month !== null) {
    for (const candidate of monthCandidates(month)) {
      const hit = options.find(
        (o) =>
          o.value.trim().toLowerCase() === candidate.toLowerCase() ||
          o.text.trim().toLowerCase() === candidate.toLowerCase(),
      );
      if (hit) return { option: hit, rule: 'month' };
    }
  }

  return null;
}
