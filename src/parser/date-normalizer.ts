/**
 * Date normalization to ISO-8601 (YYYY-MM-DD).
 *
 * Numeric day/month order is never guessed from the host locale: it comes
 * from an explicit `dateOrder`, or from the values themselves when one
 * component cannot be a month.
 */

export type DateOrder = 'MDY' | 'DMY';

export type DateNormalization =
  | { ok: true; iso: string }
  | { ok: false; reason: 'unparseable' | 'ambiguous' | 'invalid' };

export interface DateNormalizerOptions {
  dateOrder?: DateOrder;
}

const MIN_YEAR = 1850;
const MAX_YEAR = 2100;

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const YEAR_FIRST = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;
const YEAR_LAST = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{2}|\d{4})$/;
const DAY_MONTH_NAME = /^(\d{1,2})(?:st|nd|rd|th)?[\s\-.,]+([a-z]+)\.?[\s\-.,]+(\d{2}|\d{4})$/i;
const MONTH_NAME_DAY = /^([a-z]+)\.?[\s\-.]+(\d{1,2})(?:st|nd|rd|th)?,?[\s\-.]+(\d{2}|\d{4})$/i;

function monthFromName(token: string): number | null {
  const lower = token.toLowerCase();
  if (lower.length < 3) {
    return null;
  }
  const index = MONTHS.findIndex(month => month.startsWith(lower));
  return index === -1 ? null : index + 1;
}

function toIso(year: number, month: number, day: number): DateNormalization {
  if (year < MIN_YEAR || year > MAX_YEAR || month < 1 || month > 12 || day < 1) {
    return { ok: false, reason: 'invalid' };
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return { ok: false, reason: 'invalid' };
  }

  const pad = (value: number) => String(value).padStart(2, '0');
  return { ok: true, iso: `${year}-${pad(month)}-${pad(day)}` };
}

function withFullYear(yearText: string, build: (year: number) => DateNormalization): DateNormalization {
  // Two-digit years could belong to either century
  if (yearText.length !== 4) {
    return { ok: false, reason: 'ambiguous' };
  }
  return build(Number(yearText));
}

function resolveNumericOrder(first: number, second: number, order?: DateOrder): { month: number; day: number } | null {
  if (order === 'MDY') {
    return { month: first, day: second };
  }
  if (order === 'DMY') {
    return { month: second, day: first };
  }
  if (first === second) {
    return { month: first, day: second };
  }
  if (first > 12 && second <= 12) {
    return { month: second, day: first };
  }
  if (second > 12 && first <= 12) {
    return { month: first, day: second };
  }
  if (first > 12 && second > 12) {
    return { month: first, day: second };
  }
  return null;
}

export function normalizeDate(raw: string, options: DateNormalizerOptions = {}): DateNormalization {
  const value = raw.trim().replace(/[.,;:]+$/, '').replace(/\s+/g, ' ');
  if (!value) {
    return { ok: false, reason: 'unparseable' };
  }

  let match = YEAR_FIRST.exec(value) ?? COMPACT.exec(value);
  if (match) {
    return toIso(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = YEAR_LAST.exec(value);
  if (match) {
    const first = Number(match[1]);
    const second = Number(match[2]);
    return withFullYear(match[3], year => {
      const order = resolveNumericOrder(first, second, options.dateOrder);
      return order ? toIso(year, order.month, order.day) : { ok: false, reason: 'ambiguous' };
    });
  }

  match = DAY_MONTH_NAME.exec(value);
  if (match) {
    const month = monthFromName(match[2]);
    if (month !== null) {
      const day = Number(match[1]);
      return withFullYear(match[3], year => toIso(year, month, day));
    }
  }

  match = MONTH_NAME_DAY.exec(value);
  if (match) {
    const month = monthFromName(match[1]);
    if (month !== null) {
      const day = Number(match[2]);
      return withFullYear(match[3], year => toIso(year, month, day));
    }
  }

  return { ok: false, reason: 'unparseable' };
}
