import { DomainError } from '../types/error.types';
import { Result, err, ok } from './result';

// Expiry sentinel stored when the owner answers "na"
export const EXPIRY_NOT_APPLICABLE = 'N/A';

const NOT_APPLICABLE_ANSWERS = new Set(['na', 'n/a', 'none']);

interface DatePattern {
  regex: RegExp;
  toParts: (match: RegExpMatchArray) => { day: number; month: number; year: number };
}

// Two-digit years: 69-99 → 19xx, 00-68 → 20xx
const expandTwoDigitYear = (yy: number): number => (yy >= 69 ? 1900 + yy : 2000 + yy);

const DATE_PATTERNS: DatePattern[] = [
  {
    // DD/MM/YYYY
    regex: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: Number(m[3]) }),
  },
  {
    // DD/MM/YY
    regex: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/,
    toParts: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: expandTwoDigitYear(Number(m[3])) }),
  },
  {
    // YYYY-MM-DD
    regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    toParts: (m) => ({ day: Number(m[3]), month: Number(m[2]), year: Number(m[1]) }),
  },
];

const isCalendarDate = (day: number, month: number, year: number): boolean => {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

const pad2 = (n: number): string => String(n).padStart(2, '0');

/**
 * Extract the first integer token from free text ("10 bottles" → 10)
 */
export function extractQuantity(text: string): Result<number, DomainError> {
  const match = text.match(/\d+/);
  if (!match) {
    return err({ kind: 'InvalidQuantity', message: 'Please include a positive number for the quantity.' });
  }

  const qty = Number.parseInt(match[0], 10);
  if (!Number.isSafeInteger(qty) || qty <= 0) {
    return err({ kind: 'InvalidQuantity', message: 'Quantity must be positive.' });
  }

  return ok(qty);
}

/**
 * Normalize an expiry answer to DD/MM/YY, or the N/A sentinel
 */
export function parseExpiry(text: string): Result<string, DomainError> {
  const input = text.trim();
  if (!input) {
    return err({ kind: 'InvalidDate', input });
  }

  if (NOT_APPLICABLE_ANSWERS.has(input.toLowerCase())) {
    return ok(EXPIRY_NOT_APPLICABLE);
  }

  for (const pattern of DATE_PATTERNS) {
    const match = input.match(pattern.regex);
    if (!match) continue;

    const { day, month, year } = pattern.toParts(match);
    if (!isCalendarDate(day, month, year)) continue;

    return ok(`${pad2(day)}/${pad2(month)}/${pad2(year % 100)}`);
  }

  return err({ kind: 'InvalidDate', input });
}
