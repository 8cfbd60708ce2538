// node/src/services/deadline.ts — free-text deadline parsing (day-first, fuzzy) and days-left math
import { endOfMonth, isValid, parse } from 'date-fns';
import { de, enUS } from 'date-fns/locale';
import { isMissing } from '@/services/program-fields';

const DAY_MS = 24 * 60 * 60 * 1000;
const REFERENCE_DATE = new Date(2000, 0, 1);
const LOCALES = [enUS, de];
// Abbreviations the locales do not parse.
const EXTRA_MONTH_ABBREVIATIONS: Record<string, number> = { sept: 9 };

const MONTH_WORD = '[A-Za-zÄÖÜäöüé]{3,}\\.?';

const ISO_RE = /\b(\d{4})-(\d{1,2})-(\d{1,2})(?=T|\b)/;
const NUMERIC_RE = /\b(\d{1,2})[./-](\d{1,2})[./-](\d{4}|\d{2})\b/;
const DAY_MONTH_YEAR_RE = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\.?\\s+(${MONTH_WORD})\\s+(\\d{4})\\b`);
const MONTH_DAY_YEAR_RE = new RegExp(`(${MONTH_WORD})\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`);
const MONTH_YEAR_RE = new RegExp(`(${MONTH_WORD})\\s+(\\d{4})\\b`);

function utcMidnight(local: Date): Date {
  return new Date(Date.UTC(local.getFullYear(), local.getMonth(), local.getDate()));
}

function fromParts(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects overflow such as 31.02.
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

function expandYear(raw: string): number {
  const y = Number(raw);
  return raw.length === 2 ? 2000 + y : y;
}

function parseMonthWord(word: string): number | null {
  const cleaned = word.replace(/\.$/, '');
  for (const locale of LOCALES) {
    for (const fmt of ['MMMM', 'MMM']) {
      const d = parse(cleaned, fmt, REFERENCE_DATE, { locale });
      if (isValid(d)) return d.getMonth() + 1;
    }
  }
  return EXTRA_MONTH_ABBREVIATIONS[cleaned.toLowerCase()] ?? null;
}

function parseNumeric(text: string): Date | null {
  const iso = ISO_RE.exec(text);
  if (iso) return fromParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const m = NUMERIC_RE.exec(text);
  if (!m) return null;
  const first = Number(m[1]);
  const second = Number(m[2]);
  const year = expandYear(m[3]);
  if (second > 12 && first <= 12) return fromParts(year, first, second);
  return fromParts(year, second, first);
}

function parseTextual(text: string): Date | null {
  const dmy = DAY_MONTH_YEAR_RE.exec(text);
  if (dmy) {
    const month = parseMonthWord(dmy[2]);
    if (month) return fromParts(Number(dmy[3]), month, Number(dmy[1]));
  }

  const mdy = MONTH_DAY_YEAR_RE.exec(text);
  if (mdy) {
    const month = parseMonthWord(mdy[1]);
    if (month) return fromParts(Number(mdy[3]), month, Number(mdy[2]));
  }

  const my = MONTH_YEAR_RE.exec(text);
  if (my) {
    const month = parseMonthWord(my[1]);
    if (month) return utcMidnight(endOfMonth(new Date(Number(my[2]), month - 1, 1)));
  }
  return null;
}

/**
 * Parses a free-text deadline into a UTC midnight Date. Day-first for
 * ambiguous numeric dates; surrounding text is ignored. Returns null when
 * no date can be read.
 */
export function parseDeadline(raw: string | null | undefined): Date | null {
  if (raw === null || raw === undefined || isMissing(raw)) return null;
  const text = raw.trim();
  return parseNumeric(text) ?? parseTextual(text);
}

/** Whole days from now until the deadline, floored; negative once it has passed. */
export function daysLeft(deadline: Date | null, now: Date): number | null {
  if (!deadline) return null;
  return Math.floor((deadline.getTime() - now.getTime()) / DAY_MS);
}

export function isExpired(days: number | null): boolean {
  return days !== null && days < 0;
}

/** Parsed deadline fields as carried on a FundingProgram. */
export function deadlineFields(
  raw: string | undefined,
  now: Date,
): { deadlineDate: string | null; daysLeft: number | null } {
  const date = parseDeadline(raw);
  return { deadlineDate: date ? date.toISOString() : null, daysLeft: daysLeft(date, now) };
}
