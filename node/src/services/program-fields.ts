import { PROGRAM_FIELDS, type ProgramField, type ProgramRecord } from '@/types/funding';

const MISSING_EXACT = new Set(['', 'n/a', 'na', 'null', 'nan', 'none', 'not specified']);
const MISSING_SUBSTRINGS = [
  'information not found',
  'not available',
  'no information',
  'tbd',
  'to be determined',
  'unknown',
];

/** Name candidates in priority order. */
export const NAME_FIELDS: readonly ProgramField[] = [
  'name',
  'title',
  'program',
  'call',
  'call_title',
  'funding_title',
  'display_name',
];

const ACRONYMS: Record<string, string> = {
  ai: 'AI',
  'r&d': 'R&D',
  eu: 'EU',
  bmbf: 'BMBF',
  efre: 'EFRE',
  erdf: 'ERDF',
  sme: 'SME',
  smes: 'SMEs',
  ml: 'ML',
  ki: 'KI',
};

export function isMissing(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value !== 'string') return false;
  const v = value.trim().toLowerCase();
  if (MISSING_EXACT.has(v)) return true;
  return MISSING_SUBSTRINGS.some((s) => v.includes(s));
}

/** Trimmed value, or undefined when the value counts as missing. */
export function present(value: string | undefined): string | undefined {
  return isMissing(value) || value === undefined ? undefined : value.trim();
}

/** First present name candidate, unformatted. */
export function fusedName(record: ProgramRecord): string | undefined {
  for (const field of NAME_FIELDS) {
    const v = present(record[field]);
    if (v) return v;
  }
  return undefined;
}

function looksLikeSlug(s: string): boolean {
  return /\.(html?|php)$/i.test(s) || (!/\s/.test(s) && /[-_]/.test(s));
}

function safeDecode(s: string): string {
  try {
    return decodeURIComponent(s);
  } catch {
    return s;
  }
}

/**
 * Turns slug-like titles ("ai-innovation_grant.html") into display titles
 * ("AI Innovation Grant"). Other titles are returned trimmed.
 */
export function normalizeProgramTitle(raw: string): string {
  const s = raw.trim();
  if (!looksLikeSlug(s)) return s;

  const words = safeDecode(s.replace(/\.(html?|php)$/i, ''))
    .replace(/[-_]+/g, ' ')
    .split(/\s+/)
    .filter(Boolean);

  return words
    .map((w) => ACRONYMS[w.toLowerCase()] ?? w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

function slugFromUrl(url: string): string | undefined {
  const path = url.trim().split(/[?#]/)[0].replace(/\/+$/, '');
  const withoutScheme = path.replace(/^[a-z]+:\/\//i, '');
  const segments = withoutScheme.split('/').slice(1).filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : undefined;
}

/** Display name: first name candidate, else the URL slug, else "Unnamed". */
export function programName(record: ProgramRecord): string {
  const name = fusedName(record);
  if (name) return normalizeProgramTitle(name);

  const url = present(record.url);
  const slug = url ? slugFromUrl(url) : undefined;
  if (slug) return normalizeProgramTitle(slug);

  return 'Unnamed';
}

/** Keeps the known string fields of an untyped row; other keys and non-strings are dropped. */
export function toProgramRecord(raw: Record<string, unknown>): ProgramRecord {
  const record: ProgramRecord = {};
  for (const field of PROGRAM_FIELDS) {
    const value = raw[field];
    if (typeof value === 'string') {
      record[field] = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      record[field] = String(value);
    }
  }
  return record;
}
