import type { ProgramField, ProgramRecord } from '@/types/funding';
import { queryTokens } from '@/services/relevance-scorer';

const HAYSTACK_FIELDS: readonly ProgramField[] = [
  'name',
  'title',
  'program',
  'call',
  'description',
  'domain',
  'eligibility',
  'location',
];

export const DEFAULT_KEYWORD_TOP_N = 50;
const DOMAIN_BONUS = 2;

export interface KeywordCandidate {
  record: ProgramRecord;
  keywordScore: number;
}

function haystack(record: ProgramRecord): string {
  return HAYSTACK_FIELDS.map((f) => record[f] ?? '').join(' ').toLowerCase();
}

/**
 * Scores each row by how many distinct query tokens occur in its text fields
 * (substring match), plus a bonus when a domain-preference token occurs.
 * Zero-score rows are dropped; ties keep dataset order.
 */
export function keywordCandidates(
  rows: readonly ProgramRecord[],
  query: string,
  domainPref?: string,
  topN: number = DEFAULT_KEYWORD_TOP_N,
): KeywordCandidate[] {
  const tokens = Array.from(new Set(queryTokens(query)));
  const domainTokens = domainPref ? Array.from(new Set(queryTokens(domainPref))) : [];
  if (tokens.length === 0 && domainTokens.length === 0) return [];

  const scored: KeywordCandidate[] = [];
  for (const record of rows) {
    const hay = haystack(record);
    let score = tokens.filter((t) => hay.includes(t)).length;
    if (domainTokens.some((t) => hay.includes(t))) score += DOMAIN_BONUS;
    if (score > 0) scored.push({ record, keywordScore: score });
  }

  // Array.prototype.sort is stable
  scored.sort((a, b) => b.keywordScore - a.keywordScore);
  return scored.slice(0, Math.max(0, topN));
}
