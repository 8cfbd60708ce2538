import type { ProgramRecord, ScoringContext } from '@/types/funding';

export const SCORE_WEIGHTS = {
  domain: 40,
  amount: 30,
  deadline: 20,
  description: 10,
  location: 10,
} as const;

const MAGNITUDES: Record<string, number> = {
  k: 1_000,
  tsd: 1_000,
  thousand: 1_000,
  m: 1_000_000,
  mn: 1_000_000,
  mio: 1_000_000,
  million: 1_000_000,
};

// Thousands-grouped integers ("120,000", "1.500.000", "120 000") or plain/decimal numbers with an optional magnitude.
const AMOUNT_RE =
  /(\d{1,3}(?:[.,\s]\d{3})+(?!\d)|\d+(?:[.,]\d+)?)(?:\s*(k|tsd|thousand|mio|million|mn|m)\b)?/gi;

/** Unicode word tokens, lowercased. */
export function queryTokens(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
}

/**
 * Reads the last number in a free-text amount ("Grant up to €120,000" -> 120000,
 * "€500K - €15M" -> 15000000). Null when the text holds no digits.
 */
export function parseAmount(text: string | undefined): number | null {
  if (!text) return null;
  let last: number | null = null;
  for (const match of text.matchAll(AMOUNT_RE)) {
    const digits = match[1];
    const suffix = match[2]?.toLowerCase();
    let value: number;
    if (/^\d{1,3}(?:[.,\s]\d{3})+$/.test(digits)) {
      value = Number(digits.replace(/[.,\s]/g, ''));
    } else {
      value = Number(digits.replace(',', '.'));
    }
    if (suffix) value *= MAGNITUDES[suffix] ?? 1;
    if (Number.isFinite(value)) last = value;
  }
  return last;
}

/**
 * Sums the factor weights that apply and caps the result at 100.
 * Each factor is independent, so adding a satisfied condition never lowers the score.
 */
export function computeRelevanceScore(
  program: ProgramRecord & { deadlineDate: string | null },
  ctx: ScoringContext,
): number {
  let score = 0;

  const domain = (program.domain ?? '').toLowerCase();
  const target = (ctx.targetDomain ?? '').trim().toLowerCase();
  if (target && domain.includes(target)) score += SCORE_WEIGHTS.domain;

  if (ctx.fundingNeed !== undefined && ctx.fundingNeed > 0) {
    const amount = parseAmount(program.amount);
    if (amount !== null && amount >= ctx.fundingNeed) score += SCORE_WEIGHTS.amount;
  }

  if (program.deadlineDate && new Date(program.deadlineDate).getTime() >= ctx.now.getTime()) {
    score += SCORE_WEIGHTS.deadline;
  }

  const description = (program.description ?? '').toLowerCase();
  if (description && queryTokens(ctx.query).some((t) => description.includes(t))) {
    score += SCORE_WEIGHTS.description;
  }

  const location = (program.location ?? '').toLowerCase();
  const userLocation = (ctx.userLocation ?? '').trim().toLowerCase();
  if (userLocation && location.includes(userLocation)) score += SCORE_WEIGHTS.location;

  return Math.min(100, score);
}
