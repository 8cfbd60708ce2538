// node/src/services/program-selector.ts — model picks the best-fitting programs by shortlist id
import { z } from 'zod';
import type { FundingProgram, SelectionResult, Shortlist } from '@/types/funding';
import type { LlmJsonClient } from '@/services/llm-client';
import { programName } from '@/services/program-fields';
import { logger } from '@/services/logger';
import { GenerativeError } from '@/utils/errors';

export const SELECT_SYSTEM_PROMPT =
  'You are a precise funding advisor. Use only the provided programs. Do not invent anything.';

const MAX_REASON_CHARS = 300;

const pickSchema = z.object({
  id: z.coerce.number().int(),
  why: z.string().optional().default(''),
});

const selectionSchema = z.object({
  picks: z.array(z.unknown()),
});

export interface SelectionOutcome {
  selection: SelectionResult;
  /** Set when the positional fallback was used because the model call failed. */
  failure?: GenerativeError;
}

export interface SelectorOptions {
  model: string;
  wanted?: number;
}

function clip(value: string | undefined, max: number): string {
  return (value ?? '').slice(0, max);
}

export function buildSelectionPayload(shortlist: Shortlist) {
  return shortlist.map((p: FundingProgram, i) => ({
    id: i + 1,
    name: programName(p),
    title: p.title ?? '',
    domain: p.domain ?? '',
    description: clip(p.description, 800),
    eligibility: clip(p.eligibility, 400),
    amount: p.amount ?? '',
    deadline: p.deadline ?? '',
    location: p.location ?? '',
    source: p.source ?? '',
    url: p.url ?? '',
  }));
}

export function buildSelectionPrompt(query: string, shortlist: Shortlist, wanted: number): string {
  const instruction =
    `Pick up to ${wanted} unique programs by id that best fit the user's request. ` +
    'DO NOT select duplicates (same name/source/url). ' +
    'Prefer programs whose domain, location, amount and deadline match the request. ' +
    'For each pick give a 1-2 sentence "why" citing the exact matches from the program text. ' +
    'Return JSON: {"picks":[{"id":<int>,"why":"..."}]}';
  return JSON.stringify({
    user_query: query,
    programs: buildSelectionPayload(shortlist),
    instruction,
  });
}

/** First min(wanted, n) positions with empty reasons. */
export function positionalFallback(shortlistLength: number, wanted: number): SelectionResult {
  const count = Math.max(0, Math.min(wanted, shortlistLength));
  return { ids: Array.from({ length: count }, (_, i) => i + 1), reasons: {}, fallback: true };
}

/**
 * Keeps picks with an integer id inside 1..n, first occurrence only, up to
 * `wanted`. Malformed picks are skipped individually.
 */
export function validatePicks(raw: unknown, shortlistLength: number, wanted: number): SelectionResult {
  const parsed = selectionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GenerativeError('schema_mismatch', 'Selection response has no "picks" array');
  }

  const ids: number[] = [];
  const reasons: Record<number, string> = {};
  for (const entry of parsed.data.picks) {
    const pick = pickSchema.safeParse(entry);
    if (!pick.success) continue;
    const { id, why } = pick.data;
    if (id < 1 || id > shortlistLength || ids.includes(id)) continue;
    ids.push(id);
    reasons[id] = why.trim().slice(0, MAX_REASON_CHARS);
    if (ids.length >= wanted) break;
  }
  return { ids, reasons, fallback: false };
}

export class ProgramSelector {
  constructor(
    private readonly llm: LlmJsonClient,
    private readonly options: SelectorOptions,
  ) {}

  /** Never throws: any model failure or empty pick list degrades to positional ids. */
  async select(query: string, shortlist: Shortlist, wanted: number = this.options.wanted ?? 3): Promise<SelectionOutcome> {
    if (shortlist.length === 0 || wanted <= 0) {
      return { selection: { ids: [], reasons: {}, fallback: false } };
    }

    try {
      const response = await this.llm.completeJson({
        model: this.options.model,
        system: SELECT_SYSTEM_PROMPT,
        user: buildSelectionPrompt(query, shortlist, wanted),
        temperature: 0,
        context: 'select',
      });
      const selection = validatePicks(response, shortlist.length, wanted);
      if (selection.ids.length === 0) {
        throw new GenerativeError('schema_mismatch', 'Selection response contained no valid picks');
      }
      logger.info('flow:select', { picks: selection.ids });
      return { selection };
    } catch (err) {
      const failure =
        err instanceof GenerativeError ? err : new GenerativeError('http', String(err), { cause: err });
      logger.warn('flow:select_fallback', { kind: failure.kind, error: failure.message });
      return { selection: positionalFallback(shortlist.length, wanted), failure };
    }
  }
}
