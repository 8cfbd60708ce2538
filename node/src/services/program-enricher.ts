// node/src/services/program-enricher.ts — short brief and next steps for each selected program
import { z } from 'zod';
import type { Enrichment, Shortlist } from '@/types/funding';
import type { LlmJsonClient } from '@/services/llm-client';
import { programName } from '@/services/program-fields';
import { logger } from '@/services/logger';
import { GenerativeError } from '@/utils/errors';

export const ENRICH_SYSTEM_PROMPT =
  'You write precise, factual summaries of funding programs. Use only the provided data. Return JSON only.';

const MAX_BRIEF_CHARS = 600;
const MAX_STEPS = 3;

const itemSchema = z.object({
  id: z.number().int(),
  brief: z.string().optional().default(''),
  next_steps: z.array(z.unknown()).optional().default([]),
});

const enrichmentSchema = z.object({
  items: z.array(z.unknown()),
});

export interface EnrichmentOutcome {
  enrichment: Enrichment;
  failure?: GenerativeError;
}

export interface EnricherOptions {
  model: string;
  maxTokens?: number;
}

function clip(value: string | undefined, max: number): string {
  return (value ?? '').slice(0, max);
}

export function buildEnrichmentPrompt(shortlist: Shortlist, ids: readonly number[]): string {
  const items = ids.map((id) => {
    const p = shortlist[id - 1];
    return {
      id,
      name: programName(p),
      title: p.title ?? '',
      description: clip(p.description, 800),
      eligibility: clip(p.eligibility, 500),
      procedure: clip(p.procedure, 500),
      source: p.source ?? '',
      url: p.url ?? '',
      location: p.location ?? '',
      domain: p.domain ?? '',
      deadline: p.deadline ?? '',
    };
  });

  const instruction =
    'For each item write "brief": 1-2 sentences on what the program funds, and "next_steps": up to 3 ' +
    'concrete actions of at most 12 words each. Use only the given fields. ' +
    'Leave eligibility and domain out of the brief. ' +
    'Base next steps on procedure and eligibility when present, otherwise give generic steps. ' +
    'Never invent URLs or contacts. ' +
    'Return JSON: {"items":[{"id":<int>,"brief":"...","next_steps":["..."]}]}';
  return JSON.stringify({ items, instruction });
}

/** Empty brief and steps for every requested id. */
export function emptyEnrichment(ids: readonly number[]): Enrichment {
  const out: Enrichment = {};
  for (const id of ids) out[id] = { brief: '', nextSteps: [] };
  return out;
}

/** Keeps items whose id was requested; briefs and steps are trimmed and capped. */
export function validateEnrichment(raw: unknown, ids: readonly number[]): Enrichment {
  const parsed = enrichmentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GenerativeError('schema_mismatch', 'Enrichment response has no "items" array');
  }

  const wanted = new Set(ids);
  const out: Enrichment = {};
  for (const entry of parsed.data.items) {
    const item = itemSchema.safeParse(entry);
    if (!item.success || !wanted.has(item.data.id) || out[item.data.id]) continue;

    const nextSteps = item.data.next_steps
      .filter((s): s is string => typeof s === 'string')
      .map((s) => s.trim())
      .filter(Boolean)
      .slice(0, MAX_STEPS);
    out[item.data.id] = { brief: item.data.brief.trim().slice(0, MAX_BRIEF_CHARS), nextSteps };
  }
  return out;
}

export class ProgramEnricher {
  constructor(
    private readonly llm: LlmJsonClient,
    private readonly options: EnricherOptions,
  ) {}

  /** Never throws: on failure every requested id gets an empty entry. */
  async enrich(shortlist: Shortlist, ids: readonly number[]): Promise<EnrichmentOutcome> {
    const valid = ids.filter((id) => id >= 1 && id <= shortlist.length);
    if (valid.length === 0) return { enrichment: {} };

    try {
      const response = await this.llm.completeJson({
        model: this.options.model,
        system: ENRICH_SYSTEM_PROMPT,
        user: buildEnrichmentPrompt(shortlist, valid),
        temperature: 0,
        maxTokens: this.options.maxTokens ?? 600,
        context: 'enrich',
      });
      const enrichment = validateEnrichment(response, valid);
      logger.info('flow:enrich', { requested: valid.length, returned: Object.keys(enrichment).length });
      return { enrichment };
    } catch (err) {
      const failure =
        err instanceof GenerativeError ? err : new GenerativeError('http', String(err), { cause: err });
      logger.warn('flow:enrich_fallback', { kind: failure.kind, error: failure.message });
      return { enrichment: emptyEnrichment(valid), failure };
    }
  }
}
