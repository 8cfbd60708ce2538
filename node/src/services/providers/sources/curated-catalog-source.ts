// node/src/services/providers/sources/curated-catalog-source.ts — hand-maintained program catalogs
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { FundingSource, SourceHit } from './funding-source';
import type { ProgramRecord, ScoringContext } from '@/types/funding';
import { normalizeString } from '@/services/dedup-utils';
import { logger } from '@/services/logger';
import { RetrievalError, errorMessage } from '@/utils/errors';

const STOPWORDS = new Set(['and', 'for', 'the', 'with', 'our', 'und', 'der', 'die', 'das', 'fur', 'mit', 'von']);
const MIN_TOKEN_LENGTH = 3;

const catalogProgramSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  domain: z.string().optional(),
  eligibility: z.string().optional(),
  amount: z.string().optional(),
  deadline: z.string().optional(),
  location: z.string().optional(),
  contact: z.string().optional(),
  procedure: z.string().optional(),
  url: z.string().optional(),
  source: z.string().optional(),
  keywords: z.array(z.string()).optional().default([]),
});

const catalogFileSchema = z.object({
  catalogs: z.array(
    z.object({
      name: z.string().min(1),
      programs: z.array(catalogProgramSchema),
    }),
  ),
});

export type CatalogProgram = z.infer<typeof catalogProgramSchema>;

function tokens(text: string): string[] {
  return normalizeString(text)
    .split(' ')
    .filter((t) => t.length >= MIN_TOKEN_LENGTH && !STOPWORDS.has(t));
}

export class CuratedCatalogSource implements FundingSource {
  readonly origin = 'source' as const;
  private readonly indexed: Array<{ record: ProgramRecord; tokens: string[] }>;

  constructor(
    readonly name: string,
    programs: readonly CatalogProgram[],
    private readonly maxResults = 10,
  ) {
    this.indexed = programs.map(({ keywords, ...record }) => ({
      record,
      tokens: tokens(
        [record.name, record.description, record.domain, record.eligibility, record.location, ...keywords]
          .filter(Boolean)
          .join(' '),
      ),
    }));
  }

  /** Programs sharing at least one query token (prefix match), best overlap first. */
  async search(ctx: ScoringContext): Promise<SourceHit[]> {
    const queryTokens = Array.from(new Set(tokens(`${ctx.query} ${ctx.targetDomain ?? ''}`)));
    if (queryTokens.length === 0) return [];

    return this.indexed
      .map((entry) => ({
        record: entry.record,
        overlap: queryTokens.filter((q) => entry.tokens.some((t) => t.startsWith(q))).length,
      }))
      .filter((e) => e.overlap > 0)
      .sort((a, b) => b.overlap - a.overlap)
      .slice(0, this.maxResults)
      .map((e) => ({ record: e.record }));
  }
}

/** One source per catalog in the file. A missing file yields no sources. */
export function loadCuratedSources(filePath: string): CuratedCatalogSource[] {
  const resolved = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(resolved)) {
    logger.warn('curated_sources:missing', { path: resolved });
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (err) {
    throw new RetrievalError('source', `Failed to read curated sources: ${errorMessage(err)}`, {
      cause: err,
      retryable: false,
    });
  }

  const parsed = catalogFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new RetrievalError('source', `Invalid curated sources file: ${parsed.error.message}`, {
      retryable: false,
    });
  }

  logger.info('curated_sources:loaded', { path: resolved, catalogs: parsed.data.catalogs.length });
  return parsed.data.catalogs.map((c) => new CuratedCatalogSource(c.name, c.programs));
}
