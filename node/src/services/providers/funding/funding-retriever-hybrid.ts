// Hybrid retriever: vector candidates topped up with keyword candidates from the canonical dataset.
import type { FundingProgram, ScoringContext } from '@/types/funding';
import type { FundingDataset } from '@/services/providers/dataset/funding-dataset';
import { FundingVectorRetriever, toFundingProgram } from '@/services/providers/funding/funding-retriever';
import { keywordCandidates, DEFAULT_KEYWORD_TOP_N, type KeywordCandidate } from '@/services/keyword-backfill';
import { programDedupKey } from '@/services/dedup-utils';
import { isExpired } from '@/services/deadline';
import { logger } from '@/services/logger';

export interface FundingHybridRetrieverOptions {
  want?: number;
  keywordTopN?: number;
}

/**
 * Appends keyword candidates whose key is not yet present and whose deadline
 * has not passed, then stable-sorts by relevance and keeps `want`.
 */
export function mergeCandidates(
  vectorCandidates: readonly FundingProgram[],
  keyword: readonly KeywordCandidate[],
  want: number,
  ctx: ScoringContext,
): FundingProgram[] {
  const seen = new Set<string>();
  for (const p of vectorCandidates) {
    const key = programDedupKey(p);
    if (key) seen.add(key);
  }

  const additions: FundingProgram[] = [];
  for (const { record } of keyword) {
    const key = programDedupKey(record);
    if (key && seen.has(key)) continue;

    const program = toFundingProgram(record, 'keyword', ctx);
    if (isExpired(program.daysLeft)) continue;

    if (key) seen.add(key);
    additions.push(program);
  }

  return [...vectorCandidates, ...additions]
    .sort((a, b) => b.relevanceScore - a.relevanceScore)
    .slice(0, Math.max(0, want));
}

export class HybridFundingRetriever {
  private readonly options: Required<FundingHybridRetrieverOptions>;

  constructor(
    private readonly vectorRetriever: FundingVectorRetriever,
    private readonly dataset: FundingDataset,
    options: FundingHybridRetrieverOptions = {},
  ) {
    this.options = { want: 8, keywordTopN: DEFAULT_KEYWORD_TOP_N, ...options };
  }

  getMaxItems(): number {
    return this.options.want;
  }

  async searchPrograms(ctx: ScoringContext, want: number = this.options.want): Promise<FundingProgram[]> {
    const vectorCandidates = await this.vectorRetriever.queryFundingData(ctx);
    const keyword = keywordCandidates(this.dataset.rows, ctx.query, ctx.targetDomain, this.options.keywordTopN);
    const merged = mergeCandidates(vectorCandidates, keyword, want, ctx);

    logger.info('flow:hybrid_merge', {
      vector: vectorCandidates.length,
      keyword: keyword.length,
      shortlist: merged.length,
    });
    return merged;
  }
}
