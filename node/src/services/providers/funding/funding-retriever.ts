// node/src/services/providers/funding/funding-retriever.ts — embed, vector search, deadline filter, score
import type { Embedder, Embedding } from '@/services/providers/retrieval-vector-utils';
import type { VectorIndex } from '@/services/providers/vector/vector-index';
import type { FundingProgram, ProgramOrigin, ProgramRecord, ScoringContext } from '@/types/funding';
import { toProgramRecord } from '@/services/program-fields';
import { deadlineFields, isExpired } from '@/services/deadline';
import { computeRelevanceScore } from '@/services/relevance-scorer';
import { logger } from '@/services/logger';
import { callWithResilience } from '@/utils/retryWithBackoff';
import { RetrievalError, TimeoutError, errorMessage, type RetrievalStage } from '@/utils/errors';

export interface RetrievedRecord {
  record: ProgramRecord;
  similarity: number;
}

export interface FundingRetrieverOptions {
  namespace: string;
  topK?: number;
  timeoutMs?: number;
  maxRetries?: number;
}

/** Parses the deadline and scores one record; the result carries its origin. */
export function toFundingProgram(
  record: ProgramRecord,
  origin: ProgramOrigin,
  ctx: ScoringContext,
  similarity?: number,
): FundingProgram {
  const deadline = deadlineFields(record.deadline, ctx.now);
  const program: FundingProgram = {
    ...record,
    ...deadline,
    relevanceScore: 0,
    origin,
    ...(similarity !== undefined && { similarity }),
  };
  program.relevanceScore = computeRelevanceScore(program, ctx);
  return program;
}

/** Drops expired programs, then stable-sorts by relevance. */
export function rankPrograms(programs: FundingProgram[]): FundingProgram[] {
  return programs
    .filter((p) => !isExpired(p.daysLeft))
    .sort((a, b) => b.relevanceScore - a.relevanceScore);
}

function isRetryableRetrieval(err: unknown): boolean {
  return err instanceof RetrievalError ? err.retryable : true;
}

function asRetrievalError(stage: RetrievalStage, err: unknown): RetrievalError {
  if (err instanceof RetrievalError) return err;
  if (err instanceof TimeoutError) return new RetrievalError(stage, err.message, { cause: err });
  return new RetrievalError(stage, errorMessage(err), { cause: err });
}

export class FundingVectorRetriever {
  private readonly options: Required<FundingRetrieverOptions>;

  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
    options: FundingRetrieverOptions,
  ) {
    this.options = { topK: 8, timeoutMs: 15000, maxRetries: 2, ...options };
  }

  private async resilient<T>(stage: RetrievalStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await callWithResilience(fn, {
        timeoutMs: this.options.timeoutMs,
        maxRetries: this.options.maxRetries,
        initialDelay: 200,
        isRetryable: isRetryableRetrieval,
        label: stage,
      });
    } catch (err) {
      throw asRetrievalError(stage, err);
    }
  }

  async embedQuery(query: string): Promise<Embedding> {
    if (!query.trim()) {
      throw new RetrievalError('embedding', 'Cannot embed an empty query', { retryable: false });
    }
    return this.resilient('embedding', () => this.embedder.embed(query));
  }

  /** Nearest programs for a query vector, in index order. */
  async search(vector: Embedding, topK: number = this.options.topK): Promise<RetrievedRecord[]> {
    const matches = await this.resilient('vector_search', () =>
      this.index.query({ vector, topK, namespace: this.options.namespace }),
    );
    return matches.map((m) => ({ record: toProgramRecord(m.metadata), similarity: m.score }));
  }

  /**
   * Vector candidates for a query: expired programs removed, scored,
   * sorted by relevance and cut to topK.
   */
  async queryFundingData(ctx: ScoringContext, topK: number = this.options.topK): Promise<FundingProgram[]> {
    const started = Date.now();
    const vector = await this.embedQuery(ctx.query);
    const retrieved = await this.search(vector, topK);

    const programs = retrieved.map((r) => toFundingProgram(r.record, 'vector', ctx, r.similarity));
    const ranked = rankPrograms(programs).slice(0, topK);

    logger.info('flow:vector_retrieval', {
      matches: retrieved.length,
      kept: ranked.length,
      ms: Date.now() - started,
    });
    return ranked;
  }
}
