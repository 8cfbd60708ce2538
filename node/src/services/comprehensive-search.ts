// node/src/services/comprehensive-search.ts — fan out over every funding source, keep what succeeds
import type { FundingProgram, ProgramOrigin, ScoringContext } from '@/types/funding';
import type { FundingSource, SourceHit } from '@/services/providers/sources/funding-source';
import { runTaskGroup, type TaskFailure } from '@/services/task-group';
import { rankPrograms, toFundingProgram } from '@/services/providers/funding/funding-retriever';
import { dedupByKey, programDedupKey } from '@/services/dedup-utils';
import { isExpired } from '@/services/deadline';
import { logger } from '@/services/logger';
import { RetrievalError } from '@/utils/errors';

export interface ComprehensiveSearchOptions {
  concurrency: number;
  timeoutMs: number;
  want?: number;
}

export interface ComprehensiveSearchReport {
  programs: FundingProgram[];
  perSource: Record<string, number>;
  failures: TaskFailure[];
}

export class ComprehensiveSearch {
  constructor(
    private readonly sources: readonly FundingSource[],
    private readonly options: ComprehensiveSearchOptions,
  ) {}

  getMaxItems(): number {
    return this.options.want ?? 8;
  }

  /**
   * Queries all sources concurrently. Expired programs are dropped, then
   * duplicates across sources keep the best-scoring copy. Fails only when
   * every source failed.
   */
  async run(ctx: ScoringContext, want: number = this.getMaxItems()): Promise<ComprehensiveSearchReport> {
    const started = Date.now();
    const { results, failures } = await runTaskGroup<{ origin: ProgramOrigin; hits: SourceHit[] }>(
      this.sources.map((source) => ({
        name: source.name,
        run: async () => ({ origin: source.origin, hits: await source.search(ctx) }),
      })),
      { concurrency: this.options.concurrency, timeoutMs: this.options.timeoutMs },
    );

    if (this.sources.length > 0 && results.length === 0) {
      throw new RetrievalError('source', `All ${this.sources.length} funding sources failed`, {
        cause: failures,
        retryable: false,
      });
    }

    const perSource: Record<string, number> = {};
    const candidates: FundingProgram[] = [];
    for (const { name, value } of results) {
      perSource[name] = (perSource[name] ?? 0) + value.hits.length;
      for (const hit of value.hits) {
        candidates.push(toFundingProgram(hit.record, value.origin, ctx, hit.similarity));
      }
    }

    const deduped = dedupByKey(
      candidates.filter((p) => !isExpired(p.daysLeft)).map((p) => ({ item: p, score: p.relevanceScore })),
      programDedupKey,
    ).map((s) => s.item);
    const programs = rankPrograms(deduped).slice(0, Math.max(0, want));

    logger.info('flow:comprehensive_search', {
      sources: this.sources.length,
      failed: failures.map((f) => f.name),
      candidates: candidates.length,
      kept: programs.length,
      ms: Date.now() - started,
    });
    return { programs, perSource, failures };
  }

  async searchPrograms(ctx: ScoringContext, want?: number): Promise<FundingProgram[]> {
    return (await this.run(ctx, want)).programs;
  }
}
