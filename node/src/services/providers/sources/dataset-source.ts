// node/src/services/providers/sources/dataset-source.ts
import type { FundingSource, SourceHit } from './funding-source';
import type { FundingDataset } from '@/services/providers/dataset/funding-dataset';
import { keywordCandidates } from '@/services/keyword-backfill';
import type { ScoringContext } from '@/types/funding';

export class DatasetKeywordSource implements FundingSource {
  readonly name = 'dataset';
  readonly origin = 'keyword' as const;

  constructor(
    private readonly dataset: FundingDataset,
    private readonly topN = 50,
  ) {}

  async search(ctx: ScoringContext): Promise<SourceHit[]> {
    return keywordCandidates(this.dataset.rows, ctx.query, ctx.targetDomain, this.topN).map((c) => ({
      record: c.record,
    }));
  }
}
