// node/src/services/providers/sources/vector-source.ts
import type { FundingSource, SourceHit } from './funding-source';
import type { FundingVectorRetriever } from '@/services/providers/funding/funding-retriever';
import type { ScoringContext } from '@/types/funding';

export class VectorSource implements FundingSource {
  readonly name = 'vector-index';
  readonly origin = 'vector' as const;

  constructor(private readonly retriever: FundingVectorRetriever) {}

  async search(ctx: ScoringContext): Promise<SourceHit[]> {
    const vector = await this.retriever.embedQuery(ctx.query);
    const retrieved = await this.retriever.search(vector);
    return retrieved.map((r) => ({ record: r.record, similarity: r.similarity }));
  }
}
