import { describe, it, expect } from 'vitest';
import { FundingVectorRetriever } from '@/services/providers/funding/funding-retriever';
import { InMemoryVectorIndex } from '@/services/providers/vector/in-memory-index';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import type { ScoringContext } from '@/types/funding';

const NAMESPACE = 'funding';
const ctx: ScoringContext = { query: 'robotics', now: new Date('2027-01-01T00:00:00Z') };

const fixedEmbedder: Embedder = { embed: async () => [1, 0] };

function indexWith(rows: Array<Record<string, string>>): InMemoryVectorIndex {
  const index = new InMemoryVectorIndex();
  index.upsert(
    NAMESPACE,
    rows.map((metadata, i) => ({ id: `row-${i}`, vector: [1, 0], metadata })),
  );
  return index;
}

describe('FundingVectorRetriever.queryFundingData', () => {
  it('drops expired programs and keeps those without a deadline', async () => {
    const index = indexWith([
      { name: 'Closed Call', deadline: '01.06.2026', description: 'robotics prototypes' },
      { name: 'Open Call', deadline: '30.06.2027', description: 'robotics grant' },
      { name: 'Rolling Call', deadline: 'Rolling' },
    ]);
    const retriever = new FundingVectorRetriever(fixedEmbedder, index, { namespace: NAMESPACE, maxRetries: 0 });

    const programs = await retriever.queryFundingData(ctx);

    expect(programs.map((p) => [p.name, p.relevanceScore, p.daysLeft])).toEqual([
      ['Open Call', 30, 180],
      ['Rolling Call', 0, null],
    ]);
  });

  it('keeps the similarity of each match', async () => {
    const index = indexWith([{ name: 'Open Call', deadline: '30.06.2027' }]);
    const retriever = new FundingVectorRetriever(fixedEmbedder, index, { namespace: NAMESPACE, maxRetries: 0 });

    const [program] = await retriever.queryFundingData(ctx);

    expect(program).toMatchObject({ name: 'Open Call', origin: 'vector', similarity: 1 });
  });
});
