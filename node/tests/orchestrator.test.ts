import { describe, it, expect } from 'vitest';
import { runFundingTurn, type OrchestratorDeps } from '@/services/orchestrator';
import { FundingDataset } from '@/services/providers/dataset/funding-dataset';
import { SimpleEmbedder } from '@/services/providers/embeddings/simple-embedder';
import { InMemoryVectorIndex } from '@/services/providers/vector/in-memory-index';
import { FundingVectorRetriever } from '@/services/providers/funding/funding-retriever';
import { HybridFundingRetriever } from '@/services/providers/funding/funding-retriever-hybrid';
import { ComprehensiveSearch } from '@/services/comprehensive-search';
import { CuratedCatalogSource } from '@/services/providers/sources/curated-catalog-source';
import { ProgramSelector } from '@/services/program-selector';
import { ProgramEnricher } from '@/services/program-enricher';
import { seedIndexFromDataset } from '@/services/pipeline-deps';
import { emptySessionContext } from '@/memory/sessionContext';
import { NO_MATCHES_MESSAGE } from '@/format/programCards';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import type { LlmJsonClient } from '@/services/llm-client';
import { GenerativeError, RetrievalError } from '@/utils/errors';
import { FakeLlm } from './helpers';

const NAMESPACE = 'funding';
const now = new Date('2027-01-01T00:00:00Z');

const CSV = [
  'name,url,description,eligibility,procedure,deadline,location,domain',
  'Robotics Seed Grant,https://example.org/robotics-seed,Grants for robotics startups building prototypes.,Startups under five years old,Apply online,30.06.2027,Berlin,Robotics',
  'Health Pilot Fund,https://example.org/health-pilot,Funds digital health pilots with clinics.,SMEs with a prototype,Submit a pilot plan,15.03.2027,Hamburg,Health',
  'Climate Venture Prize,https://example.org/climate-prize,Prize for climate startups.,Early-stage teams,,31.05.2027,Munich,Climate',
].join('\n');

function pickingLlm(): FakeLlm {
  return new FakeLlm(async (request) => {
    if (request.context === 'select') {
      return { picks: [{ id: 2, why: 'Second best' }, { id: 1, why: 'Top match' }] };
    }
    return { items: [{ id: 2, brief: 'Brief two', next_steps: ['Call the office'] }] };
  });
}

async function buildDeps(
  llm: LlmJsonClient,
  options: { csv?: string; embedder?: Embedder } = {},
): Promise<OrchestratorDeps> {
  const dataset = FundingDataset.fromCsv(options.csv ?? CSV);
  const embedder = options.embedder ?? new SimpleEmbedder();
  const index = new InMemoryVectorIndex();
  await seedIndexFromDataset(index, NAMESPACE, dataset, new SimpleEmbedder());

  const vector = new FundingVectorRetriever(embedder, index, { namespace: NAMESPACE, maxRetries: 0 });
  return {
    search: new HybridFundingRetriever(vector, dataset),
    dataset,
    selector: new ProgramSelector(llm, { model: 'test-model' }),
    enricher: new ProgramEnricher(llm, { model: 'test-model' }),
    defaults: { want: 8, wanted: 2 },
    clock: () => now,
  };
}

describe('runFundingTurn', () => {
  it('runs retrieval, selection and enrichment and stores the turn in a fresh context', async () => {
    const llm = pickingLlm();
    const deps = await buildDeps(llm);
    const initial = emptySessionContext();

    const { result, context } = await runFundingTurn('robotics startup grant Berlin', initial, deps, {
      location: 'Berlin',
    });

    expect(result.kind).toBe('recommendations');
    if (result.kind !== 'recommendations') return;
    expect(result.shortlist.map((p) => [p.name, p.relevanceScore])).toEqual([
      ['Robotics Seed Grant', 40],
      ['Climate Venture Prize', 30],
      ['Health Pilot Fund', 20],
    ]);
    expect(result.selection).toEqual({
      ids: [2, 1],
      reasons: { 2: 'Second best', 1: 'Top match' },
      fallback: false,
    });
    expect(result.cards.map((c) => [c.rank, c.name])).toEqual([
      [1, 'Climate Venture Prize'],
      [2, 'Robotics Seed Grant'],
    ]);
    expect(result.cards[0].description).toBe('Brief two');
    expect(result.cards[0].nextSteps).toEqual([
      'Visit the official page',
      'Call the office',
      'Confirm you meet eligibility requirements',
    ]);
    expect(result.degraded).toEqual({});

    expect(context.lastQuery).toBe('robotics startup grant Berlin');
    expect(context.lastShortlist).toBe(result.shortlist);
    expect(context.updatedAt).toBe('2027-01-01T00:00:00.000Z');
    expect(initial).toEqual(emptySessionContext());
  });

  it('answers a follow-up from the stored context without calling the model', async () => {
    const llm = pickingLlm();
    const deps = await buildDeps(llm);
    const first = await runFundingTurn('robotics startup grant Berlin', emptySessionContext(), deps, {
      location: 'Berlin',
    });
    const callsBefore = llm.calls.length;

    const { result, context } = await runFundingTurn('what is the deadline of the second one?', first.context, deps);

    expect(result.kind).toBe('followup');
    if (result.kind !== 'followup') return;
    expect(result).toMatchObject({ match: 'ordinal', rank: 2, id: 1, requestedFields: ['deadline'] });
    expect(result.card.name).toBe('Robotics Seed Grant');
    expect(result.fields).toEqual([{ field: 'deadline', label: 'Deadline', value: '30.06.2027 (180 days left)' }]);
    expect(context).toBe(first.context);
    expect(llm.calls).toHaveLength(callsBefore);
  });

  it('reports no matches and keeps only the query', async () => {
    const llm = pickingLlm();
    const deps = await buildDeps(llm, { csv: 'name,url\n' });

    const { result, context } = await runFundingTurn('quantum sensors', emptySessionContext(), deps);

    expect(result).toEqual({ kind: 'empty', query: 'quantum sensors', mode: 'standard', message: NO_MATCHES_MESSAGE });
    expect(context).toMatchObject({ lastQuery: 'quantum sensors', lastShortlist: [], lastSelection: null });
    expect(llm.calls).toHaveLength(0);
  });

  it('degrades to positional picks and dataset steps when the model is unavailable', async () => {
    const llm = new FakeLlm(async () => {
      throw new GenerativeError('timeout', 'model timed out');
    });
    const deps = await buildDeps(llm);

    const { result } = await runFundingTurn('robotics startup grant Berlin', emptySessionContext(), deps, {
      location: 'Berlin',
    });

    expect(result.kind).toBe('recommendations');
    if (result.kind !== 'recommendations') return;
    expect(result.selection).toEqual({ ids: [1, 2], reasons: {}, fallback: true });
    expect(result.degraded).toEqual({ selection: 'timeout', enrichment: 'timeout' });
    expect(result.cards[0].description).toBe('Grants for robotics startups building prototypes.');
    expect(result.cards[0].nextSteps).toEqual([
      'Visit the official page',
      'Confirm you meet eligibility requirements',
      'Follow the described application procedure',
    ]);
  });

  it('drops a program whose backfilled deadline has passed', async () => {
    const dataset = FundingDataset.fromCsv(
      [
        'name,url,description,deadline',
        'Archived Fund,https://example.org/archived,Robotics research funding.,01.06.2026',
        'Open Call,https://example.org/open,Robotics grant for startups.,30.06.2027',
      ].join('\n'),
    );
    const index = new InMemoryVectorIndex();
    index.upsert(NAMESPACE, [
      { id: 'a', vector: [1, 0], metadata: { name: 'Archived Fund', url: 'https://example.org/archived' } },
      { id: 'b', vector: [1, 0], metadata: { name: 'Open Call', url: 'https://example.org/open' } },
    ]);
    const embedder: Embedder = { embed: async () => [1, 0] };
    const llm = new FakeLlm(async (request) =>
      request.context === 'select' ? { picks: [{ id: 1, why: 'Open' }] } : { items: [] },
    );
    const vector = new FundingVectorRetriever(embedder, index, { namespace: NAMESPACE, maxRetries: 0 });
    const deps: OrchestratorDeps = {
      search: new HybridFundingRetriever(vector, dataset),
      dataset,
      selector: new ProgramSelector(llm, { model: 'test-model' }),
      enricher: new ProgramEnricher(llm, { model: 'test-model' }),
      defaults: { want: 8, wanted: 2 },
      clock: () => now,
    };

    const { result } = await runFundingTurn('robotics', emptySessionContext(), deps);

    expect(result.kind).toBe('recommendations');
    if (result.kind !== 'recommendations') return;
    expect(result.shortlist.map((p) => [p.name, p.deadline, p.daysLeft])).toEqual([
      ['Open Call', '30.06.2027', 180],
    ]);
  });

  it('propagates retrieval failures', async () => {
    const failing: Embedder = {
      embed: async () => {
        throw new RetrievalError('embedding', 'embedding service down', { retryable: false });
      },
    };
    const deps = await buildDeps(pickingLlm(), { embedder: failing });

    await expect(runFundingTurn('robotics', emptySessionContext(), deps)).rejects.toBeInstanceOf(RetrievalError);
  });

  it('uses the comprehensive search when asked', async () => {
    const llm = pickingLlm();
    const deps = await buildDeps(llm);
    deps.comprehensiveSearch = new ComprehensiveSearch(
      [
        new CuratedCatalogSource('regional', [
          { name: 'Ocean Tech Voucher', description: 'Vouchers for ocean technology', deadline: '30.09.2027', keywords: [] },
          { name: 'Space Prize', description: 'Prize for space startups', keywords: [] },
        ]),
      ],
      { concurrency: 2, timeoutMs: 1000 },
    );

    const { result } = await runFundingTurn('ocean technology', emptySessionContext(), deps, { mode: 'comprehensive' });

    expect(result.kind).toBe('recommendations');
    if (result.kind !== 'recommendations') return;
    expect(result.mode).toBe('comprehensive');
    expect(result.shortlist.map((p) => [p.name, p.origin])).toEqual([['Ocean Tech Voucher', 'source']]);
    expect(result.selection.ids).toEqual([1]);
  });
});
