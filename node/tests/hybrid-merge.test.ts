import { describe, it, expect } from 'vitest';
import { mergeCandidates } from '@/services/providers/funding/funding-retriever-hybrid';
import type { KeywordCandidate } from '@/services/keyword-backfill';
import type { FundingProgram, ScoringContext } from '@/types/funding';

const ctx: ScoringContext = { query: 'grant', now: new Date('2027-01-01T00:00:00Z') };

function program(name: string, relevanceScore: number, extra: Partial<FundingProgram> = {}): FundingProgram {
  return { name, deadlineDate: null, daysLeft: null, relevanceScore, origin: 'vector', ...extra };
}

function keyword(record: KeywordCandidate['record']): KeywordCandidate {
  return { record, keywordScore: 1 };
}

describe('mergeCandidates', () => {
  it('keeps the want highest-scoring programs', () => {
    const vector = [program('a', 30), program('b', 80), program('c', 10), program('d', 70), program('e', 40)];
    expect(mergeCandidates(vector, [], 3, ctx).map((p) => p.name)).toEqual(['b', 'd', 'e']);
  });

  it('keeps input order for equal scores', () => {
    const vector = [program('first', 50), program('second', 50), program('third', 20)];
    expect(mergeCandidates(vector, [], 2, ctx).map((p) => p.name)).toEqual(['first', 'second']);
  });

  it('skips keyword rows whose URL is already among the vector results', () => {
    const vector = [program('Vector copy', 10, { url: 'https://x.org/a' })];
    const merged = mergeCandidates(
      vector,
      [keyword({ name: 'Dup', url: 'https://X.org/a/' }), keyword({ name: 'New', url: 'https://x.org/b' })],
      8,
      ctx,
    );
    expect(merged.map((p) => [p.name, p.origin])).toEqual([
      ['Vector copy', 'vector'],
      ['New', 'keyword'],
    ]);
  });

  it('adds a keyword program only once', () => {
    const merged = mergeCandidates(
      [],
      [keyword({ name: 'Twin', url: 'https://x.org/t' }), keyword({ name: 'Twin again', url: 'https://x.org/t/' })],
      8,
      ctx,
    );
    expect(merged.map((p) => p.name)).toEqual(['Twin']);
  });

  it('skips expired keyword programs and scores the rest', () => {
    const merged = mergeCandidates(
      [],
      [
        keyword({ name: 'Old', deadline: '01.01.2020' }),
        keyword({ name: 'Open', deadline: '30.06.2027', description: 'A grant for pilots' }),
      ],
      8,
      ctx,
    );
    expect(merged).toHaveLength(1);
    expect(merged[0]).toMatchObject({
      name: 'Open',
      origin: 'keyword',
      deadlineDate: '2027-06-30T00:00:00.000Z',
      daysLeft: 180,
      relevanceScore: 30,
    });
  });
});
