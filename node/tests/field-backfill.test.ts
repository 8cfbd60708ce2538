import { describe, it, expect } from 'vitest';
import { backfillProgram, backfillShortlist } from '@/services/field-backfill';
import { FundingDataset } from '@/services/providers/dataset/funding-dataset';
import type { FundingProgram } from '@/types/funding';

const now = new Date('2027-01-01T00:00:00Z');

const dataset = FundingDataset.fromCsv(
  [
    'Name,URL,Description,Eligibility,Deadline,Contact',
    'Robotics Grant,https://example.org/robotics/,Funds robotics prototypes.,SMEs in Berlin,30.06.2027,info@example.org',
  ].join('\n'),
);

function program(extra: Partial<FundingProgram>): FundingProgram {
  return { deadlineDate: null, daysLeft: null, relevanceScore: 50, origin: 'vector', ...extra };
}

describe('backfillProgram', () => {
  const sparse = program({
    name: 'robotics grant',
    url: 'https://EXAMPLE.org/robotics',
    description: 'N/A',
    eligibility: 'Startups only',
  });

  it('fills missing fields from the row with the same URL and keeps present ones', () => {
    const filled = backfillProgram(sparse, dataset, now);
    expect(filled).toMatchObject({
      name: 'robotics grant',
      description: 'Funds robotics prototypes.',
      eligibility: 'Startups only',
      deadline: '30.06.2027',
      contact: 'info@example.org',
      deadlineDate: '2027-06-30T00:00:00.000Z',
      daysLeft: 180,
    });
    expect(sparse.description).toBe('N/A');
  });

  it('is idempotent', () => {
    const once = backfillProgram(sparse, dataset, now);
    expect(backfillProgram(once, dataset, now)).toEqual(once);
  });

  it('matches by name when the program has no URL', () => {
    const filled = backfillProgram(program({ name: '  Robotics   Grant ' }), dataset, now);
    expect(filled.url).toBe('https://example.org/robotics/');
  });

  it('stays idempotent when another row shares the URL of the name match', () => {
    const shared = FundingDataset.fromCsv(
      [
        'name,url,description,contact',
        'Other Listing,https://example.org/shared,,office@example.org',
        'Robotics Grant,https://example.org/shared,Funds robotics prototypes.,',
      ].join('\n'),
    );

    const once = backfillProgram(program({ name: 'Robotics Grant' }), shared, now);

    expect(once.description).toBe('Funds robotics prototypes.');
    expect(once.url).toBeUndefined();
    expect(once.contact).toBeUndefined();
    expect(backfillProgram(once, shared, now)).toEqual(once);
  });

  it('returns the program unchanged without a matching row', () => {
    const other = program({ name: 'Ocean Fund' });
    expect(backfillProgram(other, dataset, now)).toBe(other);
  });
});

describe('backfillShortlist', () => {
  it('keeps order and length', () => {
    const list = [program({ name: 'Other' }), program({ name: 'Robotics Grant' })];
    const result = backfillShortlist(list, dataset, now);
    expect(result.map((p) => p.name)).toEqual(['Other', 'Robotics Grant']);
    expect(result[1].contact).toBe('info@example.org');
  });
});
