import { describe, it, expect } from 'vitest';
import { isMissing, programName, toProgramRecord } from '@/services/program-fields';
import { dedupByKey, programDedupKey } from '@/services/dedup-utils';

describe('isMissing', () => {
  it('treats placeholders as missing', () => {
    for (const value of [undefined, null, '', '  ', 'N/A', 'none', 'Not specified', 'TBD', 'Deadline information not found', NaN]) {
      expect(isMissing(value)).toBe(true);
    }
  });

  it('keeps real values', () => {
    expect(isMissing('30.06.2027')).toBe(false);
    expect(isMissing('Berlin')).toBe(false);
    expect(isMissing(0)).toBe(false);
  });
});

describe('programName', () => {
  it('prefers the first present name field', () => {
    expect(programName({ name: 'N/A', title: 'Digital Europe' })).toBe('Digital Europe');
  });

  it('formats slug-like names with acronyms', () => {
    expect(programName({ name: 'r&d_funding_for_smes' })).toBe('R&D Funding For SMEs');
  });

  it('falls back to the URL slug', () => {
    expect(programName({ url: 'https://example.org/programs/ai-innovation-grant.html' })).toBe('AI Innovation Grant');
  });

  it('is Unnamed without name or path', () => {
    expect(programName({})).toBe('Unnamed');
    expect(programName({ url: 'https://example.org' })).toBe('Unnamed');
  });
});

describe('toProgramRecord', () => {
  it('keeps known string fields and stringifies finite numbers', () => {
    expect(toProgramRecord({ name: 'Grant', amount: 5000, extra: 'x', url: null })).toEqual({
      name: 'Grant',
      amount: '5000',
    });
  });
});

describe('programDedupKey', () => {
  it('normalizes URL case, whitespace and trailing slashes', () => {
    expect(programDedupKey({ url: ' https://Example.org/Grant/ ' })).toBe('url:https://example.org/grant');
    expect(programDedupKey({ url: 'https://example.org/grant' })).toBe('url:https://example.org/grant');
  });

  it('uses the fused name when the URL is missing', () => {
    expect(programDedupKey({ url: 'N/A', name: '  EIC   Accelerator ' })).toBe('name:eic accelerator');
  });

  it('is empty without URL or name', () => {
    expect(programDedupKey({ description: 'something' })).toBe('');
  });
});

describe('dedupByKey', () => {
  it('keeps the best score per key in first-seen order and never merges empty keys', () => {
    const items = [
      { item: { key: 'a', label: 'a1' }, score: 10 },
      { item: { key: '', label: 'x1' }, score: 1 },
      { item: { key: 'b', label: 'b1' }, score: 5 },
      { item: { key: 'a', label: 'a2' }, score: 30 },
      { item: { key: '', label: 'x2' }, score: 1 },
    ];
    const result = dedupByKey(items, (i) => i.key).map((s) => s.item.label);
    expect(result).toEqual(['a2', 'x1', 'b1', 'x2']);
  });
});
