import { describe, it, expect } from 'vitest';
import { ProgramSelector, SELECT_SYSTEM_PROMPT, positionalFallback, validatePicks } from '@/services/program-selector';
import { GenerativeError } from '@/utils/errors';
import { FakeLlm, makeProgram } from './helpers';

const shortlist = ['Alpha', 'Beta', 'Gamma', 'Delta', 'Epsilon'].map((name) => makeProgram(name));

describe('validatePicks', () => {
  it('keeps valid unique ids in model order up to wanted', () => {
    const raw = {
      picks: [
        { id: 3, why: 'Matches AI focus' },
        { id: 3, why: 'duplicate' },
        { id: 9, why: 'out of range' },
        { id: '2', why: 'string id' },
        { id: 1 },
        { id: 4, why: 'over the limit' },
      ],
    };
    expect(validatePicks(raw, 5, 3)).toEqual({
      ids: [3, 2, 1],
      reasons: { 3: 'Matches AI focus', 2: 'string id', 1: '' },
      fallback: false,
    });
  });

  it('skips picks whose id is not a number', () => {
    expect(validatePicks({ picks: [{ id: 'two' }, { id: 2.5 }, { id: '4' }] }, 5, 3).ids).toEqual([4]);
  });

  it('caps reasons at 300 characters', () => {
    const { reasons } = validatePicks({ picks: [{ id: 1, why: 'x'.repeat(400) }] }, 5, 3);
    expect(reasons[1]).toHaveLength(300);
  });

  it('rejects a response without picks', () => {
    expect(() => validatePicks({ foo: 1 }, 5, 3)).toThrow(GenerativeError);
  });
});

describe('positionalFallback', () => {
  it('takes the first positions', () => {
    expect(positionalFallback(5, 3)).toEqual({ ids: [1, 2, 3], reasons: {}, fallback: true });
    expect(positionalFallback(2, 3).ids).toEqual([1, 2]);
  });
});

describe('ProgramSelector', () => {
  it('sends the shortlist with 1-based ids and clipped descriptions', async () => {
    const llm = new FakeLlm(async () => ({ picks: [{ id: 2, why: 'Good fit' }] }));
    const selector = new ProgramSelector(llm, { model: 'test-model' });
    const long = [makeProgram('Long', { description: 'd'.repeat(1000) }), ...shortlist];

    const { selection, failure } = await selector.select('ai grant', long, 3);

    expect(selection).toEqual({ ids: [2], reasons: { 2: 'Good fit' }, fallback: false });
    expect(failure).toBeUndefined();
    expect(llm.calls[0].system).toBe(SELECT_SYSTEM_PROMPT);
    const payload = JSON.parse(llm.calls[0].user);
    expect(payload.user_query).toBe('ai grant');
    expect(payload.programs[0].id).toBe(1);
    expect(payload.programs[0].description).toHaveLength(800);
    expect(payload.programs[5].name).toBe('Epsilon');
    expect(payload.instruction).toContain('Pick up to 3 unique programs by id');
    expect(payload.instruction).toContain('"why" citing the exact matches from the program text');
  });

  it('falls back to the first positions when the model times out', async () => {
    const llm = new FakeLlm(async () => {
      throw new GenerativeError('timeout', 'select timed out');
    });
    const selector = new ProgramSelector(llm, { model: 'test-model' });

    const { selection, failure } = await selector.select('ai grant', shortlist, 3);

    expect(selection).toEqual({ ids: [1, 2, 3], reasons: {}, fallback: true });
    expect(failure?.kind).toBe('timeout');
  });

  it('falls back when no pick survives validation', async () => {
    const llm = new FakeLlm(async () => ({ picks: [{ id: 42 }] }));
    const selector = new ProgramSelector(llm, { model: 'test-model' });

    const { selection, failure } = await selector.select('ai grant', shortlist.slice(0, 2), 3);

    expect(selection.ids).toEqual([1, 2]);
    expect(failure?.kind).toBe('schema_mismatch');
  });

  it('does not call the model for an empty shortlist', async () => {
    const llm = new FakeLlm(async () => ({ picks: [] }));
    const selector = new ProgramSelector(llm, { model: 'test-model' });

    const { selection } = await selector.select('ai grant', [], 3);

    expect(selection.ids).toEqual([]);
    expect(llm.calls).toHaveLength(0);
  });
});
