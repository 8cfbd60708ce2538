import { describe, it, expect, afterEach } from 'vitest';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import { emptySessionContext, parseSessionContext } from '@/memory/sessionContext';
import type { SessionContext } from '@/types/funding';
import { makeProgram } from './helpers';

const MINUTE = 60 * 1000;

function contextFor(query: string): SessionContext {
  return {
    lastQuery: query,
    lastShortlist: [makeProgram('Alpha', { deadlineDate: '2027-06-30T00:00:00.000Z', daysLeft: 180 }), makeProgram('Beta')],
    lastSelection: { ids: [2, 1], reasons: { 2: 'Good fit' }, fallback: false },
    lastEnrichment: { 2: { brief: 'Brief', nextSteps: ['Call'] } },
    updatedAt: '2027-01-01T00:00:00.000Z',
  };
}

describe('InMemorySessionStore', () => {
  let now = 0;
  let store: InMemorySessionStore;

  afterEach(async () => {
    await store.destroy();
  });

  it('expires sessions after the TTL', async () => {
    now = 0;
    store = new InMemorySessionStore({ ttlMinutes: 1, cleanupIntervalMs: 0, clock: () => now });
    await store.set('s1', contextFor('robotics'));

    now = 30 * 1000;
    expect((await store.get('s1'))?.lastQuery).toBe('robotics');

    now += MINUTE + 1;
    expect(await store.get('s1')).toBeNull();
  });

  it('refreshes the TTL on read', async () => {
    now = 0;
    store = new InMemorySessionStore({ ttlMinutes: 1, cleanupIntervalMs: 0, clock: () => now });
    await store.set('s1', contextFor('robotics'));

    now = 50 * 1000;
    await store.get('s1');
    now = 100 * 1000;
    expect(await store.get('s1')).not.toBeNull();
  });

  it('evicts the oldest sessions at capacity', async () => {
    now = 0;
    store = new InMemorySessionStore({ maxSessions: 5, cleanupIntervalMs: 0, clock: () => now });
    for (let i = 0; i < 6; i++) {
      now = i * 1000;
      await store.set(`s${i}`, contextFor(`q${i}`));
    }

    expect(store.size()).toBe(5);
    expect(await store.get('s0')).toBeNull();
    expect(await store.get('s5')).not.toBeNull();
  });

  it('deletes sessions', async () => {
    store = new InMemorySessionStore({ cleanupIntervalMs: 0 });
    await store.set('s1', emptySessionContext());
    await store.delete('s1');
    expect(await store.get('s1')).toBeNull();
  });
});

describe('parseSessionContext', () => {
  it('restores numeric ids after a JSON round trip', () => {
    const parsed = parseSessionContext(JSON.stringify(contextFor('robotics')));

    expect(parsed?.lastSelection?.reasons[2]).toBe('Good fit');
    expect(parsed?.lastEnrichment[2]).toEqual({ brief: 'Brief', nextSteps: ['Call'] });
    expect(parsed?.lastShortlist[0].daysLeft).toBe(180);
  });

  it('rejects malformed or foreign data', () => {
    expect(parseSessionContext('{not json')).toBeNull();
    expect(parseSessionContext(JSON.stringify({ lastQuery: 3 }))).toBeNull();
  });
});
