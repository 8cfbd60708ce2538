// node/src/memory/InMemorySessionStore.ts
import type { SessionStore } from './SessionStore';
import type { SessionContext } from '@/types/funding';
import { logger } from '@/services/logger';

interface SessionEntry {
  context: SessionContext;
  timestamp: number;
}

export interface InMemorySessionStoreOptions {
  ttlMinutes?: number;
  maxSessions?: number;
  /** Cleanup sweep period; 0 disables the timer. */
  cleanupIntervalMs?: number;
  clock?: () => number;
}

export class InMemorySessionStore implements SessionStore {
  private memory = new Map<string, SessionEntry>();
  private readonly ttl: number;
  private readonly maxSessions: number;
  private readonly clock: () => number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.ttl = (options.ttlMinutes ?? 30) * 60 * 1000;
    this.maxSessions = options.maxSessions ?? 1000;
    this.clock = options.clock ?? Date.now;
    this.startCleanupInterval(options.cleanupIntervalMs ?? 5 * 60 * 1000);
  }

  private startCleanupInterval(periodMs: number): void {
    if (periodMs <= 0) return;
    this.cleanupInterval = setInterval(() => this.cleanupExpiredSessions(), periodMs);
    this.cleanupInterval.unref();
  }

  private isExpired(entry: SessionEntry, now: number): boolean {
    return now - entry.timestamp > this.ttl;
  }

  /** Drops expired sessions, then the oldest 20% when at capacity. */
  cleanupExpiredSessions(): number {
    const now = this.clock();
    let cleaned = 0;

    for (const [sessionId, entry] of this.memory) {
      if (this.isExpired(entry, now)) {
        this.memory.delete(sessionId);
        cleaned++;
      }
    }

    if (this.memory.size >= this.maxSessions) {
      const oldest = Array.from(this.memory.entries())
        .sort((a, b) => a[1].timestamp - b[1].timestamp)
        .slice(0, Math.max(1, Math.floor(this.memory.size * 0.2)));
      for (const [sessionId] of oldest) {
        this.memory.delete(sessionId);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug('session:cleanup', { store: 'memory', cleaned });
    }
    return cleaned;
  }

  async get(sessionId: string): Promise<SessionContext | null> {
    const entry = this.memory.get(sessionId);
    if (!entry) return null;

    const now = this.clock();
    if (this.isExpired(entry, now)) {
      this.memory.delete(sessionId);
      return null;
    }

    entry.timestamp = now;
    return entry.context;
  }

  async set(sessionId: string, context: SessionContext): Promise<void> {
    if (!this.memory.has(sessionId)) this.cleanupExpiredSessions();

    this.memory.set(sessionId, { context, timestamp: this.clock() });
    logger.debug('session:saved', {
      store: 'memory',
      sessionId,
      shortlist: context.lastShortlist.length,
      selection: context.lastSelection?.ids ?? [],
    });
  }

  async delete(sessionId: string): Promise<void> {
    this.memory.delete(sessionId);
    logger.debug('session:deleted', { store: 'memory', sessionId });
  }

  async refreshTTL(sessionId: string): Promise<void> {
    const entry = this.memory.get(sessionId);
    if (entry) {
      entry.timestamp = this.clock();
    }
  }

  isAvailable(): boolean {
    return true;
  }

  size(): number {
    return this.memory.size;
  }

  async destroy(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
