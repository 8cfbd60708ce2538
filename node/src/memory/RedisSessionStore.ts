// node/src/memory/RedisSessionStore.ts

import { Redis } from 'ioredis';
import type { SessionStore } from './SessionStore';
import type { SessionContext } from '@/types/funding';
import { parseSessionContext } from './sessionContext';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

/**
 * Redis-backed session store
 * Persistent across server restarts, supports scaling
 */
export class RedisSessionStore implements SessionStore {
  private readonly client: Redis;
  private isConnected = false;
  private readonly ttl: number;
  private readonly keyPrefix = 'funding:session:';

  constructor(redisUrl: string, ttlMinutes: number = 30) {
    this.ttl = ttlMinutes * 60; // Redis TTL is in seconds
    this.client = new Redis(redisUrl, {
      // Exponential backoff, max 30 seconds
      retryStrategy: (times) => Math.min(times * 50, 30000),
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: true,
    });

    this.client.on('error', (err: Error) => {
      logger.error('session:redis_error', { error: err.message });
      this.isConnected = false;
    });
    this.client.on('ready', () => {
      logger.info('session:redis_ready');
      this.isConnected = true;
    });
    this.client.on('close', () => {
      logger.warn('session:redis_closed');
      this.isConnected = false;
    });
  }

  /** Opens the connection; callers fall back to another store when this rejects. */
  async connect(): Promise<void> {
    await this.client.connect();
    this.isConnected = true;
  }

  private getKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }

  async get(sessionId: string): Promise<SessionContext | null> {
    if (!this.isAvailable()) return null;

    const key = this.getKey(sessionId);
    const data = await this.client.get(key);
    if (!data) return null;

    await this.client.expire(key, this.ttl);
    const context = parseSessionContext(data);
    if (!context) {
      logger.warn('session:invalid_payload', { store: 'redis', sessionId });
    }
    return context;
  }

  async set(sessionId: string, context: SessionContext): Promise<void> {
    if (!this.isAvailable()) {
      throw new Error('RedisSessionStore: Redis not available');
    }
    await this.client.setex(this.getKey(sessionId), this.ttl, JSON.stringify(context));
    logger.debug('session:saved', {
      store: 'redis',
      sessionId,
      shortlist: context.lastShortlist.length,
      selection: context.lastSelection?.ids ?? [],
    });
  }

  async delete(sessionId: string): Promise<void> {
    if (!this.isAvailable()) return;
    await this.client.del(this.getKey(sessionId));
    logger.debug('session:deleted', { store: 'redis', sessionId });
  }

  async refreshTTL(sessionId: string): Promise<void> {
    if (!this.isAvailable()) return;
    try {
      await this.client.expire(this.getKey(sessionId), this.ttl);
    } catch (err) {
      logger.warn('session:refresh_failed', { store: 'redis', sessionId, error: errorMessage(err) });
    }
  }

  isAvailable(): boolean {
    return this.isConnected;
  }

  /**
   * Gracefully close Redis connection
   */
  async destroy(): Promise<void> {
    if (this.client.status === 'ready') {
      await this.client.quit();
    } else if (this.client.status !== 'end') {
      this.client.disconnect();
    }
    this.isConnected = false;
  }
}
