// node/src/memory/SessionStore.ts

import type { SessionContext } from '@/types/funding';

/**
 * SessionStore interface for abstracting session storage
 * Supports both in-memory and persistent (Redis) storage
 */
export interface SessionStore {
  /**
   * Session context for a session ID, or null if not found/expired.
   * Refreshes the TTL when the session exists.
   */
  get(sessionId: string): Promise<SessionContext | null>;

  /** Save or replace the session context; resets the TTL. */
  set(sessionId: string, context: SessionContext): Promise<void>;

  delete(sessionId: string): Promise<void>;

  refreshTTL(sessionId: string): Promise<void>;

  /** True if the store is ready to use */
  isAvailable(): boolean;

  /** Release timers and connections. */
  destroy(): Promise<void>;
}
