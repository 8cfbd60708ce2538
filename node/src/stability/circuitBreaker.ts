// node/src/stability/circuitBreaker.ts — circuit breaker with per-call timeout for outbound model calls
import { logger } from '@/services/logger';
import { withTimeout } from '@/utils/retryWithBackoff';

export enum CircuitState {
  CLOSED = 'CLOSED', // Normal operation
  OPEN = 'OPEN', // Failing, reject requests
  HALF_OPEN = 'HALF_OPEN', // Testing if service recovered
}

export interface CircuitBreakerConfig {
  name: string;
  failureThreshold: number; // Open circuit after N failures
  successThreshold: number; // Close circuit after N successes (half-open)
  timeout: number; // Per-call timeout (ms)
  resetTimeout: number; // Time before attempting half-open (ms)
}

export class CircuitOpenError extends Error {
  constructor(name: string) {
    super(`Circuit breaker "${name}" is OPEN - service unavailable`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly clock: () => number = Date.now,
  ) {}

  /**
   * Execute function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      const timeSinceFailure = this.clock() - this.lastFailureTime;
      if (timeSinceFailure > this.config.resetTimeout) {
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
        logger.info('circuit:half_open', { name: this.config.name });
      } else {
        throw new CircuitOpenError(this.config.name);
      }
    }

    try {
      const result = await withTimeout(fn, this.config.timeout, this.config.name);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = CircuitState.CLOSED;
        logger.info('circuit:closed', { name: this.config.name });
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.clock();

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.state = CircuitState.OPEN;
      logger.error('circuit:open', { name: this.config.name, failures: this.failureCount });
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
  }
}

export function createLlmCircuitBreaker(timeoutMs: number): CircuitBreaker {
  return new CircuitBreaker({
    name: 'llm',
    failureThreshold: 3,
    successThreshold: 1,
    timeout: timeoutMs,
    resetTimeout: 120000, // 2 minutes before retry
  });
}
