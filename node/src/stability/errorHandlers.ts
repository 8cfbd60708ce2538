import type { Server } from 'node:http';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

let serverInstance: Server | null = null;
const cleanupHooks: Array<() => Promise<void>> = [];
let shuttingDown = false;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Registers work to run before the process exits (closing stores, timers). */
export function onShutdown(hook: () => Promise<void>): void {
  cleanupHooks.push(hook);
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // Only production keeps serving after an unhandled rejection.
    if (nodeEnv !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown_started', { reason });

  // Give ongoing requests time to complete (15 seconds)
  const shutdownTimeout = setTimeout(() => {
    logger.error('process:forced_shutdown');
    process.exit(1);
  }, 15000);
  shutdownTimeout.unref();

  try {
    if (serverInstance) {
      const server = serverInstance;
      await new Promise<void>((resolve) => server.close(() => resolve()));
      logger.info('process:http_closed');
    }
    for (const hook of cleanupHooks) {
      await hook();
    }
    clearTimeout(shutdownTimeout);
    process.exit(exitCode);
  } catch (error) {
    logger.error('process:shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

/**
 * Answers 408 when a request has not responded within the timeout.
 */
export function requestTimeout(timeoutMs: number) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        logger.warn('request:timeout', { path: req.path, timeoutMs });
        res
          .status(408)
          .json(createErrorResponse(`Request exceeded ${timeoutMs}ms timeout`, undefined, 'request_timeout'));
      }
    }, timeoutMs);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));

    next();
  };
}
