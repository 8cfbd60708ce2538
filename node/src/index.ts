// Load environment variables FIRST
import 'dotenv/config';

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import { appConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { getPipelineDeps } from '@/services/pipeline-deps';
import { createFundingRouter } from '@/routes/funding';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorMiddleware, notFoundMiddleware } from '@/middleware/error.middleware';
import {
  onShutdown,
  requestTimeout,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

const app = express();

// Security middleware
app.use(helmet());

app.use(
  cors({
    origin: appConfig.corsOrigins,
    credentials: true,
  }),
);

// Rate limiting is disabled in development
if (appConfig.nodeEnv !== 'development') {
  app.use(
    rateLimit({
      windowMs: 60 * 1000, // 1 minute window
      limit: 60, // per IP
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );
}

app.use(attachCorrelationId);
app.use(requestTimeout(appConfig.resilience.requestTimeoutMs));
app.use(express.json({ limit: '100kb' }));
app.use(compression());
app.use(morgan(appConfig.nodeEnv === 'development' ? 'dev' : 'combined'));

app.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'OK',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: appConfig.nodeEnv,
  });
});

app.use('/api/funding', createFundingRouter(() => getPipelineDeps(appConfig)));

app.use(notFoundMiddleware);
app.use(errorMiddleware);

setupUnhandledRejectionHandler(appConfig.nodeEnv);
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const startServer = async (): Promise<void> => {
  // Warm up: load the dataset, seed the index and connect the session store before accepting traffic.
  const deps = await getPipelineDeps(appConfig);
  onShutdown(() => deps.sessions.destroy());

  const server = app.listen(appConfig.port, () => {
    logger.info('server:listening', {
      url: `http://localhost:${appConfig.port}`,
      environment: appConfig.nodeEnv,
      health: `http://localhost:${appConfig.port}/health`,
    });
  });
  setServerInstance(server);
};

startServer().catch((err: unknown) => {
  logger.fatal('server:start_failed', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
