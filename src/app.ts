import express from 'express';
import helmet from 'helmet';

import { getConfig } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { loggingMiddleware } from './middleware/logging';
import healthRouter from './routes/health';
import { createCyclesRouter } from './routes/api/cycles';
import type { FlightSyncService } from './services/flightSyncService';

type CreateAppOptions = {
  syncService?: Pick<FlightSyncService, 'run' | 'getLatestStatus'>;
};

export const createApp = (options: CreateAppOptions = {}) => {
  const app = express();
  const config = getConfig();

  app.set('trust proxy', config.nodeEnv === 'production');

  app.use(helmet());
  app.use(express.json());
  app.use(loggingMiddleware);

  app.use('/health', healthRouter);

  if (options.syncService) {
    app.use('/api/cycles', createCyclesRouter(options.syncService));
  }

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
