import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import { LifecycleTracker } from '@core/tracker';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { apiRouter } from './routes/index';

export interface AppOptions {
  tracker?: LifecycleTracker;
  logRequests?: boolean;
}

export function createApp(options: AppOptions = {}): Express {
  const tracker = options.tracker ?? new LifecycleTracker();
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, apiRouter(tracker));
  app.use(errorHandler);

  return app;
}
