import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { EngineContext } from '@core/context';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

export interface AppOptions {
  clientUrl: string;
  /** morgan output; off in tests */
  logRequests?: boolean;
}

export function createApp(ctx: EngineContext, options: AppOptions): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: options.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) app.use(requestLogger);

  app.use(API_PREFIX, createApiRouter(ctx));
  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Route not found', code: 'NOT_FOUND' });
  });

  app.use(errorHandler);
  return app;
}
