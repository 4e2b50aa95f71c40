import { Router } from 'express';
import type { EngineContext } from '@core/context';
import healthRouter from './health';
import { createTalksRouter } from './talks';
import { createRatingsRouter } from './ratings';
import { createLabelsRouter } from './labels';
import { createGridRouter } from './grid';
import { createExportRouter } from './export';

export function createApiRouter(ctx: EngineContext): Router {
  const router = Router();
  router.use(healthRouter);
  router.use(createTalksRouter(ctx));
  router.use(createRatingsRouter(ctx));
  router.use(createLabelsRouter(ctx));
  router.use(createGridRouter(ctx));
  router.use(createExportRouter(ctx));
  return router;
}
