import { Router } from 'express';
import type { EngineContext } from '@core/context';
import { exportTalks } from '@core/export';
import { parseInput } from '@core/validation';
import { asyncHandler, organizerOf } from '../middleware/index';
import { exportQuerySchema } from '../schemas';

export function createExportRouter(ctx: EngineContext): Router {
  const router = Router();

  router.get(
    '/export/talks',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const { state } = parseInput(exportQuerySchema, req.query);
      const result = await exportTalks(ctx, { state });
      res.setHeader('Content-Disposition', `attachment; filename="talks-export-${result.exportedAt.toISOString().slice(0, 10)}.json"`);
      res.json({ success: true, data: result });
    }),
  );

  return router;
}
