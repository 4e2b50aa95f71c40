import { Router } from 'express';
import type { EngineContext } from '@core/context';
import { dashboard } from '@core/dashboard';
import { average, deleteRating, getRating, listRatings, rate, statistics } from '@core/ratings';
import { getTalk } from '@core/talk-store';
import { parseInput, ratingSchema } from '@core/validation';
import { actorOf, asyncHandler, organizerOf } from '../middleware/index';
import { statisticsQuerySchema } from '../schemas';

export function createRatingsRouter(ctx: EngineContext): Router {
  const router = Router();

  // ---- The caller's own rating ----

  router.get(
    '/talks/:id/ratings/me',
    asyncHandler(async (req, res) => {
      const actor = organizerOf(req);
      await getTalk(ctx, req.params.id, actor);
      const rating = await getRating(ctx, req.params.id, actor.userId);
      res.json({ success: true, data: rating });
    }),
  );

  router.put(
    '/talks/:id/ratings/me',
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const rating = await rate(ctx, req.params.id, actor, parseInput(ratingSchema, req.body));
      res.json({ success: true, data: rating });
    }),
  );

  router.delete(
    '/talks/:id/ratings/me',
    asyncHandler(async (req, res) => {
      const actor = organizerOf(req);
      const removed = await deleteRating(ctx, req.params.id, actor.userId);
      res.json({ success: true, data: { removed } });
    }),
  );

  // ---- Aggregates ----

  router.get(
    '/talks/:id/ratings',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const rows = await listRatings(ctx, req.params.id);
      res.json({ success: true, data: rows });
    }),
  );

  router.get(
    '/talks/:id/ratings/average',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const result = await average(ctx, req.params.id);
      res.json({ success: true, data: result });
    }),
  );

  router.get(
    '/ratings/statistics',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const { top } = parseInput(statisticsQuerySchema, req.query);
      const result = await statistics(ctx, top);
      res.json({ success: true, data: result });
    }),
  );

  router.get(
    '/dashboard',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      res.json({ success: true, data: await dashboard(ctx) });
    }),
  );

  return router;
}
