import { Router } from 'express';
import type { EngineContext } from '@core/context';
import { isOrganizer } from '@core/identity';
import { applyTransition, listTalkEvents, respondToTalk } from '@core/lifecycle';
import { createTalk, deleteTalk, getTalk, listTalks, updateTalk } from '@core/talk-store';
import { createTalkSchema, parseInput, updateTalkSchema } from '@core/validation';
import { actorOf, asyncHandler } from '../middleware/index';
import { respondBodySchema, talkListQuerySchema, transitionBodySchema } from '../schemas';

export function createTalksRouter(ctx: EngineContext): Router {
  const router = Router();

  // Speakers only ever see their own submissions
  router.get(
    '/talks',
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const filter = parseInput(talkListQuerySchema, req.query);
      const rows = await listTalks(ctx, {
        state: filter.state,
        speakerId: isOrganizer(actor) ? filter.speakerId : actor.userId,
      });
      res.json({ success: true, data: rows });
    }),
  );

  router.post(
    '/talks',
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const talk = await createTalk(ctx, actor, parseInput(createTalkSchema, req.body));
      res.status(201).json({ success: true, data: talk });
    }),
  );

  router.get(
    '/talks/:id',
    asyncHandler(async (req, res) => {
      const talk = await getTalk(ctx, req.params.id, actorOf(req));
      res.json({ success: true, data: talk });
    }),
  );

  router.patch(
    '/talks/:id',
    asyncHandler(async (req, res) => {
      const talk = await updateTalk(ctx, req.params.id, actorOf(req), parseInput(updateTalkSchema, req.body));
      res.json({ success: true, data: talk });
    }),
  );

  router.delete(
    '/talks/:id',
    asyncHandler(async (req, res) => {
      await deleteTalk(ctx, req.params.id, actorOf(req));
      res.json({ success: true });
    }),
  );

  // ---- Lifecycle ----

  router.post(
    '/talks/:id/transition',
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const { targetState, reason } = parseInput(transitionBodySchema, req.body);
      const outcome = await applyTransition(ctx, req.params.id, targetState, actor, reason);
      res.json({ success: true, data: outcome });
    }),
  );

  router.post(
    '/talks/:id/respond',
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const { response } = parseInput(respondBodySchema, req.body);
      const outcome = await respondToTalk(ctx, req.params.id, response, actor);
      res.json({ success: true, data: outcome });
    }),
  );

  router.get(
    '/talks/:id/events',
    asyncHandler(async (req, res) => {
      // read access follows talk visibility
      await getTalk(ctx, req.params.id, actorOf(req));
      const rows = await listTalkEvents(ctx, req.params.id);
      res.json({ success: true, data: rows });
    }),
  );

  return router;
}
