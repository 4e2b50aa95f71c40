import { Router } from 'express';
import type { EngineContext } from '@core/context';
import {
  addLabels,
  createLabel,
  deleteLabel,
  getLabel,
  labelsForTalk,
  listLabels,
  removeLabel,
  updateLabel,
} from '@core/labels';
import { getTalk } from '@core/talk-store';
import { createLabelSchema, parseInput, updateLabelSchema } from '@core/validation';
import { actorOf, asyncHandler, organizerOf } from '../middleware/index';
import { addLabelsBodySchema } from '../schemas';

export function createLabelsRouter(ctx: EngineContext): Router {
  const router = Router();

  // ---- Catalogue ----

  router.get(
    '/labels',
    asyncHandler(async (req, res) => {
      actorOf(req);
      res.json({ success: true, data: await listLabels(ctx) });
    }),
  );

  router.get(
    '/labels/:id',
    asyncHandler(async (req, res) => {
      actorOf(req);
      res.json({ success: true, data: await getLabel(ctx, req.params.id) });
    }),
  );

  router.post(
    '/labels',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const label = await createLabel(ctx, parseInput(createLabelSchema, req.body));
      res.status(201).json({ success: true, data: label });
    }),
  );

  router.patch(
    '/labels/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const label = await updateLabel(ctx, req.params.id, parseInput(updateLabelSchema, req.body));
      res.json({ success: true, data: label });
    }),
  );

  router.delete(
    '/labels/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      await deleteLabel(ctx, req.params.id);
      res.json({ success: true });
    }),
  );

  // ---- Talk attachments ----

  router.get(
    '/talks/:id/labels',
    asyncHandler(async (req, res) => {
      await getTalk(ctx, req.params.id, actorOf(req));
      res.json({ success: true, data: await labelsForTalk(ctx, req.params.id) });
    }),
  );

  router.post(
    '/talks/:id/labels',
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const { labelIds } = parseInput(addLabelsBodySchema, req.body);
      const attached = await addLabels(ctx, req.params.id, labelIds, actor);
      res.json({ success: true, data: attached });
    }),
  );

  router.delete(
    '/talks/:id/labels/:labelId',
    asyncHandler(async (req, res) => {
      // same ownership rule as attaching
      await getTalk(ctx, req.params.id, actorOf(req));
      const removed = await removeLabel(ctx, req.params.id, req.params.labelId);
      res.json({ success: true, data: { removed } });
    }),
  );

  return router;
}
