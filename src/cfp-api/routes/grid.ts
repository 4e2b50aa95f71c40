import { Router } from 'express';
import {
  createConference,
  deleteConference,
  getActiveConference,
  getConference,
  listConferences,
  updateConference,
} from '@core/conferences';
import type { EngineContext } from '@core/context';
import { assign, getSchedule, unassign } from '@core/schedule-assigner';
import {
  createSlot,
  createTrack,
  deleteSlot,
  deleteTrack,
  getSlot,
  getTrack,
  listSlots,
  listTracks,
  updateSlot,
  updateTrack,
} from '@core/schedule-grid';
import {
  createConferenceSchema,
  createSlotSchema,
  createTrackSchema,
  parseInput,
  updateConferenceSchema,
  updateSlotSchema,
  updateTrackSchema,
} from '@core/validation';
import { asyncHandler, organizerOf } from '../middleware/index';
import { assignBodySchema, conferenceQuerySchema, slotQuerySchema } from '../schemas';

/**
 * Conferences, tracks, slots and assignments. Reads are public (the published
 * schedule); every write needs an organizer.
 */
export function createGridRouter(ctx: EngineContext): Router {
  const router = Router();

  // ---- Conferences ----

  router.get(
    '/conferences',
    asyncHandler(async (_req, res) => {
      res.json({ success: true, data: await listConferences(ctx) });
    }),
  );

  router.get(
    '/conferences/active',
    asyncHandler(async (_req, res) => {
      res.json({ success: true, data: await getActiveConference(ctx) });
    }),
  );

  router.get(
    '/conferences/:id',
    asyncHandler(async (req, res) => {
      res.json({ success: true, data: await getConference(ctx, req.params.id) });
    }),
  );

  router.post(
    '/conferences',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const conference = await createConference(ctx, parseInput(createConferenceSchema, req.body));
      res.status(201).json({ success: true, data: conference });
    }),
  );

  router.patch(
    '/conferences/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const conference = await updateConference(
        ctx,
        req.params.id,
        parseInput(updateConferenceSchema, req.body),
      );
      res.json({ success: true, data: conference });
    }),
  );

  router.delete(
    '/conferences/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      await deleteConference(ctx, req.params.id);
      res.json({ success: true });
    }),
  );

  // ---- Tracks ----

  router.get(
    '/tracks',
    asyncHandler(async (req, res) => {
      const { conferenceId } = parseInput(conferenceQuerySchema, req.query);
      res.json({ success: true, data: await listTracks(ctx, conferenceId) });
    }),
  );

  router.get(
    '/tracks/:id',
    asyncHandler(async (req, res) => {
      res.json({ success: true, data: await getTrack(ctx, req.params.id) });
    }),
  );

  router.post(
    '/tracks',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const track = await createTrack(ctx, parseInput(createTrackSchema, req.body));
      res.status(201).json({ success: true, data: track });
    }),
  );

  router.patch(
    '/tracks/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const track = await updateTrack(ctx, req.params.id, parseInput(updateTrackSchema, req.body));
      res.json({ success: true, data: track });
    }),
  );

  router.delete(
    '/tracks/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      await deleteTrack(ctx, req.params.id);
      res.json({ success: true });
    }),
  );

  // ---- Slots ----

  router.get(
    '/slots',
    asyncHandler(async (req, res) => {
      const filter = parseInput(slotQuerySchema, req.query);
      res.json({ success: true, data: await listSlots(ctx, filter) });
    }),
  );

  router.get(
    '/slots/:id',
    asyncHandler(async (req, res) => {
      res.json({ success: true, data: await getSlot(ctx, req.params.id) });
    }),
  );

  router.post(
    '/slots',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const slot = await createSlot(ctx, parseInput(createSlotSchema, req.body));
      res.status(201).json({ success: true, data: slot });
    }),
  );

  router.patch(
    '/slots/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const slot = await updateSlot(ctx, req.params.id, parseInput(updateSlotSchema, req.body));
      res.json({ success: true, data: slot });
    }),
  );

  router.delete(
    '/slots/:id',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      await deleteSlot(ctx, req.params.id);
      res.json({ success: true });
    }),
  );

  router.post(
    '/slots/:id/assign',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      const { talkId } = parseInput(assignBodySchema, req.body);
      res.json({ success: true, data: await assign(ctx, req.params.id, talkId) });
    }),
  );

  router.post(
    '/slots/:id/unassign',
    asyncHandler(async (req, res) => {
      organizerOf(req);
      res.json({ success: true, data: await unassign(ctx, req.params.id) });
    }),
  );

  // ---- Published schedule ----

  router.get(
    '/schedule',
    asyncHandler(async (req, res) => {
      const { conferenceId } = parseInput(conferenceQuerySchema, req.query);
      res.json({ success: true, data: await getSchedule(ctx, conferenceId) });
    }),
  );

  return router;
}
