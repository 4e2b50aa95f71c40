import { and, asc, eq, isNotNull, type SQL } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { scheduleSlots, tracks } from '@db/schema/index';
import type { EngineContext } from './context';
import { conflict, notFound, validationError } from './errors';
import { intervalsOverlap } from './time';
import { readStore, runInTransaction } from './transaction';
import {
  createSlotSchema,
  createTrackSchema,
  parseInput,
  updateSlotSchema,
  updateTrackSchema,
  type CreateSlotInput,
  type CreateTrackInput,
  type UpdateSlotInput,
  type UpdateTrackInput,
} from './validation';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Track = typeof tracks.$inferSelect;
export type ScheduleSlot = typeof scheduleSlots.$inferSelect;

export interface SlotFilter {
  conferenceId?: string;
  trackId?: string;
  slotDate?: string;
}

interface SlotPlacement {
  trackId: string;
  slotDate: string;
  startTime: string;
  endTime: string;
}

// ---------------------------------------------------------------------------
// Tracks
// ---------------------------------------------------------------------------

export async function createTrack(ctx: EngineContext, input: CreateTrackInput): Promise<Track> {
  const data = parseInput(createTrackSchema, input);
  return runInTransaction(ctx, async (tx) => {
    const [track] = await tx
      .insert(tracks)
      .values({ ...data, createdAt: ctx.clock.now() })
      .returning();
    return track;
  });
}

export async function updateTrack(
  ctx: EngineContext,
  trackId: string,
  patch: UpdateTrackInput,
): Promise<Track> {
  const changes = parseInput(updateTrackSchema, patch);
  if (Object.keys(changes).length === 0) return getTrack(ctx, trackId);

  return runInTransaction(ctx, async (tx) => {
    const [track] = await tx.update(tracks).set(changes).where(eq(tracks.id, trackId)).returning();
    if (!track) throw notFound('Track', trackId);
    return track;
  });
}

export async function getTrack(ctx: EngineContext, trackId: string): Promise<Track> {
  const [track] = await readStore(() => ctx.db.select().from(tracks).where(eq(tracks.id, trackId)));
  if (!track) throw notFound('Track', trackId);
  return track;
}

export async function listTracks(ctx: EngineContext, conferenceId?: string): Promise<Track[]> {
  return readStore(() =>
    ctx.db
      .select()
      .from(tracks)
      .where(conferenceId ? eq(tracks.conferenceId, conferenceId) : undefined)
      .orderBy(asc(tracks.name)),
  );
}

/**
 * Deletes a track and its empty slots. Refused with a Conflict while any
 * slot on the track still holds a talk: the caller unassigns first, so a
 * scheduled talk is never dropped from the grid as a side effect.
 */
export async function deleteTrack(ctx: EngineContext, trackId: string): Promise<void> {
  await runInTransaction(ctx, async (tx) => {
    await lockTrack(tx, trackId);

    const scheduled = await tx
      .select({ id: scheduleSlots.id })
      .from(scheduleSlots)
      .where(and(eq(scheduleSlots.trackId, trackId), isNotNull(scheduleSlots.talkId)));
    if (scheduled.length > 0) {
      throw conflict('Track still has scheduled talks; unassign them first', {
        slotIds: scheduled.map((s) => s.id),
      });
    }

    await tx.delete(scheduleSlots).where(eq(scheduleSlots.trackId, trackId));
    await tx.delete(tracks).where(eq(tracks.id, trackId));
  });
}

// ---------------------------------------------------------------------------
// Slot placement
// ---------------------------------------------------------------------------

/**
 * Taking the track row lock serializes every slot write on that track, so
 * the overlap check below and the write that follows it see the same grid.
 */
async function lockTrack(tx: Database, trackId: string): Promise<Track> {
  const [track] = await tx.select().from(tracks).where(eq(tracks.id, trackId)).for('update');
  if (!track) throw notFound('Track', trackId);
  return track;
}

function assertOrdered(placement: SlotPlacement): void {
  if (placement.startTime >= placement.endTime) {
    throw validationError('Start time must be before end time', {
      startTime: placement.startTime,
      endTime: placement.endTime,
    });
  }
}

/** Fails Conflict when `placement` overlaps another slot on the same track and date. */
async function assertNoOverlap(
  tx: Database,
  placement: SlotPlacement,
  ignoreSlotId?: string,
): Promise<void> {
  const sameDay = await tx
    .select()
    .from(scheduleSlots)
    .where(
      and(
        eq(scheduleSlots.trackId, placement.trackId),
        eq(scheduleSlots.slotDate, placement.slotDate),
      ),
    )
    .orderBy(asc(scheduleSlots.startTime));

  const wanted = { start: placement.startTime, end: placement.endTime };
  const clash = sameDay.find(
    (slot) =>
      slot.id !== ignoreSlotId &&
      intervalsOverlap(wanted, { start: slot.startTime, end: slot.endTime }),
  );

  if (clash) {
    throw conflict(
      `Slot ${placement.startTime}-${placement.endTime} overlaps ${clash.startTime}-${clash.endTime} on ${placement.slotDate}`,
      { conflictingSlotId: clash.id },
    );
  }
}

// ---------------------------------------------------------------------------
// Slots
// ---------------------------------------------------------------------------

export async function createSlot(ctx: EngineContext, input: CreateSlotInput): Promise<ScheduleSlot> {
  const placement = parseInput(createSlotSchema, input);
  assertOrdered(placement);
  const now = ctx.clock.now();

  return runInTransaction(ctx, async (tx) => {
    const track = await lockTrack(tx, placement.trackId);
    await assertNoOverlap(tx, placement);

    const [slot] = await tx
      .insert(scheduleSlots)
      .values({
        ...placement,
        conferenceId: track.conferenceId,
        talkId: null,
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    return slot;
  });
}

/**
 * Moves or resizes a slot. The assigned talk, if any, travels with it; use
 * `assign` / `unassign` to change who is in the slot.
 */
export async function updateSlot(
  ctx: EngineContext,
  slotId: string,
  patch: UpdateSlotInput,
): Promise<ScheduleSlot> {
  const changes = parseInput(updateSlotSchema, patch);

  return runInTransaction(ctx, async (tx) => {
    const [current] = await tx
      .select()
      .from(scheduleSlots)
      .where(eq(scheduleSlots.id, slotId))
      .for('update');
    if (!current) throw notFound('Schedule slot', slotId);

    const placement: SlotPlacement = {
      trackId: changes.trackId ?? current.trackId,
      slotDate: changes.slotDate ?? current.slotDate,
      startTime: changes.startTime ?? current.startTime,
      endTime: changes.endTime ?? current.endTime,
    };
    assertOrdered(placement);

    // both tracks, in id order, so two opposite moves cannot deadlock
    const trackIds = [...new Set([current.trackId, placement.trackId])].sort();
    let target: Track | undefined;
    for (const id of trackIds) {
      const locked = await lockTrack(tx, id);
      if (id === placement.trackId) target = locked;
    }
    if (!target) throw notFound('Track', placement.trackId);

    await assertNoOverlap(tx, placement, slotId);

    const [updated] = await tx
      .update(scheduleSlots)
      .set({ ...placement, conferenceId: target.conferenceId, updatedAt: ctx.clock.now() })
      .where(eq(scheduleSlots.id, slotId))
      .returning();
    return updated;
  });
}

export async function deleteSlot(ctx: EngineContext, slotId: string): Promise<void> {
  await runInTransaction(ctx, async (tx) => {
    const removed = await tx
      .delete(scheduleSlots)
      .where(eq(scheduleSlots.id, slotId))
      .returning({ id: scheduleSlots.id });
    if (removed.length === 0) throw notFound('Schedule slot', slotId);
  });
}

export async function getSlot(ctx: EngineContext, slotId: string): Promise<ScheduleSlot> {
  const [slot] = await readStore(() =>
    ctx.db.select().from(scheduleSlots).where(eq(scheduleSlots.id, slotId)),
  );
  if (!slot) throw notFound('Schedule slot', slotId);
  return slot;
}

export async function listSlots(ctx: EngineContext, filter: SlotFilter = {}): Promise<ScheduleSlot[]> {
  const conditions: SQL[] = [];
  if (filter.conferenceId) conditions.push(eq(scheduleSlots.conferenceId, filter.conferenceId));
  if (filter.trackId) conditions.push(eq(scheduleSlots.trackId, filter.trackId));
  if (filter.slotDate) conditions.push(eq(scheduleSlots.slotDate, filter.slotDate));

  return readStore(() =>
    ctx.db
      .select()
      .from(scheduleSlots)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(scheduleSlots.slotDate), asc(scheduleSlots.startTime)),
  );
}
