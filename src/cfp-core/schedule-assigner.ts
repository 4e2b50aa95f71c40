import { and, asc, eq, ne } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { scheduleSlots, talks, tracks } from '@db/schema/index';
import type { EngineContext } from './context';
import { conflict, notFound, stateError } from './errors';
import { findTalk } from './queries';
import type { ScheduleSlot } from './schedule-grid';
import { readStore, runInTransaction } from './transaction';

export interface ScheduledTalk {
  id: string;
  title: string;
  shortSummary: string;
  speakerId: string;
}

export interface ScheduleEntry {
  slotId: string;
  conferenceId: string;
  trackId: string;
  trackName: string;
  slotDate: string;
  startTime: string;
  endTime: string;
  talk: ScheduledTalk | null;
}

async function lockSlot(tx: Database, slotId: string): Promise<ScheduleSlot | undefined> {
  const [slot] = await tx
    .select()
    .from(scheduleSlots)
    .where(eq(scheduleSlots.id, slotId))
    .for('update');
  return slot;
}

/**
 * Puts an accepted talk into a slot.
 *
 * The talk row is locked before the slot, the same order a cancelling
 * transition uses, so the two cannot interleave. Assigning the talk a slot
 * already holds returns that slot unchanged.
 */
export async function assign(
  ctx: EngineContext,
  slotId: string,
  talkId: string,
): Promise<ScheduleSlot> {
  return runInTransaction(ctx, async (tx) => {
    const talk = await findTalk(tx, talkId, { lock: true });
    const slot = await lockSlot(tx, slotId);
    if (!slot) throw notFound('Schedule slot', slotId);
    if (!talk) throw notFound('Talk', talkId);

    if (talk.state !== 'accepted') {
      throw stateError(`Only accepted talks can be scheduled; this talk is '${talk.state}'`, {
        talkId,
        state: talk.state,
      });
    }

    if (slot.talkId === talkId) return slot;

    if (slot.talkId !== null) {
      throw conflict('Slot already holds another talk', { slotId, occupiedBy: slot.talkId });
    }

    const [elsewhere] = await tx
      .select({ id: scheduleSlots.id })
      .from(scheduleSlots)
      .where(and(eq(scheduleSlots.talkId, talkId), ne(scheduleSlots.id, slotId)))
      .limit(1);
    if (elsewhere) {
      throw conflict('Talk is already scheduled in another slot', {
        talkId,
        scheduledIn: elsewhere.id,
      });
    }

    const [updated] = await tx
      .update(scheduleSlots)
      .set({ talkId, updatedAt: ctx.clock.now() })
      .where(eq(scheduleSlots.id, slotId))
      .returning();
    return updated;
  });
}

/** Empties a slot. Already-empty slots come back as they are. */
export async function unassign(ctx: EngineContext, slotId: string): Promise<ScheduleSlot> {
  return runInTransaction(ctx, async (tx) => {
    const slot = await lockSlot(tx, slotId);
    if (!slot) throw notFound('Schedule slot', slotId);
    if (slot.talkId === null) return slot;

    const [updated] = await tx
      .update(scheduleSlots)
      .set({ talkId: null, updatedAt: ctx.clock.now() })
      .where(eq(scheduleSlots.id, slotId))
      .returning();
    return updated;
  });
}

/** The grid as attendees see it: every slot with its room and, if filled, its talk. */
export async function getSchedule(
  ctx: EngineContext,
  conferenceId?: string,
): Promise<ScheduleEntry[]> {
  return readStore(() =>
    ctx.db
      .select({
        slotId: scheduleSlots.id,
        conferenceId: scheduleSlots.conferenceId,
        trackId: scheduleSlots.trackId,
        trackName: tracks.name,
        slotDate: scheduleSlots.slotDate,
        startTime: scheduleSlots.startTime,
        endTime: scheduleSlots.endTime,
        talk: {
          id: talks.id,
          title: talks.title,
          shortSummary: talks.shortSummary,
          speakerId: talks.speakerId,
        },
      })
      .from(scheduleSlots)
      .innerJoin(tracks, eq(scheduleSlots.trackId, tracks.id))
      .leftJoin(talks, eq(scheduleSlots.talkId, talks.id))
      .where(conferenceId ? eq(scheduleSlots.conferenceId, conferenceId) : undefined)
      .orderBy(asc(scheduleSlots.slotDate), asc(scheduleSlots.startTime), asc(tracks.name)),
  );
}
