import { and, desc, eq, isNotNull } from 'drizzle-orm';
import { conferences, scheduleSlots } from '@db/schema/index';
import type { EngineContext } from './context';
import { conflict, notFound, validationError } from './errors';
import { readStore, runInTransaction } from './transaction';
import {
  createConferenceSchema,
  parseInput,
  updateConferenceSchema,
  type CreateConferenceInput,
  type UpdateConferenceInput,
} from './validation';

export type Conference = typeof conferences.$inferSelect;

export async function createConference(
  ctx: EngineContext,
  input: CreateConferenceInput,
): Promise<Conference> {
  const data = parseInput(createConferenceSchema, input);
  const now = ctx.clock.now();
  return runInTransaction(ctx, async (tx) => {
    const [conference] = await tx
      .insert(conferences)
      .values({ ...data, createdAt: now, updatedAt: now })
      .returning();
    return conference;
  });
}

export async function updateConference(
  ctx: EngineContext,
  conferenceId: string,
  patch: UpdateConferenceInput,
): Promise<Conference> {
  const changes = parseInput(updateConferenceSchema, patch);
  return runInTransaction(ctx, async (tx) => {
    const [current] = await tx
      .select()
      .from(conferences)
      .where(eq(conferences.id, conferenceId))
      .for('update');
    if (!current) throw notFound('Conference', conferenceId);

    const startDate = changes.startDate ?? current.startDate;
    const endDate = changes.endDate ?? current.endDate;
    if (startDate > endDate) {
      throw validationError('Start date must not be after end date', { startDate, endDate });
    }

    const [updated] = await tx
      .update(conferences)
      .set({ ...changes, updatedAt: ctx.clock.now() })
      .where(eq(conferences.id, conferenceId))
      .returning();
    return updated;
  });
}

export async function getConference(ctx: EngineContext, conferenceId: string): Promise<Conference> {
  const [row] = await readStore(() =>
    ctx.db.select().from(conferences).where(eq(conferences.id, conferenceId)),
  );
  if (!row) throw notFound('Conference', conferenceId);
  return row;
}

export async function listConferences(ctx: EngineContext): Promise<Conference[]> {
  return readStore(() =>
    ctx.db.select().from(conferences).orderBy(desc(conferences.startDate)),
  );
}

/** The most recently created conference still flagged active. */
export async function getActiveConference(ctx: EngineContext): Promise<Conference> {
  const [row] = await readStore(() =>
    ctx.db
      .select()
      .from(conferences)
      .where(eq(conferences.isActive, true))
      .orderBy(desc(conferences.createdAt))
      .limit(1),
  );
  if (!row) throw notFound('Conference', 'active');
  return row;
}

/**
 * Deletes a conference with its tracks and slots. Refused while any of its
 * slots still holds a talk.
 */
export async function deleteConference(ctx: EngineContext, conferenceId: string): Promise<void> {
  await runInTransaction(ctx, async (tx) => {
    const [current] = await tx
      .select({ id: conferences.id })
      .from(conferences)
      .where(eq(conferences.id, conferenceId))
      .for('update');
    if (!current) throw notFound('Conference', conferenceId);

    const scheduled = await tx
      .select({ id: scheduleSlots.id })
      .from(scheduleSlots)
      .where(and(eq(scheduleSlots.conferenceId, conferenceId), isNotNull(scheduleSlots.talkId)));
    if (scheduled.length > 0) {
      throw conflict('Conference still has scheduled talks; unassign them first', {
        slotIds: scheduled.map((s) => s.id),
      });
    }

    await tx.delete(conferences).where(eq(conferences.id, conferenceId));
  });
}
