import { and, desc, eq, type SQL } from 'drizzle-orm';
import { talks } from '@db/schema/index';
import { DELETABLE_STATES, EDITABLE_STATES } from '@shared/constants';
import type { TalkState } from '@shared/types';
import type { EngineContext } from './context';
import { permissionDenied, stateError } from './errors';
import { isOrganizer, ownsTalk, type Actor } from './identity';
import {
  insertTalkLabels,
  labelsOfTalk,
  requireLabels,
  requireTalk,
  type Label,
  type Talk,
} from './queries';
import { readStore, runInTransaction } from './transaction';
import {
  createTalkSchema,
  parseInput,
  updateTalkSchema,
  type CreateTalkInput,
  type UpdateTalkInput,
} from './validation';

export type { Talk };

export interface TalkWithLabels extends Talk {
  labels: Label[];
}

export interface TalkFilter {
  state?: TalkState;
  speakerId?: string;
}

const editableStates: readonly TalkState[] = EDITABLE_STATES;
const deletableStates: readonly TalkState[] = DELETABLE_STATES;
const isEditable = (state: TalkState) => editableStates.includes(state);
const isDeletable = (state: TalkState) => deletableStates.includes(state);

/**
 * Stores a new submission owned by `actor`. Labels passed along are attached
 * in the same transaction, with the submitter recorded as the one who added them.
 */
export async function createTalk(
  ctx: EngineContext,
  actor: Actor,
  input: CreateTalkInput,
): Promise<TalkWithLabels> {
  const data = parseInput(createTalkSchema, input);
  const now = ctx.clock.now();

  return runInTransaction(ctx, async (tx) => {
    await requireLabels(tx, data.labelIds ?? []);

    const [talk] = await tx
      .insert(talks)
      .values({
        speakerId: actor.userId,
        title: data.title,
        shortSummary: data.shortSummary,
        longDescription: data.longDescription,
        state: 'submitted',
        submittedAt: now,
        updatedAt: now,
      })
      .returning();

    await insertTalkLabels(tx, talk.id, data.labelIds ?? [], actor.userId, now);
    return { ...talk, labels: await labelsOfTalk(tx, talk.id) };
  });
}

/** Speakers see their own talks; organizers see every talk. */
export async function getTalk(
  ctx: EngineContext,
  talkId: string,
  actor: Actor,
): Promise<TalkWithLabels> {
  return readStore(async () => {
    const talk = await requireTalk(ctx.db, talkId);
    if (!isOrganizer(actor) && !ownsTalk(actor, talk)) {
      throw permissionDenied("You don't have permission to view this talk");
    }
    return { ...talk, labels: await labelsOfTalk(ctx.db, talk.id) };
  });
}

export async function listTalks(ctx: EngineContext, filter: TalkFilter = {}): Promise<Talk[]> {
  const conditions: SQL[] = [];
  if (filter.state) conditions.push(eq(talks.state, filter.state));
  if (filter.speakerId) conditions.push(eq(talks.speakerId, filter.speakerId));

  return readStore(() =>
    ctx.db
      .select()
      .from(talks)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(talks.submittedAt)),
  );
}

export async function updateTalk(
  ctx: EngineContext,
  talkId: string,
  actor: Actor,
  patch: UpdateTalkInput,
): Promise<Talk> {
  const changes = parseInput(updateTalkSchema, patch);

  return runInTransaction(ctx, async (tx) => {
    const talk = await requireTalk(tx, talkId, { lock: true });
    if (!ownsTalk(actor, talk)) {
      throw permissionDenied('You can only update your own talk submissions');
    }
    if (!isEditable(talk.state)) {
      throw stateError(`A talk in state '${talk.state}' can no longer be edited`, {
        state: talk.state,
      });
    }

    const [updated] = await tx
      .update(talks)
      .set({ ...changes, updatedAt: ctx.clock.now() })
      .where(eq(talks.id, talkId))
      .returning();
    return updated;
  });
}

/**
 * Removes a talk while it is still `submitted` or already `rejected`.
 * Ratings, labels and the transition history go with it.
 */
export async function deleteTalk(ctx: EngineContext, talkId: string, actor: Actor): Promise<void> {
  await runInTransaction(ctx, async (tx) => {
    const talk = await requireTalk(tx, talkId, { lock: true });
    if (!isOrganizer(actor) && !ownsTalk(actor, talk)) {
      throw permissionDenied('You can only delete your own talk submissions');
    }
    if (!isDeletable(talk.state)) {
      throw stateError(`A talk in state '${talk.state}' cannot be deleted`, {
        state: talk.state,
      });
    }
    await tx.delete(talks).where(eq(talks.id, talkId));
  });
}
