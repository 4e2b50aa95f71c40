import { asc, eq } from 'drizzle-orm';
import { scheduleSlots, talkEvents, talks } from '@db/schema/index';
import type { TalkState } from '@shared/types';
import type { EngineContext } from './context';
import { CfpError } from './errors';
import type { TalkTransitionEvent } from './events';
import type { Actor } from './identity';
import { requireTalk, type Talk } from './queries';
import { evaluateTransition } from './state-machine';
import { readStore, runInTransaction } from './transaction';
import { parseInput, talkResponseSchema, talkStateSchema } from './validation';

export type TalkEvent = typeof talkEvents.$inferSelect;

export interface TransitionOutcome {
  talk: Talk;
  event: TalkTransitionEvent;
  /** Slots whose talk reference was cleared by this transition. */
  clearedSlotIds: string[];
}

/**
 * Moves a talk along one edge of the lifecycle table.
 *
 * The talk row stays locked from the read until commit, so a concurrent
 * `assign` cannot slip between the state write and the slot release that
 * an `accepted -> rejected` cancellation performs.
 */
export async function applyTransition(
  ctx: EngineContext,
  talkId: string,
  target: TalkState,
  actor: Actor,
  reason?: string,
): Promise<TransitionOutcome> {
  const targetState = parseInput(talkStateSchema, target);

  const outcome = await runInTransaction(ctx, async (tx) => {
    const talk = await requireTalk(tx, talkId, { lock: true });

    const result = evaluateTransition(talk, targetState, actor);
    if (!result.ok) {
      throw new CfpError(
        result.code === 'INVALID_TRANSITION' ? 'InvalidTransition' : 'PermissionDenied',
        result.error,
        { currentState: talk.state, targetState },
      );
    }

    const now = ctx.clock.now();
    const [updated] = await tx
      .update(talks)
      .set({ state: result.to, updatedAt: now })
      .where(eq(talks.id, talkId))
      .returning();

    let clearedSlotIds: string[] = [];
    if (result.from === 'accepted' && result.to === 'rejected') {
      const cleared = await tx
        .update(scheduleSlots)
        .set({ talkId: null, updatedAt: now })
        .where(eq(scheduleSlots.talkId, talkId))
        .returning({ id: scheduleSlots.id });
      clearedSlotIds = cleared.map((s) => s.id);
    }

    await tx.insert(talkEvents).values({
      talkId,
      actorId: actor.userId,
      fromState: result.from,
      toState: result.to,
      reason: reason ?? null,
      createdAt: now,
    });

    const event: TalkTransitionEvent = {
      talkId,
      oldState: result.from,
      newState: result.to,
      actorId: actor.userId,
      reason: reason ?? null,
      timestamp: now,
    };
    return { talk: updated, event, clearedSlotIds };
  });

  try {
    ctx.events.publish(outcome.event);
  } catch (err) {
    // already committed; report and move on
    console.error('[EVENTS] Failed to publish transition event:', err);
  }

  return outcome;
}

/**
 * A speaker's answer to an organizer's `pending` offer. Only the owning
 * speaker can answer, and only while the talk is pending.
 */
export async function respondToTalk(
  ctx: EngineContext,
  talkId: string,
  response: 'accept' | 'decline',
  actor: Actor,
): Promise<TransitionOutcome> {
  const answer = parseInput(talkResponseSchema, response);
  if (actor.role !== 'speaker') {
    throw new CfpError('PermissionDenied', 'Only the speaker can respond to a talk offer');
  }
  return applyTransition(ctx, talkId, answer === 'accept' ? 'accepted' : 'rejected', actor);
}

export async function listTalkEvents(ctx: EngineContext, talkId: string): Promise<TalkEvent[]> {
  return readStore(async () => {
    await requireTalk(ctx.db, talkId);
    return ctx.db
      .select()
      .from(talkEvents)
      .where(eq(talkEvents.talkId, talkId))
      .orderBy(asc(talkEvents.createdAt));
  });
}
