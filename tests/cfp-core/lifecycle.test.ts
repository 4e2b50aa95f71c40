import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { applyTransition, listTalkEvents, respondToTalk } from '@core/lifecycle';
import { assign } from '@core/schedule-assigner';
import { createSlot, getSlot } from '@core/schedule-grid';
import { getTalk } from '@core/talk-store';
import type { EngineContext } from '@core/context';
import type { Actor } from '@core/identity';
import { findTransition } from '@core/state-machine';
import { TALK_STATES } from '@shared/constants';
import type { TalkState } from '@shared/types';
import {
  createTestDatabase,
  recordingSink,
  testContext,
  MISSING_ID,
  ORGANIZER,
  OTHER_SPEAKER,
  SPEAKER,
  type RecordingSink,
  type TestDatabase,
} from '../helpers/test-db';
import { acceptedTalk, conferenceWithTrack, submitTalk } from '../helpers/fixtures';

describe('talk lifecycle', () => {
  let testDb: TestDatabase;
  let sink: RecordingSink;
  let ctx: EngineContext;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await testDb.reset();
    sink = recordingSink();
    ctx = testContext(testDb.db, sink);
  });

  it('moves a talk through submitted -> pending -> accepted', async () => {
    const talk = await submitTalk(ctx);
    expect(talk.state).toBe('submitted');

    const pending = await applyTransition(ctx, talk.id, 'pending', ORGANIZER, 'Strong proposal');
    expect(pending.talk.state).toBe('pending');

    const accepted = await applyTransition(ctx, talk.id, 'accepted', SPEAKER);
    expect(accepted.talk.state).toBe('accepted');
    expect(accepted.clearedSlotIds).toEqual([]);

    const stored = await getTalk(ctx, talk.id, ORGANIZER);
    expect(stored.state).toBe('accepted');
  });

  it('publishes one event per committed transition', async () => {
    const talk = await submitTalk(ctx);
    const { event } = await applyTransition(ctx, talk.id, 'pending', ORGANIZER, 'Strong proposal');

    expect(sink.events).toEqual([event]);
    expect(event).toMatchObject({
      talkId: talk.id,
      oldState: 'submitted',
      newState: 'pending',
      actorId: ORGANIZER.userId,
      reason: 'Strong proposal',
    });
  });

  it('records the transition history oldest first', async () => {
    const talk = await acceptedTalk(ctx);
    const history = await listTalkEvents(ctx, talk.id);

    expect(history.map((e) => [e.fromState, e.toState, e.actorId])).toEqual([
      ['submitted', 'pending', ORGANIZER.userId],
      ['pending', 'accepted', SPEAKER.userId],
    ]);
  });

  it('rejects a missing edge with InvalidTransition and leaves the talk alone', async () => {
    const talk = await submitTalk(ctx);

    await expect(applyTransition(ctx, talk.id, 'accepted', SPEAKER)).rejects.toMatchObject({
      kind: 'InvalidTransition',
      code: 'INVALID_TRANSITION',
      details: { currentState: 'submitted', targetState: 'accepted' },
    });

    expect((await getTalk(ctx, talk.id, SPEAKER)).state).toBe('submitted');
    expect(sink.events).toEqual([]);
  });

  describe('every (from, to) pair against the store', () => {
    async function talkIn(state: TalkState) {
      if (state === 'accepted') return acceptedTalk(ctx);
      const talk = await submitTalk(ctx);
      if (state === 'submitted') return talk;
      const { talk: moved } = await applyTransition(ctx, talk.id, state, ORGANIZER);
      return moved;
    }

    const pairs = TALK_STATES.flatMap((from) => TALK_STATES.map((to): [TalkState, TalkState] => [from, to]));

    it.each(pairs)('%s -> %s', async (from, to) => {
      const talk = await talkIn(from);
      const before = await listTalkEvents(ctx, talk.id);
      sink.events.length = 0;
      const edge = findTransition(from, to);

      if (edge) {
        const actor: Actor = edge.actors.includes('organizer') ? ORGANIZER : SPEAKER;
        const result = await applyTransition(ctx, talk.id, to, actor);
        expect(result.talk.state).toBe(to);
        expect((await getTalk(ctx, talk.id, SPEAKER)).state).toBe(to);
        expect(await listTalkEvents(ctx, talk.id)).toHaveLength(before.length + 1);
        expect(sink.events.map((e) => `${e.oldState}->${e.newState}`)).toEqual([`${from}->${to}`]);
      } else {
        await expect(applyTransition(ctx, talk.id, to, ORGANIZER)).rejects.toMatchObject({
          kind: 'InvalidTransition',
          details: { currentState: from, targetState: to },
        });
        expect((await getTalk(ctx, talk.id, SPEAKER)).state).toBe(from);
        expect(await listTalkEvents(ctx, talk.id)).toHaveLength(before.length);
        expect(sink.events).toEqual([]);
      }
    });
  });

  it('reports a repeated transition as InvalidTransition with the current state', async () => {
    const talk = await submitTalk(ctx);
    await applyTransition(ctx, talk.id, 'pending', ORGANIZER);

    await expect(applyTransition(ctx, talk.id, 'pending', ORGANIZER)).rejects.toMatchObject({
      kind: 'InvalidTransition',
      details: { currentState: 'pending', targetState: 'pending' },
    });
  });

  it('refuses speakers acting on talks they do not own', async () => {
    const talk = await submitTalk(ctx);
    await applyTransition(ctx, talk.id, 'pending', ORGANIZER);

    await expect(applyTransition(ctx, talk.id, 'accepted', OTHER_SPEAKER)).rejects.toMatchObject({
      kind: 'PermissionDenied',
    });
  });

  it('fails NotFound for an unknown talk', async () => {
    await expect(applyTransition(ctx, MISSING_ID, 'pending', ORGANIZER)).rejects.toMatchObject({
      kind: 'NotFound',
      message: 'Talk not found',
    });
  });

  it('frees the slot when an accepted, scheduled talk is cancelled', async () => {
    const talk = await acceptedTalk(ctx);
    const { track } = await conferenceWithTrack(ctx);
    const slot = await createSlot(ctx, {
      trackId: track.id,
      slotDate: '2026-05-12',
      startTime: '10:00',
      endTime: '10:45',
    });
    await assign(ctx, slot.id, talk.id);

    const outcome = await applyTransition(ctx, talk.id, 'rejected', ORGANIZER, 'Speaker unavailable');

    expect(outcome.talk.state).toBe('rejected');
    expect(outcome.clearedSlotIds).toEqual([slot.id]);
    expect((await getSlot(ctx, slot.id)).talkId).toBeNull();
  });

  describe('respondToTalk', () => {
    it('accepts a pending offer for the owning speaker', async () => {
      const talk = await submitTalk(ctx);
      await applyTransition(ctx, talk.id, 'pending', ORGANIZER);

      const outcome = await respondToTalk(ctx, talk.id, 'accept', SPEAKER);
      expect(outcome.talk.state).toBe('accepted');
    });

    it('declines a pending offer', async () => {
      const talk = await submitTalk(ctx);
      await applyTransition(ctx, talk.id, 'pending', ORGANIZER);

      const outcome = await respondToTalk(ctx, talk.id, 'decline', SPEAKER);
      expect(outcome.talk.state).toBe('rejected');
    });

    it('is reserved for speakers', async () => {
      const talk = await submitTalk(ctx);
      await applyTransition(ctx, talk.id, 'pending', ORGANIZER);

      await expect(respondToTalk(ctx, talk.id, 'decline', ORGANIZER)).rejects.toMatchObject({
        kind: 'PermissionDenied',
        message: 'Only the speaker can respond to a talk offer',
      });
    });

    it('only answers pending talks', async () => {
      const talk = await submitTalk(ctx);
      await expect(respondToTalk(ctx, talk.id, 'accept', SPEAKER)).rejects.toMatchObject({
        kind: 'InvalidTransition',
      });
    });
  });
});
