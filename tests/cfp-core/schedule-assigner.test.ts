import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { applyTransition } from '@core/lifecycle';
import { assign, getSchedule, unassign } from '@core/schedule-assigner';
import { createSlot, getSlot } from '@core/schedule-grid';
import type { EngineContext } from '@core/context';
import {
  createTestDatabase,
  testContext,
  MISSING_ID,
  ORGANIZER,
  SPEAKER,
  type TestDatabase,
} from '../helpers/test-db';
import { acceptedTalk, conferenceWithTrack, submitTalk } from '../helpers/fixtures';

describe('schedule assigner', () => {
  let testDb: TestDatabase;
  let ctx: EngineContext;

  beforeAll(async () => {
    testDb = await createTestDatabase();
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await testDb.reset();
    ctx = testContext(testDb.db);
  });

  async function emptySlot(startTime = '10:00', endTime = '10:45') {
    const { track } = await conferenceWithTrack(ctx);
    return createSlot(ctx, { trackId: track.id, slotDate: '2026-05-12', startTime, endTime });
  }

  it('puts an accepted talk into an empty slot', async () => {
    const talk = await acceptedTalk(ctx);
    const slot = await emptySlot();

    const assigned = await assign(ctx, slot.id, talk.id);
    expect(assigned.talkId).toBe(talk.id);
    expect((await getSlot(ctx, slot.id)).talkId).toBe(talk.id);
  });

  it('refuses talks that are not accepted', async () => {
    const slot = await emptySlot();
    const submitted = await submitTalk(ctx, 'Submitted');
    const pending = await submitTalk(ctx, 'Pending');
    await applyTransition(ctx, pending.id, 'pending', ORGANIZER);

    await expect(assign(ctx, slot.id, submitted.id)).rejects.toMatchObject({
      kind: 'StateError',
      message: "Only accepted talks can be scheduled; this talk is 'submitted'",
    });
    await expect(assign(ctx, slot.id, pending.id)).rejects.toMatchObject({ kind: 'StateError' });
    expect((await getSlot(ctx, slot.id)).talkId).toBeNull();
  });

  it('returns the slot unchanged when the same pair is assigned again', async () => {
    const talk = await acceptedTalk(ctx);
    const slot = await emptySlot();
    const first = await assign(ctx, slot.id, talk.id);

    const second = await assign(ctx, slot.id, talk.id);
    expect(second).toEqual(first);
  });

  it('refuses a slot that holds another talk', async () => {
    const holder = await acceptedTalk(ctx, 'Holder');
    const newcomer = await acceptedTalk(ctx, 'Newcomer');
    const slot = await emptySlot();
    await assign(ctx, slot.id, holder.id);

    await expect(assign(ctx, slot.id, newcomer.id)).rejects.toMatchObject({
      kind: 'Conflict',
      message: 'Slot already holds another talk',
      details: { slotId: slot.id, occupiedBy: holder.id },
    });
  });

  it('refuses to schedule a talk twice', async () => {
    const talk = await acceptedTalk(ctx);
    const { track } = await conferenceWithTrack(ctx);
    const morning = await createSlot(ctx, { trackId: track.id, slotDate: '2026-05-12', startTime: '09:00', endTime: '10:00' });
    const noon = await createSlot(ctx, { trackId: track.id, slotDate: '2026-05-12', startTime: '12:00', endTime: '13:00' });
    await assign(ctx, morning.id, talk.id);

    await expect(assign(ctx, noon.id, talk.id)).rejects.toMatchObject({
      kind: 'Conflict',
      message: 'Talk is already scheduled in another slot',
      details: { talkId: talk.id, scheduledIn: morning.id },
    });
    expect((await getSlot(ctx, noon.id)).talkId).toBeNull();
  });

  it('fails NotFound for a missing slot or talk', async () => {
    const talk = await acceptedTalk(ctx);
    const slot = await emptySlot();

    await expect(assign(ctx, MISSING_ID, talk.id)).rejects.toMatchObject({
      kind: 'NotFound',
      message: 'Schedule slot not found',
    });
    await expect(assign(ctx, slot.id, MISSING_ID)).rejects.toMatchObject({
      kind: 'NotFound',
      message: 'Talk not found',
    });
  });

  it('unassigns idempotently', async () => {
    const talk = await acceptedTalk(ctx);
    const slot = await emptySlot();
    await assign(ctx, slot.id, talk.id);

    expect((await unassign(ctx, slot.id)).talkId).toBeNull();
    expect((await unassign(ctx, slot.id)).talkId).toBeNull();
    await expect(unassign(ctx, MISSING_ID)).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('lets a freed talk move to another slot', async () => {
    const talk = await acceptedTalk(ctx);
    const { track } = await conferenceWithTrack(ctx);
    const first = await createSlot(ctx, { trackId: track.id, slotDate: '2026-05-12', startTime: '09:00', endTime: '10:00' });
    const second = await createSlot(ctx, { trackId: track.id, slotDate: '2026-05-12', startTime: '11:00', endTime: '12:00' });

    await assign(ctx, first.id, talk.id);
    await unassign(ctx, first.id);
    expect((await assign(ctx, second.id, talk.id)).talkId).toBe(talk.id);
  });

  it('builds the published schedule from submission to cancellation', async () => {
    const { conference, track } = await conferenceWithTrack(ctx);
    const slot = await createSlot(ctx, {
      trackId: track.id,
      slotDate: '2026-05-12',
      startTime: '14:00',
      endTime: '14:45',
    });
    const later = await createSlot(ctx, {
      trackId: track.id,
      slotDate: '2026-05-12',
      startTime: '15:00',
      endTime: '15:45',
    });

    const talk = await submitTalk(ctx, 'Observability on a budget');
    await applyTransition(ctx, talk.id, 'pending', ORGANIZER);
    await applyTransition(ctx, talk.id, 'accepted', SPEAKER);
    await assign(ctx, slot.id, talk.id);

    expect(await getSchedule(ctx, conference.id)).toEqual([
      {
        slotId: slot.id,
        conferenceId: conference.id,
        trackId: track.id,
        trackName: 'Main Hall',
        slotDate: '2026-05-12',
        startTime: '14:00:00',
        endTime: '14:45:00',
        talk: {
          id: talk.id,
          title: 'Observability on a budget',
          shortSummary: 'Observability on a budget in practice',
          speakerId: SPEAKER.userId,
        },
      },
      {
        slotId: later.id,
        conferenceId: conference.id,
        trackId: track.id,
        trackName: 'Main Hall',
        slotDate: '2026-05-12',
        startTime: '15:00:00',
        endTime: '15:45:00',
        talk: null,
      },
    ]);

    await applyTransition(ctx, talk.id, 'rejected', ORGANIZER);
    const [afterCancel] = await getSchedule(ctx, conference.id);
    expect(afterCancel?.talk).toBeNull();
  });
});
