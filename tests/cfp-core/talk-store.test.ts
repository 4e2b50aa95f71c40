import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { createLabel } from '@core/labels';
import { applyTransition } from '@core/lifecycle';
import { rate } from '@core/ratings';
import { createTalk, deleteTalk, getTalk, listTalks, updateTalk } from '@core/talk-store';
import type { EngineContext } from '@core/context';
import {
  createTestDatabase,
  testContext,
  MISSING_ID,
  ORGANIZER,
  OTHER_SPEAKER,
  SPEAKER,
  type TestDatabase,
} from '../helpers/test-db';
import { acceptedTalk, submitTalk } from '../helpers/fixtures';

describe('talk store', () => {
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

  describe('createTalk', () => {
    it('stores a trimmed submission owned by the speaker', async () => {
      const talk = await createTalk(ctx, SPEAKER, {
        title: '  Streaming Parsers  ',
        shortSummary: 'Incremental JSON',
        longDescription: 'Backpressure and resumable state',
      });

      expect(talk).toMatchObject({
        speakerId: SPEAKER.userId,
        title: 'Streaming Parsers',
        shortSummary: 'Incremental JSON',
        longDescription: 'Backpressure and resumable state',
        slidesUrl: null,
        state: 'submitted',
        labels: [],
      });
      expect(talk.submittedAt.toISOString()).toBe('2026-03-01T09:00:00.000Z');
    });

    it('attaches the given labels in name order', async () => {
      const web = await createLabel(ctx, { name: 'Web' });
      const apis = await createLabel(ctx, { name: 'APIs' });

      const talk = await createTalk(ctx, SPEAKER, {
        title: 'REST at scale',
        shortSummary: 'Pagination and caching',
        labelIds: [web.id, apis.id],
      });

      expect(talk.labels.map((l) => l.name)).toEqual(['APIs', 'Web']);
    });

    it('creates nothing when a label is missing', async () => {
      await expect(
        createTalk(ctx, SPEAKER, { title: 'Lost', shortSummary: 'Gone', labelIds: [MISSING_ID] }),
      ).rejects.toMatchObject({ kind: 'NotFound', details: { entity: 'Label', id: MISSING_ID } });

      expect(await listTalks(ctx)).toEqual([]);
    });

    it('requires a title', async () => {
      await expect(createTalk(ctx, SPEAKER, { title: '', shortSummary: 'x' })).rejects.toMatchObject({
        kind: 'ValidationError',
        message: 'title: Title is required',
      });
    });
  });

  describe('getTalk', () => {
    it('lets the owner and organizers read a talk', async () => {
      const talk = await submitTalk(ctx);
      expect((await getTalk(ctx, talk.id, SPEAKER)).id).toBe(talk.id);
      expect((await getTalk(ctx, talk.id, ORGANIZER)).id).toBe(talk.id);
    });

    it('hides a talk from other speakers', async () => {
      const talk = await submitTalk(ctx);
      await expect(getTalk(ctx, talk.id, OTHER_SPEAKER)).rejects.toMatchObject({ kind: 'PermissionDenied' });
    });

    it('fails NotFound for an unknown id', async () => {
      await expect(getTalk(ctx, MISSING_ID, ORGANIZER)).rejects.toMatchObject({ kind: 'NotFound' });
    });
  });

  describe('listTalks', () => {
    it('filters by state and speaker, newest first', async () => {
      const first = await submitTalk(ctx, 'First');
      const second = await submitTalk(ctx, 'Second');
      const other = await submitTalk(ctx, 'Other', OTHER_SPEAKER);
      await applyTransition(ctx, first.id, 'pending', ORGANIZER);

      expect((await listTalks(ctx)).map((t) => t.title)).toEqual(['Other', 'Second', 'First']);
      expect((await listTalks(ctx, { state: 'submitted' })).map((t) => t.id)).toEqual([other.id, second.id]);
      expect((await listTalks(ctx, { speakerId: SPEAKER.userId })).map((t) => t.id)).toEqual([
        second.id,
        first.id,
      ]);
    });
  });

  describe('updateTalk', () => {
    it('lets the owner edit while submitted or pending', async () => {
      const talk = await submitTalk(ctx);
      const edited = await updateTalk(ctx, talk.id, SPEAKER, { title: 'Renamed' });
      expect(edited.title).toBe('Renamed');

      await applyTransition(ctx, talk.id, 'pending', ORGANIZER);
      const withSlides = await updateTalk(ctx, talk.id, SPEAKER, { slidesUrl: 'https://slides.example/talk' });
      expect(withSlides.slidesUrl).toBe('https://slides.example/talk');
      expect(withSlides.title).toBe('Renamed');
    });

    it('lets the speaker of an accepted talk add slides', async () => {
      const talk = await acceptedTalk(ctx);
      const edited = await updateTalk(ctx, talk.id, SPEAKER, { slidesUrl: 'https://slides.example/final' });
      expect(edited).toMatchObject({ state: 'accepted', slidesUrl: 'https://slides.example/final' });
    });

    it('refuses edits once the talk is rejected', async () => {
      const talk = await submitTalk(ctx);
      await applyTransition(ctx, talk.id, 'rejected', ORGANIZER);
      await expect(updateTalk(ctx, talk.id, SPEAKER, { title: 'Late' })).rejects.toMatchObject({
        kind: 'StateError',
        message: "A talk in state 'rejected' can no longer be edited",
      });
      expect((await getTalk(ctx, talk.id, SPEAKER)).title).toBe('Typed State Machines');
    });

    it('refuses edits from anyone but the owner', async () => {
      const talk = await submitTalk(ctx);
      await expect(updateTalk(ctx, talk.id, ORGANIZER, { title: 'Mine now' })).rejects.toMatchObject({
        kind: 'PermissionDenied',
      });
    });
  });

  describe('deleteTalk', () => {
    it('removes a submitted talk together with its ratings', async () => {
      const talk = await submitTalk(ctx);
      await rate(ctx, talk.id, ORGANIZER, { score: 4 });

      await deleteTalk(ctx, talk.id, SPEAKER);
      await expect(getTalk(ctx, talk.id, ORGANIZER)).rejects.toMatchObject({ kind: 'NotFound' });

      const remaining = await testDb.client.query<{ count: number }>('SELECT count(*)::int AS count FROM ratings');
      expect(remaining.rows[0]?.count).toBe(0);
    });

    it('refuses to delete a pending talk', async () => {
      const talk = await submitTalk(ctx);
      await applyTransition(ctx, talk.id, 'pending', ORGANIZER);
      await expect(deleteTalk(ctx, talk.id, ORGANIZER)).rejects.toMatchObject({ kind: 'StateError' });
    });

    it('refuses other speakers', async () => {
      const talk = await submitTalk(ctx);
      await expect(deleteTalk(ctx, talk.id, OTHER_SPEAKER)).rejects.toMatchObject({ kind: 'PermissionDenied' });
    });
  });
});
