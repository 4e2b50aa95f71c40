import type { EngineContext } from '@core/context';
import { createConference } from '@core/conferences';
import type { Actor } from '@core/identity';
import { applyTransition } from '@core/lifecycle';
import { createTrack } from '@core/schedule-grid';
import { createTalk } from '@core/talk-store';
import { ORGANIZER, SPEAKER } from './test-db';

export async function submitTalk(ctx: EngineContext, title = 'Typed State Machines', speaker: Actor = SPEAKER) {
  return createTalk(ctx, speaker, { title, shortSummary: `${title} in practice` });
}

/** submitted -> pending (organizer) -> accepted (owning speaker) */
export async function acceptedTalk(ctx: EngineContext, title?: string, speaker: Actor = SPEAKER) {
  const talk = await submitTalk(ctx, title, speaker);
  await applyTransition(ctx, talk.id, 'pending', ORGANIZER);
  const { talk: accepted } = await applyTransition(ctx, talk.id, 'accepted', speaker);
  return accepted;
}

export async function conferenceWithTrack(ctx: EngineContext, trackName = 'Main Hall') {
  const conference = await createConference(ctx, {
    name: 'Example Conf',
    startDate: '2026-05-12',
    endDate: '2026-05-13',
  });
  const track = await createTrack(ctx, { conferenceId: conference.id, name: trackName });
  return { conference, track };
}
