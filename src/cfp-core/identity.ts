import type { Role } from '@shared/types';

/** The caller as supplied by the identity layer; authentication happens upstream. */
export interface Actor {
  userId: string;
  role: Role;
}

export const isOrganizer = (actor: Actor): boolean => actor.role === 'organizer';

export const ownsTalk = (actor: Actor, talk: { speakerId: string }): boolean =>
  actor.role === 'speaker' && actor.userId === talk.speakerId;
