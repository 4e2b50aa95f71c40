import { TALK_STATES } from '@shared/constants';
import type { Role, TalkState } from '@shared/types';
import type { Actor } from './identity';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type { TalkState };

/**
 * `actors` names who may drive the edge. `speaker` always means the speaker
 * who owns the talk; a speaker acting on someone else's talk never matches.
 */
export interface TransitionEdge {
  from: TalkState;
  to: TalkState;
  actors: readonly Role[];
}

export interface TransitionSubject {
  speakerId: string;
  state: TalkState;
}

export interface TransitionSuccess {
  ok: true;
  from: TalkState;
  to: TalkState;
}

export interface TransitionFailure {
  ok: false;
  code: 'INVALID_TRANSITION' | 'PERMISSION_DENIED';
  error: string;
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

export const TRANSITIONS: readonly TransitionEdge[] = [
  { from: 'submitted', to: 'pending', actors: ['organizer'] },
  { from: 'submitted', to: 'rejected', actors: ['organizer'] },
  { from: 'pending', to: 'accepted', actors: ['speaker'] },
  { from: 'pending', to: 'rejected', actors: ['speaker', 'organizer'] },
  { from: 'accepted', to: 'rejected', actors: ['organizer'] },
];

const knownStates: ReadonlySet<unknown> = new Set(TALK_STATES);

export function isTalkState(value: unknown): value is TalkState {
  return knownStates.has(value);
}

export function findTransition(from: TalkState, to: TalkState): TransitionEdge | undefined {
  return TRANSITIONS.find((edge) => edge.from === from && edge.to === to);
}

/** States reachable from `from` in one step, in table order. */
export function nextStates(from: TalkState): TalkState[] {
  return TRANSITIONS.filter((edge) => edge.from === from).map((edge) => edge.to);
}

// ---------------------------------------------------------------------------
// Capability Predicate
// ---------------------------------------------------------------------------

function actorMatches(edge: TransitionEdge, actor: Actor, talk: TransitionSubject): boolean {
  return edge.actors.some((allowed) => {
    if (allowed === 'organizer') return actor.role === 'organizer';
    return actor.role === 'speaker' && actor.userId === talk.speakerId;
  });
}

export function canTransition(
  actor: Actor,
  talk: TransitionSubject,
  target: TalkState,
): boolean {
  const edge = findTransition(talk.state, target);
  return edge !== undefined && actorMatches(edge, actor, talk);
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Pure check of a requested transition. Edge existence is decided before
 * permission, so an impossible move reports INVALID_TRANSITION whoever asks.
 */
export function evaluateTransition(
  talk: TransitionSubject,
  target: TalkState,
  actor: Actor,
): TransitionResult {
  const edge = findTransition(talk.state, target);
  if (!edge) {
    return {
      ok: false,
      code: 'INVALID_TRANSITION',
      error: `Cannot move a talk from '${talk.state}' to '${target}'`,
    };
  }

  if (!actorMatches(edge, actor, talk)) {
    const who = edge.actors
      .map((a) => (a === 'speaker' ? 'the owning speaker' : 'an organizer'))
      .join(' or ');
    return {
      ok: false,
      code: 'PERMISSION_DENIED',
      error: `Only ${who} may move a talk from '${talk.state}' to '${target}'`,
    };
  }

  return { ok: true, from: edge.from, to: edge.to };
}
