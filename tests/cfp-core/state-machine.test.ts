import { describe, it, expect } from 'vitest';
import {
  TRANSITIONS,
  canTransition,
  evaluateTransition,
  findTransition,
  isTalkState,
  nextStates,
} from '@core/state-machine';
import { TALK_STATES } from '@shared/constants';
import type { Actor } from '@core/identity';

const owner: Actor = { userId: 'speaker-1', role: 'speaker' };
const stranger: Actor = { userId: 'speaker-2', role: 'speaker' };
const organizer: Actor = { userId: 'organizer-1', role: 'organizer' };

const talkIn = (state: (typeof TALK_STATES)[number]) => ({ speakerId: owner.userId, state });

describe('transition table', () => {
  it('has exactly the five lifecycle edges', () => {
    expect(TRANSITIONS.map((e) => `${e.from}->${e.to}`)).toEqual([
      'submitted->pending',
      'submitted->rejected',
      'pending->accepted',
      'pending->rejected',
      'accepted->rejected',
    ]);
  });

  it('treats rejected as terminal', () => {
    expect(nextStates('rejected')).toEqual([]);
  });

  it('lists reachable states in table order', () => {
    expect(nextStates('submitted')).toEqual(['pending', 'rejected']);
    expect(nextStates('pending')).toEqual(['accepted', 'rejected']);
    expect(nextStates('accepted')).toEqual(['rejected']);
  });

  it('has no self-transitions', () => {
    for (const state of TALK_STATES) {
      expect(findTransition(state, state)).toBeUndefined();
    }
  });

  it('recognises talk states', () => {
    expect(isTalkState('pending')).toBe(true);
    expect(isTalkState('withdrawn')).toBe(false);
    expect(isTalkState(3)).toBe(false);
  });
});

describe('canTransition', () => {
  it('lets organizers move submitted talks to pending or rejected', () => {
    expect(canTransition(organizer, talkIn('submitted'), 'pending')).toBe(true);
    expect(canTransition(organizer, talkIn('submitted'), 'rejected')).toBe(true);
    expect(canTransition(owner, talkIn('submitted'), 'pending')).toBe(false);
  });

  it('lets only the owning speaker accept a pending talk', () => {
    expect(canTransition(owner, talkIn('pending'), 'accepted')).toBe(true);
    expect(canTransition(stranger, talkIn('pending'), 'accepted')).toBe(false);
    expect(canTransition(organizer, talkIn('pending'), 'accepted')).toBe(false);
  });

  it('lets the owner or an organizer decline a pending talk', () => {
    expect(canTransition(owner, talkIn('pending'), 'rejected')).toBe(true);
    expect(canTransition(organizer, talkIn('pending'), 'rejected')).toBe(true);
    expect(canTransition(stranger, talkIn('pending'), 'rejected')).toBe(false);
  });

  it('lets only organizers cancel an accepted talk', () => {
    expect(canTransition(organizer, talkIn('accepted'), 'rejected')).toBe(true);
    expect(canTransition(owner, talkIn('accepted'), 'rejected')).toBe(false);
  });

  it('refuses every move out of rejected', () => {
    for (const target of TALK_STATES) {
      expect(canTransition(organizer, talkIn('rejected'), target)).toBe(false);
    }
  });
});

describe('evaluateTransition', () => {
  it('returns the edge on success', () => {
    expect(evaluateTransition(talkIn('submitted'), 'pending', organizer)).toEqual({
      ok: true,
      from: 'submitted',
      to: 'pending',
    });
  });

  it('reports a missing edge before checking who asks', () => {
    const result = evaluateTransition(talkIn('submitted'), 'accepted', stranger);
    expect(result).toEqual({
      ok: false,
      code: 'INVALID_TRANSITION',
      error: "Cannot move a talk from 'submitted' to 'accepted'",
    });
  });

  it('reports a permission failure for a valid edge', () => {
    const result = evaluateTransition(talkIn('pending'), 'accepted', organizer);
    expect(result).toEqual({
      ok: false,
      code: 'PERMISSION_DENIED',
      error: "Only the owning speaker may move a talk from 'pending' to 'accepted'",
    });
  });

  it('names both allowed actors when a stranger declines', () => {
    const result = evaluateTransition(talkIn('pending'), 'rejected', stranger);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(
        "Only the owning speaker or an organizer may move a talk from 'pending' to 'rejected'",
      );
    }
  });

  it('rejects a self-transition as invalid', () => {
    const result = evaluateTransition(talkIn('accepted'), 'accepted', organizer);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.code).toBe('INVALID_TRANSITION');
  });
});
