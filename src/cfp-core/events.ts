import type { TalkState } from '@shared/types';

export interface TalkTransitionEvent {
  talkId: string;
  oldState: TalkState;
  newState: TalkState;
  actorId: string;
  reason: string | null;
  timestamp: Date;
}

/**
 * Outbound channel for committed transitions. The notification dispatcher
 * sits behind it; the engine never sends mail itself.
 */
export interface TransitionEventSink {
  publish(event: TalkTransitionEvent): void;
}

export const discardEvents: TransitionEventSink = {
  publish: () => undefined,
};
