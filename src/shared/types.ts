import type { ERROR_KINDS, ROLES, TALK_STATES, WS_EVENTS } from './constants';

export type TalkState = (typeof TALK_STATES)[number];
export type Role = (typeof ROLES)[number];
export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface WsMessage {
  event: (typeof WS_EVENTS)[keyof typeof WS_EVENTS];
  data: unknown;
  timestamp: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: Record<string, unknown>;
}
