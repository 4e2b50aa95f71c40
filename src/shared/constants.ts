export const API_PREFIX = '/api';

export const WS_PATH = '/ws';

export const WS_EVENTS = {
  CONNECTION_ESTABLISHED: 'connection_established',
  HEARTBEAT: 'heartbeat',
  TRANSITION_APPLIED: 'transition_applied',
} as const;

export const TALK_STATES = ['submitted', 'pending', 'accepted', 'rejected'] as const;

export const ROLES = ['speaker', 'organizer'] as const;

export const TALK_RESPONSES = ['accept', 'decline'] as const;

export const ERROR_KINDS = [
  'ValidationError',
  'InvalidTransition',
  'PermissionDenied',
  'NotFound',
  'Conflict',
  'StateError',
  'StorageError',
] as const;

export const MIN_SCORE = 1;
export const MAX_SCORE = 5;

export const TITLE_MAX_LENGTH = 500;
export const LABEL_NAME_MAX_LENGTH = 100;

// Talks a speaker may still edit
export const EDITABLE_STATES = ['submitted', 'pending', 'accepted'] as const;

// Talks that may be deleted
export const DELETABLE_STATES = ['submitted', 'rejected'] as const;
