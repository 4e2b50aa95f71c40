// cfp-core: talk lifecycle, review aggregation, labels and the schedule grid.
// Every mutating operation runs in its own serializable transaction.

export const CFP_CORE_VERSION = '0.1.0';

export { createEngineContext, DEFAULT_ENGINE_OPTIONS } from './context';
export type { EngineContext, EngineOptions } from './context';
export { systemClock } from './clock';
export type { Clock } from './clock';
export { discardEvents } from './events';
export type { TalkTransitionEvent, TransitionEventSink } from './events';
export { CfpError, ERROR_CODES, isCfpError } from './errors';
export type { Actor } from './identity';

export { TRANSITIONS, canTransition, evaluateTransition, findTransition, nextStates } from './state-machine';
export { createTalk, getTalk, listTalks, updateTalk, deleteTalk } from './talk-store';
export { applyTransition, respondToTalk, listTalkEvents } from './lifecycle';
export { rate, deleteRating, getRating, listRatings, average, statistics } from './ratings';
export {
  createLabel,
  updateLabel,
  getLabel,
  listLabels,
  deleteLabel,
  addLabels,
  removeLabel,
  labelsForTalk,
  attachmentsOfTalk,
} from './labels';
export {
  createConference,
  updateConference,
  getConference,
  listConferences,
  getActiveConference,
  deleteConference,
} from './conferences';
export {
  createTrack,
  updateTrack,
  getTrack,
  listTracks,
  deleteTrack,
  createSlot,
  updateSlot,
  deleteSlot,
  getSlot,
  listSlots,
} from './schedule-grid';
export { assign, unassign, getSchedule } from './schedule-assigner';
export { exportTalks } from './export';
export { dashboard, RECENT_SUBMISSIONS_LIMIT } from './dashboard';
