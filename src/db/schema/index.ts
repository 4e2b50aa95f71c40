export { conferences } from './conferences';
export { tracks } from './tracks';
export { talkState, talks } from './talks';
export { ratings } from './ratings';
export { labels, talkLabels } from './labels';
export { scheduleSlots } from './schedule-slots';
export { talkEvents } from './talk-events';
