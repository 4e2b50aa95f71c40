import { pgTable, pgEnum, uuid, text, varchar, timestamp, index } from 'drizzle-orm/pg-core';
import { TALK_STATES } from '@shared/constants';

export const talkState = pgEnum('talk_state', TALK_STATES);

export const talks = pgTable(
  'talks',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    speakerId: uuid('speaker_id').notNull(),
    title: varchar('title', { length: 500 }).notNull(),
    shortSummary: text('short_summary').notNull(),
    longDescription: text('long_description'),
    slidesUrl: varchar('slides_url', { length: 1000 }),
    state: talkState('state').notNull().default('submitted'),
    submittedAt: timestamp('submitted_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    index('idx_talks_speaker_id').on(t.speakerId),
    index('idx_talks_state').on(t.state),
    index('idx_talks_submitted_at').on(t.submittedAt),
  ],
);
