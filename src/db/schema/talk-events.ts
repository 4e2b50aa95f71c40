import { pgTable, uuid, text, timestamp, index } from 'drizzle-orm/pg-core';
import { talks, talkState } from './talks';

export const talkEvents = pgTable(
  'talk_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    talkId: uuid('talk_id')
      .notNull()
      .references(() => talks.id, { onDelete: 'cascade' }),
    actorId: uuid('actor_id').notNull(),
    fromState: talkState('from_state').notNull(),
    toState: talkState('to_state').notNull(),
    reason: text('reason'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [index('idx_talk_events_talk_id').on(t.talkId)],
);
