import { pgTable, uuid, text, integer, timestamp, unique, check, index } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { talks } from './talks';

export const ratings = pgTable(
  'ratings',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    talkId: uuid('talk_id')
      .notNull()
      .references(() => talks.id, { onDelete: 'cascade' }),
    reviewerId: uuid('reviewer_id').notNull(),
    score: integer('score').notNull(),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    unique('ratings_talk_reviewer_unique').on(t.talkId, t.reviewerId),
    check('ratings_score_range', sql`${t.score} >= 1 AND ${t.score} <= 5`),
    index('idx_ratings_talk_id').on(t.talkId),
  ],
);
