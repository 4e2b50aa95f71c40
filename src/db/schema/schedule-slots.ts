import { pgTable, uuid, date, time, timestamp, check, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { conferences } from './conferences';
import { tracks } from './tracks';
import { talks } from './talks';

export const scheduleSlots = pgTable(
  'schedule_slots',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    conferenceId: uuid('conference_id')
      .notNull()
      .references(() => conferences.id, { onDelete: 'cascade' }),
    trackId: uuid('track_id')
      .notNull()
      .references(() => tracks.id, { onDelete: 'no action' }),
    talkId: uuid('talk_id').references(() => talks.id, { onDelete: 'set null' }),
    slotDate: date('slot_date', { mode: 'string' }).notNull(),
    startTime: time('start_time').notNull(),
    endTime: time('end_time').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    check('schedule_slots_time_order', sql`${t.startTime} < ${t.endTime}`),
    uniqueIndex('schedule_slots_talk_id_unique')
      .on(t.talkId)
      .where(sql`${t.talkId} IS NOT NULL`),
    index('idx_schedule_slots_track_date').on(t.trackId, t.slotDate, t.startTime),
  ],
);
