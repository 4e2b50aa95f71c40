import { pgTable, uuid, text, varchar, boolean, timestamp, primaryKey, index } from 'drizzle-orm/pg-core';
import { talks } from './talks';

export const labels = pgTable('labels', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 100 }).notNull().unique('labels_name_unique'),
  description: text('description'),
  color: varchar('color', { length: 7 }),
  isAiGenerated: boolean('is_ai_generated').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const talkLabels = pgTable(
  'talk_labels',
  {
    talkId: uuid('talk_id')
      .notNull()
      .references(() => talks.id, { onDelete: 'cascade' }),
    labelId: uuid('label_id')
      .notNull()
      .references(() => labels.id, { onDelete: 'cascade' }),
    addedBy: uuid('added_by'),
    addedAt: timestamp('added_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    primaryKey({ name: 'talk_labels_pkey', columns: [t.talkId, t.labelId] }),
    index('idx_talk_labels_label_id').on(t.labelId),
  ],
);
