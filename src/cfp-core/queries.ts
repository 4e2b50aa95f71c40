import { eq, inArray } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { labels, talkLabels, talks } from '@db/schema/index';
import { notFound } from './errors';

// Row-level reads and writes shared by more than one engine module.

export type Talk = typeof talks.$inferSelect;
export type Label = typeof labels.$inferSelect;

export async function findTalk(
  db: Database,
  talkId: string,
  options: { lock?: boolean } = {},
): Promise<Talk | undefined> {
  const query = db.select().from(talks).where(eq(talks.id, talkId));
  const [row] = options.lock ? await query.for('update') : await query;
  return row;
}

export async function requireTalk(
  db: Database,
  talkId: string,
  options: { lock?: boolean } = {},
): Promise<Talk> {
  const talk = await findTalk(db, talkId, options);
  if (!talk) throw notFound('Talk', talkId);
  return talk;
}

/** Fails NotFound naming the first id that has no label. */
export async function requireLabels(db: Database, labelIds: readonly string[]): Promise<Label[]> {
  const unique = [...new Set(labelIds)];
  if (unique.length === 0) return [];
  const rows = await db.select().from(labels).where(inArray(labels.id, unique));
  const found = new Set(rows.map((r) => r.id));
  const missing = unique.find((id) => !found.has(id));
  if (missing) throw notFound('Label', missing);
  return rows;
}

export async function insertTalkLabels(
  db: Database,
  talkId: string,
  labelIds: readonly string[],
  addedBy: string | null,
  addedAt: Date,
): Promise<void> {
  const unique = [...new Set(labelIds)];
  if (unique.length === 0) return;
  await db
    .insert(talkLabels)
    .values(unique.map((labelId) => ({ talkId, labelId, addedBy, addedAt })))
    .onConflictDoNothing({ target: [talkLabels.talkId, talkLabels.labelId] });
}

export async function labelsOfTalk(db: Database, talkId: string): Promise<Label[]> {
  const rows = await db
    .select({ label: labels })
    .from(talkLabels)
    .innerJoin(labels, eq(talkLabels.labelId, labels.id))
    .where(eq(talkLabels.talkId, talkId))
    .orderBy(labels.name);
  return rows.map((r) => r.label);
}
