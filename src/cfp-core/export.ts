import { asc, desc, eq, sql } from 'drizzle-orm';
import { labels, ratings, talkLabels, talks } from '@db/schema/index';
import type { TalkState } from '@shared/types';
import type { EngineContext } from './context';
import { readStore } from './transaction';

export interface ExportedTalk {
  id: string;
  speakerId: string;
  title: string;
  shortSummary: string;
  longDescription: string | null;
  state: TalkState;
  submittedAt: Date;
  labels: string[];
  averageRating: number | null;
  ratingCount: number;
}

export interface TalkExport {
  talks: ExportedTalk[];
  totalCount: number;
  exportedAt: Date;
}

/**
 * Read-only snapshot of talks for the export and tagging collaborators:
 * label names, average rating (`null` when unrated) and rating count per talk,
 * newest submission first.
 */
export async function exportTalks(
  ctx: EngineContext,
  filter: { state?: TalkState } = {},
): Promise<TalkExport> {
  const [rows, aggregates, labelRows] = await readStore(() =>
    Promise.all([
      ctx.db
        .select({
          id: talks.id,
          speakerId: talks.speakerId,
          title: talks.title,
          shortSummary: talks.shortSummary,
          longDescription: talks.longDescription,
          state: talks.state,
          submittedAt: talks.submittedAt,
        })
        .from(talks)
        .where(filter.state ? eq(talks.state, filter.state) : undefined)
        .orderBy(desc(talks.submittedAt)),
      ctx.db
        .select({
          talkId: ratings.talkId,
          average: sql<number>`avg(${ratings.score})::float8`,
          count: sql<number>`count(*)::int`,
        })
        .from(ratings)
        .groupBy(ratings.talkId),
      ctx.db
        .select({ talkId: talkLabels.talkId, name: labels.name })
        .from(talkLabels)
        .innerJoin(labels, eq(talkLabels.labelId, labels.id))
        .orderBy(asc(labels.name)),
    ]),
  );

  const ratingsByTalk = new Map(aggregates.map((a) => [a.talkId, a]));
  const labelsByTalk = new Map<string, string[]>();
  for (const { talkId, name } of labelRows) {
    const names = labelsByTalk.get(talkId) ?? [];
    names.push(name);
    labelsByTalk.set(talkId, names);
  }

  const exported = rows.map((row): ExportedTalk => {
    const aggregate = ratingsByTalk.get(row.id);
    return {
      ...row,
      labels: labelsByTalk.get(row.id) ?? [],
      averageRating: aggregate ? Number(aggregate.average) : null,
      ratingCount: aggregate ? Number(aggregate.count) : 0,
    };
  });

  return { talks: exported, totalCount: exported.length, exportedAt: ctx.clock.now() };
}
