import { and, asc, desc, eq, sql } from 'drizzle-orm';
import { ratings, talks } from '@db/schema/index';
import type { TalkState } from '@shared/types';
import type { EngineContext } from './context';
import { permissionDenied } from './errors';
import { isOrganizer, type Actor } from './identity';
import { requireTalk } from './queries';
import { readStore, runInTransaction } from './transaction';
import { parseInput, ratingSchema } from './validation';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Rating = typeof ratings.$inferSelect;

export type Score = 1 | 2 | 3 | 4 | 5;
export type ScoreHistogram = Record<Score, number>;

export interface RatingInput {
  score: number;
  notes?: string | null;
}

export interface TalkAverage {
  talkId: string;
  /** `null` means the talk has no ratings, which is not the same as scoring 0. */
  average: number | null;
  count: number;
}

export interface RankedTalk {
  talkId: string;
  title: string;
  state: TalkState;
  submittedAt: Date;
  average: number;
  count: number;
}

export interface RatingStatistics {
  totalTalks: number;
  ratedTalks: number;
  unratedTalks: number;
  totalRatings: number;
  globalAverage: number | null;
  histogram: ScoreHistogram;
  top: RankedTalk[];
}

const isScore = (value: number): value is Score =>
  value === 1 || value === 2 || value === 3 || value === 4 || value === 5;

const avgScore = sql<number | null>`avg(${ratings.score})::float8`;
const ratingCount = sql<number>`count(${ratings.id})::int`;

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Records `actor`'s score for a talk. A second call from the same reviewer
 * overwrites the first; there is never more than one row per (talk, reviewer).
 */
export async function rate(
  ctx: EngineContext,
  talkId: string,
  actor: Actor,
  input: RatingInput,
): Promise<Rating> {
  if (!isOrganizer(actor)) {
    throw permissionDenied('Only organizers can rate talks');
  }
  const { score, notes } = parseInput(ratingSchema, input);
  const now = ctx.clock.now();

  return runInTransaction(ctx, async (tx) => {
    await requireTalk(tx, talkId);
    const [row] = await tx
      .insert(ratings)
      .values({ talkId, reviewerId: actor.userId, score, notes, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: [ratings.talkId, ratings.reviewerId],
        set: { score, notes, updatedAt: now },
      })
      .returning();
    return row;
  });
}

/** Idempotent; resolves `false` when there was nothing to delete. */
export async function deleteRating(
  ctx: EngineContext,
  talkId: string,
  reviewerId: string,
): Promise<boolean> {
  return runInTransaction(ctx, async (tx) => {
    const removed = await tx
      .delete(ratings)
      .where(and(eq(ratings.talkId, talkId), eq(ratings.reviewerId, reviewerId)))
      .returning({ id: ratings.id });
    return removed.length > 0;
  });
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export async function getRating(
  ctx: EngineContext,
  talkId: string,
  reviewerId: string,
): Promise<Rating | null> {
  const [row] = await readStore(() =>
    ctx.db
      .select()
      .from(ratings)
      .where(and(eq(ratings.talkId, talkId), eq(ratings.reviewerId, reviewerId))),
  );
  return row ?? null;
}

export async function listRatings(ctx: EngineContext, talkId: string): Promise<Rating[]> {
  return readStore(async () => {
    await requireTalk(ctx.db, talkId);
    return ctx.db
      .select()
      .from(ratings)
      .where(eq(ratings.talkId, talkId))
      .orderBy(desc(ratings.createdAt));
  });
}

export async function average(ctx: EngineContext, talkId: string): Promise<TalkAverage> {
  return readStore(async () => {
    await requireTalk(ctx.db, talkId);
    const [row] = await ctx.db
      .select({ average: avgScore, count: ratingCount })
      .from(ratings)
      .where(eq(ratings.talkId, talkId));
    const count = Number(row?.count ?? 0);
    return { talkId, average: count > 0 ? Number(row?.average) : null, count };
  });
}

/**
 * Cross-talk figures, read in one transaction so the totals, histogram and
 * ranking describe the same snapshot. The ranking orders by average (desc),
 * then rating count (desc), then submission time (asc).
 */
export async function statistics(
  ctx: EngineContext,
  topN: number = ctx.options.statisticsTopN,
): Promise<RatingStatistics> {
  return runInTransaction(ctx, async (tx) => {
    const [talkTotals] = await tx.select({ count: sql<number>`count(*)::int` }).from(talks);

    const [ratingTotals] = await tx
      .select({
        count: ratingCount,
        average: avgScore,
        ratedTalks: sql<number>`count(distinct ${ratings.talkId})::int`,
      })
      .from(ratings);

    const distribution = await tx
      .select({ score: ratings.score, count: ratingCount })
      .from(ratings)
      .groupBy(ratings.score);

    const ranked = await tx
      .select({
        talkId: talks.id,
        title: talks.title,
        state: talks.state,
        submittedAt: talks.submittedAt,
        average: avgScore,
        count: ratingCount,
      })
      .from(talks)
      .innerJoin(ratings, eq(ratings.talkId, talks.id))
      .groupBy(talks.id)
      .orderBy(
        desc(sql`avg(${ratings.score})`),
        desc(sql`count(${ratings.id})`),
        asc(talks.submittedAt),
        asc(talks.id),
      )
      .limit(Math.max(0, topN));

    const histogram: ScoreHistogram = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    for (const row of distribution) {
      if (isScore(row.score)) histogram[row.score] = Number(row.count);
    }

    const totalTalks = Number(talkTotals?.count ?? 0);
    const totalRatings = Number(ratingTotals?.count ?? 0);
    const ratedTalks = Number(ratingTotals?.ratedTalks ?? 0);

    return {
      totalTalks,
      ratedTalks,
      unratedTalks: totalTalks - ratedTalks,
      totalRatings,
      globalAverage: totalRatings > 0 ? Number(ratingTotals?.average) : null,
      histogram,
      top: ranked.map((r) => ({
        talkId: r.talkId,
        title: r.title,
        state: r.state,
        submittedAt: r.submittedAt,
        average: Number(r.average),
        count: Number(r.count),
      })),
    };
  });
}
