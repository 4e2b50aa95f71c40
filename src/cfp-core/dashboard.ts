import { desc, eq, sql } from 'drizzle-orm';
import { ratings, talks } from '@db/schema/index';
import { TALK_STATES } from '@shared/constants';
import type { TalkState } from '@shared/types';
import type { EngineContext } from './context';
import { runInTransaction } from './transaction';

export const RECENT_SUBMISSIONS_LIMIT = 10;

export type TalksByState = Record<TalkState, number>;

export interface RecentSubmission {
  id: string;
  title: string;
  speakerId: string;
  state: TalkState;
  submittedAt: Date;
  ratingCount: number;
  averageRating: number | null;
}

export interface DashboardStats {
  totalTalks: number;
  talksByState: TalksByState;
  ratings: {
    totalRatings: number;
    averageRating: number | null;
    ratedTalks: number;
    unratedTalks: number;
  };
  recentSubmissions: RecentSubmission[];
}

/** Organizer overview: state breakdown, rating coverage and the latest submissions. */
export async function dashboard(ctx: EngineContext): Promise<DashboardStats> {
  return runInTransaction(ctx, async (tx) => {
    const stateCounts = await tx
      .select({ state: talks.state, count: sql<number>`count(*)::int` })
      .from(talks)
      .groupBy(talks.state);

    const [ratingTotals] = await tx
      .select({
        count: sql<number>`count(*)::int`,
        average: sql<number | null>`avg(${ratings.score})::float8`,
        ratedTalks: sql<number>`count(distinct ${ratings.talkId})::int`,
      })
      .from(ratings);

    const recent = await tx
      .select({
        id: talks.id,
        title: talks.title,
        speakerId: talks.speakerId,
        state: talks.state,
        submittedAt: talks.submittedAt,
        ratingCount: sql<number>`count(${ratings.id})::int`,
        averageRating: sql<number | null>`avg(${ratings.score})::float8`,
      })
      .from(talks)
      .leftJoin(ratings, eq(ratings.talkId, talks.id))
      .groupBy(talks.id)
      .orderBy(desc(talks.submittedAt), desc(talks.id))
      .limit(RECENT_SUBMISSIONS_LIMIT);

    const talksByState: TalksByState = { submitted: 0, pending: 0, accepted: 0, rejected: 0 };
    for (const row of stateCounts) talksByState[row.state] = Number(row.count);

    const totalTalks = TALK_STATES.reduce((sum, state) => sum + talksByState[state], 0);
    const totalRatings = Number(ratingTotals?.count ?? 0);
    const ratedTalks = Number(ratingTotals?.ratedTalks ?? 0);

    return {
      totalTalks,
      talksByState,
      ratings: {
        totalRatings,
        averageRating: totalRatings > 0 ? Number(ratingTotals?.average) : null,
        ratedTalks,
        unratedTalks: totalTalks - ratedTalks,
      },
      recentSubmissions: recent.map((r) => ({
        ...r,
        ratingCount: Number(r.ratingCount),
        averageRating: r.averageRating === null ? null : Number(r.averageRating),
      })),
    };
  });
}
