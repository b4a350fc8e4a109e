/**
 * Engagement statistics for a reader
 */

import type { UserStats } from "../model";
import type { StoredInteraction } from "../db/interactions";
import { SIGNAL_THRESHOLDS } from "../../config/personalization";

const DAY_MS = 24 * 60 * 60 * 1000;

function utcDayStart(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * - read: readDurationSeconds > 30
 * - last7DaysActivity: reads per UTC day, oldest first, today last
 */
export function computeUserStats(
  userId: string,
  interactions: readonly StoredInteraction[],
  digestCount: number,
  now: Date
): UserStats {
  const reads = interactions.filter((i) => i.readDurationSeconds > SIGNAL_THRESHOLDS.countedReadSeconds);
  const totalDuration = interactions.reduce((sum, i) => sum + i.readDurationSeconds, 0);

  const today = utcDayStart(now);
  const last7DaysActivity = new Array<number>(7).fill(0);
  for (const read of reads) {
    const daysAgo = Math.round((today - utcDayStart(read.occurredAt)) / DAY_MS);
    if (daysAgo >= 0 && daysAgo < 7) {
      last7DaysActivity[6 - daysAgo]++;
    }
  }

  return {
    userId,
    totalArticlesRead: reads.length,
    totalArticlesSaved: interactions.filter((i) => i.saved).length,
    averageReadingTime: interactions.length > 0 ? Math.round(totalDuration / interactions.length) : 0,
    digestCount,
    last7DaysActivity,
  };
}
