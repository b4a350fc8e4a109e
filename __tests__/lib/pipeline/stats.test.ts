/**
 * Tests for engagement statistics
 */

import { describe, it, expect } from "vitest";
import { computeUserStats } from "../../../src/lib/pipeline/stats";
import type { StoredInteraction } from "../../../src/lib/db/interactions";

const NOW = new Date("2026-03-02T12:00:00Z");
const DAY = 24 * 60 * 60 * 1000;

function createInteraction(overrides: Partial<StoredInteraction> = {}): StoredInteraction {
  return {
    articleId: "article-1",
    userId: "user-1",
    opened: true,
    readDurationSeconds: 45,
    explicitRating: 0,
    saved: false,
    dismissed: false,
    occurredAt: NOW,
    signal: "neutral",
    ...overrides,
  };
}

describe("computeUserStats", () => {
  it("should return zeros for a reader with no history", () => {
    expect(computeUserStats("user-1", [], 0, NOW)).toEqual({
      userId: "user-1",
      totalArticlesRead: 0,
      totalArticlesSaved: 0,
      averageReadingTime: 0,
      digestCount: 0,
      last7DaysActivity: [0, 0, 0, 0, 0, 0, 0],
    });
  });

  it("should count reads over 30 seconds per UTC day", () => {
    const stats = computeUserStats(
      "user-1",
      [
        createInteraction({ articleId: "a", readDurationSeconds: 45 }),
        createInteraction({ articleId: "b", readDurationSeconds: 120, occurredAt: new Date(NOW.getTime() - 2 * DAY) }),
        createInteraction({ articleId: "c", readDurationSeconds: 10, saved: true }),
        createInteraction({ articleId: "d", readDurationSeconds: 31, occurredAt: new Date(NOW.getTime() - 8 * DAY) }),
      ],
      4,
      NOW
    );

    expect(stats.totalArticlesRead).toBe(3);
    expect(stats.totalArticlesSaved).toBe(1);
    expect(stats.averageReadingTime).toBe(52);
    expect(stats.digestCount).toBe(4);
    expect(stats.last7DaysActivity).toEqual([0, 0, 0, 0, 1, 0, 1]);
  });

  it("should not count a read of exactly 30 seconds", () => {
    const stats = computeUserStats("user-1", [createInteraction({ readDurationSeconds: 30 })], 0, NOW);
    expect(stats.totalArticlesRead).toBe(0);
    expect(stats.averageReadingTime).toBe(30);
  });
});
