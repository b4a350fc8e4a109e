/**
 * Tests for the personalization service over in-process stores
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { PersonalizationService } from "../../../src/lib/personalization/service";
import {
  InMemoryArticleStore,
  InMemoryDigestHistory,
  InMemoryInteractionLog,
  InMemoryProfileStore,
} from "../../../src/lib/db/memory";
import { ProfileLock } from "../../../src/lib/sync/profile-lock";
import { ProfileStoreUnavailableError, UnknownArticleError } from "../../../src/lib/errors";
import type { CandidateArticle } from "../../../src/lib/model";

const NOW = new Date("2026-03-02T12:00:00Z");
const HOUR = 60 * 60 * 1000;

function createArticle(id: string, overrides: Partial<CandidateArticle> = {}): CandidateArticle {
  return {
    id,
    category: "AI",
    source: "Reuters",
    quality: 7,
    publishedAt: new Date(NOW.getTime() - HOUR),
    ...overrides,
  };
}

describe("PersonalizationService", () => {
  let profiles: InMemoryProfileStore;
  let articles: InMemoryArticleStore;
  let interactions: InMemoryInteractionLog;
  let digests: InMemoryDigestHistory;
  let lock: ProfileLock;
  let service: PersonalizationService;

  beforeEach(() => {
    profiles = new InMemoryProfileStore(() => NOW);
    articles = new InMemoryArticleStore([
      createArticle("a1"),
      createArticle("a2", { category: "Crypto", source: "CoinDesk" }),
      createArticle("w1", { category: "Web", source: "Blog" }),
      createArticle("old", { publishedAt: new Date(NOW.getTime() - 100 * HOUR) }),
    ]);
    interactions = new InMemoryInteractionLog();
    digests = new InMemoryDigestHistory();
    lock = new ProfileLock();
    service = new PersonalizationService({
      profiles,
      articles,
      interactions,
      digests,
      lock,
      candidateWindowHours: 72,
      candidateLimit: 500,
      clock: () => NOW,
    });
  });

  describe("generateDigest", () => {
    it("should build a digest from candidates inside the window and record it", async () => {
      const digest = await service.generateDigest("user-1");

      expect(digest.articles.map((a) => a.id).sort()).toEqual(["a1", "a2", "w1"]);
      expect(digest.generatedAt).toEqual(NOW);

      const history = await service.listDigests("user-1", 10);
      expect(history).toHaveLength(1);
      expect(history[0].articleIds).toEqual(digest.articles.map((a) => a.id));
      expect(history[0].id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("should rank a liked topic first after feedback", async () => {
      await service.submitFeedback("user-1", "a2", "like");
      const digest = await service.generateDigest("user-1");
      expect(digest.articles[0].id).toBe("a2");
    });

    it("should not record history for an empty digest", async () => {
      const empty = new PersonalizationService({
        profiles,
        articles: new InMemoryArticleStore(),
        interactions,
        digests,
        lock,
        candidateWindowHours: 72,
        candidateLimit: 500,
        clock: () => NOW,
      });

      const digest = await empty.generateDigest("user-1");
      expect(digest.articles).toEqual([]);
      expect(digest.personalizationScore).toBe(0);
      expect(await digests.countForUser("user-1")).toBe(0);
    });

    it("should not wait for a held profile lock", async () => {
      let release: () => void = () => {};
      const held = lock.runExclusive(
        "user-1",
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );

      const digest = await service.generateDigest("user-1");
      expect(digest.articles.length).toBeGreaterThan(0);

      release();
      await held;
    });

    it("should still return the digest when history cannot be saved", async () => {
      vi.spyOn(digests, "save").mockRejectedValue(new Error("disk full"));
      const digest = await service.generateDigest("user-1");
      expect(digest.articles).toHaveLength(3);
    });

    it("should surface an unavailable profile store", async () => {
      vi.spyOn(profiles, "getProfile").mockRejectedValue(
        new ProfileStoreUnavailableError("getProfile", "user-1", new Error("timeout"))
      );
      await expect(service.generateDigest("user-1")).rejects.toBeInstanceOf(ProfileStoreUnavailableError);
    });
  });

  describe("recordInteraction", () => {
    it("should update weights and log the event with its signal", async () => {
      const summary = await service.recordInteraction("user-1", {
        articleId: "a2",
        opened: true,
        readDurationSeconds: 2,
        explicitRating: 0,
        saved: false,
        dismissed: false,
      });

      expect(summary.signal).toBe("negative");
      expect(summary.topicWeights.Crypto).toBeCloseTo(0.42, 10);

      const profile = await service.getProfile("user-1");
      expect(profile.topicWeights.Crypto).toBeCloseTo(0.42, 10);
      expect(profile.lastInteractionAt).toEqual(NOW);

      const logged = await service.recentInteractions("user-1");
      expect(logged).toHaveLength(1);
      expect(logged[0].signal).toBe("negative");
      expect(logged[0].occurredAt).toEqual(NOW);
    });

    it("should reject interactions with unknown articles", async () => {
      await expect(service.submitFeedback("user-1", "missing", "like")).rejects.toBeInstanceOf(UnknownArticleError);
      expect(await profiles.listUserIds()).toEqual([]);
    });

    it("should apply every concurrent like exactly once", async () => {
      await Promise.all(Array.from({ length: 5 }, () => service.submitFeedback("user-1", "a1", "like")));

      const profile = await service.getProfile("user-1");
      expect(profile.topicWeights.AI).toBeCloseTo(0.75, 10);
      expect(profile.sourceWeights.Reuters).toBeCloseTo(0.65, 10);
    });

    it("should map one-click feedback onto signals", async () => {
      expect((await service.submitFeedback("user-1", "a1", "save")).signal).toBe("positive");
      expect((await service.submitFeedback("user-1", "a2", "dismiss")).signal).toBe("negative");
      expect((await service.submitFeedback("user-1", "w1", "dislike")).signal).toBe("negative");
    });
  });

  describe("completeOnboarding", () => {
    it("should seed chosen topics and sources at high interest", async () => {
      const profile = await service.completeOnboarding("user-1", {
        topics: ["AI", "Web"],
        sources: ["Reuters"],
        dailyLimit: 5,
        freshnessMode: "breaking",
      });

      expect(profile.topicWeights).toEqual({ AI: 0.9, Web: 0.9 });
      expect(profile.sourceWeights).toEqual({ Reuters: 0.9 });
      expect(profile.lastUpdate["topic:AI"]).toEqual(NOW);
      expect(profile.dailyLimit).toBe(5);
      expect(profile.freshnessMode).toBe("breaking");
      expect((await service.getProfile("user-1")).topicWeights.AI).toBe(0.9);
    });
  });

  describe("updatePreferences", () => {
    it("should clamp out-of-range values", async () => {
      const profile = await service.updatePreferences("user-1", {
        topicWeights: { AI: 1.7, Crypto: -3 },
        diversityBoost: -0.2,
        dailyLimit: 0,
      });

      expect(profile.topicWeights).toEqual({ AI: 1, Crypto: 0 });
      expect(profile.diversityBoost).toBe(0);
      expect(profile.dailyLimit).toBe(1);
    });

    it("should replace exclusion lists without duplicates", async () => {
      const profile = await service.updatePreferences("user-1", {
        excludeTopics: ["Politics", "Politics", "Sports"],
        autoAdjust: false,
      });

      expect(profile.excludeTopics).toEqual(["Politics", "Sports"]);
      expect(profile.autoAdjust).toBe(false);
    });
  });

  describe("getStats", () => {
    it("should summarize interactions and digests", async () => {
      await service.recordInteraction("user-1", {
        articleId: "a1",
        opened: true,
        readDurationSeconds: 90,
        explicitRating: 0,
        saved: true,
        dismissed: false,
      });
      await service.generateDigest("user-1");

      const stats = await service.getStats("user-1");
      expect(stats).toEqual({
        userId: "user-1",
        totalArticlesRead: 1,
        totalArticlesSaved: 1,
        averageReadingTime: 90,
        digestCount: 1,
        last7DaysActivity: [0, 0, 0, 0, 0, 0, 1],
      });
    });
  });
});
