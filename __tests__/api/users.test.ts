/**
 * Tests for the per-user personalization endpoints
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { NextRequest } from "next/server";
import { GET as getDigest } from "@/app/api/users/[userId]/digest/route";
import { GET as getDigests } from "@/app/api/users/[userId]/digests/route";
import { GET as getInteractions, POST as postInteraction } from "@/app/api/users/[userId]/interactions/route";
import { POST as postFeedback } from "@/app/api/users/[userId]/feedback/route";
import { GET as getPreferences, PATCH as patchPreferences } from "@/app/api/users/[userId]/preferences/route";
import { POST as postOnboarding } from "@/app/api/users/[userId]/onboarding/route";
import { GET as getStats } from "@/app/api/users/[userId]/stats/route";
import { getPersonalizationService } from "@/src/lib/personalization/context";
import { PersonalizationService } from "@/src/lib/personalization/service";
import {
  InMemoryArticleStore,
  InMemoryDigestHistory,
  InMemoryInteractionLog,
  InMemoryProfileStore,
} from "@/src/lib/db/memory";
import { ProfileLock } from "@/src/lib/sync/profile-lock";
import { ProfileStoreUnavailableError } from "@/src/lib/errors";

vi.mock("@/src/lib/personalization/context");

const NOW = new Date("2026-03-02T12:00:00Z");
const BASE = "http://localhost/api/users/user-1";

function params(userId = "user-1") {
  return { params: Promise.resolve({ userId }) };
}

function jsonRequest(path: string, method: string, body: unknown): NextRequest {
  return new NextRequest(`${BASE}${path}`, {
    method,
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("/api/users/[userId]", () => {
  let service: PersonalizationService;

  beforeEach(() => {
    vi.clearAllMocks();
    service = new PersonalizationService({
      profiles: new InMemoryProfileStore(() => NOW),
      articles: new InMemoryArticleStore([
        { id: "a1", category: "AI", source: "Reuters", quality: 8, publishedAt: new Date(NOW.getTime() - 60 * 60 * 1000) },
        { id: "c1", category: "Crypto", source: "CoinDesk", publishedAt: new Date(NOW.getTime() - 2 * 60 * 60 * 1000) },
      ]),
      interactions: new InMemoryInteractionLog(),
      digests: new InMemoryDigestHistory(),
      lock: new ProfileLock(),
      candidateWindowHours: 72,
      candidateLimit: 500,
      clock: () => NOW,
    });
    vi.mocked(getPersonalizationService).mockResolvedValue(service);
  });

  describe("GET /digest", () => {
    it("should return the digest with scores", async () => {
      const response = await getDigest(new NextRequest(`${BASE}/digest`), params());
      const data = await response.json();

      expect(response.status).toBe(200);
      expect(data.userId).toBe("user-1");
      expect(data.articles.map((a: { id: string }) => a.id)).toEqual(["a1", "c1"]);
      expect(data.diversityScore).toBe(1);
      expect(data.generatedAt).toBe("2026-03-02T12:00:00.000Z");
    });

    it("should return 503 when the profile store is down", async () => {
      vi.mocked(getPersonalizationService).mockRejectedValue(
        new ProfileStoreUnavailableError("connect", null, new Error("connection refused"))
      );

      const response = await getDigest(new NextRequest(`${BASE}/digest`), params());
      const data = await response.json();

      expect(response.status).toBe(503);
      expect(data).toEqual({ success: false, error: "Profile store unavailable" });
    });

    it("should reject a blank user id", async () => {
      const response = await getDigest(new NextRequest(`${BASE}/digest`), params("  "));
      expect(response.status).toBe(400);
    });
  });

  describe("POST /interactions", () => {
    it("should apply the interaction and return the summary", async () => {
      const response = await postInteraction(
        jsonRequest("/interactions", "POST", { articleId: "c1", explicitRating: -1 }),
        params()
      );
      const data = await response.json();

      expect(response.status).toBe(200);
      expect(data.success).toBe(true);
      expect(data.summary.signal).toBe("negative");
      expect(data.summary.topicWeights.Crypto).toBeCloseTo(0.42, 10);
    });

    it("should reject an invalid event", async () => {
      const response = await postInteraction(
        jsonRequest("/interactions", "POST", { articleId: "c1", readDurationSeconds: -5 }),
        params()
      );
      const data = await response.json();

      expect(response.status).toBe(400);
      expect(data.error).toBe("Invalid request");
    });

    it("should reject a body that is not JSON", async () => {
      const response = await postInteraction(jsonRequest("/interactions", "POST", "{not json"), params());
      expect(response.status).toBe(400);
    });

    it("should return 404 for an unknown article", async () => {
      const response = await postInteraction(jsonRequest("/interactions", "POST", { articleId: "nope" }), params());
      const data = await response.json();

      expect(response.status).toBe(404);
      expect(data.error).toBe("Unknown article: nope");
    });

    it("should list recent interactions", async () => {
      await service.submitFeedback("user-1", "a1", "save");

      const response = await getInteractions(new NextRequest(`${BASE}/interactions`), params());
      const data = await response.json();

      expect(data.count).toBe(1);
      expect(data.interactions[0].articleId).toBe("a1");
      expect(data.interactions[0].signal).toBe("positive");
    });
  });

  describe("POST /feedback", () => {
    it("should map a like onto the profile", async () => {
      const response = await postFeedback(
        jsonRequest("/feedback", "POST", { articleId: "a1", feedback: "like" }),
        params()
      );
      const data = await response.json();

      expect(response.status).toBe(200);
      expect(data.summary.topicWeights.AI).toBeCloseTo(0.55, 10);
      expect(data.summary.sourceWeights.Reuters).toBeCloseTo(0.53, 10);
    });

    it("should reject an unknown feedback kind", async () => {
      const response = await postFeedback(
        jsonRequest("/feedback", "POST", { articleId: "a1", feedback: "love" }),
        params()
      );
      expect(response.status).toBe(400);
    });
  });

  describe("/preferences", () => {
    it("should return the default profile for a new reader", async () => {
      const response = await getPreferences(new NextRequest(`${BASE}/preferences`), params("fresh"));
      const data = await response.json();

      expect(data.profile.userId).toBe("fresh");
      expect(data.profile.dailyLimit).toBe(10);
      expect(data.profile.freshnessMode).toBe("daily");
    });

    it("should clamp out-of-range weights", async () => {
      const response = await patchPreferences(
        jsonRequest("/preferences", "PATCH", { topicWeights: { AI: 2 }, excludeSources: ["CoinDesk"] }),
        params()
      );
      const data = await response.json();

      expect(response.status).toBe(200);
      expect(data.profile.topicWeights).toEqual({ AI: 1 });
      expect(data.profile.excludeSources).toEqual(["CoinDesk"]);
    });

    it("should reject unknown fields", async () => {
      const response = await patchPreferences(jsonRequest("/preferences", "PATCH", { favouriteColour: "blue" }), params());
      expect(response.status).toBe(400);
    });
  });

  describe("POST /onboarding", () => {
    it("should seed the chosen topics", async () => {
      const response = await postOnboarding(
        jsonRequest("/onboarding", "POST", { topics: ["AI"], sources: ["Reuters"], dailyLimit: 5 }),
        params()
      );
      const data = await response.json();

      expect(response.status).toBe(201);
      expect(data.profile.topicWeights).toEqual({ AI: 0.9 });
      expect(data.profile.sourceWeights).toEqual({ Reuters: 0.9 });
      expect(data.profile.dailyLimit).toBe(5);
    });
  });

  describe("GET /digests and /stats", () => {
    it("should list stored digests and count them in stats", async () => {
      await service.generateDigest("user-1");
      await service.generateDigest("user-1");

      const listed = await getDigests(new NextRequest(`${BASE}/digests?limit=1`), params());
      const listData = await listed.json();
      expect(listData.count).toBe(1);
      expect(listData.digests[0].articleIds).toEqual(["a1", "c1"]);

      const stats = await getStats(new NextRequest(`${BASE}/stats`), params());
      const statsData = await stats.json();
      expect(statsData.digestCount).toBe(2);
      expect(statsData.totalArticlesRead).toBe(0);
    });

    it("should reject a limit of zero", async () => {
      const response = await getDigests(new NextRequest(`${BASE}/digests?limit=0`), params());
      expect(response.status).toBe(400);
    });
  });
});
