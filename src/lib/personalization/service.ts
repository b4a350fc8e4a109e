/**
 * Personalization service
 * The operations the serving layer calls: generate a digest, record an
 * interaction, onboard a reader and edit preferences
 */

import { v4 as uuidv4 } from "uuid";
import type {
  DigestResult,
  FeedbackKind,
  FreshnessMode,
  InteractionEvent,
  InterestProfile,
  ProfileSummary,
  StoredDigest,
  UserStats,
} from "../model";
import { sourceKey, topicKey } from "../model";
import { ONBOARDING_SEED_WEIGHT } from "../../config/personalization";
import { clampDailyLimit, clampWeight, cloneProfile } from "../profile";
import { assembleDigest } from "../pipeline/personalize";
import { applyInteraction } from "../pipeline/learn";
import { computeUserStats } from "../pipeline/stats";
import { UnknownArticleError } from "../errors";
import { logger } from "../logger";
import type { ProfileStore } from "../db/profiles";
import type { CandidateFeed } from "../db/articles";
import type { InteractionLog, StoredInteraction } from "../db/interactions";
import type { DigestHistory } from "../db/digests";
import type { ProfileLock } from "../sync/profile-lock";
import { runDecaySweep, type DecaySweepReport } from "../sync/decay-sweep";

export interface PersonalizationDeps {
  profiles: ProfileStore;
  articles: CandidateFeed;
  interactions: InteractionLog;
  digests: DigestHistory;
  lock: ProfileLock;
  candidateWindowHours: number;
  candidateLimit: number;
  clock?: () => Date;
}

export type InteractionInput = Omit<InteractionEvent, "userId" | "occurredAt"> & {
  occurredAt?: Date;
};

export interface OnboardingInput {
  topics: string[];
  sources?: string[];
  dailyLimit?: number;
  freshnessMode?: FreshnessMode;
}

export interface PreferencesPatch {
  topicWeights?: Record<string, number>;
  sourceWeights?: Record<string, number>;
  excludeTopics?: string[];
  excludeSources?: string[];
  freshnessMode?: FreshnessMode;
  diversityBoost?: number;
  dailyLimit?: number;
  autoAdjust?: boolean;
}

const FEEDBACK_EVENTS: Record<FeedbackKind, Pick<InteractionInput, "explicitRating" | "saved" | "dismissed">> = {
  like: { explicitRating: 1, saved: false, dismissed: false },
  dislike: { explicitRating: -1, saved: false, dismissed: false },
  save: { explicitRating: 0, saved: true, dismissed: false },
  dismiss: { explicitRating: 0, saved: false, dismissed: true },
};

const HISTORY_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

export class PersonalizationService {
  private readonly clock: () => Date;

  constructor(private readonly deps: PersonalizationDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Build today's digest for a reader. Reads the profile without taking the
   * per-user lock, so it never waits on interaction processing.
   */
  async generateDigest(userId: string): Promise<DigestResult> {
    const now = this.clock();
    const profile = await this.deps.profiles.getProfile(userId);
    const candidates = await this.deps.articles.loadCandidates({
      now,
      windowHours: this.deps.candidateWindowHours,
      limit: this.deps.candidateLimit,
    });

    const digest = assembleDigest(profile, candidates, now);

    logger.info(`Generated digest for ${userId}`, {
      candidates: candidates.length,
      selected: digest.articles.length,
      personalizationScore: Number(digest.personalizationScore.toFixed(3)),
      diversityScore: Number(digest.diversityScore.toFixed(3)),
    });

    if (digest.articles.length > 0) {
      await this.recordDigest(userId, digest);
    }

    return digest;
  }

  private async recordDigest(userId: string, digest: DigestResult): Promise<void> {
    const stored: StoredDigest = {
      id: uuidv4(),
      userId,
      articleIds: digest.articles.map((a) => a.id),
      articleScores: Object.fromEntries(digest.articles.map((a) => [a.id, a.score])),
      personalizationScore: digest.personalizationScore,
      diversityScore: digest.diversityScore,
      freshnessScore: mean(digest.articles.map((a) => a.breakdown.freshness)),
      createdAt: digest.generatedAt,
    };

    try {
      await this.deps.digests.save(stored);
    } catch (error) {
      logger.error(`Failed to record digest history for ${userId}`, error);
    }
  }

  /**
   * Apply one interaction to the reader's profile and log it
   */
  async recordInteraction(userId: string, input: InteractionInput): Promise<ProfileSummary> {
    const article = await this.deps.articles.getArticle(input.articleId);
    if (!article) {
      throw new UnknownArticleError(input.articleId);
    }

    return this.deps.lock.runExclusive(userId, async () => {
      const now = this.clock();
      const event: InteractionEvent = {
        ...input,
        userId,
        occurredAt: input.occurredAt ?? now,
      };

      const profile = await this.deps.profiles.getProfile(userId);
      const { profile: updated, summary } = applyInteraction(profile, event, article, now);
      await this.deps.profiles.saveProfile(updated);
      await this.deps.interactions.record(event, summary.signal);
      return summary;
    });
  }

  /**
   * One-click feedback mapped onto an interaction event
   */
  async submitFeedback(userId: string, articleId: string, feedback: FeedbackKind): Promise<ProfileSummary> {
    return this.recordInteraction(userId, {
      articleId,
      opened: false,
      readDurationSeconds: 0,
      ...FEEDBACK_EVENTS[feedback],
    });
  }

  /**
   * Seed selected topics and sources at high interest
   */
  async completeOnboarding(userId: string, input: OnboardingInput): Promise<InterestProfile> {
    return this.deps.lock.runExclusive(userId, async () => {
      const now = this.clock();
      const profile = cloneProfile(await this.deps.profiles.getProfile(userId));

      for (const topic of input.topics) {
        profile.topicWeights[topic] = ONBOARDING_SEED_WEIGHT;
        profile.lastUpdate[topicKey(topic)] = now;
      }
      for (const source of input.sources ?? []) {
        profile.sourceWeights[source] = ONBOARDING_SEED_WEIGHT;
        profile.lastUpdate[sourceKey(source)] = now;
      }
      if (input.dailyLimit !== undefined) {
        profile.dailyLimit = clampDailyLimit(input.dailyLimit);
      }
      if (input.freshnessMode !== undefined) {
        profile.freshnessMode = input.freshnessMode;
      }
      profile.updatedAt = now;

      await this.deps.profiles.saveProfile(profile);
      logger.info("Onboarding completed", {
        userId,
        topics: input.topics,
        sources: input.sources ?? [],
      });
      return profile;
    });
  }

  async updatePreferences(userId: string, patch: PreferencesPatch): Promise<InterestProfile> {
    return this.deps.lock.runExclusive(userId, async () => {
      const now = this.clock();
      const profile = cloneProfile(await this.deps.profiles.getProfile(userId));

      for (const [topic, weight] of Object.entries(patch.topicWeights ?? {})) {
        profile.topicWeights[topic] = clampWeight(weight);
        profile.lastUpdate[topicKey(topic)] = now;
      }
      for (const [source, weight] of Object.entries(patch.sourceWeights ?? {})) {
        profile.sourceWeights[source] = clampWeight(weight);
        profile.lastUpdate[sourceKey(source)] = now;
      }
      if (patch.excludeTopics) profile.excludeTopics = [...new Set(patch.excludeTopics)];
      if (patch.excludeSources) profile.excludeSources = [...new Set(patch.excludeSources)];
      if (patch.freshnessMode) profile.freshnessMode = patch.freshnessMode;
      if (patch.diversityBoost !== undefined) profile.diversityBoost = clampWeight(patch.diversityBoost);
      if (patch.dailyLimit !== undefined) profile.dailyLimit = clampDailyLimit(patch.dailyLimit);
      if (patch.autoAdjust !== undefined) profile.autoAdjust = patch.autoAdjust;
      profile.updatedAt = now;

      await this.deps.profiles.saveProfile(profile);
      logger.info("Preferences updated", { userId, changes: Object.keys(patch) });
      return profile;
    });
  }

  async getProfile(userId: string): Promise<InterestProfile> {
    return this.deps.profiles.getProfile(userId);
  }

  async getStats(userId: string): Promise<UserStats> {
    const now = this.clock();
    const [interactions, digestCount] = await Promise.all([
      this.deps.interactions.listForUser(userId),
      this.deps.digests.countForUser(userId),
    ]);
    return computeUserStats(userId, interactions, digestCount, now);
  }

  async listDigests(userId: string, limit: number): Promise<StoredDigest[]> {
    return this.deps.digests.listForUser(userId, limit);
  }

  /**
   * Interactions from the last week, newest first
   */
  async recentInteractions(userId: string): Promise<StoredInteraction[]> {
    const since = new Date(this.clock().getTime() - HISTORY_WINDOW_MS);
    return this.deps.interactions.listForUser(userId, since);
  }

  /**
   * Relax stale weights for every stored profile
   */
  async decayProfiles(): Promise<DecaySweepReport> {
    return runDecaySweep({ store: this.deps.profiles, lock: this.deps.lock, now: this.clock() });
  }
}
