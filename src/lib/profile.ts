/**
 * Interest profile helpers
 * Defaults, clamping and copy-on-write for InterestProfile
 */

import type { InterestProfile } from "./model";
import { NEUTRAL_WEIGHT, PROFILE_DEFAULTS } from "../config/personalization";

/**
 * Clamp a weight into [0, 1]. NaN collapses to the neutral weight.
 */
export function clampWeight(value: number): number {
  if (Number.isNaN(value)) return NEUTRAL_WEIGHT;
  return Math.max(0, Math.min(1, value));
}

export function clampDailyLimit(value: number): number {
  if (!Number.isFinite(value)) return PROFILE_DEFAULTS.dailyLimit;
  return Math.max(1, Math.floor(value));
}

export function createDefaultProfile(userId: string, now: Date): InterestProfile {
  return {
    userId,
    topicWeights: {},
    sourceWeights: {},
    excludeTopics: [],
    excludeSources: [],
    freshnessMode: PROFILE_DEFAULTS.freshnessMode,
    diversityBoost: PROFILE_DEFAULTS.diversityBoost,
    dailyLimit: PROFILE_DEFAULTS.dailyLimit,
    autoAdjust: PROFILE_DEFAULTS.autoAdjust,
    lastUpdate: {},
    lastInteractionAt: null,
    createdAt: now,
    updatedAt: now,
  };
}

export function getTopicWeight(profile: InterestProfile, topic: string): number {
  return clampWeight(profile.topicWeights[topic] ?? NEUTRAL_WEIGHT);
}

export function getSourceWeight(profile: InterestProfile, source: string): number {
  return clampWeight(profile.sourceWeights[source] ?? NEUTRAL_WEIGHT);
}

/**
 * Shallow-copy every mutable collection so callers can edit the copy
 * without touching the original.
 */
export function cloneProfile(profile: InterestProfile): InterestProfile {
  return {
    ...profile,
    topicWeights: { ...profile.topicWeights },
    sourceWeights: { ...profile.sourceWeights },
    excludeTopics: [...profile.excludeTopics],
    excludeSources: [...profile.excludeSources],
    lastUpdate: { ...profile.lastUpdate },
  };
}
