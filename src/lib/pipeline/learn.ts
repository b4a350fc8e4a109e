/**
 * Feedback learning
 * Turns interaction events into bounded weight changes and relaxes stale
 * weights back toward neutral
 */

import type {
  CandidateArticle,
  InteractionEvent,
  InteractionSignal,
  InterestProfile,
  ProfileSummary,
  WeightChange,
  WeightKey,
} from "../model";
import { sourceKey, topicKey } from "../model";
import { DECAY, LEARNING_RATES, NEUTRAL_WEIGHT, SIGNAL_THRESHOLDS } from "../../config/personalization";
import { clampWeight, cloneProfile, getSourceWeight, getTopicWeight } from "../profile";
import { logger } from "../logger";

export type ArticleContext = Pick<CandidateArticle, "category" | "source">;

export interface LearningOutcome {
  profile: InterestProfile;
  summary: ProfileSummary;
}

export interface DecayOutcome {
  profile: InterestProfile;
  decayedKeys: WeightKey[];
}

/**
 * First match wins: positive, then negative, else neutral.
 */
export function classifySignal(event: InteractionEvent): InteractionSignal {
  if (
    event.explicitRating > 0 ||
    event.readDurationSeconds >= SIGNAL_THRESHOLDS.longReadSeconds ||
    event.saved
  ) {
    return "positive";
  }

  if (
    event.explicitRating < 0 ||
    (event.readDurationSeconds < SIGNAL_THRESHOLDS.bounceSeconds && !event.saved) ||
    event.dismissed
  ) {
    return "negative";
  }

  return "neutral";
}

/**
 * Topic and source deltas for a classified event, before clamping
 */
export function computeDeltas(
  event: InteractionEvent,
  signal: InteractionSignal
): { topic: number; source: number } {
  if (signal === "positive") {
    let topic = LEARNING_RATES.topicReinforce * Math.max(event.explicitRating, 1);
    if (event.saved) {
      topic += LEARNING_RATES.savedBonus;
    }
    return { topic, source: LEARNING_RATES.sourceReinforce };
  }

  if (signal === "negative") {
    return { topic: -LEARNING_RATES.topicPenalty, source: 0 };
  }

  return { topic: 0, source: 0 };
}

/**
 * Apply one interaction to a profile. Returns a new profile; the input is
 * left untouched.
 */
export function applyInteraction(
  profile: InterestProfile,
  event: InteractionEvent,
  article: ArticleContext,
  now: Date
): LearningOutcome {
  const next = cloneProfile(profile);
  const signal = classifySignal(event);
  const changes: WeightChange[] = [];

  next.lastInteractionAt = now;
  next.updatedAt = now;

  if (signal !== "neutral" && profile.autoAdjust) {
    const deltas = computeDeltas(event, signal);

    if (deltas.topic !== 0) {
      const previous = getTopicWeight(profile, article.category);
      const updated = clampWeight(previous + deltas.topic);
      next.topicWeights[article.category] = updated;
      // Reinforced even when clamping leaves the value where it was
      next.lastUpdate[topicKey(article.category)] = now;
      if (updated !== previous) {
        changes.push({ key: topicKey(article.category), previous, next: updated });
      }
    }

    if (deltas.source !== 0) {
      const previous = getSourceWeight(profile, article.source);
      const updated = clampWeight(previous + deltas.source);
      next.sourceWeights[article.source] = updated;
      next.lastUpdate[sourceKey(article.source)] = now;
      if (updated !== previous) {
        changes.push({ key: sourceKey(article.source), previous, next: updated });
      }
    }
  } else if (signal !== "neutral") {
    logger.debug(`Auto-adjust disabled, ignoring ${signal} signal`, { userId: profile.userId });
  }

  logger.info(`Applied ${signal} interaction`, {
    userId: profile.userId,
    articleId: event.articleId,
    changes: changes.length,
  });

  return {
    profile: next,
    summary: {
      userId: profile.userId,
      signal,
      changes,
      topicWeights: { ...next.topicWeights },
      sourceWeights: { ...next.sourceWeights },
    },
  };
}

function isStale(lastUpdate: Date | undefined, now: Date): boolean {
  if (!lastUpdate) return true;
  return now.getTime() - lastUpdate.getTime() >= DECAY.staleAfterMs;
}

function relax(weight: number): number {
  return clampWeight(weight + (NEUTRAL_WEIGHT - weight) * DECAY.rate);
}

/**
 * Relax every weight untouched for DECAY.staleAfterMs toward 0.5.
 * Decayed keys get lastUpdate = now, so a second call with the same `now`
 * changes nothing.
 */
export function decayProfile(profile: InterestProfile, now: Date): DecayOutcome {
  if (!profile.autoAdjust) {
    return { profile, decayedKeys: [] };
  }

  const next = cloneProfile(profile);
  const decayedKeys: WeightKey[] = [];

  for (const [topic, weight] of Object.entries(profile.topicWeights)) {
    const key = topicKey(topic);
    if (!isStale(profile.lastUpdate[key], now)) continue;
    next.topicWeights[topic] = relax(weight);
    next.lastUpdate[key] = now;
    decayedKeys.push(key);
  }

  for (const [source, weight] of Object.entries(profile.sourceWeights)) {
    const key = sourceKey(source);
    if (!isStale(profile.lastUpdate[key], now)) continue;
    next.sourceWeights[source] = relax(weight);
    next.lastUpdate[key] = now;
    decayedKeys.push(key);
  }

  if (decayedKeys.length === 0) {
    return { profile, decayedKeys };
  }

  next.updatedAt = now;
  logger.debug(`Decayed ${decayedKeys.length} stale weights`, { userId: profile.userId });
  return { profile: next, decayedKeys };
}
