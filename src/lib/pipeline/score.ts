/**
 * Scoring pipeline
 * Combines topic interest, source preference, freshness, quality and
 * in-batch diversity into a single [0, 1] personalization score
 */

import type {
  CandidateArticle,
  FreshnessMode,
  InterestProfile,
  ScoreBreakdown,
  ScoredArticle,
} from "../model";
import {
  FRESHNESS_HALF_LIFE_HOURS,
  MAX_QUALITY,
  NEUTRAL_QUALITY,
  SCORE_WEIGHTS,
} from "../../config/personalization";
import { getSourceWeight, getTopicWeight } from "../profile";
import { logger } from "../logger";

const HOUR_MS = 60 * 60 * 1000;

/**
 * Category frequencies of the candidate set being scored together.
 */
export interface BatchContext {
  size: number;
  categoryCounts: ReadonlyMap<string, number>;
}

export function buildBatchContext(candidates: readonly CandidateArticle[]): BatchContext {
  const categoryCounts = new Map<string, number>();
  for (const candidate of candidates) {
    categoryCounts.set(candidate.category, (categoryCounts.get(candidate.category) ?? 0) + 1);
  }
  return { size: candidates.length, categoryCounts };
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Exponential recency decay: exp(-ageHours / halfLife).
 * Articles dated in the future count as brand new.
 */
export function computeFreshnessScore(publishedAt: Date, now: Date, mode: FreshnessMode): number {
  const ageHours = Math.max(0, (now.getTime() - publishedAt.getTime()) / HOUR_MS);
  if (!Number.isFinite(ageHours)) {
    return 0;
  }
  return clamp01(Math.exp(-ageHours / FRESHNESS_HALF_LIFE_HOURS[mode]));
}

export function computeQualityScore(quality: number | undefined): number {
  const raw = quality === undefined || Number.isNaN(quality) ? NEUTRAL_QUALITY : quality;
  return Math.max(0, Math.min(MAX_QUALITY, raw)) / MAX_QUALITY;
}

/**
 * Rewards categories that are rare within the batch.
 * An article scored outside any batch counts as a batch of one.
 */
export function computeDiversityTerm(category: string, batch: BatchContext): number {
  if (batch.size <= 0) {
    return 0;
  }
  const count = batch.categoryCounts.get(category) ?? 0;
  return clamp01(1 - count / batch.size);
}

/**
 * Score one article for one profile. Pure: no I/O, no shared state.
 */
export function scoreArticle(
  article: CandidateArticle,
  profile: InterestProfile,
  now: Date,
  batch: BatchContext = buildBatchContext([article])
): ScoredArticle {
  const breakdown: ScoreBreakdown = {
    topic: getTopicWeight(profile, article.category),
    source: getSourceWeight(profile, article.source),
    freshness: computeFreshnessScore(article.publishedAt, now, profile.freshnessMode),
    quality: computeQualityScore(article.quality),
    diversity: computeDiversityTerm(article.category, batch),
  };

  const weighted =
    SCORE_WEIGHTS.topic * breakdown.topic +
    SCORE_WEIGHTS.source * breakdown.source +
    SCORE_WEIGHTS.freshness * breakdown.freshness +
    SCORE_WEIGHTS.quality * breakdown.quality +
    SCORE_WEIGHTS.diversity * breakdown.diversity;

  return {
    ...article,
    score: clamp01(weighted),
    breakdown,
  };
}

/**
 * Score a candidate set against its own category distribution.
 * Output order matches input order; ranking is the selector's job.
 */
export function scoreBatch(
  candidates: readonly CandidateArticle[],
  profile: InterestProfile,
  now: Date
): ScoredArticle[] {
  if (candidates.length === 0) {
    return [];
  }

  const batch = buildBatchContext(candidates);
  const scored = candidates.map((candidate) => scoreArticle(candidate, profile, now, batch));

  logger.debug(`Scored ${scored.length} candidates`, {
    userId: profile.userId,
    categories: batch.categoryCounts.size,
    freshnessMode: profile.freshnessMode,
  });

  return scored;
}
