/**
 * Personalization constants
 * Scoring weights, freshness half-lives, learning rates and profile defaults
 */

import type { FreshnessMode, ScoreBreakdown } from "../lib/model";

/**
 * Fixed component weights. They sum to 1.0 for every freshness mode;
 * the mode only changes the freshness half-life.
 */
export const SCORE_WEIGHTS: Readonly<ScoreBreakdown> = {
  topic: 0.35,
  source: 0.2,
  freshness: 0.25,
  quality: 0.15,
  diversity: 0.05,
};

export const FRESHNESS_HALF_LIFE_HOURS: Record<FreshnessMode, number> = {
  breaking: 6,
  daily: 24,
  weekly: 168,
};

export const NEUTRAL_WEIGHT = 0.5;
export const NEUTRAL_QUALITY = 5; // on the 0–10 critique scale
export const MAX_QUALITY = 10;

export const LEARNING_RATES = {
  topicReinforce: 0.05,
  sourceReinforce: 0.03,
  savedBonus: 0.1,
  topicPenalty: 0.08,
};

export const SIGNAL_THRESHOLDS = {
  longReadSeconds: 60,
  bounceSeconds: 5,
  // Stats only: what counts as "read" in the engagement summary
  countedReadSeconds: 30,
};

export const DECAY = {
  staleAfterMs: 7 * 24 * 60 * 60 * 1000,
  rate: 0.05,
};

export const ONBOARDING_SEED_WEIGHT = 0.9;

export const PROFILE_DEFAULTS: {
  freshnessMode: FreshnessMode;
  diversityBoost: number;
  dailyLimit: number;
  autoAdjust: boolean;
} = {
  freshnessMode: "daily",
  diversityBoost: 0.1,
  dailyLimit: 10,
  autoAdjust: true,
};
