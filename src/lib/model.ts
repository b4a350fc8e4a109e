/**
 * Core data models for personalized digests
 */

export type FreshnessMode = "breaking" | "daily" | "weekly";

export const FRESHNESS_MODES: readonly FreshnessMode[] = ["breaking", "daily", "weekly"];

/**
 * Key into InterestProfile.lastUpdate.
 * Topics and sources live in separate namespaces so "Reuters" the topic
 * never collides with "Reuters" the source.
 */
export type WeightKey = `topic:${string}` | `source:${string}`;

export function topicKey(topic: string): WeightKey {
  return `topic:${topic}`;
}

export function sourceKey(source: string): WeightKey {
  return `source:${source}`;
}

export interface InterestProfile {
  userId: string;
  topicWeights: Record<string, number>; // 0–1, absent = 0.5
  sourceWeights: Record<string, number>; // 0–1, absent = 0.5
  excludeTopics: string[];
  excludeSources: string[];
  freshnessMode: FreshnessMode;
  diversityBoost: number; // 0–1, higher = smaller per-category cap
  dailyLimit: number; // >= 1
  autoAdjust: boolean;
  lastUpdate: Partial<Record<WeightKey, Date>>;
  lastInteractionAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CandidateArticle {
  id: string;
  category: string;
  source: string;
  quality?: number; // 0–10 critique score, absent = 5
  publishedAt: Date;
  title?: string;
  url?: string;
}

export interface ScoreBreakdown {
  topic: number;
  source: number;
  freshness: number;
  quality: number;
  diversity: number;
}

export interface ScoredArticle extends CandidateArticle {
  score: number;
  breakdown: ScoreBreakdown;
}

export type ExplicitRating = -1 | 0 | 1;

export interface InteractionEvent {
  articleId: string;
  userId: string;
  opened: boolean;
  readDurationSeconds: number;
  explicitRating: ExplicitRating;
  saved: boolean;
  dismissed: boolean;
  occurredAt: Date;
}

export type FeedbackKind = "like" | "dislike" | "save" | "dismiss";

export type InteractionSignal = "positive" | "negative" | "neutral";

export interface DigestResult {
  readonly articles: readonly ScoredArticle[];
  readonly personalizationScore: number;
  readonly diversityScore: number;
  readonly generatedAt: Date;
}

export interface WeightChange {
  key: WeightKey;
  previous: number;
  next: number;
}

export interface ProfileSummary {
  userId: string;
  signal: InteractionSignal;
  changes: WeightChange[];
  topicWeights: Record<string, number>;
  sourceWeights: Record<string, number>;
}

export interface StoredDigest {
  id: string;
  userId: string;
  articleIds: string[];
  articleScores: Record<string, number>;
  personalizationScore: number;
  diversityScore: number;
  freshnessScore: number;
  createdAt: Date;
}

export interface UserStats {
  userId: string;
  totalArticlesRead: number;
  totalArticlesSaved: number;
  averageReadingTime: number;
  digestCount: number;
  last7DaysActivity: number[];
}
