/**
 * Digest assembly
 * filter exclusions → score → diversity-select → report
 */

import type { CandidateArticle, DigestResult, InterestProfile, ScoredArticle } from "../model";
import { scoreBatch } from "./score";
import { selectWithDiversity } from "./select";
import { logger } from "../logger";

export interface ExclusionResult {
  kept: CandidateArticle[];
  excluded: { topic: number; source: number };
  fellBack: boolean;
}

/**
 * Drop candidates whose category or source the reader excluded.
 * If that would empty a non-empty set, the unfiltered set is returned
 * instead so a digest never comes back blank while content exists.
 */
export function filterExclusions(
  candidates: readonly CandidateArticle[],
  profile: InterestProfile
): ExclusionResult {
  const excludedTopics = new Set(profile.excludeTopics);
  const excludedSources = new Set(profile.excludeSources);
  const excluded = { topic: 0, source: 0 };
  const kept: CandidateArticle[] = [];

  for (const candidate of candidates) {
    if (excludedTopics.has(candidate.category)) {
      excluded.topic++;
      continue;
    }
    if (excludedSources.has(candidate.source)) {
      excluded.source++;
      continue;
    }
    kept.push(candidate);
  }

  if (kept.length === 0 && candidates.length > 0) {
    logger.warn(`Exclusions removed all ${candidates.length} candidates, using unfiltered set`, {
      userId: profile.userId,
      excluded,
    });
    return { kept: [...candidates], excluded, fellBack: true };
  }

  return { kept, excluded, fellBack: false };
}

function dedupeCandidates(candidates: readonly CandidateArticle[]): CandidateArticle[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.id)) return false;
    seen.add(candidate.id);
    return true;
  });
}

export function computePersonalizationScore(selected: readonly ScoredArticle[]): number {
  if (selected.length === 0) return 0;
  const total = selected.reduce((sum, item) => sum + item.score, 0);
  return Math.max(0, Math.min(1, total / selected.length));
}

export function computeDiversityScore(selected: readonly ScoredArticle[]): number {
  if (selected.length === 0) return 0;
  return new Set(selected.map((item) => item.category)).size / selected.length;
}

function freezeDigest(
  articles: ScoredArticle[],
  personalizationScore: number,
  diversityScore: number,
  generatedAt: Date
): DigestResult {
  const frozenArticles = Object.freeze(
    articles.map((article) => Object.freeze({ ...article, breakdown: Object.freeze({ ...article.breakdown }) }))
  );
  return Object.freeze({
    articles: frozenArticles,
    personalizationScore,
    diversityScore,
    generatedAt,
  });
}

export function emptyDigest(generatedAt: Date): DigestResult {
  return freezeDigest([], 0, 0, generatedAt);
}

/**
 * Build a digest for one profile from an already-fetched candidate set.
 * Pure apart from logging; identical inputs give an identical result.
 */
export function assembleDigest(
  profile: InterestProfile,
  candidates: readonly CandidateArticle[],
  now: Date
): DigestResult {
  if (candidates.length === 0) {
    logger.info(`No candidates for ${profile.userId}, returning empty digest`);
    return emptyDigest(now);
  }

  const unique = dedupeCandidates(candidates);
  const { kept, excluded, fellBack } = filterExclusions(unique, profile);

  logger.info(`Filtered ${unique.length} → ${kept.length} candidates`, {
    userId: profile.userId,
    excluded,
    fellBack,
  });

  const scored = scoreBatch(kept, profile, now);
  const { items } = selectWithDiversity(scored, profile.dailyLimit, profile.diversityBoost);

  return freezeDigest(
    items,
    computePersonalizationScore(items),
    computeDiversityScore(items),
    now
  );
}
