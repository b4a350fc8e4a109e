/**
 * Selection pipeline
 * Apply per-category diversity caps and select the top `limit` articles
 */

import type { ScoredArticle } from "../model";
import { logger } from "../logger";

export interface SelectionResult {
  items: ScoredArticle[];
  reasons: Map<string, string>; // article.id -> selection/deferral reason
  categoryCap: number;
  relaxed: boolean;
}

/**
 * Ranking order: score desc, then newest first, then id asc so equal
 * inputs always produce the same order.
 */
export function compareScored(a: ScoredArticle, b: ScoredArticle): number {
  if (b.score !== a.score) return b.score - a.score;
  const published = b.publishedAt.getTime() - a.publishedAt.getTime();
  if (published !== 0) return published;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * max(1, floor(limit * (1 - diversityBoost)))
 */
export function computeCategoryCap(limit: number, diversityBoost: number): number {
  const boost = Math.max(0, Math.min(1, diversityBoost));
  return Math.max(1, Math.floor(limit * (1 - boost)));
}

/**
 * Keep the first (highest-ranked) occurrence of each id
 */
function dedupeById(ranked: ScoredArticle[]): ScoredArticle[] {
  const seen = new Set<string>();
  const unique: ScoredArticle[] = [];
  for (const item of ranked) {
    if (seen.has(item.id)) {
      logger.debug(`Dropping duplicate candidate ${item.id}`);
      continue;
    }
    seen.add(item.id);
    unique.push(item);
  }
  return unique;
}

/**
 * Greedy diversity-capped selection:
 * - First pass: accept in rank order while the category is under its cap
 * - Second pass: if that left the digest short, fill from deferred items
 *   in rank order, ignoring the cap
 *
 * Result size is min(limit, distinct ids) and is returned in rank order.
 */
export function selectWithDiversity(
  scored: readonly ScoredArticle[],
  limit: number,
  diversityBoost: number
): SelectionResult {
  const reasons = new Map<string, string>();
  const categoryCap = computeCategoryCap(Math.max(1, limit), diversityBoost);

  if (limit <= 0 || scored.length === 0) {
    return { items: [], reasons, categoryCap, relaxed: false };
  }

  const ranked = dedupeById([...scored].sort(compareScored));
  const rankOf = new Map(ranked.map((item, index) => [item.id, index]));

  const selected: ScoredArticle[] = [];
  const deferred: ScoredArticle[] = [];
  const categoryCount = new Map<string, number>();

  for (const item of ranked) {
    if (selected.length >= limit) {
      reasons.set(item.id, `Digest full (${limit} items)`);
      continue;
    }

    const current = categoryCount.get(item.category) ?? 0;
    if (current >= categoryCap) {
      deferred.push(item);
      reasons.set(item.id, `Category cap reached for ${item.category} (${categoryCap} items)`);
      continue;
    }

    selected.push(item);
    categoryCount.set(item.category, current + 1);
    reasons.set(item.id, `Selected at rank ${rankOf.get(item.id) ?? 0}`);
  }

  let relaxed = false;
  if (selected.length < limit && deferred.length > 0) {
    relaxed = true;
    logger.info(
      `Below limit (${selected.length}/${limit}), relaxing category cap of ${categoryCap}`
    );

    for (const item of deferred) {
      if (selected.length >= limit) break;
      selected.push(item);
      categoryCount.set(item.category, (categoryCount.get(item.category) ?? 0) + 1);
      reasons.set(item.id, `Selected (category cap relaxed to reach limit)`);
    }

    selected.sort((a, b) => (rankOf.get(a.id) ?? 0) - (rankOf.get(b.id) ?? 0));
  }

  logger.info(
    `Selected ${selected.length} items from ${categoryCount.size} categories ` +
      `(limit: ${limit}, category cap: ${categoryCap}${relaxed ? ", relaxed" : ""})`
  );

  return { items: selected, reasons, categoryCap, relaxed };
}
