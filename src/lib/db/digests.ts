/**
 * Digest history
 * Keeps what each generated digest contained and how well it matched
 */

import { z } from "zod";
import type { StoredDigest } from "../model";
import { logger } from "../logger";
import type { DatabaseClient } from "./driver";

export interface DigestHistory {
  save(digest: StoredDigest): Promise<void>;
  listForUser(userId: string, limit: number): Promise<StoredDigest[]>;
  countForUser(userId: string): Promise<number>;
}

const DigestRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  article_ids: z.string(),
  article_scores: z.string(),
  personalization_score: z.coerce.number(),
  diversity_score: z.coerce.number(),
  freshness_score: z.coerce.number(),
  created_at: z.coerce.number(),
});

export function rowToDigest(row: unknown): StoredDigest {
  const r = DigestRowSchema.parse(row);
  return {
    id: r.id,
    userId: r.user_id,
    articleIds: z.array(z.string()).parse(JSON.parse(r.article_ids)),
    articleScores: z.record(z.number()).parse(JSON.parse(r.article_scores)),
    personalizationScore: r.personalization_score,
    diversityScore: r.diversity_score,
    freshnessScore: r.freshness_score,
    createdAt: new Date(r.created_at),
  };
}

export class SqlDigestHistory implements DigestHistory {
  constructor(private readonly db: DatabaseClient) {}

  async save(digest: StoredDigest): Promise<void> {
    try {
      await this.db.run(
        `INSERT INTO personalized_digests
         (id, user_id, article_ids, article_scores, personalization_score, diversity_score, freshness_score, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          digest.id,
          digest.userId,
          JSON.stringify(digest.articleIds),
          JSON.stringify(digest.articleScores),
          digest.personalizationScore,
          digest.diversityScore,
          digest.freshnessScore,
          digest.createdAt.getTime(),
        ]
      );
      logger.info("Saved digest", { userId: digest.userId, digestId: digest.id, articles: digest.articleIds.length });
    } catch (error) {
      logger.error("Failed to save digest", { userId: digest.userId, error });
      throw error;
    }
  }

  async listForUser(userId: string, limit: number): Promise<StoredDigest[]> {
    const result = await this.db.query(
      `SELECT id, user_id, article_ids, article_scores, personalization_score, diversity_score, freshness_score, created_at
       FROM personalized_digests WHERE user_id = ? ORDER BY created_at DESC, id ASC LIMIT ?`,
      [userId, limit]
    );
    return result.rows.map(rowToDigest);
  }

  async countForUser(userId: string): Promise<number> {
    const result = await this.db.query(
      `SELECT COUNT(*) AS count FROM personalized_digests WHERE user_id = ?`,
      [userId]
    );
    const row = result.rows[0];
    return row ? z.object({ count: z.coerce.number() }).parse(row).count : 0;
  }
}
