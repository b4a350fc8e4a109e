/**
 * Interaction log: one row per (user, article), latest event wins
 */

import { z } from "zod";
import type { ExplicitRating, InteractionEvent, InteractionSignal } from "../model";
import { logger } from "../logger";
import { upsertSyntax, type DatabaseClient } from "./driver";

export interface StoredInteraction extends InteractionEvent {
  signal: InteractionSignal;
}

export interface InteractionLog {
  record(event: InteractionEvent, signal: InteractionSignal): Promise<void>;
  listForUser(userId: string, since?: Date): Promise<StoredInteraction[]>;
}

const InteractionRowSchema = z.object({
  user_id: z.string(),
  article_id: z.string(),
  opened: z.coerce.number(),
  read_duration_seconds: z.coerce.number(),
  explicit_rating: z.coerce.number(),
  saved: z.coerce.number(),
  dismissed: z.coerce.number(),
  signal: z.enum(["positive", "negative", "neutral"]),
  occurred_at: z.coerce.number(),
});

function toRating(value: number): ExplicitRating {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

export function rowToInteraction(row: unknown): StoredInteraction {
  const r = InteractionRowSchema.parse(row);
  return {
    userId: r.user_id,
    articleId: r.article_id,
    opened: r.opened !== 0,
    readDurationSeconds: r.read_duration_seconds,
    explicitRating: toRating(r.explicit_rating),
    saved: r.saved !== 0,
    dismissed: r.dismissed !== 0,
    signal: r.signal,
    occurredAt: new Date(r.occurred_at),
  };
}

const INTERACTION_COLUMNS = [
  "user_id",
  "article_id",
  "opened",
  "read_duration_seconds",
  "explicit_rating",
  "saved",
  "dismissed",
  "signal",
  "occurred_at",
];

export class SqlInteractionLog implements InteractionLog {
  constructor(private readonly db: DatabaseClient) {}

  async record(event: InteractionEvent, signal: InteractionSignal): Promise<void> {
    try {
      await this.db.run(
        `INSERT INTO user_interactions (${INTERACTION_COLUMNS.join(", ")})
         VALUES (${INTERACTION_COLUMNS.map(() => "?").join(", ")})
         ${upsertSyntax(["user_id", "article_id"], INTERACTION_COLUMNS.slice(2))}`,
        [
          event.userId,
          event.articleId,
          event.opened ? 1 : 0,
          Math.max(0, Math.round(event.readDurationSeconds)),
          event.explicitRating,
          event.saved ? 1 : 0,
          event.dismissed ? 1 : 0,
          signal,
          event.occurredAt.getTime(),
        ]
      );
      logger.debug("Recorded interaction", { userId: event.userId, articleId: event.articleId, signal });
    } catch (error) {
      logger.error("Failed to record interaction", { userId: event.userId, articleId: event.articleId, error });
      throw error;
    }
  }

  async listForUser(userId: string, since?: Date): Promise<StoredInteraction[]> {
    const result = since
      ? await this.db.query(
          `SELECT ${INTERACTION_COLUMNS.join(", ")} FROM user_interactions
           WHERE user_id = ? AND occurred_at >= ? ORDER BY occurred_at DESC`,
          [userId, since.getTime()]
        )
      : await this.db.query(
          `SELECT ${INTERACTION_COLUMNS.join(", ")} FROM user_interactions
           WHERE user_id = ? ORDER BY occurred_at DESC`,
          [userId]
        );
    return result.rows.map(rowToInteraction);
  }
}
