/**
 * Article store: the candidate feed for digest generation
 *
 * Records arrive here already normalized and deduplicated by the ingestion
 * side; this module only stores and windows them.
 */

import { z } from "zod";
import type { CandidateArticle } from "../model";
import { logger } from "../logger";
import { upsertSyntax, type DatabaseClient } from "./driver";

export interface CandidateQuery {
  now: Date;
  windowHours: number;
  limit: number;
}

export interface CandidateFeed {
  loadCandidates(query: CandidateQuery): Promise<CandidateArticle[]>;
  getArticle(articleId: string): Promise<CandidateArticle | null>;
}

const ArticleRowSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  url: z.string().nullable(),
  category: z.string(),
  source: z.string(),
  quality: z.coerce.number().nullable(),
  published_at: z.coerce.number(),
});

export function rowToArticle(row: unknown): CandidateArticle {
  const r = ArticleRowSchema.parse(row);
  const article: CandidateArticle = {
    id: r.id,
    category: r.category,
    source: r.source,
    publishedAt: new Date(r.published_at),
  };
  if (r.quality !== null) article.quality = r.quality;
  if (r.title !== null) article.title = r.title;
  if (r.url !== null) article.url = r.url;
  return article;
}

const ARTICLE_COLUMNS = "id, title, url, category, source, quality, published_at";

export class SqlArticleStore implements CandidateFeed {
  constructor(private readonly db: DatabaseClient) {}

  /**
   * Most recent articles inside the window, newest first, capped at `limit`
   * so per-request scoring cost stays bounded.
   */
  async loadCandidates({ now, windowHours, limit }: CandidateQuery): Promise<CandidateArticle[]> {
    const since = now.getTime() - windowHours * 60 * 60 * 1000;
    try {
      const result = await this.db.query(
        `SELECT ${ARTICLE_COLUMNS} FROM articles
         WHERE published_at >= ? AND published_at <= ?
         ORDER BY published_at DESC, id ASC
         LIMIT ?`,
        [since, now.getTime(), limit]
      );
      const articles = result.rows.map(rowToArticle);
      logger.info(`Loaded ${articles.length} candidates from the last ${windowHours}h`);
      return articles;
    } catch (error) {
      logger.error("Failed to load candidate articles", error);
      throw error;
    }
  }

  async getArticle(articleId: string): Promise<CandidateArticle | null> {
    try {
      const result = await this.db.query(`SELECT ${ARTICLE_COLUMNS} FROM articles WHERE id = ?`, [articleId]);
      return result.rows.length > 0 ? rowToArticle(result.rows[0]) : null;
    } catch (error) {
      logger.error(`Failed to load article ${articleId}`, error);
      throw error;
    }
  }

  /**
   * Insert or refresh articles coming from ingestion
   */
  async upsertArticles(articles: readonly CandidateArticle[]): Promise<number> {
    let written = 0;
    for (const article of articles) {
      const result = await this.db.run(
        `INSERT INTO articles (${ARTICLE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)
         ${upsertSyntax(["id"], ["title", "url", "category", "source", "quality", "published_at"])}`,
        [
          article.id,
          article.title ?? null,
          article.url ?? null,
          article.category,
          article.source,
          article.quality ?? null,
          article.publishedAt.getTime(),
        ]
      );
      written += result.changes;
    }
    logger.info(`Upserted ${written} articles`);
    return written;
  }
}
