/**
 * PostgreSQL Schema Definitions
 *
 * Same tables as the SQLite schema. Millisecond timestamps need BIGINT,
 * which pg returns as strings; the row parsers coerce them back.
 */

export const TABLES_SQL = `
CREATE TABLE IF NOT EXISTS articles (
  id TEXT PRIMARY KEY,
  title TEXT,
  url TEXT,
  category TEXT NOT NULL,
  source TEXT NOT NULL,
  quality DOUBLE PRECISION,
  published_at BIGINT NOT NULL,
  created_at BIGINT NOT NULL DEFAULT (EXTRACT(EPOCH FROM NOW()) * 1000)::BIGINT
);

CREATE TABLE IF NOT EXISTS interest_profiles (
  user_id TEXT PRIMARY KEY,
  topic_weights TEXT NOT NULL DEFAULT '{}',
  source_weights TEXT NOT NULL DEFAULT '{}',
  exclude_topics TEXT NOT NULL DEFAULT '[]',
  exclude_sources TEXT NOT NULL DEFAULT '[]',
  freshness_mode TEXT NOT NULL DEFAULT 'daily',
  diversity_boost DOUBLE PRECISION NOT NULL DEFAULT 0.1,
  daily_limit INTEGER NOT NULL DEFAULT 10,
  auto_adjust INTEGER NOT NULL DEFAULT 1,
  last_update TEXT NOT NULL DEFAULT '{}',
  last_interaction_at BIGINT,
  created_at BIGINT NOT NULL,
  updated_at BIGINT NOT NULL
);

CREATE TABLE IF NOT EXISTS user_interactions (
  user_id TEXT NOT NULL,
  article_id TEXT NOT NULL,
  opened INTEGER NOT NULL DEFAULT 0,
  read_duration_seconds INTEGER NOT NULL DEFAULT 0,
  explicit_rating INTEGER NOT NULL DEFAULT 0,
  saved INTEGER NOT NULL DEFAULT 0,
  dismissed INTEGER NOT NULL DEFAULT 0,
  signal TEXT NOT NULL,
  occurred_at BIGINT NOT NULL,
  PRIMARY KEY (user_id, article_id)
);

CREATE TABLE IF NOT EXISTS personalized_digests (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  article_ids TEXT NOT NULL,
  article_scores TEXT NOT NULL,
  personalization_score DOUBLE PRECISION NOT NULL,
  diversity_score DOUBLE PRECISION NOT NULL,
  freshness_score DOUBLE PRECISION NOT NULL,
  created_at BIGINT NOT NULL
);
`;

export const INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS idx_articles_published_at ON articles(published_at);
CREATE INDEX IF NOT EXISTS idx_interactions_user_occurred ON user_interactions(user_id, occurred_at);
CREATE INDEX IF NOT EXISTS idx_digests_user_created ON personalized_digests(user_id, created_at);
`;

export function getPostgresSchema(): string {
  return `${TABLES_SQL}\n${INDEXES_SQL}`;
}
