/**
 * Database initialization
 *
 * Supports both SQLite (development, tests) and PostgreSQL (production).
 * Driver detection is automatic based on DATABASE_URL.
 */

import { logger } from "../logger";
import { getDbClient, type DatabaseClient } from "./driver";
import { SQLITE_SCHEMA } from "./schema";
import { getPostgresSchema } from "./schema-postgres";

const initialized = new WeakSet<DatabaseClient>();

/**
 * Create tables if they don't exist. Runs once per client.
 */
export async function initializeDatabase(client?: DatabaseClient): Promise<DatabaseClient> {
  const db = client ?? (await getDbClient());
  if (initialized.has(db)) {
    return db;
  }

  try {
    await db.exec(db.driver === "postgres" ? getPostgresSchema() : SQLITE_SCHEMA);
    initialized.add(db);
    logger.info(`${db.driver === "postgres" ? "PostgreSQL" : "SQLite"} schema initialized`);
    return db;
  } catch (error) {
    logger.error("Failed to initialize database schema", error);
    throw error;
  }
}
