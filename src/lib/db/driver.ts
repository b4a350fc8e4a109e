/**
 * Database driver abstraction for SQLite (dev/test) and PostgreSQL (prod)
 *
 * - Uses better-sqlite3 when no postgres connection string is configured
 * - Uses pg when DATABASE_URL (or LOCAL_DATABASE_URL with USE_LOCAL_DB=true)
 *   starts with "postgres"
 *
 * Queries are written with SQLite-style `?` placeholders; the Postgres
 * client rewrites them to $1, $2, ...
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger';
import { getDatabaseUrl, isProduction, loadSettings } from '../../config/settings';

export type DatabaseDriver = 'sqlite' | 'postgres';

export type DbRow = Record<string, unknown>;

export interface DbResult {
  rows: DbRow[];
  rowCount: number;
}

export interface DatabaseClient {
  driver: DatabaseDriver;
  query(sql: string, params?: unknown[]): Promise<DbResult>;
  run(sql: string, params?: unknown[]): Promise<{ changes: number }>;
  exec(sql: string): Promise<void>;
  close(): Promise<void>;
}

let clientInstance: DatabaseClient | null = null;

function isRow(value: unknown): value is DbRow {
  return typeof value === 'object' && value !== null;
}

/**
 * Detect which database driver to use based on environment
 */
export function detectDriver(): DatabaseDriver {
  const dbUrl = getDatabaseUrl();
  if (dbUrl?.startsWith('postgres')) {
    return 'postgres';
  }
  return 'sqlite';
}

/**
 * Get or create the shared database client
 */
export async function getDbClient(): Promise<DatabaseClient> {
  if (clientInstance) {
    return clientInstance;
  }

  const driver = detectDriver();
  const settings = loadSettings();

  if (driver === 'postgres') {
    clientInstance = await createPostgresClient(getDatabaseUrl(settings) ?? '');
  } else {
    clientInstance = await createSqliteClient(settings.SQLITE_PATH);
  }

  logger.info(`Database initialized with ${driver} driver`);
  return clientInstance;
}

/**
 * Close and forget the shared client
 */
export async function resetDbClient(): Promise<void> {
  if (clientInstance) {
    const client = clientInstance;
    clientInstance = null;
    await client.close();
  }
}

/**
 * Create a SQLite client. Pass ':memory:' for a throwaway database.
 */
export async function createSqliteClient(dbPath: string): Promise<DatabaseClient> {
  // Dynamic import keeps the native module out of the postgres path
  const Database = (await import('better-sqlite3')).default;

  if (dbPath !== ':memory:') {
    const dataDir = path.dirname(path.resolve(process.cwd(), dbPath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  return {
    driver: 'sqlite',

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const stmt = sqlite.prepare(sql);
      const rows = (params ? stmt.all(...params) : stmt.all()).filter(isRow);
      return {
        rows,
        rowCount: rows.length,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const stmt = sqlite.prepare(sql);
      const result = params ? stmt.run(...params) : stmt.run();
      return { changes: result.changes };
    },

    async exec(sql: string): Promise<void> {
      sqlite.exec(sql);
    },

    async close(): Promise<void> {
      sqlite.close();
    },
  };
}

/**
 * Create PostgreSQL client (production)
 */
export async function createPostgresClient(databaseUrl: string): Promise<DatabaseClient> {
  const { Pool } = await import('pg');

  if (!databaseUrl) {
    throw new Error('DATABASE_URL or LOCAL_DATABASE_URL is required for PostgreSQL');
  }
  const needsSSL = isProduction() && !databaseUrl.includes('localhost');

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: needsSSL ? { rejectUnauthorized: false } : undefined,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 60000,
  });

  await pool.query('SELECT 1');

  return {
    driver: 'postgres',

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const result = await pool.query(convertPlaceholders(sql), params);
      return { changes: result.rowCount ?? 0 };
    },

    async exec(sql: string): Promise<void> {
      const statements = sql.split(';').filter((s) => s.trim());
      for (const stmt of statements) {
        await pool.query(stmt);
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

/**
 * Convert SQLite ? placeholders to PostgreSQL $1, $2, etc.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

/**
 * INSERT ... ON CONFLICT clause, identical for both drivers
 */
export function upsertSyntax(conflictColumns: string[], updateColumns: string[]): string {
  const updates = updateColumns.map((col) => `${col} = excluded.${col}`).join(', ');
  return `ON CONFLICT (${conflictColumns.join(', ')}) DO UPDATE SET ${updates}`;
}
