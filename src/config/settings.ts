/**
 * Runtime settings read from the environment
 *
 * Scripts load .env.local with dotenv before importing this module;
 * Next.js loads it on its own for route handlers.
 */

import { z } from "zod";
import { InvalidSettingsError } from "../lib/errors";

const SettingsSchema = z.object({
  NODE_ENV: z.string().default("development"),
  DATABASE_URL: z.string().optional(),
  USE_LOCAL_DB: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  LOCAL_DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().default(".data/digest.db"),
  // Candidate window and bound for digest generation
  DIGEST_WINDOW_HOURS: z.coerce.number().int().positive().default(72),
  DIGEST_CANDIDATE_LIMIT: z.coerce.number().int().positive().default(500),
  ADMIN_API_TOKEN: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Parse settings from an env map. Throws InvalidSettingsError naming the
 * bad variables.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidSettingsError([...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))]);
  }
  return parsed.data;
}

/**
 * Connection string for the active database.
 * Batch scripts can point at a local copy with USE_LOCAL_DB=true.
 */
export function getDatabaseUrl(settings: Settings = loadSettings()): string | undefined {
  return settings.USE_LOCAL_DB ? settings.LOCAL_DATABASE_URL : settings.DATABASE_URL;
}

export function isProduction(settings: Settings = loadSettings()): boolean {
  return settings.NODE_ENV === "production";
}
