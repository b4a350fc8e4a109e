/**
 * Interest profile persistence
 */

import { z } from "zod";
import type { InterestProfile, WeightKey } from "../model";
import { FRESHNESS_MODES } from "../model";
import { clampDailyLimit, clampWeight, createDefaultProfile } from "../profile";
import { CorruptProfileError, ProfileStoreUnavailableError } from "../errors";
import { logger } from "../logger";
import { upsertSyntax, type DatabaseClient } from "./driver";

/**
 * Profile access used by the personalization core.
 * getProfile never fails for an unknown user: it creates the default profile.
 */
export interface ProfileStore {
  getProfile(userId: string): Promise<InterestProfile>;
  saveProfile(profile: InterestProfile): Promise<void>;
  listUserIds(): Promise<string[]>;
}

const WeightMapSchema = z.record(z.number());
const StringListSchema = z.array(z.string());
const TimestampMapSchema = z.record(z.string());

const ProfileRowSchema = z.object({
  user_id: z.string(),
  topic_weights: z.string(),
  source_weights: z.string(),
  exclude_topics: z.string(),
  exclude_sources: z.string(),
  freshness_mode: z.enum(["breaking", "daily", "weekly"]),
  diversity_boost: z.coerce.number(),
  daily_limit: z.coerce.number(),
  auto_adjust: z.coerce.number(),
  last_update: z.string(),
  last_interaction_at: z.coerce.number().nullable(),
  created_at: z.coerce.number(),
  updated_at: z.coerce.number(),
});

function isWeightKey(key: string): key is WeightKey {
  return key.startsWith("topic:") || key.startsWith("source:");
}

function clampWeights(weights: Record<string, number>): Record<string, number> {
  const clamped: Record<string, number> = {};
  for (const [key, value] of Object.entries(weights)) {
    clamped[key] = clampWeight(value);
  }
  return clamped;
}

export function serializeLastUpdate(lastUpdate: InterestProfile["lastUpdate"]): string {
  const out: Record<string, string> = {};
  for (const [key, date] of Object.entries(lastUpdate)) {
    if (date) out[key] = date.toISOString();
  }
  return JSON.stringify(out);
}

export function parseLastUpdate(json: string): InterestProfile["lastUpdate"] {
  const raw = TimestampMapSchema.parse(JSON.parse(json));
  const parsed: InterestProfile["lastUpdate"] = {};
  for (const [key, iso] of Object.entries(raw)) {
    const date = new Date(iso);
    if (isWeightKey(key) && !Number.isNaN(date.getTime())) {
      parsed[key] = date;
    }
  }
  return parsed;
}

/**
 * Convert a database row into a profile. Stored weights outside [0, 1]
 * are clamped rather than rejected.
 */
export function rowToProfile(row: unknown): InterestProfile {
  const r = ProfileRowSchema.parse(row);
  return {
    userId: r.user_id,
    topicWeights: clampWeights(WeightMapSchema.parse(JSON.parse(r.topic_weights))),
    sourceWeights: clampWeights(WeightMapSchema.parse(JSON.parse(r.source_weights))),
    excludeTopics: StringListSchema.parse(JSON.parse(r.exclude_topics)),
    excludeSources: StringListSchema.parse(JSON.parse(r.exclude_sources)),
    freshnessMode: r.freshness_mode,
    diversityBoost: clampWeight(r.diversity_boost),
    dailyLimit: clampDailyLimit(r.daily_limit),
    autoAdjust: r.auto_adjust !== 0,
    lastUpdate: parseLastUpdate(r.last_update),
    lastInteractionAt: r.last_interaction_at === null ? null : new Date(r.last_interaction_at),
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

function profileToParams(profile: InterestProfile): unknown[] {
  return [
    profile.userId,
    JSON.stringify(clampWeights(profile.topicWeights)),
    JSON.stringify(clampWeights(profile.sourceWeights)),
    JSON.stringify(profile.excludeTopics),
    JSON.stringify(profile.excludeSources),
    FRESHNESS_MODES.includes(profile.freshnessMode) ? profile.freshnessMode : "daily",
    clampWeight(profile.diversityBoost),
    clampDailyLimit(profile.dailyLimit),
    profile.autoAdjust ? 1 : 0,
    serializeLastUpdate(profile.lastUpdate),
    profile.lastInteractionAt ? profile.lastInteractionAt.getTime() : null,
    profile.createdAt.getTime(),
    profile.updatedAt.getTime(),
  ];
}

const PROFILE_COLUMNS = [
  "user_id",
  "topic_weights",
  "source_weights",
  "exclude_topics",
  "exclude_sources",
  "freshness_mode",
  "diversity_boost",
  "daily_limit",
  "auto_adjust",
  "last_update",
  "last_interaction_at",
  "created_at",
  "updated_at",
];

const INSERT_PROFILE_SQL = `INSERT INTO interest_profiles (${PROFILE_COLUMNS.join(", ")})
  VALUES (${PROFILE_COLUMNS.map(() => "?").join(", ")})`;

/**
 * SQL-backed profile store (SQLite or PostgreSQL through DatabaseClient)
 */
export class SqlProfileStore implements ProfileStore {
  constructor(
    private readonly db: DatabaseClient,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async getProfile(userId: string): Promise<InterestProfile> {
    let row: unknown;
    try {
      const result = await this.db.query(
        `SELECT ${PROFILE_COLUMNS.join(", ")} FROM interest_profiles WHERE user_id = ?`,
        [userId]
      );
      row = result.rows[0];

      if (row === undefined) {
        const profile = createDefaultProfile(userId, this.clock());
        await this.db.run(`${INSERT_PROFILE_SQL} ON CONFLICT (user_id) DO NOTHING`, profileToParams(profile));
        logger.info("Created default interest profile", { userId });
        return profile;
      }
    } catch (error) {
      logger.error(`Failed to load profile for ${userId}`, error);
      throw new ProfileStoreUnavailableError("getProfile", userId, error);
    }

    try {
      return rowToProfile(row);
    } catch (error) {
      logger.error(`Stored profile for ${userId} is unreadable`, error);
      throw new CorruptProfileError(userId, error);
    }
  }

  async saveProfile(profile: InterestProfile): Promise<void> {
    try {
      await this.db.run(
        `${INSERT_PROFILE_SQL} ${upsertSyntax(["user_id"], PROFILE_COLUMNS.filter((c) => c !== "user_id" && c !== "created_at"))}`,
        profileToParams(profile)
      );
      logger.debug("Saved interest profile", { userId: profile.userId });
    } catch (error) {
      logger.error(`Failed to save profile for ${profile.userId}`, error);
      throw new ProfileStoreUnavailableError("saveProfile", profile.userId, error);
    }
  }

  async listUserIds(): Promise<string[]> {
    try {
      const result = await this.db.query(`SELECT user_id FROM interest_profiles ORDER BY user_id ASC`);
      return result.rows.map((row) => z.object({ user_id: z.string() }).parse(row).user_id);
    } catch (error) {
      logger.error("Failed to list profile owners", error);
      throw new ProfileStoreUnavailableError("listUserIds", null, error);
    }
  }
}
