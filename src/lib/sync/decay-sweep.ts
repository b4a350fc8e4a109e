/**
 * Decay sweep
 *
 * Periodic pass that relaxes stale, unreinforced weights toward neutral.
 * Each user is processed under the same per-user lock as live feedback.
 */

import type { ProfileStore } from "../db/profiles";
import { decayProfile } from "../pipeline/learn";
import { ProfileStoreUnavailableError } from "../errors";
import { logger } from "../logger";
import type { ProfileLock } from "./profile-lock";

export interface DecaySweepOptions {
  store: ProfileStore;
  lock: ProfileLock;
  now?: Date;
}

export interface DecaySweepReport {
  usersScanned: number;
  usersDecayed: number;
  keysDecayed: number;
  failed: string[];
  durationMs: number;
}

export async function runDecaySweep({ store, lock, now = new Date() }: DecaySweepOptions): Promise<DecaySweepReport> {
  const startTime = Date.now();
  const userIds = await store.listUserIds();

  const report: DecaySweepReport = {
    usersScanned: 0,
    usersDecayed: 0,
    keysDecayed: 0,
    failed: [],
    durationMs: 0,
  };

  logger.info(`[DECAY] Starting sweep over ${userIds.length} profiles`, { now: now.toISOString() });

  for (const userId of userIds) {
    report.usersScanned++;
    try {
      const decayed = await lock.runExclusive(userId, async () => {
        const profile = await store.getProfile(userId);
        const outcome = decayProfile(profile, now);
        if (outcome.decayedKeys.length > 0) {
          await store.saveProfile(outcome.profile);
        }
        return outcome.decayedKeys.length;
      });

      if (decayed > 0) {
        report.usersDecayed++;
        report.keysDecayed += decayed;
      }
    } catch (error) {
      logger.error(`[DECAY] Failed to decay profile ${userId}`, error);
      if (error instanceof ProfileStoreUnavailableError) {
        throw error;
      }
      report.failed.push(userId);
    }
  }

  report.durationMs = Date.now() - startTime;
  logger.info(`[DECAY] Sweep complete`, {
    usersScanned: report.usersScanned,
    usersDecayed: report.usersDecayed,
    keysDecayed: report.keysDecayed,
    failed: report.failed.length,
    durationMs: report.durationMs,
  });

  return report;
}
