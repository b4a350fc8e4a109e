#!/usr/bin/env tsx
/**
 * Decay sweep cron job script
 *
 * Relaxes interest weights that have gone 7+ days without reinforcement.
 * Safe to run more often than weekly: weights decayed on one run are not
 * touched again until another 7 days pass.
 *
 * Usage:
 *   npx tsx scripts/cron-decay-sweep.ts
 *
 * Environment variables:
 *   - DATABASE_URL (PostgreSQL connection string in production; SQLite otherwise)
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load .env.local for local development
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { resetDbClient } from '../src/lib/db/driver';
import { getPersonalizationService } from '../src/lib/personalization/context';
import { logger } from '../src/lib/logger';

async function main() {
  try {
    const service = await getPersonalizationService();
    const report = await service.decayProfiles();

    if (report.failed.length > 0) {
      logger.warn(`Decay sweep finished with ${report.failed.length} failures`, { failed: report.failed });
      process.exitCode = 1;
    }
  } finally {
    await resetDbClient();
  }
}

main().catch((error: unknown) => {
  logger.error('Decay sweep failed', error);
  process.exit(1);
});
