/**
 * Shared service wiring for route handlers and scripts
 */

import { loadSettings } from "../../config/settings";
import { initializeDatabase } from "../db/index";
import { SqlProfileStore } from "../db/profiles";
import { SqlArticleStore } from "../db/articles";
import { SqlInteractionLog } from "../db/interactions";
import { SqlDigestHistory } from "../db/digests";
import { getProfileLock } from "../sync/profile-lock";
import { ProfileStoreUnavailableError } from "../errors";
import { PersonalizationService } from "./service";

let servicePromise: Promise<PersonalizationService> | null = null;

async function createService(): Promise<PersonalizationService> {
  const settings = loadSettings();
  const db = await initializeDatabase().catch((error: unknown) => {
    throw new ProfileStoreUnavailableError("connect", null, error);
  });

  return new PersonalizationService({
    profiles: new SqlProfileStore(db),
    articles: new SqlArticleStore(db),
    interactions: new SqlInteractionLog(db),
    digests: new SqlDigestHistory(db),
    lock: getProfileLock(),
    candidateWindowHours: settings.DIGEST_WINDOW_HOURS,
    candidateLimit: settings.DIGEST_CANDIDATE_LIMIT,
  });
}

export function getPersonalizationService(): Promise<PersonalizationService> {
  if (!servicePromise) {
    servicePromise = createService().catch((error: unknown) => {
      servicePromise = null;
      throw error;
    });
  }
  return servicePromise;
}
