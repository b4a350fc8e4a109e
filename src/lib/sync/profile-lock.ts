/**
 * Per-user write serialization
 *
 * Every read-modify-write of a profile (live feedback, onboarding,
 * preference edits, the decay sweep) runs inside runExclusive for that
 * user, so two writers never interleave and lose an update.
 * Digest generation only reads and never takes the lock.
 */

import { logger } from "../logger";

export class ProfileLock {
  // Tail of each user's queue; removed when the queue drains
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `userId` has settled.
   * Tasks for different users run independently.
   */
  async runExclusive<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(userId) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(userId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(userId) === tail) {
        this.tails.delete(userId);
      }
    }
  }

  isLocked(userId: string): boolean {
    return this.tails.has(userId);
  }

  /**
   * Number of users with queued or running work
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}

let sharedLock: ProfileLock | null = null;

/**
 * Process-wide lock shared by route handlers and the decay sweep.
 * Deployments with several processes need the storage-level guarantee
 * instead; this covers a single server.
 */
export function getProfileLock(): ProfileLock {
  if (!sharedLock) {
    sharedLock = new ProfileLock();
    logger.debug("Created shared profile lock");
  }
  return sharedLock;
}
