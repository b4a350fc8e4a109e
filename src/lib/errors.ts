/**
 * Errors surfaced by the personalization core.
 *
 * Out-of-range weights, unknown users and empty candidate sets are not
 * errors: weights are clamped, profiles are created on first read and an
 * empty candidate set yields an empty digest.
 */

/**
 * The profile store could not be reached or failed mid-operation.
 * Not retried here; the caller owns retry policy.
 */
export class ProfileStoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    public readonly userId: string | null,
    cause: unknown
  ) {
    super(
      `Profile store unavailable during ${operation}` +
        (userId ? ` for user ${userId}` : "") +
        `: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "ProfileStoreUnavailableError";
  }
}

/**
 * An interaction referenced an article the article store does not know,
 * so there is no topic or source to adjust.
 */
export class UnknownArticleError extends Error {
  constructor(public readonly articleId: string) {
    super(`Unknown article: ${articleId}`);
    this.name = "UnknownArticleError";
  }
}

/**
 * A stored profile row could not be parsed. The store itself is reachable;
 * only this user's record is affected.
 */
export class CorruptProfileError extends Error {
  constructor(
    public readonly userId: string,
    cause: unknown
  ) {
    super(
      `Stored profile for user ${userId} is unreadable: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "CorruptProfileError";
  }
}

/**
 * An environment variable failed settings validation
 */
export class InvalidSettingsError extends Error {
  constructor(public readonly variables: string[]) {
    super(`Invalid settings: ${variables.join(", ")}`);
    this.name = "InvalidSettingsError";
  }
}
