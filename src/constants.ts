/**
 * Shared constants used across the codebase.
 *
 * Defaults here are overridable through config.ts; the comment prefix and
 * event header are fixed.
 */

// ---------------------------------------------------------------------------
// Webhook protocol
// ---------------------------------------------------------------------------

/** Header carrying the webhook event name (Node lowercases header names) */
export const GITHUB_EVENT_HEADER = "x-github-event";

/** Conclusion of a workflow run that counts as passing */
export const SUCCESS_CONCLUSION = "success";

/** Largest accepted webhook body */
export const MAX_BODY_SIZE = 1024 * 1024;

// ---------------------------------------------------------------------------
// Comments
// ---------------------------------------------------------------------------

/** Token that addresses the app in a pull request comment */
export const DEFAULT_MENTION = "@mergequeue";

/** Prefix of every comment the app writes */
export const APP_PREFIX = "***[from mergequeue]***";

// ---------------------------------------------------------------------------
// Branches and batching
// ---------------------------------------------------------------------------

export const DEFAULT_MAINLINE = "master";
export const DEFAULT_STAGING = "staging";

/** Pending pull requests needed to trigger a batch merge */
export const DEFAULT_BATCH_SIZE = 3;

// ---------------------------------------------------------------------------
// Timeouts
// ---------------------------------------------------------------------------

/** Bound on a single CI wait; 0 disables the bound */
export const DEFAULT_CI_TIMEOUT_MINUTES = 60;

/** Time given to the in-flight integration when shutting down */
export const DEFAULT_SHUTDOWN_TIMEOUT_SECONDS = 20;

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8080;
