/**
 * Custom Error Classes
 *
 * Domain-specific error types for the merge queue. Everything extends
 * AppError so callers can branch on `code` without string matching.
 *
 * User-actionable failures (rejected commands, missing permission, a branch
 * that cannot be fast-forwarded) are reported on the pull request where they
 * are detected. PlatformError is the transport failure class: it is never
 * swallowed except at the documented fail-open points.
 */

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() so instanceof keeps working on subclasses
 * after transpilation.
 *
 * @example
 * ```typescript
 * throw new AppError("Something went wrong", "GENERIC_ERROR");
 * ```
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Hosting platform call failed
 *
 * Raised for anything the platform answers with an unexpected status, and for
 * network failures where no status is available.
 *
 * @param operation - Platform operation that failed (e.g. "updateRef")
 * @param status - HTTP status returned by the platform, when there was one
 *
 * @example
 * ```typescript
 * throw new PlatformError("Server error", "mergePullRequest", 502);
 * ```
 */
export class PlatformError extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
		public readonly status?: number,
		code?: string,
	) {
		super(message, code ?? "PLATFORM_ERROR");
		this.name = "PlatformError";
		Object.setPrototypeOf(this, PlatformError.prototype);
	}
}

/**
 * Branch does not exist on the remote
 */
export class BranchNotFoundError extends PlatformError {
	constructor(public readonly branch: string) {
		super(`Branch \`${branch}\` not found`, "getBranch", 404, "BRANCH_NOT_FOUND");
		this.name = "BranchNotFoundError";
		Object.setPrototypeOf(this, BranchNotFoundError.prototype);
	}
}

/**
 * Ref update rejected because it is not a fast-forward
 *
 * Recoverable: the worker reports it on the pull request and moves on.
 */
export class FastForwardError extends PlatformError {
	constructor(
		public readonly branch: string,
		public readonly sha: string,
	) {
		super(`Cannot fast-forward \`${branch}\` to ${sha}`, "updateRef", 422, "FAST_FORWARD_FAILED");
		this.name = "FastForwardError";
		Object.setPrototypeOf(this, FastForwardError.prototype);
	}
}

/**
 * Branch merge rejected by the platform (conflicting changes)
 */
export class MergeConflictError extends PlatformError {
	constructor(
		public readonly base: string,
		public readonly head: string,
		status?: number,
	) {
		super(`Cannot merge \`${head}\` into \`${base}\``, "mergeBranches", status ?? 409, "MERGE_CONFLICT");
		this.name = "MergeConflictError";
		Object.setPrototypeOf(this, MergeConflictError.prototype);
	}
}

/**
 * Pull request branch cannot be updated with its base (conflicting changes)
 */
export class UpdateConflictError extends PlatformError {
	constructor(
		public readonly pullRequest: number,
		message: string,
	) {
		super(message, "updatePullRequestBranch", 422, "UPDATE_CONFLICT");
		this.name = "UpdateConflictError";
		Object.setPrototypeOf(this, UpdateConflictError.prototype);
	}
}

/**
 * Comment mentions the app with a missing or unknown command
 */
export class CommandRejectedError extends AppError {
	constructor(public readonly command: string | null) {
		super(
			`Failed to process command (reason: ${command === null ? "no command provided" : `unknown command \`${command}\``})`,
			"COMMAND_REJECTED",
		);
		this.name = "CommandRejectedError";
		Object.setPrototypeOf(this, CommandRejectedError.prototype);
	}
}

/**
 * Comment author has no push access on the protected branch
 */
export class PermissionDeniedError extends AppError {
	constructor(
		public readonly login: string,
		public readonly branch: string,
	) {
		super(`User @${login} hasn't push access on \`${branch}\` branch.`, "PERMISSION_DENIED");
		this.name = "PermissionDeniedError";
		Object.setPrototypeOf(this, PermissionDeniedError.prototype);
	}
}

/**
 * Timeout error for operations that exceed time limits
 *
 * @param operation - The operation that timed out (e.g. "awaitResult")
 * @param timeoutMs - Timeout duration in milliseconds
 */
export class TimeoutError extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
		public readonly timeoutMs: number,
	) {
		super(message, "TIMEOUT_ERROR");
		this.name = "TimeoutError";
		Object.setPrototypeOf(this, TimeoutError.prototype);
	}
}

/**
 * Wait abandoned before it produced a result (e.g. forced shutdown)
 */
export class CancelledError extends AppError {
	constructor(
		message: string,
		public readonly operation: string,
	) {
		super(message, "CANCELLED");
		this.name = "CancelledError";
		Object.setPrototypeOf(this, CancelledError.prototype);
	}
}

/**
 * Request body over the server's size limit
 */
export class BodyTooLargeError extends AppError {
	constructor(public readonly limit: number) {
		super(`Body too large (max ${limit} bytes)`, "BODY_TOO_LARGE");
		this.name = "BodyTooLargeError";
		Object.setPrototypeOf(this, BodyTooLargeError.prototype);
	}
}

/**
 * Webhook payload does not match the shape of its event
 *
 * @param event - Value of the event header
 * @param issues - One line per schema violation
 */
export class InvalidPayloadError extends AppError {
	constructor(
		public readonly event: string,
		public readonly issues: string[] = [],
	) {
		super(`Invalid \`${event}\` payload`, "INVALID_PAYLOAD");
		this.name = "InvalidPayloadError";
		Object.setPrototypeOf(this, InvalidPayloadError.prototype);
	}
}

/**
 * Invalid configuration (rc file, environment or CLI flags)
 */
export class ConfigError extends AppError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(message, "CONFIG_ERROR");
		this.name = "ConfigError";
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

/**
 * Render an unknown thrown value for structured logs
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
