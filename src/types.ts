/**
 * Shared types for the merge queue
 */

/**
 * The parts of a pull request the queue works with
 */
export interface PullRequestRef {
	number: number;
	/** Head branch name (without refs/heads/) */
	headRef: string;
	headSha: string;
	htmlUrl: string;
	author: string;
}

/**
 * A single pull request, or the integration pull request opened for a batch
 */
export type IntegrationKind = "single" | "batch";

/**
 * One unit of work in the FIFO merge queue. Frozen when enqueued.
 */
export type IntegrationRequest = Readonly<
	PullRequestRef & {
		kind: IntegrationKind;
		/** PR numbers folded into a batch integration PR */
		members: readonly number[];
		enqueuedAt: Date;
	}
>;

/**
 * Recognized comment commands
 */
export const COMMANDS = ["try-merge", "try-batchmerge"] as const;
export type MergeCommand = (typeof COMMANDS)[number];

export function isMergeCommand(value: string | null): value is MergeCommand {
	return value !== null && COMMANDS.some((command) => command === value);
}

/**
 * Result of offering a pull request to the batch accumulator
 */
export type BatchAddResult =
	| { status: "queued"; size: number }
	| { status: "duplicate" }
	| { status: "triggered"; branch: string; integration: PullRequestRef; merged: number[]; failed: number[] }
	| { status: "empty"; branch: string; failed: number[] };

/**
 * Worker lifecycle states
 */
export type WorkerState = "idle" | "running" | "stopping" | "stopped";

/**
 * Steps of the per-item integration pipeline, used in logs and status output
 */
export type IntegrationStep =
	| "waiting"
	| "staging_mainline"
	| "updating_base"
	| "staging_candidate"
	| "awaiting_ci"
	| "merging"
	| "resetting_staging";

/**
 * Terminal outcome of one integration request
 */
export type IntegrationOutcome =
	| "merged"
	| "tests_failed"
	| "update_conflict"
	| "fast_forward_failed"
	| "ci_timeout"
	| "cancelled"
	| "error";

export interface MergeQueueStatus {
	worker: WorkerState;
	current: { number: number; kind: IntegrationKind; step: IntegrationStep } | null;
	queued: number[];
	pendingBatch: number[];
	/** CI waits in registration order; `since` is an ISO timestamp */
	awaitingCi: Array<{ sha: string; pr: number; since: string }>;
	processed: number;
}
