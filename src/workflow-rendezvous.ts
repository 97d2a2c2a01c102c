/**
 * Workflow Rendezvous
 *
 * Correlates CI completion events with the worker waiting on them:
 * the merge queue worker calls awaitResult(sha) right after pushing a
 * candidate to staging, and the webhook path calls deliver(sha, conclusion)
 * when the workflow run for that commit completes.
 *
 * - At most one waiter per commit; the entry is removed once resolved
 * - deliver() for a commit nobody waits on is a no-op
 * - Each waiter settles exactly once: resolved by deliver(), rejected by a
 *   timeout or a cancellation
 */

import { SUCCESS_CONCLUSION } from "./constants.js";
import { CancelledError, TimeoutError } from "./errors.js";
import { queueLogger } from "./logger.js";

interface PendingOutcome {
	pullRequestNumber: number;
	registeredAt: Date;
	settle: (success: boolean) => void;
	fail: (error: Error) => void;
	timer: ReturnType<typeof setTimeout> | null;
}

export interface AwaitOptions {
	/** Reject with TimeoutError after this long; 0 or undefined waits forever */
	timeoutMs?: number;
}

export class WorkflowRendezvous {
	private pending = new Map<string, PendingOutcome>();

	/**
	 * Wait for the CI conclusion of `sha`.
	 *
	 * Registration happens synchronously, before the returned promise is
	 * handed back, so a delivery can never slip in between.
	 *
	 * @returns true iff the run concluded with "success"
	 * @throws TimeoutError when `timeoutMs` elapses first
	 * @throws CancelledError when the wait is replaced or cancelled
	 */
	awaitResult(sha: string, pullRequestNumber: number, options: AwaitOptions = {}): Promise<boolean> {
		const previous = this.pending.get(sha);
		if (previous) {
			queueLogger.warn({ sha, pr: previous.pullRequestNumber }, "Replacing stale CI wait for commit");
			this.remove(sha, previous);
			previous.fail(new CancelledError(`CI wait for ${sha} replaced`, "awaitResult"));
		}

		return new Promise<boolean>((resolve, reject) => {
			const entry: PendingOutcome = {
				pullRequestNumber,
				registeredAt: new Date(),
				settle: resolve,
				fail: reject,
				timer: null,
			};

			const timeoutMs = options.timeoutMs ?? 0;
			if (timeoutMs > 0) {
				entry.timer = setTimeout(() => {
					if (this.pending.get(sha) !== entry) return;
					this.pending.delete(sha);
					entry.fail(new TimeoutError(`No CI result for ${sha} after ${timeoutMs}ms`, "awaitResult", timeoutMs));
				}, timeoutMs);
			}

			this.pending.set(sha, entry);
		});
	}

	/**
	 * Hand a workflow conclusion to the waiter for `sha`.
	 *
	 * @returns false when nobody was waiting on that commit
	 */
	deliver(sha: string, conclusion: string | null): boolean {
		const entry = this.pending.get(sha);
		if (!entry) {
			return false;
		}
		queueLogger.info({ pr: entry.pullRequestNumber, sha, conclusion }, "Workflow completed");
		this.remove(sha, entry);
		entry.settle(conclusion === SUCCESS_CONCLUSION);
		return true;
	}

	/**
	 * Reject every waiter with CancelledError (used at shutdown)
	 */
	cancelAll(): number {
		const entries = [...this.pending.entries()];
		for (const [sha, entry] of entries) {
			this.remove(sha, entry);
			entry.fail(new CancelledError(`CI wait for ${sha} cancelled`, "awaitResult"));
		}
		return entries.length;
	}

	/**
	 * Commits currently awaited, oldest first
	 */
	list(): Array<{ sha: string; pr: number; registeredAt: Date }> {
		return [...this.pending.entries()].map(([sha, entry]) => ({
			sha,
			pr: entry.pullRequestNumber,
			registeredAt: entry.registeredAt,
		}));
	}

	private remove(sha: string, entry: PendingOutcome): void {
		if (entry.timer) clearTimeout(entry.timer);
		this.pending.delete(sha);
	}
}
