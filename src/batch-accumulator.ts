/**
 * Batch Accumulator
 *
 * Collects pull requests submitted with `try-batchmerge`. When the pending
 * batch reaches capacity:
 * 1. Create a fresh batch branch at the first pull request's head commit
 * 2. Merge every pending pull request's head branch into it, in arrival order
 * 3. Open one integration pull request listing the ones that merged
 * 4. Enqueue that integration pull request in the merge queue
 * 5. Tell each merged pull request where its commits went
 *
 * A pull request whose branch does not merge is reported and dropped; the
 * others carry on. The whole add-and-maybe-trigger sequence runs under one
 * mutex, so the threshold is evaluated by one delivery at a time and the
 * pending batch is cleared after every trigger attempt.
 */

import { randomUUID } from "node:crypto";
import { DEFAULT_BATCH_SIZE, DEFAULT_MAINLINE, DEFAULT_MENTION } from "./constants.js";
import { PlatformError } from "./errors.js";
import { batchLogger } from "./logger.js";
import { Mutex } from "./mutex.js";
import type { Notifier } from "./notifier.js";
import type { HostingPlatform } from "./platform/types.js";
import type { BatchAddResult, IntegrationKind, IntegrationRequest, PullRequestRef } from "./types.js";

export type EnqueueIntegration = (pr: PullRequestRef, kind: IntegrationKind, members: number[]) => IntegrationRequest;

export interface BatchAccumulatorOptions {
	platform: HostingPlatform;
	notifier: Notifier;
	enqueue: EnqueueIntegration;
	capacity?: number;
	mainline?: string;
	mention?: string;
	/** Produces a branch name never used before by this process */
	nextBranchName?: () => string;
}

/**
 * Branch names of the form `batch-<sequence>-<random>`.
 *
 * The sequence keeps names unique within a process; the random suffix keeps
 * them apart across restarts.
 */
export function createBatchBranchNamer(prefix = "batch"): () => string {
	let sequence = 0;
	return () => {
		sequence++;
		return `${prefix}-${sequence}-${randomUUID().slice(0, 8)}`;
	};
}

export class BatchAccumulator {
	private pending: PullRequestRef[] = [];
	private lock = new Mutex();
	private platform: HostingPlatform;
	private notifier: Notifier;
	private enqueue: EnqueueIntegration;
	private capacity: number;
	private mainline: string;
	private mention: string;
	private nextBranchName: () => string;

	constructor(options: BatchAccumulatorOptions) {
		this.platform = options.platform;
		this.notifier = options.notifier;
		this.enqueue = options.enqueue;
		this.capacity = options.capacity ?? DEFAULT_BATCH_SIZE;
		this.mainline = options.mainline ?? DEFAULT_MAINLINE;
		this.mention = options.mention ?? DEFAULT_MENTION;
		this.nextBranchName = options.nextBranchName ?? createBatchBranchNamer();
		if (!Number.isInteger(this.capacity) || this.capacity < 1) {
			throw new RangeError(`Batch capacity must be a positive integer, got ${this.capacity}`);
		}
	}

	/**
	 * Offer a pull request to the pending batch
	 */
	add(pullRequest: PullRequestRef): Promise<BatchAddResult> {
		return this.lock.runExclusive(async () => {
			if (this.pending.some((pr) => pr.number === pullRequest.number)) {
				batchLogger.info({ pr: pullRequest.number }, "Pull request already in batch queue");
				await this.notifier.send(pullRequest.number, "Pull request already added to batch merge queue.");
				return { status: "duplicate" };
			}

			this.pending.push(pullRequest);
			batchLogger.info({ pr: pullRequest.number, size: this.pending.length }, "Pull request put in batch queue");

			if (this.pending.length < this.capacity) {
				await this.notifier.send(
					pullRequest.number,
					"Pull request added to the batch merge queue. It will be processed soon.",
				);
				return { status: "queued", size: this.pending.length };
			}

			const batch = [...this.pending];
			try {
				return await this.trigger(batch);
			} finally {
				this.pending = [];
			}
		});
	}

	/**
	 * Pull request numbers waiting for the next trigger, in arrival order
	 */
	pendingNumbers(): number[] {
		return this.pending.map((pr) => pr.number);
	}

	get size(): number {
		return this.pending.length;
	}

	private async trigger(batch: PullRequestRef[]): Promise<BatchAddResult> {
		const [first] = batch;
		if (!first) {
			throw new RangeError("Cannot trigger an empty batch");
		}

		const branch = this.nextBranchName();
		await this.platform.createRef(branch, first.headSha);
		batchLogger.debug({ branch, from: first.number }, "Batch merge branch created");

		const merged: PullRequestRef[] = [];
		const failed: number[] = [];
		for (const pr of batch) {
			try {
				await this.platform.mergeBranches(branch, pr.headRef);
				merged.push(pr);
				batchLogger.debug({ pr: pr.number, branch }, "Pull request added to batch merge branch");
			} catch (error) {
				if (!(error instanceof PlatformError)) throw error;
				const message = `Batch branch \`${branch}\` rebase onto ${pr.headRef} failed (cannot fast-forward)`;
				batchLogger.info({ pr: pr.number, branch, status: error.status }, message);
				failed.push(pr.number);
				await this.notifier.send(pr.number, message);
			}
		}

		if (merged.length === 0) {
			batchLogger.info({ branch, failed }, "No pull requests added to batch merge");
			return { status: "empty", branch, failed };
		}

		const details = merged.map((pr) => `- [#${pr.number}](${pr.htmlUrl})\n`).join("");
		const integration = await this.platform.createPullRequest({
			title: `${this.mention} Batch merge with \`${branch}\``,
			body: this.notifier.format(`Batch merge attempt for the following pull requests:\n${details}`),
			head: branch,
			base: this.mainline,
		});
		batchLogger.info({ pr: integration.number, branch }, "Batch merge pull request created");

		const members = merged.map((pr) => pr.number);
		this.enqueue(integration, "batch", members);

		for (const pr of merged) {
			await this.notifier.send(
				pr.number,
				`Commits added to \`${branch}\` branch.\n` +
					`Check batch merge pull request [#${integration.number}](${integration.htmlUrl}) ` +
					"associated with this branch to know merge status.",
			);
		}

		return { status: "triggered", branch, integration, merged: members, failed };
	}
}
