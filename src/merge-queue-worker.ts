/**
 * Merge Queue Worker
 *
 * Single consumer of the FIFO merge queue. Each request is fully processed
 * before the next one is popped:
 * 1. Bring staging up to date with mainline
 * 2. Retarget the candidate PR to mainline and update its branch
 * 3. Move staging to the candidate head (fast-forward only)
 * 4. Wait for the CI verdict on that commit, merge on success
 * 5. Reset staging to mainline, whatever happened above
 *
 * A failing step skips to the reset; nothing short of the shutdown sentinel
 * or an abandoned stop() ends the loop. Only this worker writes the staging
 * branch.
 */

import { AsyncQueue } from "./async-queue.js";
import { DEFAULT_MAINLINE, DEFAULT_STAGING } from "./constants.js";
import { CancelledError, describeError, FastForwardError, TimeoutError, UpdateConflictError } from "./errors.js";
import { queueLogger } from "./logger.js";
import type { Notifier } from "./notifier.js";
import type { HostingPlatform, MergeMethod } from "./platform/types.js";
import { alignBranch } from "./rebase.js";
import type {
	IntegrationKind,
	IntegrationOutcome,
	IntegrationRequest,
	IntegrationStep,
	PullRequestRef,
	WorkerState,
} from "./types.js";
import type { WorkflowRendezvous } from "./workflow-rendezvous.js";

/** Sentinel telling the worker loop to exit */
export const SHUTDOWN = Symbol("mergequeue.shutdown");

export type QueueMessage = IntegrationRequest | typeof SHUTDOWN;

export interface MergeQueueWorkerOptions {
	platform: HostingPlatform;
	rendezvous: WorkflowRendezvous;
	notifier: Notifier;
	mainline?: string;
	staging?: string;
	mergeMethod?: MergeMethod;
	/** Bound on each CI wait; 0 waits forever */
	ciTimeoutMs?: number;
}

export class MergeQueueWorker {
	private queue = new AsyncQueue<QueueMessage>();
	private platform: HostingPlatform;
	private rendezvous: WorkflowRendezvous;
	private notifier: Notifier;
	private mainline: string;
	private staging: string;
	private mergeMethod: MergeMethod;
	private ciTimeoutMs: number;

	private state: WorkerState = "idle";
	private loop: Promise<void> | null = null;
	private current: { request: IntegrationRequest; step: IntegrationStep } | null = null;
	private processedCount = 0;
	private abandoned = false;
	private idleWaiters: Array<() => void> = [];

	constructor(options: MergeQueueWorkerOptions) {
		this.platform = options.platform;
		this.rendezvous = options.rendezvous;
		this.notifier = options.notifier;
		this.mainline = options.mainline ?? DEFAULT_MAINLINE;
		this.staging = options.staging ?? DEFAULT_STAGING;
		this.mergeMethod = options.mergeMethod ?? "rebase";
		this.ciTimeoutMs = options.ciTimeoutMs ?? 0;
	}

	/**
	 * Add a pull request to the back of the queue. Never waits.
	 */
	enqueue(pr: PullRequestRef, kind: IntegrationKind = "single", members: number[] = []): IntegrationRequest {
		const request: IntegrationRequest = Object.freeze({
			...pr,
			kind,
			members: Object.freeze([...members]),
			enqueuedAt: new Date(),
		});
		this.queue.push(request);
		queueLogger.info({ pr: pr.number, kind, position: this.queue.size }, "Pull request put in queue");
		return request;
	}

	start(): void {
		if (this.loop) return;
		this.state = "running";
		this.loop = this.run();
	}

	/**
	 * Ask the loop to exit after the in-flight request and wait up to
	 * `timeoutMs` for it.
	 *
	 * When the deadline passes, the worker is abandoned: pending CI waits are
	 * cancelled, the in-flight request unwinds without a verdict, queued
	 * requests are left unprocessed, and the method resolves false.
	 */
	async stop(timeoutMs: number): Promise<boolean> {
		if (!this.loop) {
			this.state = "stopped";
			return true;
		}
		if (this.state === "running") {
			this.state = "stopping";
			this.queue.push(SHUTDOWN);
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timedOut = new Promise<false>((resolve) => {
			timer = setTimeout(() => resolve(false), timeoutMs);
		});
		const finished = await Promise.race([this.loop.then(() => true as const), timedOut]);
		clearTimeout(timer);

		if (!finished) {
			this.abandoned = true;
			const cancelled = this.rendezvous.cancelAll();
			queueLogger.warn(
				{ timeoutMs, cancelled, dropped: this.queuedNumbers() },
				"Worker did not stop in time, forcing shutdown",
			);
		}
		return finished;
	}

	/**
	 * Resolves once the queue is empty and nothing is in flight
	 */
	whenIdle(): Promise<void> {
		if (this.current === null && this.queue.size === 0) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	getState(): WorkerState {
		return this.state;
	}

	getCurrent(): { number: number; kind: IntegrationKind; step: IntegrationStep } | null {
		if (!this.current) return null;
		return { number: this.current.request.number, kind: this.current.request.kind, step: this.current.step };
	}

	/**
	 * Queued pull request numbers, next first
	 */
	queuedNumbers(): number[] {
		return this.queue.snapshot().flatMap((message) => (message === SHUTDOWN ? [] : [message.number]));
	}

	get processed(): number {
		return this.processedCount;
	}

	private async run(): Promise<void> {
		queueLogger.info({ mainline: this.mainline, staging: this.staging }, "Merge queue worker started");
		while (!this.abandoned) {
			const message = await this.queue.pop();
			if (message === SHUTDOWN) break;
			await this.process(message);
		}
		this.state = "stopped";
		queueLogger.info(
			{ processed: this.processedCount, unprocessed: this.queuedNumbers() },
			"Merge queue worker stopped",
		);
	}

	/**
	 * Run one request through the pipeline. Never throws.
	 */
	async process(request: IntegrationRequest): Promise<IntegrationOutcome> {
		const prefix = `[PR #${request.number}]`;
		const current: { request: IntegrationRequest; step: IntegrationStep } = { request, step: "waiting" };
		this.current = current;

		let outcome: IntegrationOutcome;
		try {
			outcome = await this.integrate(request, prefix);
		} catch (error) {
			outcome = "error";
			queueLogger.error(
				{ pr: request.number, step: current.step, error: describeError(error) },
				`${prefix} Integration aborted`,
			);
		}

		// always reset, whatever the outcome
		current.step = "resetting_staging";
		try {
			await alignBranch(this.platform, this.staging, this.mainline, { force: true, logPrefix: prefix });
		} catch (error) {
			queueLogger.error({ pr: request.number, error: describeError(error) }, `${prefix} Failed to reset staging`);
		}

		this.processedCount++;
		this.current = null;
		queueLogger.info({ pr: request.number, outcome }, `${prefix} Integration finished`);
		if (this.queue.size === 0) {
			const waiters = this.idleWaiters.splice(0);
			for (const resolve of waiters) resolve();
		}
		return outcome;
	}

	private setStep(step: IntegrationStep): void {
		if (this.current) this.current.step = step;
	}

	private async integrate(request: IntegrationRequest, prefix: string): Promise<IntegrationOutcome> {
		const { number, headRef } = request;

		this.setStep("staging_mainline");
		await alignBranch(this.platform, this.staging, this.mainline, { logPrefix: prefix });

		this.setStep("updating_base");
		await this.platform.updatePullRequestBase(number, this.mainline);
		try {
			await this.platform.updatePullRequestBranch(number);
		} catch (error) {
			if (!(error instanceof UpdateConflictError)) throw error;
			const message = `Updating \`${headRef}\` with \`${this.mainline}\` failed (merge conflict)`;
			queueLogger.info(`${prefix} ${message}`);
			await this.notifier.send(number, message);
			return "update_conflict";
		}
		queueLogger.debug(`${prefix} Base set to \`${this.mainline}\` head`);

		this.setStep("staging_candidate");
		let sha: string;
		try {
			sha = await alignBranch(this.platform, this.staging, headRef, { logPrefix: prefix });
			queueLogger.debug(`${prefix} \`${headRef}\` merged into \`${this.staging}\``);
		} catch (error) {
			if (!(error instanceof FastForwardError)) throw error;
			const message = `Rebasing \`${headRef}\` on top of \`${this.mainline}\` failed (cannot fast-forward)`;
			queueLogger.info(`${prefix} ${message}`);
			await this.notifier.send(number, message);
			return "fast_forward_failed";
		}

		this.setStep("awaiting_ci");
		let success: boolean;
		try {
			success = await this.rendezvous.awaitResult(sha, number, { timeoutMs: this.ciTimeoutMs });
		} catch (error) {
			if (error instanceof CancelledError) {
				queueLogger.warn({ pr: number, sha }, `${prefix} CI wait cancelled`);
				return "cancelled";
			}
			if (!(error instanceof TimeoutError)) throw error;
			const minutes = Math.round(this.ciTimeoutMs / 60_000);
			const message = `No test result for \`${headRef}\` after ${minutes} minutes, not merged into \`${this.mainline}\``;
			queueLogger.warn({ pr: number, sha }, `${prefix} ${message}`);
			await this.notifier.send(number, message);
			return "ci_timeout";
		}

		if (!success) {
			const message = `Automated tests failed, \`${headRef}\` cannot be merged into \`${this.mainline}\``;
			await this.notifier.send(number, message);
			queueLogger.info(`${prefix} ${message}`);
			return "tests_failed";
		}

		this.setStep("merging");
		await this.platform.mergePullRequest(number, this.mergeMethod);
		queueLogger.info(`${prefix} \`${headRef}\` successfully merged into \`${this.mainline}\``);
		return "merged";
	}
}
