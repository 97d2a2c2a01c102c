/**
 * Merge Queue Handler
 *
 * Composition root of the merge queue. Owns the worker, the batch
 * accumulator and the CI rendezvous, and turns webhook deliveries into
 * queue operations:
 *
 * - `issue_comment` on a pull request: parse the mention command, check the
 *   author's push access, then tryMerge() or tryBatchMerge()
 * - `workflow_run` completed on the staging branch: hand the conclusion to
 *   the worker waiting on that commit
 *
 * Webhook entry points return a short status line for the HTTP response and
 * never wait for a merge to finish.
 */

import { AccessGate } from "./access-gate.js";
import { BatchAccumulator } from "./batch-accumulator.js";
import { parseIssueComment } from "./command-parser.js";
import { APP_PREFIX } from "./constants.js";
import type { MergeQueueConfig } from "./config.js";
import { getDefaultConfig } from "./config.js";
import { CommandRejectedError, PermissionDeniedError } from "./errors.js";
import { handlerLogger } from "./logger.js";
import { MergeQueueWorker } from "./merge-queue-worker.js";
import { Notifier } from "./notifier.js";
import type { HostingPlatform } from "./platform/types.js";
import type { BatchAddResult, IntegrationRequest, MergeCommand, MergeQueueStatus, PullRequestRef } from "./types.js";
import { isMergeCommand } from "./types.js";
import {
	type IssueCommentEvent,
	IssueCommentEventSchema,
	parsePayload,
	type WorkflowRunEvent,
	WorkflowRunEventSchema,
} from "./webhook-schemas.js";
import { WorkflowRendezvous } from "./workflow-rendezvous.js";

export type HandlerSettings = Pick<
	MergeQueueConfig,
	"mainline" | "staging" | "batchSize" | "mention" | "ciTimeoutMinutes" | "shutdownTimeoutSeconds" | "mergeMethod"
>;

export interface MergeQueueHandlerOptions {
	platform: HostingPlatform;
	settings?: Partial<HandlerSettings>;
	/** Batch branch name generator, see createBatchBranchNamer() */
	nextBranchName?: () => string;
}

export class MergeQueueHandler {
	readonly settings: HandlerSettings;
	private platform: HostingPlatform;
	private notifier: Notifier;
	private gate: AccessGate;
	private rendezvous = new WorkflowRendezvous();
	private worker: MergeQueueWorker;
	private batch: BatchAccumulator;
	private connected = false;
	private shuttingDown = false;

	private commands: Record<MergeCommand, (pr: PullRequestRef) => Promise<unknown>>;

	constructor(options: MergeQueueHandlerOptions) {
		this.settings = { ...getDefaultConfig(), ...options.settings };
		this.platform = options.platform;
		this.notifier = new Notifier(this.platform);
		this.gate = new AccessGate(this.platform);
		this.worker = new MergeQueueWorker({
			platform: this.platform,
			rendezvous: this.rendezvous,
			notifier: this.notifier,
			mainline: this.settings.mainline,
			staging: this.settings.staging,
			mergeMethod: this.settings.mergeMethod,
			ciTimeoutMs: this.settings.ciTimeoutMinutes * 60_000,
		});
		this.batch = new BatchAccumulator({
			platform: this.platform,
			notifier: this.notifier,
			enqueue: (pr, kind, members) => this.worker.enqueue(pr, kind, members),
			capacity: this.settings.batchSize,
			mainline: this.settings.mainline,
			mention: this.settings.mention,
			nextBranchName: options.nextBranchName,
		});
		this.commands = {
			"try-merge": async (pr) => this.tryMerge(pr),
			"try-batchmerge": (pr) => this.tryBatchMerge(pr),
		};
	}

	/**
	 * Check the repository is reachable and start the worker.
	 * Must run before webhook events are accepted.
	 */
	async connect(): Promise<void> {
		if (this.connected) return;
		handlerLogger.info({ repo: this.platform.repoPath }, "Connecting to repository");
		await this.platform.verifyAccess();
		this.worker.start();
		this.connected = true;
	}

	/**
	 * Stop the worker, giving the in-flight integration the configured grace
	 * period. Safe to call more than once.
	 *
	 * @returns false when the worker had to be abandoned
	 */
	async close(): Promise<boolean> {
		if (this.shuttingDown) return true;
		this.shuttingDown = true;
		handlerLogger.info("Shutting down merge queue");
		return this.worker.stop(this.settings.shutdownTimeoutSeconds * 1000);
	}

	/**
	 * Dispatch a webhook delivery on its event name
	 */
	async onWebhookEvent(eventName: string | undefined, body: unknown): Promise<string> {
		if (!eventName) {
			return "Webhook Event Not Found";
		}

		switch (eventName) {
			case "issue_comment": {
				const payload = parsePayload(eventName, IssueCommentEventSchema, body);
				if (!payload.issue.pull_request) {
					return "Comment not from a pull-request";
				}
				return this.onPullRequestComment(payload);
			}
			case "workflow_run":
				return this.onWorkflowRun(parsePayload(eventName, WorkflowRunEventSchema, body));
			default:
				return "Webhook Event Not Handled";
		}
	}

	/**
	 * Handle a comment on a pull request
	 */
	async onPullRequestComment(payload: IssueCommentEvent): Promise<string> {
		if (payload.action === "deleted") {
			return "Does nothing on comment deletion";
		}

		const number = payload.issue.number;
		if (payload.comment.body.startsWith(APP_PREFIX)) {
			return "Comment written by mergequeue";
		}

		const { hasMention, command } = parseIssueComment(payload.comment, this.settings.mention);
		if (!hasMention) {
			return "mergequeue app not mentioned";
		}
		if (!isMergeCommand(command)) {
			const rejection = new CommandRejectedError(command);
			await this.sendMessage(number, rejection.message);
			handlerLogger.info({ pr: number, command }, `[PR #${number}] ${rejection.message}`);
			return `Unknown command: ${command ?? "none"}`;
		}
		if (this.shuttingDown) {
			handlerLogger.info({ pr: number, command }, `[PR #${number}] Command ignored, shutting down`);
			return `Merge queue is shutting down, command \`${command}\` ignored`;
		}

		const author = await this.platform.getCommentAuthor(payload.comment.id);
		if (!(await this.gate.isAllowed(this.settings.mainline, author))) {
			const denied = new PermissionDeniedError(author, this.settings.mainline);
			await this.sendMessage(number, denied.message);
			handlerLogger.info({ pr: number, author }, `[PR #${number}] ${denied.message}`);
			return "User hasn't the push permission";
		}

		const pullRequest = await this.platform.getPullRequest(number);
		await this.commands[command](pullRequest);
		return `Command \`${command}\` is being processed`;
	}

	/**
	 * Handle a workflow run event; only completed runs on staging matter
	 */
	onWorkflowRun(payload: WorkflowRunEvent): string {
		const run = payload.workflow_run;
		if (run.status !== "completed") {
			return "Nothing done, workflow run is not completed";
		}
		if (run.head_branch !== this.settings.staging) {
			return `Nothing done, workflow run is not against '${this.settings.staging}' branch`;
		}

		if (!this.rendezvous.deliver(run.head_sha, run.conclusion)) {
			handlerLogger.debug({ run: run.id, sha: run.head_sha }, "No integration waiting on this commit");
		}
		return `Workflow ${run.id} has been handled`;
	}

	/**
	 * Put `pullRequest` at the back of the merge queue
	 */
	tryMerge(pullRequest: PullRequestRef): IntegrationRequest {
		return this.worker.enqueue(pullRequest);
	}

	/**
	 * Offer `pullRequest` to the pending batch; triggers a batch merge when
	 * the batch is full
	 */
	tryBatchMerge(pullRequest: PullRequestRef): Promise<BatchAddResult> {
		return this.batch.add(pullRequest);
	}

	/**
	 * Comment on a pull request on behalf of the app
	 */
	sendMessage(issueNumber: number, message: string): Promise<void> {
		return this.notifier.send(issueNumber, message);
	}

	/**
	 * Resolves once every queued integration has been processed
	 */
	whenIdle(): Promise<void> {
		return this.worker.whenIdle();
	}

	status(): MergeQueueStatus {
		return {
			worker: this.worker.getState(),
			current: this.worker.getCurrent(),
			queued: this.worker.queuedNumbers(),
			pendingBatch: this.batch.pendingNumbers(),
			awaitingCi: this.rendezvous
				.list()
				.map(({ sha, pr, registeredAt }) => ({ sha, pr, since: registeredAt.toISOString() })),
			processed: this.worker.processed,
		};
	}
}
