/**
 * mergequeue - public exports
 *
 * Embed the queue in another process:
 *
 * ```typescript
 * const handler = new MergeQueueHandler({ platform: GitHubPlatform.fromToken(token, owner, repo) });
 * await handler.connect();
 * await handler.onWebhookEvent(req.headers["x-github-event"], payload);
 * ```
 */

export { AccessGate } from "./access-gate.js";
export { AsyncQueue } from "./async-queue.js";
export { BatchAccumulator, type BatchAccumulatorOptions, createBatchBranchNamer } from "./batch-accumulator.js";
export { type ParsedCommand, parseCommand, parseIssueComment } from "./command-parser.js";
export { ConfigSchema, getDefaultConfig, loadConfig, type LoadConfigOptions, type MergeQueueConfig } from "./config.js";
export * from "./constants.js";
export * from "./errors.js";
export { logger, setLogLevel } from "./logger.js";
export { MergeQueueHandler, type HandlerSettings, type MergeQueueHandlerOptions } from "./merge-queue-handler.js";
export { MergeQueueWorker, type MergeQueueWorkerOptions, type QueueMessage, SHUTDOWN } from "./merge-queue-worker.js";
export { Mutex } from "./mutex.js";
export { Notifier } from "./notifier.js";
export { GitHubPlatform, type GitHubPlatformOptions } from "./platform/github.js";
export type { CreatePullRequestInput, HostingPlatform, MergeMethod } from "./platform/types.js";
export { type AlignOptions, alignBranch } from "./rebase.js";
export { routeRequest, type WebhookRequest, type WebhookResponse, WebhookServer } from "./server.js";
export * from "./types.js";
export {
	type IssueCommentEvent,
	IssueCommentEventSchema,
	parsePayload,
	type WorkflowRunEvent,
	WorkflowRunEventSchema,
} from "./webhook-schemas.js";
export { WorkflowRendezvous } from "./workflow-rendezvous.js";
