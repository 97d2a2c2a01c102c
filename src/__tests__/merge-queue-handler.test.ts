/**
 * Tests for merge-queue-handler.ts
 *
 * Drives the whole queue through webhook payloads, the way GitHub does.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidPayloadError, PlatformError } from "../errors.js";
import { type HandlerSettings, MergeQueueHandler } from "../merge-queue-handler.js";
import { createRepository, type FakePlatform, issueCommentPayload, PREFIX, workflowRunPayload } from "./helpers.js";

describe("MergeQueueHandler", () => {
	let platform: FakePlatform;
	let handler: MergeQueueHandler;

	const create = async (settings: Partial<HandlerSettings> = {}) => {
		handler = new MergeQueueHandler({
			platform,
			settings: { shutdownTimeoutSeconds: 0.1, ...settings },
			nextBranchName: () => "batch-test",
		});
		await handler.connect();
		return handler;
	};

	const comment = (issue: number, body: string, commentId = 1) =>
		handler.onWebhookEvent("issue_comment", issueCommentPayload({ issue, body, commentId }));

	const awaitingCi = (pr: number) =>
		vi.waitFor(() => {
			const entry = handler.status().awaitingCi.find((candidate) => candidate.pr === pr);
			if (!entry) throw new Error(`#${pr} not awaiting CI yet`);
			return entry;
		});

	beforeEach(async () => {
		platform = createRepository();
		platform.commentAuthors.set(1, "octocat");
		platform.commentAuthors.set(2, "octocat");
		await create();
	});

	afterEach(async () => {
		await handler.close();
	});

	describe("event dispatch", () => {
		it("requires the event header", async () => {
			expect(await handler.onWebhookEvent(undefined, {})).toBe("Webhook Event Not Found");
		});

		it("ignores other events", async () => {
			expect(await handler.onWebhookEvent("push", { ref: "refs/heads/master" })).toBe("Webhook Event Not Handled");
		});

		it("rejects malformed payloads", async () => {
			await expect(handler.onWebhookEvent("issue_comment", { action: "created" })).rejects.toBeInstanceOf(
				InvalidPayloadError,
			);
			await expect(handler.onWebhookEvent("workflow_run", {})).rejects.toBeInstanceOf(InvalidPayloadError);
		});
	});

	describe("issue comments", () => {
		it("ignores comments on plain issues", async () => {
			const payload = issueCommentPayload({ issue: 9, body: "@mergequeue try-merge", pullRequest: false });
			expect(await handler.onWebhookEvent("issue_comment", payload)).toBe("Comment not from a pull-request");
		});

		it("ignores deleted comments", async () => {
			const payload = issueCommentPayload({ issue: 1, body: "@mergequeue try-merge", action: "deleted" });
			expect(await handler.onWebhookEvent("issue_comment", payload)).toBe("Does nothing on comment deletion");
			expect(handler.status().queued).toEqual([]);
		});

		it("ignores its own comments", async () => {
			expect(await comment(1, `${PREFIX} Pull request already added to batch merge queue. @mergequeue try-merge`)).toBe(
				"Comment written by mergequeue",
			);
			expect(platform.comments).toEqual([]);
		});

		it("ignores comments without the mention", async () => {
			expect(await comment(1, "LGTM")).toBe("mergequeue app not mentioned");
			expect(platform.comments).toEqual([]);
		});

		it("answers unknown commands on the pull request", async () => {
			expect(await comment(1, "@mergequeue deploy")).toBe("Unknown command: deploy");
			expect(platform.commentsOn(1)).toEqual([`${PREFIX} Failed to process command (reason: unknown command \`deploy\`)`]);
		});

		it("answers a bare mention on the pull request", async () => {
			expect(await comment(1, "@mergequeue")).toBe("Unknown command: none");
			expect(platform.commentsOn(1)).toEqual([`${PREFIX} Failed to process command (reason: no command provided)`]);
		});

		it("refuses users without push access to mainline", async () => {
			platform.pushRestrictions.set("master", ["alice"]);
			platform.commentAuthors.set(5, "mallory");

			expect(await comment(1, "@mergequeue try-merge", 5)).toBe("User hasn't the push permission");
			expect(platform.commentsOn(1)).toEqual([`${PREFIX} User @mallory hasn't push access on \`master\` branch.`]);
			expect(handler.status().queued).toEqual([]);
			expect(handler.status().current).toBeNull();
		});

		it("accepts users on the push list", async () => {
			platform.pushRestrictions.set("master", ["octocat"]);

			expect(await comment(1, "@mergequeue try-merge")).toBe("Command `try-merge` is being processed");
			await awaitingCi(1);
		});

		it("honours a custom mention", async () => {
			await handler.close();
			await create({ mention: "@queue-bot" });

			expect(await comment(1, "@mergequeue try-merge")).toBe("mergequeue app not mentioned");
			expect(await comment(1, "@queue-bot try-merge")).toBe("Command `try-merge` is being processed");
		});
	});

	describe("workflow runs", () => {
		it("ignores runs that are not completed", async () => {
			const payload = workflowRunPayload({ sha: "abc", status: "in_progress", conclusion: null });
			expect(await handler.onWebhookEvent("workflow_run", payload)).toBe("Nothing done, workflow run is not completed");
		});

		it("ignores runs on other branches", async () => {
			const payload = workflowRunPayload({ sha: "abc", branch: "feature-a" });
			expect(await handler.onWebhookEvent("workflow_run", payload)).toBe(
				"Nothing done, workflow run is not against 'staging' branch",
			);
		});

		it("acknowledges runs nobody waits on", async () => {
			expect(await handler.onWebhookEvent("workflow_run", workflowRunPayload({ sha: "abc", id: 7 }))).toBe(
				"Workflow 7 has been handled",
			);
		});
	});

	it("merges a pull request end to end", async () => {
		const head = platform.tip("feature-a");
		expect(await comment(1, "@mergequeue  try-merge")).toBe("Command `try-merge` is being processed");

		const { sha } = await awaitingCi(1);
		expect(sha).toBe(head);
		expect(handler.status()).toMatchObject({
			worker: "running",
			current: { number: 1, kind: "single", step: "awaiting_ci" },
			queued: [],
		});

		expect(await handler.onWebhookEvent("workflow_run", workflowRunPayload({ sha }))).toBe(
			"Workflow 42 has been handled",
		);
		await handler.whenIdle();

		expect(platform.merged).toEqual([{ number: 1, method: "rebase" }]);
		expect(platform.tip("master")).toBe(head);
		expect(platform.tip("staging")).toBe(head);
		expect(platform.comments).toEqual([]);
		expect(handler.status().processed).toBe(1);
	});

	it("does not merge when CI fails", async () => {
		await comment(1, "@mergequeue try-merge");
		const { sha } = await awaitingCi(1);

		await handler.onWebhookEvent("workflow_run", workflowRunPayload({ sha, conclusion: "failure" }));
		await handler.whenIdle();

		expect(platform.merged).toEqual([]);
		expect(platform.commentsOn(1)).toEqual([
			`${PREFIX} Automated tests failed, \`feature-a\` cannot be merged into \`master\``,
		]);
	});

	it("integrates concurrently submitted pull requests in order", async () => {
		platform.commentAuthors.set(3, "octocat");
		await Promise.all([1, 2, 3].map((n) => comment(n, "@mergequeue try-merge", n)));

		for (const number of [1, 2, 3]) {
			const { sha } = await awaitingCi(number);
			expect(handler.status().awaitingCi).toHaveLength(1);
			expect(platform.tip("staging")).toBe(sha);
			await handler.onWebhookEvent("workflow_run", workflowRunPayload({ sha }));
		}
		await handler.whenIdle();

		expect(platform.merged.map((merge) => merge.number)).toEqual([1, 2, 3]);
	});

	it("batches pull requests into one integration pull request", async () => {
		platform.commentAuthors.set(3, "octocat");
		const firstHead = platform.tip("feature-a");

		expect(await comment(1, "@mergequeue try-batchmerge", 1)).toBe("Command `try-batchmerge` is being processed");
		expect(await comment(2, "@mergequeue try-batchmerge", 2)).toBe("Command `try-batchmerge` is being processed");
		expect(handler.status().pendingBatch).toEqual([1, 2]);
		expect(platform.pullRequests.has(100)).toBe(false);

		expect(await comment(3, "@mergequeue try-batchmerge", 3)).toBe("Command `try-batchmerge` is being processed");
		expect(handler.status().pendingBatch).toEqual([]);
		expect(platform.calls.slice(0, 4)).toEqual([
			`createRef batch-test ${firstHead}`,
			"mergeBranches batch-test feature-a",
			"mergeBranches batch-test feature-b",
			"mergeBranches batch-test feature-c",
		]);

		const { sha } = await awaitingCi(100);
		expect(sha).toBe(platform.tip("batch-test"));
		expect(handler.status().current).toEqual({ number: 100, kind: "batch", step: "awaiting_ci" });

		await handler.onWebhookEvent("workflow_run", workflowRunPayload({ sha }));
		await handler.whenIdle();

		expect(platform.merged).toEqual([{ number: 100, method: "rebase" }]);
		for (const head of ["feature-a", "feature-b", "feature-c"]) {
			expect(platform.isAncestor(platform.tip(head), platform.tip("master"))).toBe(true);
		}
		const notice =
			`${PREFIX} Commits added to \`batch-test\` branch.\n` +
			"Check batch merge pull request [#100](https://github.com/acme/widgets/pull/100) " +
			"associated with this branch to know merge status.";
		expect(platform.commentsOn(1)).toEqual([
			`${PREFIX} Pull request added to the batch merge queue. It will be processed soon.`,
			notice,
		]);
		expect(platform.commentsOn(3)).toEqual([notice]);
	});

	describe("lifecycle", () => {
		it("reports an idle queue after connecting", () => {
			expect(handler.status()).toEqual({
				worker: "running",
				current: null,
				queued: [],
				pendingBatch: [],
				awaitingCi: [],
				processed: 0,
			});
		});

		it("fails to connect when the repository is unreachable", async () => {
			platform.failures.set("verifyAccess", new PlatformError("Not Found", "getRepository", 404));
			const other = new MergeQueueHandler({ platform });
			await expect(other.connect()).rejects.toThrow("Not Found");
			expect(other.status().worker).toBe("idle");
		});

		it("lists CI waits with the time they started", async () => {
			const before = Date.now();
			await comment(1, "@mergequeue try-merge");
			const { sha, since } = await awaitingCi(1);

			expect(handler.status().awaitingCi).toEqual([{ sha, pr: 1, since }]);
			expect(new Date(since).toISOString()).toBe(since);
			expect(Date.parse(since)).toBeGreaterThanOrEqual(before);
		});

		it("ignores commands once shutting down", async () => {
			await handler.close();

			expect(await comment(1, "@mergequeue try-merge")).toBe(
				"Merge queue is shutting down, command `try-merge` ignored",
			);
			expect(await comment(2, "@mergequeue try-batchmerge", 2)).toBe(
				"Merge queue is shutting down, command `try-batchmerge` ignored",
			);
			expect(handler.status().queued).toEqual([]);
			expect(handler.status().pendingBatch).toEqual([]);
			expect(platform.comments).toEqual([]);
		});

		it("abandons the in-flight integration after the grace period", async () => {
			await comment(1, "@mergequeue try-merge");
			await comment(2, "@mergequeue try-merge");
			await awaitingCi(1);

			await expect(handler.close()).resolves.toBe(false);
			expect(await comment(3, "@mergequeue try-merge")).toBe(
				"Merge queue is shutting down, command `try-merge` ignored",
			);
			await vi.waitFor(() => expect(handler.status().worker).toBe("stopped"));

			expect(handler.status()).toMatchObject({ current: null, queued: [2], awaitingCi: [], processed: 1 });
			expect(platform.merged).toEqual([]);
			expect(platform.comments).toEqual([]);
		});

		it("can be closed more than once", async () => {
			await expect(handler.close()).resolves.toBe(true);
			await expect(handler.close()).resolves.toBe(true);
			expect(handler.status().worker).toBe("stopped");
		});
	});
});
