/**
 * Test Helpers
 *
 * In-memory HostingPlatform with just enough git semantics for the queue:
 * commits know their ancestors, so fast-forward checks behave like GitHub's.
 */

import {
	BranchNotFoundError,
	FastForwardError,
	MergeConflictError,
	PlatformError,
	UpdateConflictError,
} from "../errors.js";
import type { CreatePullRequestInput, HostingPlatform, MergeMethod } from "../platform/types.js";
import type { PullRequestRef } from "../types.js";

interface FakePullRequest {
	number: number;
	head: string;
	base: string;
	author: string;
	title: string;
	body: string;
}

export interface PostedComment {
	issue: number;
	body: string;
}

export class FakePlatform implements HostingPlatform {
	readonly repoPath = "acme/widgets";

	/** branch name -> tip sha */
	readonly branches = new Map<string, string>();
	readonly pullRequests = new Map<number, FakePullRequest>();
	readonly comments: PostedComment[] = [];
	readonly merged: Array<{ number: number; method: MergeMethod }> = [];
	/** Every mutating call, in order */
	readonly calls: string[] = [];

	/** Head branches whose merge into another branch is refused */
	readonly conflicting = new Set<string>();
	/** Head branches updatePullRequestBranch leaves untouched */
	readonly stale = new Set<string>();
	/** Head branches that conflict with their base when updated */
	readonly updateConflicts = new Set<string>();
	/** branch -> logins allowed to push; absent means unrestricted */
	readonly pushRestrictions = new Map<string, string[]>();
	readonly commentAuthors = new Map<number, string>();
	/** operation name -> error thrown by its next call */
	readonly failures = new Map<string, Error>();

	private ancestors = new Map<string, Set<string>>();
	private commitCount = 0;
	private nextPullRequest = 100;

	/** Create a commit on top of `parents` */
	commit(...parents: string[]): string {
		this.commitCount++;
		const sha = `c${this.commitCount}`;
		const lineage = new Set<string>();
		for (const parent of parents) {
			lineage.add(parent);
			for (const older of this.ancestors.get(parent) ?? []) lineage.add(older);
		}
		this.ancestors.set(sha, lineage);
		return sha;
	}

	/** Create a branch with one new commit on top of `from` (a branch name) */
	branch(name: string, from?: string): string {
		const parent = from ? this.tip(from) : undefined;
		const sha = parent ? this.commit(parent) : this.commit();
		this.branches.set(name, sha);
		return sha;
	}

	/** Open a pull request from `head` against `base` */
	openPullRequest(number: number, head: string, base: string, author = "octocat"): PullRequestRef {
		this.pullRequests.set(number, { number, head, base, author, title: `PR ${number}`, body: "" });
		return this.toRef(number);
	}

	tip(branch: string): string {
		const sha = this.branches.get(branch);
		if (sha === undefined) {
			throw new Error(`no branch ${branch}`);
		}
		return sha;
	}

	isAncestor(ancestor: string, sha: string): boolean {
		return ancestor === sha || (this.ancestors.get(sha)?.has(ancestor) ?? false);
	}

	commentsOn(issue: number): string[] {
		return this.comments.filter((comment) => comment.issue === issue).map((comment) => comment.body);
	}

	private maybeFail(operation: string): void {
		const error = this.failures.get(operation);
		if (error) {
			this.failures.delete(operation);
			throw error;
		}
	}

	private toRef(number: number): PullRequestRef {
		const pr = this.pullRequests.get(number);
		if (!pr) {
			throw new PlatformError(`Pull request #${number} not found`, "getPullRequest", 404);
		}
		return {
			number,
			headRef: pr.head,
			headSha: this.branches.get(pr.head) ?? "",
			htmlUrl: `https://github.com/${this.repoPath}/pull/${number}`,
			author: pr.author,
		};
	}

	async verifyAccess(): Promise<void> {
		this.maybeFail("verifyAccess");
	}

	async getPullRequest(number: number): Promise<PullRequestRef> {
		this.maybeFail("getPullRequest");
		return this.toRef(number);
	}

	async getCommentAuthor(commentId: number): Promise<string> {
		this.maybeFail("getCommentAuthor");
		const login = this.commentAuthors.get(commentId);
		if (login === undefined) {
			throw new PlatformError(`Comment ${commentId} not found`, "getComment", 404);
		}
		return login;
	}

	async getBranch(branch: string): Promise<string> {
		this.maybeFail("getBranch");
		const sha = this.branches.get(branch);
		if (sha === undefined) {
			throw new BranchNotFoundError(branch);
		}
		return sha;
	}

	async createRef(branch: string, sha: string): Promise<void> {
		this.maybeFail("createRef");
		if (this.branches.has(branch)) {
			throw new PlatformError("Reference already exists", "createRef", 422);
		}
		this.calls.push(`createRef ${branch} ${sha}`);
		this.branches.set(branch, sha);
	}

	async updateRef(branch: string, sha: string, force: boolean): Promise<void> {
		this.maybeFail("updateRef");
		const current = this.branches.get(branch);
		if (current === undefined) {
			throw new PlatformError("Reference does not exist", "updateRef", 422);
		}
		if (!force && !this.isAncestor(current, sha)) {
			throw new FastForwardError(branch, sha);
		}
		this.calls.push(`updateRef ${branch} ${sha}${force ? " force" : ""}`);
		this.branches.set(branch, sha);
	}

	async mergeBranches(base: string, head: string): Promise<void> {
		this.maybeFail("mergeBranches");
		if (this.conflicting.has(head)) {
			throw new MergeConflictError(base, head);
		}
		const baseSha = this.tip(base);
		const headSha = this.tip(head);
		this.calls.push(`mergeBranches ${base} ${head}`);
		if (this.isAncestor(headSha, baseSha)) return;
		this.branches.set(base, this.commit(baseSha, headSha));
	}

	async createPullRequest(input: CreatePullRequestInput): Promise<PullRequestRef> {
		this.maybeFail("createPullRequest");
		const number = this.nextPullRequest++;
		this.pullRequests.set(number, {
			number,
			head: input.head,
			base: input.base,
			author: "mergequeue[bot]",
			title: input.title,
			body: input.body,
		});
		this.calls.push(`createPullRequest ${input.head} -> ${input.base}`);
		return this.toRef(number);
	}

	async mergePullRequest(number: number, method: MergeMethod): Promise<void> {
		this.maybeFail("mergePullRequest");
		const pr = this.pullRequests.get(number);
		if (!pr) {
			throw new PlatformError(`Pull request #${number} not found`, "mergePullRequest", 404);
		}
		this.calls.push(`mergePullRequest ${number}`);
		this.merged.push({ number, method });
		this.branches.set(pr.base, this.tip(pr.head));
	}

	async updatePullRequestBase(number: number, base: string): Promise<void> {
		this.maybeFail("updatePullRequestBase");
		const pr = this.pullRequests.get(number);
		if (!pr) {
			throw new PlatformError(`Pull request #${number} not found`, "updatePullRequestBase", 404);
		}
		pr.base = base;
	}

	async updatePullRequestBranch(number: number): Promise<void> {
		this.maybeFail("updatePullRequestBranch");
		const pr = this.pullRequests.get(number);
		if (!pr) {
			throw new PlatformError(`Pull request #${number} not found`, "updatePullRequestBranch", 404);
		}
		if (this.stale.has(pr.head)) return;
		const baseSha = this.tip(pr.base);
		const headSha = this.tip(pr.head);
		if (this.isAncestor(baseSha, headSha)) return;
		if (this.updateConflicts.has(pr.head)) {
			throw new UpdateConflictError(number, "merge conflict between base and head");
		}
		this.calls.push(`updatePullRequestBranch ${number}`);
		this.branches.set(pr.head, this.commit(headSha, baseSha));
	}

	async createComment(issueNumber: number, body: string): Promise<void> {
		this.maybeFail("createComment");
		this.comments.push({ issue: issueNumber, body });
	}

	async getPushRestrictions(branch: string): Promise<string[] | null> {
		this.maybeFail("getPushRestrictions");
		return this.pushRestrictions.get(branch) ?? null;
	}
}

/**
 * Repository with `master` and three feature branches, each with an open PR
 * (#1 feature-a, #2 feature-b, #3 feature-c) against master
 */
export function createRepository(): FakePlatform {
	const platform = new FakePlatform();
	platform.branch("master");
	for (const [number, head] of [
		[1, "feature-a"],
		[2, "feature-b"],
		[3, "feature-c"],
	] as const) {
		platform.branch(head, "master");
		platform.openPullRequest(number, head, "master");
	}
	return platform;
}

export const PREFIX = "***[from mergequeue]***";

/** issue_comment payload as GitHub sends it, trimmed to what the queue reads */
export function issueCommentPayload(options: {
	issue: number;
	body: string;
	commentId?: number;
	login?: string;
	action?: string;
	pullRequest?: boolean;
}) {
	return {
		action: options.action ?? "created",
		issue: {
			number: options.issue,
			pull_request: options.pullRequest === false ? undefined : { url: `https://api.github.com/pulls/${options.issue}` },
		},
		comment: {
			id: options.commentId ?? 1,
			body: options.body,
			user: { login: options.login ?? "octocat" },
		},
	};
}

/** workflow_run payload for a run on `branch` at `sha` */
export function workflowRunPayload(options: {
	sha: string;
	branch?: string;
	status?: string;
	conclusion?: string | null;
	id?: number;
}) {
	return {
		action: "completed",
		workflow_run: {
			id: options.id ?? 42,
			status: options.status ?? "completed",
			conclusion: options.conclusion === undefined ? "success" : options.conclusion,
			head_branch: options.branch ?? "staging",
			head_sha: options.sha,
		},
	};
}
