/**
 * Hosting platform port
 *
 * The merge queue only talks to the code host through this interface.
 * GitHubPlatform implements it on top of Octokit; tests use an in-memory fake.
 *
 * Error contract:
 * - getBranch rejects with BranchNotFoundError when the branch is missing
 * - updateRef rejects with FastForwardError when a non-forced update is not
 *   a fast-forward
 * - mergeBranches rejects with MergeConflictError when the merge is refused
 * - updatePullRequestBranch rejects with UpdateConflictError when the head
 *   cannot be updated with its base, and resolves when it is already current
 * - getPushRestrictions resolves to null when the branch has no push
 *   restrictions configured
 * - everything else rejects with PlatformError
 */

import type { PullRequestRef } from "../types.js";

export type MergeMethod = "merge" | "squash" | "rebase";

export interface CreatePullRequestInput {
	title: string;
	body: string;
	head: string;
	base: string;
}

export interface HostingPlatform {
	/** "owner/name", for logs */
	readonly repoPath: string;

	/** Check the repository is reachable with the configured credentials */
	verifyAccess(): Promise<void>;

	getPullRequest(number: number): Promise<PullRequestRef>;

	getCommentAuthor(commentId: number): Promise<string>;

	/** Resolve the tip commit SHA of a branch */
	getBranch(branch: string): Promise<string>;

	createRef(branch: string, sha: string): Promise<void>;

	updateRef(branch: string, sha: string, force: boolean): Promise<void>;

	/** Merge `head` into `base` server-side */
	mergeBranches(base: string, head: string, message?: string): Promise<void>;

	createPullRequest(input: CreatePullRequestInput): Promise<PullRequestRef>;

	mergePullRequest(number: number, method: MergeMethod): Promise<void>;

	updatePullRequestBase(number: number, base: string): Promise<void>;

	/** Bring the PR's head branch up to date with its base */
	updatePullRequestBranch(number: number): Promise<void>;

	createComment(issueNumber: number, body: string): Promise<void>;

	/** Logins allowed to push to `branch`, or null when no restrictions are set */
	getPushRestrictions(branch: string): Promise<string[] | null>;
}
