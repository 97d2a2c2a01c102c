/**
 * GitHub implementation of the HostingPlatform port
 *
 * All calls go through the Octokit REST client. Octokit's RequestError is
 * translated into the error classes of errors.ts so the queue never has to
 * look at HTTP status codes.
 */

import { Octokit, RequestError } from "octokit";
import {
	BranchNotFoundError,
	describeError,
	FastForwardError,
	MergeConflictError,
	PlatformError,
	UpdateConflictError,
} from "../errors.js";
import { githubLogger } from "../logger.js";
import type { PullRequestRef } from "../types.js";
import type { CreatePullRequestInput, HostingPlatform, MergeMethod } from "./types.js";

export interface GitHubPlatformOptions {
	octokit: Octokit;
	owner: string;
	repo: string;
}

interface PullRequestData {
	number: number;
	html_url: string;
	head: { ref: string; sha: string };
	user: { login: string } | null;
}

function toPullRequestRef(data: PullRequestData): PullRequestRef {
	return {
		number: data.number,
		headRef: data.head.ref,
		headSha: data.head.sha,
		htmlUrl: data.html_url,
		author: data.user?.login ?? "",
	};
}

/**
 * Status of a failed Octokit call, or undefined for non-HTTP failures
 */
export function statusOf(error: unknown): number | undefined {
	return error instanceof RequestError ? error.status : undefined;
}

export class GitHubPlatform implements HostingPlatform {
	readonly repoPath: string;
	private octokit: Octokit;
	private owner: string;
	private repo: string;

	constructor(options: GitHubPlatformOptions) {
		this.octokit = options.octokit;
		this.owner = options.owner;
		this.repo = options.repo;
		this.repoPath = `${options.owner}/${options.repo}`;
	}

	/**
	 * Build a platform client authenticated with a personal access token
	 */
	static fromToken(token: string, owner: string, repo: string): GitHubPlatform {
		return new GitHubPlatform({ octokit: new Octokit({ auth: token }), owner, repo });
	}

	/**
	 * Run an Octokit call, converting failures to PlatformError
	 */
	private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			if (error instanceof PlatformError) throw error;
			const status = statusOf(error);
			const message = describeError(error);
			githubLogger.debug({ operation, status, error: message }, "GitHub call failed");
			throw new PlatformError(message, operation, status);
		}
	}

	async verifyAccess(): Promise<void> {
		await this.call("getRepository", () => this.octokit.rest.repos.get({ owner: this.owner, repo: this.repo }));
		githubLogger.info({ repo: this.repoPath }, "Repository reachable");
	}

	async getPullRequest(number: number): Promise<PullRequestRef> {
		const { data } = await this.call("getPullRequest", () =>
			this.octokit.rest.pulls.get({ owner: this.owner, repo: this.repo, pull_number: number }),
		);
		return toPullRequestRef(data);
	}

	async getCommentAuthor(commentId: number): Promise<string> {
		const { data } = await this.call("getComment", () =>
			this.octokit.rest.issues.getComment({ owner: this.owner, repo: this.repo, comment_id: commentId }),
		);
		return data.user?.login ?? "";
	}

	async getBranch(branch: string): Promise<string> {
		try {
			const { data } = await this.octokit.rest.repos.getBranch({ owner: this.owner, repo: this.repo, branch });
			return data.commit.sha;
		} catch (error) {
			if (statusOf(error) === 404) {
				throw new BranchNotFoundError(branch);
			}
			throw new PlatformError(describeError(error), "getBranch", statusOf(error));
		}
	}

	async createRef(branch: string, sha: string): Promise<void> {
		await this.call("createRef", () =>
			this.octokit.rest.git.createRef({ owner: this.owner, repo: this.repo, ref: `refs/heads/${branch}`, sha }),
		);
	}

	async updateRef(branch: string, sha: string, force: boolean): Promise<void> {
		try {
			await this.octokit.rest.git.updateRef({
				owner: this.owner,
				repo: this.repo,
				ref: `heads/${branch}`,
				sha,
				force,
			});
		} catch (error) {
			// 422 "Update is not a fast forward"
			if (statusOf(error) === 422 && !force) {
				throw new FastForwardError(branch, sha);
			}
			throw new PlatformError(describeError(error), "updateRef", statusOf(error));
		}
	}

	async mergeBranches(base: string, head: string, message?: string): Promise<void> {
		try {
			await this.octokit.rest.repos.merge({
				owner: this.owner,
				repo: this.repo,
				base,
				head,
				commit_message: message,
			});
		} catch (error) {
			const status = statusOf(error);
			if (status === 409) {
				throw new MergeConflictError(base, head, status);
			}
			throw new PlatformError(describeError(error), "mergeBranches", status);
		}
	}

	async createPullRequest(input: CreatePullRequestInput): Promise<PullRequestRef> {
		const { data } = await this.call("createPullRequest", () =>
			this.octokit.rest.pulls.create({ owner: this.owner, repo: this.repo, ...input }),
		);
		return toPullRequestRef(data);
	}

	async mergePullRequest(number: number, method: MergeMethod): Promise<void> {
		await this.call("mergePullRequest", () =>
			this.octokit.rest.pulls.merge({
				owner: this.owner,
				repo: this.repo,
				pull_number: number,
				merge_method: method,
			}),
		);
	}

	async updatePullRequestBase(number: number, base: string): Promise<void> {
		await this.call("updatePullRequestBase", () =>
			this.octokit.rest.pulls.update({ owner: this.owner, repo: this.repo, pull_number: number, base }),
		);
	}

	async updatePullRequestBranch(number: number): Promise<void> {
		try {
			await this.octokit.rest.pulls.updateBranch({ owner: this.owner, repo: this.repo, pull_number: number });
		} catch (error) {
			// 422 covers both "merge conflict between base and head" and a head
			// that is not behind its base
			if (statusOf(error) === 422) {
				const message = describeError(error);
				if (/conflict/i.test(message)) {
					throw new UpdateConflictError(number, message);
				}
				githubLogger.info({ pr: number, error: message }, "Pull request branch not updated");
				return;
			}
			throw new PlatformError(describeError(error), "updatePullRequestBranch", statusOf(error));
		}
	}

	async createComment(issueNumber: number, body: string): Promise<void> {
		await this.call("createComment", () =>
			this.octokit.rest.issues.createComment({ owner: this.owner, repo: this.repo, issue_number: issueNumber, body }),
		);
	}

	async getPushRestrictions(branch: string): Promise<string[] | null> {
		try {
			const users = await this.octokit.paginate(this.octokit.rest.repos.getUsersWithAccessToProtectedBranch, {
				owner: this.owner,
				repo: this.repo,
				branch,
				per_page: 100,
			});
			return users.map((user) => user.login);
		} catch (error) {
			// Branch not protected, or protected without push restrictions
			if (statusOf(error) === 404) {
				return null;
			}
			throw new PlatformError(describeError(error), "getPushRestrictions", statusOf(error));
		}
	}
}
