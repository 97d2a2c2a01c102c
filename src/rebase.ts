/**
 * Branch alignment
 *
 * Moves `base` to the tip of `head`, creating `base` when it does not exist.
 * This is the only code that writes the staging branch, and the merge queue
 * worker is its only caller for that branch.
 */

import { BranchNotFoundError } from "./errors.js";
import { queueLogger } from "./logger.js";
import type { HostingPlatform } from "./platform/types.js";

export interface AlignOptions {
	/** Move `base` even when the update is not a fast-forward */
	force?: boolean;
	/** Prefix identifying the pull request in log lines, e.g. "[PR #7]" */
	logPrefix?: string;
}

/**
 * Point `base` at the current tip of `head`.
 *
 * @returns the SHA `base` now points at
 * @throws FastForwardError when `force` is off and the move is not a fast-forward
 * @throws PlatformError for any other platform failure
 */
export async function alignBranch(
	platform: HostingPlatform,
	base: string,
	head: string,
	options: AlignOptions = {},
): Promise<string> {
	const { force = false, logPrefix = "" } = options;
	const sha = await platform.getBranch(head);

	try {
		await platform.getBranch(base);
	} catch (error) {
		if (!(error instanceof BranchNotFoundError)) throw error;
		queueLogger.debug(`${logPrefix} Branch \`${base}\` cannot be found, creating one`.trim());
		await platform.createRef(base, sha);
		return sha;
	}

	await platform.updateRef(base, sha, force);
	queueLogger.debug(`${logPrefix} \`${base}\` branch rebased on top of \`${head}\``.trim());
	return sha;
}
