/**
 * Pull request comments written on behalf of the app
 */

import { APP_PREFIX } from "./constants.js";
import { handlerLogger } from "./logger.js";
import type { HostingPlatform } from "./platform/types.js";

export class Notifier {
	constructor(
		private platform: HostingPlatform,
		private prefix: string = APP_PREFIX,
	) {}

	/**
	 * Comment on pull request `issueNumber`, prefixed so the app's own
	 * comments are recognizable.
	 */
	async send(issueNumber: number, message: string): Promise<void> {
		await this.platform.createComment(issueNumber, this.format(message));
		handlerLogger.debug({ pr: issueNumber }, "Comment posted");
	}

	format(message: string): string {
		return [this.prefix, message].join(" ");
	}
}
