/**
 * Push-access check for comment authors
 *
 * Only users allowed to push to the protected branch may drive the queue.
 * A branch without push restrictions lets everyone through: unconfigured
 * protection must not lock out automation. Any other lookup failure
 * propagates to the caller.
 */

import { handlerLogger } from "./logger.js";
import type { HostingPlatform } from "./platform/types.js";

export class AccessGate {
	constructor(private platform: HostingPlatform) {}

	async isAllowed(branch: string, login: string): Promise<boolean> {
		const allowed = await this.platform.getPushRestrictions(branch);
		if (allowed === null) {
			handlerLogger.debug({ branch, login }, "No push restrictions on branch, permitting");
			return true;
		}
		return allowed.includes(login);
	}
}
