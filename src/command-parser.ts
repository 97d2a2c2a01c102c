/**
 * Comment command parsing
 *
 * A command is the first whitespace-delimited token after the app mention:
 *
 *   "LGTM, @mergequeue try-merge please"  ->  { hasMention: true, command: "try-merge" }
 *   "ping @mergequeue"                     ->  { hasMention: true, command: null }
 *   "no mention here"                      ->  { hasMention: false, command: null }
 *
 * Matching is case-sensitive and only the first mention counts.
 */

import { DEFAULT_MENTION } from "./constants.js";

export interface ParsedCommand {
	hasMention: boolean;
	/** null when nothing follows the mention */
	command: string | null;
}

export interface ParsedComment extends ParsedCommand {
	author: string;
}

export function parseCommand(message: string, mention: string = DEFAULT_MENTION): ParsedCommand {
	const index = message.indexOf(mention);
	if (index === -1) {
		return { hasMention: false, command: null };
	}

	const remain = message.slice(index + mention.length).trimStart();
	const [token] = remain.split(/\s+/, 1);
	return { hasMention: true, command: token ? token : null };
}

/**
 * Parse a webhook comment object into its author and command
 */
export function parseIssueComment(
	comment: { body: string; user: { login: string } },
	mention: string = DEFAULT_MENTION,
): ParsedComment {
	return { author: comment.user.login, ...parseCommand(comment.body, mention) };
}
