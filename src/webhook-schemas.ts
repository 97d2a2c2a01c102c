/**
 * Webhook payload schemas
 *
 * Only the fields the queue reads are declared; zod strips the rest.
 */

import { z } from "zod";
import { InvalidPayloadError } from "./errors.js";

export const IssueCommentEventSchema = z.object({
	action: z.string(),
	issue: z.object({
		number: z.number().int().positive(),
		// Present (and non-null) only when the issue is a pull request
		pull_request: z.object({}).passthrough().nullish(),
	}),
	comment: z.object({
		id: z.number().int().positive(),
		body: z
			.string()
			.nullable()
			.transform((body) => body ?? ""),
		user: z.object({ login: z.string() }),
	}),
});

export type IssueCommentEvent = z.infer<typeof IssueCommentEventSchema>;

export const WorkflowRunEventSchema = z.object({
	action: z.string().optional(),
	workflow_run: z.object({
		id: z.number().int(),
		status: z.string().nullable(),
		conclusion: z.string().nullable(),
		head_branch: z.string().nullable(),
		head_sha: z.string().min(1),
	}),
});

export type WorkflowRunEvent = z.infer<typeof WorkflowRunEventSchema>;

/**
 * Validate `body` against `schema`, raising InvalidPayloadError on mismatch
 */
export function parsePayload<S extends z.ZodTypeAny>(event: string, schema: S, body: unknown): z.output<S> {
	const result = schema.safeParse(body);
	if (!result.success) {
		throw new InvalidPayloadError(
			event,
			result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
		);
	}
	return result.data;
}
