#!/usr/bin/env node

/**
 * mergequeue CLI
 *
 * Merge queue for GitHub pull requests, driven by PR comments.
 *
 * Commands:
 *   serve <owner> <repo> [token]  Run the webhook server
 *   status                        Show the queue of a running server
 *   config                        Print the effective configuration
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import { Command } from "commander";
import { z } from "zod";
import { loadConfig, type MergeQueueConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";
import { MergeQueueHandler } from "./merge-queue-handler.js";
import { GitHubPlatform } from "./platform/github.js";
import { WebhookServer } from "./server.js";
import type { WorkerState } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
	try {
		const pkgPath = join(__dirname, "..", "package.json");
		const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch {
		// fall through to the default
	}
	return "0.1.0";
}

function stateColor(state: WorkerState): string {
	switch (state) {
		case "idle":
			return chalk.green(state);
		case "running":
			return chalk.cyan(state);
		case "stopping":
			return chalk.yellow(state);
		case "stopped":
			return chalk.red(state);
		default:
			return state;
	}
}

function parseInteger(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (Number.isNaN(parsed)) {
		throw new ConfigError(`Not a number: ${value}`);
	}
	return parsed;
}

function loadConfigOrExit(overrides: Partial<MergeQueueConfig>): MergeQueueConfig {
	try {
		return loadConfig({ overrides });
	} catch (error) {
		if (error instanceof ConfigError) {
			console.error(chalk.red(`Error: ${error.message}`));
			for (const issue of error.issues) {
				console.error(chalk.dim(`  ${issue}`));
			}
			process.exit(1);
		}
		throw error;
	}
}

/** Shape of GET /status, as rendered by the status command */
const StatusSchema = z.object({
	worker: z.enum(["idle", "running", "stopping", "stopped"]),
	current: z
		.object({
			number: z.number(),
			kind: z.string(),
			step: z.string(),
		})
		.nullable(),
	queued: z.array(z.number()),
	pendingBatch: z.array(z.number()),
	awaitingCi: z.array(z.object({ sha: z.string(), pr: z.number(), since: z.string() })),
	processed: z.number(),
});

const program = new Command();

program.name("mergequeue").description("Merge queue for GitHub pull requests, driven by PR comments").version(getVersion());

program
	.command("serve <owner> <repo> [token]")
	.description("Run the webhook server for owner/repo")
	.option("-H, --host <host>", "Address to bind")
	.option("-p, --port <port>", "Port to listen on", parseInteger)
	.option("--mainline <branch>", "Protected branch pull requests are merged into")
	.option("--staging <branch>", "Branch CI runs on before a merge")
	.option("--batch-size <n>", "Pull requests per batch merge", parseInteger)
	.option("-d, --debug", "Enable debug logging")
	.option("-q, --quiet", "Disable log output")
	.action(
		async (
			owner: string,
			repo: string,
			tokenArg: string | undefined,
			options: {
				host?: string;
				port?: number;
				mainline?: string;
				staging?: string;
				batchSize?: number;
				debug?: boolean;
				quiet?: boolean;
			},
		) => {
			setLogLevel({ debug: options.debug, quiet: options.quiet });

			const token = tokenArg ?? process.env.MERGEQUEUE_TOKEN;
			if (!token) {
				console.error(chalk.red("Error: a GitHub token is required (argument or MERGEQUEUE_TOKEN)"));
				process.exit(1);
			}

			const config = loadConfigOrExit({
				host: options.host,
				port: options.port,
				mainline: options.mainline,
				staging: options.staging,
				batchSize: options.batchSize,
			});

			const handler = new MergeQueueHandler({
				platform: GitHubPlatform.fromToken(token, owner, repo),
				settings: config,
			});
			const server = new WebhookServer({ handler, host: config.host, port: config.port });

			try {
				await handler.connect();
				const port = await server.start();
				console.log(chalk.green(`mergequeue listening on ${config.host}:${port} for ${owner}/${repo}`));
				console.log(chalk.dim(`  ${config.staging} -> ${config.mainline}, batches of ${config.batchSize}`));
			} catch (error) {
				logger.error({ error: describeError(error) }, "Startup failed");
				console.error(chalk.red(`Error: ${describeError(error)}`));
				await handler.close();
				process.exit(1);
			}

			let stopping = false;
			const shutdown = async (signal: string) => {
				if (stopping) return;
				stopping = true;
				logger.info({ signal }, "Received shutdown signal");
				await server.stop();
				const clean = await handler.close();
				process.exit(clean ? 0 : 1);
			};
			process.on("SIGINT", () => void shutdown("SIGINT"));
			process.on("SIGTERM", () => void shutdown("SIGTERM"));
		},
	);

program
	.command("status")
	.description("Show the queue of a running server")
	.option("-H, --host <host>", "Server address")
	.option("-p, --port <port>", "Server port", parseInteger)
	.option("--json", "Print the raw JSON snapshot")
	.action(async (options: { host?: string; port?: number; json?: boolean }) => {
		const config = loadConfigOrExit({ host: options.host, port: options.port });
		const url = `http://${config.host}:${config.port}/status`;

		let status: z.infer<typeof StatusSchema>;
		try {
			const response = await fetch(url);
			if (!response.ok) {
				throw new Error(`HTTP ${response.status}`);
			}
			status = StatusSchema.parse(await response.json());
		} catch (error) {
			console.error(chalk.red(`Error: cannot reach ${url} (${describeError(error)})`));
			process.exit(1);
		}

		if (options.json) {
			console.log(JSON.stringify(status, null, 2));
			return;
		}

		console.log(chalk.bold("Merge queue"));
		console.log(`  Worker: ${stateColor(status.worker)}`);
		if (status.current) {
			const { number, kind, step } = status.current;
			console.log(`  Current: #${number} (${kind}) ${chalk.cyan(step)}`);
		}
		console.log(`  Queued: ${status.queued.length > 0 ? status.queued.map((n) => `#${n}`).join(" ") : chalk.dim("none")}`);
		console.log(
			`  Pending batch: ${status.pendingBatch.length > 0 ? status.pendingBatch.map((n) => `#${n}`).join(" ") : chalk.dim("none")}`,
		);
		for (const { sha, pr, since } of status.awaitingCi) {
			console.log(`  Awaiting CI: #${pr} at ${chalk.dim(sha.slice(0, 7))} since ${since}`);
		}
		console.log(`  Processed: ${status.processed}`);
	});

program
	.command("config")
	.description("Print the effective configuration")
	.action(() => {
		const config = loadConfigOrExit({});
		for (const [key, value] of Object.entries(config)) {
			console.log(`  ${chalk.cyan(key)}: ${String(value)}`);
		}
	});

program.parseAsync().catch((error: unknown) => {
	console.error(chalk.red(`Error: ${describeError(error)}`));
	process.exit(1);
});
