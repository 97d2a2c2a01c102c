/**
 * Configuration
 *
 * Settings are layered, lowest precedence first:
 * 1. Built-in defaults
 * 2. .mergequeuerc in the home directory
 * 3. .mergequeuerc in the current directory
 * 4. Environment variables (MERGEQUEUE_*)
 * 5. CLI flags
 *
 * The access token is never read from rc files; it comes from the command
 * line or MERGEQUEUE_TOKEN.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import {
	DEFAULT_BATCH_SIZE,
	DEFAULT_CI_TIMEOUT_MINUTES,
	DEFAULT_HOST,
	DEFAULT_MAINLINE,
	DEFAULT_MENTION,
	DEFAULT_PORT,
	DEFAULT_SHUTDOWN_TIMEOUT_SECONDS,
	DEFAULT_STAGING,
} from "./constants.js";
import { ConfigError, describeError } from "./errors.js";
import { logger } from "./logger.js";

export const RC_FILE = ".mergequeuerc";

export const ConfigSchema = z.object({
	host: z.string().min(1),
	port: z.number().int().min(0).max(65535),
	mainline: z.string().min(1),
	staging: z.string().min(1),
	batchSize: z.number().int().min(1).max(100),
	mention: z.string().regex(/^@\S+$/, "must be @ followed by a name"),
	ciTimeoutMinutes: z.number().min(0),
	shutdownTimeoutSeconds: z.number().min(0),
	mergeMethod: z.enum(["merge", "squash", "rebase"]),
});

export type MergeQueueConfig = z.infer<typeof ConfigSchema>;

const RcSchema = ConfigSchema.partial().strict();

const DEFAULT_CONFIG: MergeQueueConfig = {
	host: DEFAULT_HOST,
	port: DEFAULT_PORT,
	mainline: DEFAULT_MAINLINE,
	staging: DEFAULT_STAGING,
	batchSize: DEFAULT_BATCH_SIZE,
	mention: DEFAULT_MENTION,
	ciTimeoutMinutes: DEFAULT_CI_TIMEOUT_MINUTES,
	shutdownTimeoutSeconds: DEFAULT_SHUTDOWN_TIMEOUT_SECONDS,
	mergeMethod: "rebase",
};

/** Environment variable for each setting */
const ENV_KEYS: Record<keyof MergeQueueConfig, string> = {
	host: "MERGEQUEUE_HOST",
	port: "MERGEQUEUE_PORT",
	mainline: "MERGEQUEUE_MAINLINE",
	staging: "MERGEQUEUE_STAGING",
	batchSize: "MERGEQUEUE_BATCH_SIZE",
	mention: "MERGEQUEUE_MENTION",
	ciTimeoutMinutes: "MERGEQUEUE_CI_TIMEOUT_MINUTES",
	shutdownTimeoutSeconds: "MERGEQUEUE_SHUTDOWN_TIMEOUT_SECONDS",
	mergeMethod: "MERGEQUEUE_MERGE_METHOD",
};

const NUMERIC_KEYS = new Set<string>([
	"port",
	"batchSize",
	"ciTimeoutMinutes",
	"shutdownTimeoutSeconds",
]);

export interface LoadConfigOptions {
	cwd?: string;
	homeDir?: string;
	env?: NodeJS.ProcessEnv;
	/** Values from CLI flags; undefined entries are ignored */
	overrides?: { [K in keyof MergeQueueConfig]?: MergeQueueConfig[K] | undefined };
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Read one rc file. Missing files yield an empty layer.
 */
function readRcFile(filePath: string): Record<string, unknown> {
	if (!fs.existsSync(filePath)) {
		return {};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ConfigError(`Invalid JSON in ${filePath}`, [describeError(error)]);
	}

	const result = RcSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(`Invalid config values in ${filePath}`, formatIssues(result.error));
	}
	logger.debug({ file: filePath }, "Loaded config file");
	return result.data;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
	const layer: Record<string, unknown> = {};
	for (const [key, variable] of Object.entries(ENV_KEYS)) {
		const value = env[variable];
		if (value === undefined || value === "") continue;
		layer[key] = NUMERIC_KEYS.has(key) ? Number(value) : value;
	}
	return layer;
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Build the effective configuration
 *
 * @throws ConfigError when any layer holds an invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): MergeQueueConfig {
	const cwd = options.cwd ?? process.cwd();
	const homeDir = options.homeDir ?? os.homedir();
	const env = options.env ?? process.env;

	const merged = {
		...DEFAULT_CONFIG,
		...readRcFile(path.join(homeDir, RC_FILE)),
		...readRcFile(path.join(cwd, RC_FILE)),
		...readEnv(env),
		...definedEntries(options.overrides ?? {}),
	};

	const result = ConfigSchema.safeParse(merged);
	if (!result.success) {
		throw new ConfigError("Invalid configuration", formatIssues(result.error));
	}
	return result.data;
}

/**
 * Default config values (for documentation and `--help`)
 */
export function getDefaultConfig(): MergeQueueConfig {
	return { ...DEFAULT_CONFIG };
}
