/**
 * Logger Module
 *
 * Pino-based structured logging. Child loggers tag each line with the
 * component that wrote it (server, handler, queue, batch, github).
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const isTest = process.env.VITEST !== undefined;

function defaultLevel(): string {
	if (isTest) return "silent";
	return isDev ? "debug" : "info";
}

export const logger = pino({
	level: process.env.LOG_LEVEL || defaultLevel(),
	transport:
		isDev && !isTest
			? {
					target: "pino-pretty",
					options: {
						colorize: true,
						ignore: "pid,hostname",
						translateTime: "HH:MM:ss",
					},
				}
			: undefined,
});

export const serverLogger = logger.child({ module: "server" });
export const handlerLogger = logger.child({ module: "handler" });
export const queueLogger = logger.child({ module: "queue" });
export const batchLogger = logger.child({ module: "batch" });
export const githubLogger = logger.child({ module: "github" });

const childLoggers = [serverLogger, handlerLogger, queueLogger, batchLogger, githubLogger];

/**
 * Apply CLI verbosity flags. `quiet` wins over `debug`.
 *
 * Pino children copy the parent level when created, so each one is updated.
 */
export function setLogLevel(options: { debug?: boolean; quiet?: boolean }): void {
	const level = options.quiet ? "silent" : options.debug ? "debug" : undefined;
	if (!level) return;
	for (const target of [logger, ...childLoggers]) {
		target.level = level;
	}
}
