/**
 * Webhook HTTP Server
 *
 * Endpoints:
 *   POST /        - GitHub webhook deliveries (event name in X-GitHub-Event)
 *   GET  /status  - Queue snapshot as JSON
 *
 * Every delivery is answered, including on internal errors and oversized
 * bodies, so GitHub does not keep redelivering it. Signature verification is left to whatever sits
 * in front of this server.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { GITHUB_EVENT_HEADER, MAX_BODY_SIZE } from "./constants.js";
import { BodyTooLargeError, describeError, InvalidPayloadError } from "./errors.js";
import { serverLogger } from "./logger.js";
import type { MergeQueueHandler } from "./merge-queue-handler.js";

export interface WebhookServerConfig {
	handler: MergeQueueHandler;
	host: string;
	port: number;
	/** Largest accepted request body in bytes */
	maxBodySize?: number;
}

export interface WebhookRequest {
	method: string;
	url: string;
	headers: Record<string, string | string[] | undefined>;
	body: string;
}

export interface WebhookResponse {
	status: number;
	contentType: "text/plain" | "application/json";
	body: string;
}

function text(status: number, body: string): WebhookResponse {
	return { status, contentType: "text/plain", body };
}

function firstHeader(value: string | string[] | undefined): string | undefined {
	return Array.isArray(value) ? value[0] : value;
}

/**
 * Route one request to the handler. Transport-independent so it can be
 * exercised without a socket.
 */
export async function routeRequest(handler: MergeQueueHandler, request: WebhookRequest): Promise<WebhookResponse> {
	const route = `${request.method} ${request.url.split("?")[0]}`;

	switch (route) {
		case "POST /":
			break;
		case "GET /status":
			return { status: 200, contentType: "application/json", body: JSON.stringify(handler.status(), null, 2) };
		default:
			return text(404, "Not found");
	}

	let body: unknown;
	try {
		body = request.body ? JSON.parse(request.body) : {};
	} catch {
		return text(400, "Invalid JSON body");
	}

	const event = firstHeader(request.headers[GITHUB_EVENT_HEADER]);
	try {
		const result = await handler.onWebhookEvent(event, body);
		serverLogger.debug({ event, result }, "Webhook handled");
		return text(200, result);
	} catch (err) {
		if (err instanceof InvalidPayloadError) {
			serverLogger.warn({ event, issues: err.issues }, "Invalid webhook payload");
			return text(400, err.message);
		}
		serverLogger.error({ event, error: describeError(err) }, "Webhook handling failed");
		return text(500, "Internal error");
	}
}

export class WebhookServer {
	private server: Server | null = null;
	private handler: MergeQueueHandler;
	private host: string;
	private port: number;
	private maxBodySize: number;

	constructor(config: WebhookServerConfig) {
		this.handler = config.handler;
		this.host = config.host;
		this.port = config.port;
		this.maxBodySize = config.maxBodySize ?? MAX_BODY_SIZE;
	}

	/**
	 * Start listening. Resolves with the bound port.
	 */
	async start(): Promise<number> {
		return new Promise((resolve, reject) => {
			this.server = createServer((req, res) => {
				this.handleRequest(req, res).catch((err: unknown) => {
					serverLogger.error({ error: describeError(err) }, "Request error");
					if (!res.headersSent) {
						res.writeHead(500, { "Content-Type": "text/plain" });
					}
					res.end("Internal error");
				});
			});

			this.server.on("error", (err: NodeJS.ErrnoException) => {
				if (err.code === "EADDRINUSE") {
					reject(new Error(`Port ${this.port} is already in use`));
				} else {
					reject(err);
				}
			});

			this.server.listen(this.port, this.host, () => {
				const address = this.server?.address();
				const port = typeof address === "object" && address !== null ? address.port : this.port;
				serverLogger.info({ host: this.host, port }, "Webhook server listening");
				resolve(port);
			});
		});
	}

	async stop(): Promise<void> {
		return new Promise((resolve) => {
			if (!this.server) {
				resolve();
				return;
			}
			this.server.close(() => {
				serverLogger.info("Webhook server stopped");
				resolve();
			});
			this.server.closeAllConnections();
		});
	}

	private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
		let body: string;
		try {
			body = await this.readBody(req);
		} catch (err) {
			if (err instanceof BodyTooLargeError) {
				serverLogger.warn({ url: req.url, limit: err.limit }, "Request body too large");
				return this.send(res, text(413, err.message), { Connection: "close" });
			}
			serverLogger.warn({ url: req.url, error: describeError(err) }, "Failed to read request body");
			return this.send(res, text(400, "Could not read request body"));
		}

		const response = await routeRequest(this.handler, {
			method: req.method ?? "GET",
			url: req.url ?? "/",
			headers: req.headers,
			body,
		});
		this.send(res, response);
	}

	private send(res: ServerResponse, response: WebhookResponse, headers: Record<string, string> = {}): void {
		res.writeHead(response.status, { ...headers, "Content-Type": response.contentType });
		res.end(response.body);
	}

	/**
	 * Read the whole body. Past `maxBodySize` the rest is read and discarded
	 * so the client still gets its 413 instead of a reset connection.
	 */
	private readBody(req: IncomingMessage): Promise<string> {
		return new Promise((resolve, reject) => {
			const chunks: Buffer[] = [];
			let size = 0;
			let overflow = false;

			req.on("data", (chunk: Buffer) => {
				if (overflow) return;
				size += chunk.length;
				if (size > this.maxBodySize) {
					overflow = true;
					chunks.length = 0;
					return;
				}
				chunks.push(chunk);
			});

			req.on("end", () => {
				if (overflow) {
					reject(new BodyTooLargeError(this.maxBodySize));
					return;
				}
				resolve(Buffer.concat(chunks).toString("utf-8"));
			});
			req.on("error", reject);
		});
	}
}
