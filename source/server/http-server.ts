import {
	createServer,
	type IncomingMessage,
	type Server,
	type ServerResponse,
} from "node:http";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../utils/logger.js";
import { type JobApi, routeRequest } from "./router.js";

const MAX_BODY_BYTES = 64 * 1024;

export type HttpServerOptions = {
	api: JobApi;
	logger: Logger;
};

class BodyTooLargeError extends Error {}

async function readBody(request: IncomingMessage): Promise<string> {
	const chunks: Buffer[] = [];
	let size = 0;
	for await (const chunk of request) {
		const buffer = Buffer.isBuffer(chunk)
			? chunk
			: Buffer.from(String(chunk));
		size += buffer.length;
		// Keep reading past the limit; leaving the loop early destroys the socket.
		if (size <= MAX_BODY_BYTES) {
			chunks.push(buffer);
		}
	}

	if (size > MAX_BODY_BYTES) {
		throw new BodyTooLargeError("Request body too large");
	}
	return Buffer.concat(chunks).toString("utf8");
}

function sendJson(
	response: ServerResponse,
	status: number,
	body: unknown,
): void {
	const payload = JSON.stringify(body);
	response.writeHead(status, {
		"content-type": "application/json; charset=utf-8",
		"content-length": Buffer.byteLength(payload),
		"cache-control": "no-store",
	});
	response.end(payload);
}

async function handle(
	options: HttpServerOptions,
	request: IncomingMessage,
	response: ServerResponse,
): Promise<void> {
	const method = request.method ?? "GET";
	const { pathname } = new URL(request.url ?? "/", "http://localhost");

	let body = "";
	try {
		body = await readBody(request);
	} catch (error) {
		const status = error instanceof BodyTooLargeError ? 413 : 400;
		sendJson(response, status, { error: errorMessage(error) });
		return;
	}

	const result = await routeRequest(options.api, {
		method,
		path: pathname,
		contentType: request.headers["content-type"],
		body,
	});

	if (pathname !== "/progress") {
		options.logger.info(`${method} ${pathname} -> ${result.status}`);
	}
	sendJson(response, result.status, result.body);
}

export function createHttpServer(options: HttpServerOptions): Server {
	return createServer((request, response) => {
		handle(options, request, response).catch((error: unknown) => {
			options.logger.error(`request failed: ${errorMessage(error)}`);
			if (!response.headersSent) {
				sendJson(response, 500, { error: "Internal server error" });
			} else {
				response.end();
			}
		});
	});
}

export function listen(
	server: Server,
	port: number,
	host: string,
): Promise<void> {
	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(port, host, () => {
			server.off("error", reject);
			resolve();
		});
	});
}
