import { InvalidInputError, TransferError } from "../core/errors.js";
import type { JobStatus } from "../core/types.js";
import type { ProgressResponse } from "./status-endpoint.js";

const JOB_STATUSES: readonly JobStatus[] = [
	"idle",
	"fetching_metadata",
	"downloading",
	"postprocessing",
	"finished",
	"error",
	"cancelled",
];

function isJobStatus(value: unknown): value is JobStatus {
	return JOB_STATUSES.some((status) => status === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseProgressResponse(payload: unknown): ProgressResponse {
	if (!isRecord(payload)) {
		throw new TransferError("Progress response is not an object");
	}

	const { progress, current, total, title, status, message } = payload;
	if (
		typeof progress !== "string" ||
		typeof current !== "number" ||
		typeof total !== "number" ||
		!isJobStatus(status)
	) {
		throw new TransferError("Progress response is missing fields");
	}

	return {
		progress,
		current,
		total,
		...(typeof title === "string" ? { title } : {}),
		status,
		...(typeof message === "string" ? { message } : {}),
	};
}

export function progressUrl(serverUrl: string): URL {
	try {
		return new URL("/progress", serverUrl);
	} catch {
		throw new InvalidInputError(`Invalid server URL: ${serverUrl}`);
	}
}

export async function fetchProgress(url: URL): Promise<ProgressResponse> {
	const response = await fetch(url, {
		headers: { accept: "application/json" },
	});
	if (!response.ok) {
		throw new TransferError(`GET ${url.pathname} failed (${response.status})`);
	}

	return parseProgressResponse(await response.json());
}
