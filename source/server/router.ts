import type { JobController } from "../core/job-runner.js";
import {
	errorMessage,
	InvalidInputError,
	toHttpStatus,
} from "../core/errors.js";
import type {
	AudioQuality,
	DownloadKind,
	DownloadRequest,
	Quality,
	VideoQuality,
} from "../core/types.js";
import { readProgress } from "./status-endpoint.js";

export type RouteRequest = {
	method: string;
	path: string;
	contentType?: string;
	body: string;
};

export type RouteResponse = {
	status: number;
	body: unknown;
};

export type JobApi = Pick<JobController, "submit" | "cancel" | "status">;

const VIDEO_QUALITIES: readonly VideoQuality[] = ["360", "720", "1080"];
const AUDIO_QUALITIES: readonly AudioQuality[] = ["160", "256", "320"];
const DEFAULT_QUALITY: Record<DownloadKind, Quality> = {
	video: "720",
	audio: "320",
};

type FormFields = Record<string, string | undefined>;

export function parseFormBody(body: string, contentType = ""): FormFields {
	if (!contentType.toLowerCase().includes("application/json")) {
		return Object.fromEntries(new URLSearchParams(body));
	}

	let payload: unknown;
	try {
		payload = JSON.parse(body);
	} catch {
		throw new InvalidInputError("Request body is not valid JSON");
	}

	if (
		typeof payload !== "object" ||
		payload === null ||
		Array.isArray(payload)
	) {
		throw new InvalidInputError("Request body must be a JSON object");
	}

	const fields: FormFields = {};
	for (const [key, value] of Object.entries(payload)) {
		if (typeof value === "string" || typeof value === "number") {
			fields[key] = String(value);
		}
	}
	return fields;
}

function isDownloadKind(value: string): value is DownloadKind {
	return value === "video" || value === "audio";
}

function isVideoQuality(value: string): value is VideoQuality {
	return VIDEO_QUALITIES.some((quality) => quality === value);
}

function isAudioQuality(value: string): value is AudioQuality {
	return AUDIO_QUALITIES.some((quality) => quality === value);
}

export function parseDownloadRequest(fields: FormFields): DownloadRequest {
	const url = fields.url?.trim();
	if (!url) {
		throw new InvalidInputError("Missing URL");
	}

	const kind = fields.download_type?.trim().toLowerCase() || "video";
	if (!isDownloadKind(kind)) {
		throw new InvalidInputError(
			`Unsupported download_type: ${kind}. Use video or audio.`,
		);
	}

	const qualityRaw = fields.quality?.trim() || DEFAULT_QUALITY[kind];
	if (kind === "video" && isVideoQuality(qualityRaw)) {
		return { url, kind, quality: qualityRaw };
	}
	if (kind === "audio" && isAudioQuality(qualityRaw)) {
		return { url, kind, quality: qualityRaw };
	}

	const allowed = kind === "video" ? VIDEO_QUALITIES : AUDIO_QUALITIES;
	throw new InvalidInputError(
		`Unsupported ${kind} quality: ${qualityRaw}. Use one of ${allowed.join(", ")}.`,
	);
}

function failure(error: unknown): RouteResponse {
	return { status: toHttpStatus(error), body: { error: errorMessage(error) } };
}

export async function routeRequest(
	api: JobApi,
	request: RouteRequest,
): Promise<RouteResponse> {
	const method = request.method.toUpperCase();

	switch (request.path) {
		case "/download": {
			if (method !== "POST") {
				return { status: 405, body: { error: "Use POST /download" } };
			}

			try {
				const downloadRequest = parseDownloadRequest(
					parseFormBody(request.body, request.contentType),
				);
				const handle = await api.submit(downloadRequest);
				return {
					status: 202,
					body: { accepted: true, jobId: handle.id, total: handle.total },
				};
			} catch (error) {
				return failure(error);
			}
		}

		case "/progress": {
			if (method !== "GET") {
				return { status: 405, body: { error: "Use GET /progress" } };
			}

			return { status: 200, body: readProgress(api) };
		}

		case "/cancel": {
			if (method !== "POST") {
				return { status: 405, body: { error: "Use POST /cancel" } };
			}

			return api.cancel()
				? { status: 200, body: { cancelled: true } }
				: { status: 409, body: { error: "No job is running" } };
		}

		default:
			return { status: 404, body: { error: `Not found: ${request.path}` } };
	}
}
