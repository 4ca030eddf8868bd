import type { JobStatus, NormalizedEvent, RawProgressEvent } from "./types.js";

// CSI sequences (colours, cursor moves) first, then any remaining C0/DEL byte.
const CSI_SEQUENCE = /\u001b\[[0-9;?]*[ -/]*[@-~]/g;
const OTHER_ESCAPE = /\u001b[@-_]/g;
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f-\u009f]/g;
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

const DOWNLOAD_STATUS: Record<string, JobStatus> = {
	downloading: "downloading",
	finished: "downloading",
	error: "error",
};

const POSTPROCESS_STATUS: Record<string, JobStatus> = {
	started: "postprocessing",
	processing: "postprocessing",
	finished: "postprocessing",
};

export function stripControlSequences(text: string): string {
	return text
		.replace(CSI_SEQUENCE, "")
		.replace(OTHER_ESCAPE, "")
		.replace(CONTROL_CHARACTER, "");
}

export function clampPercent(value: number): number {
	if (!Number.isFinite(value)) {
		return 0;
	}

	return Math.min(100, Math.max(0, value));
}

/**
 * Parses an engine percentage such as `"\u001b[0;94m 42.0%\u001b[0m"`.
 * Anything that is not a plain decimal after cleaning yields 0.
 */
export function parsePercentText(text: string | undefined): number {
	if (text === undefined) {
		return 0;
	}

	let cleaned = stripControlSequences(text).trim();
	if (cleaned.endsWith("%")) {
		cleaned = cleaned.slice(0, -1).trim();
	}

	if (!DECIMAL.test(cleaned)) {
		return 0;
	}

	return clampPercent(Number(cleaned));
}

function toNumber(value: number | string | undefined): number | undefined {
	if (value === undefined) {
		return undefined;
	}

	if (typeof value === "number") {
		return Number.isFinite(value) ? value : undefined;
	}

	const cleaned = stripControlSequences(value).trim();
	if (!DECIMAL.test(cleaned)) {
		return undefined;
	}

	return Number(cleaned);
}

function percentFromBytes(raw: RawProgressEvent): number {
	const downloaded = toNumber(raw.downloadedBytes);
	const total = toNumber(raw.totalBytes) ?? toNumber(raw.totalBytesEstimate);
	if (downloaded === undefined || total === undefined || total <= 0) {
		return 0;
	}

	return clampPercent((downloaded / total) * 100);
}

function cleanText(value: string | undefined): string | undefined {
	if (value === undefined) {
		return undefined;
	}

	const cleaned = stripControlSequences(value).trim();
	if (cleaned.length === 0 || cleaned === "NA") {
		return undefined;
	}

	return cleaned;
}

function resolveItemKey(raw: RawProgressEvent, title?: string): string {
	const index = toNumber(raw.itemIndex);
	if (index !== undefined) {
		return `#${index}`;
	}

	return cleanText(raw.itemId) ?? title ?? "item";
}

export function normalizeEvent(raw: RawProgressEvent): NormalizedEvent {
	const token = cleanText(raw.status)?.toLowerCase() ?? "";
	const title = cleanText(raw.title);
	const itemKey = resolveItemKey(raw, title);
	const phase = raw.phase ?? "download";

	if (phase === "postprocess") {
		return {
			percent: 100,
			status: POSTPROCESS_STATUS[token],
			itemFinished: false,
			itemKey,
			title,
		};
	}

	const itemFinished = token === "finished";
	const percent = itemFinished
		? 100
		: raw.percentText !== undefined
			? parsePercentText(raw.percentText)
			: percentFromBytes(raw);

	return {
		percent,
		status: DOWNLOAD_STATUS[token],
		itemFinished,
		itemKey,
		title,
	};
}
