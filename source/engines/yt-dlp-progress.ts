import type { RawProgressEvent } from "../core/types.js";

export const DOWNLOAD_PROGRESS_PREFIX = "[reelpoll-progress]";
export const POSTPROCESS_PROGRESS_PREFIX = "[reelpoll-postprocess]";

// The title goes last in both templates since it may itself contain "|".
export const DOWNLOAD_PROGRESS_TEMPLATE = `download:${DOWNLOAD_PROGRESS_PREFIX} %(progress.status)s|%(progress.downloaded_bytes)s|%(progress.total_bytes)s|%(progress.total_bytes_estimate)s|%(progress._percent_str)s|%(info.playlist_index)s|%(info.id)s|%(info.title)s`;
export const POSTPROCESS_PROGRESS_TEMPLATE = `postprocess:${POSTPROCESS_PROGRESS_PREFIX} %(progress.status)s|%(progress.postprocessor)s|%(info.playlist_index)s|%(info.id)s|%(info.title)s`;

function fieldsAfter(line: string, prefix: string): string[] | undefined {
	const markerIndex = line.indexOf(prefix);
	if (markerIndex < 0) {
		return undefined;
	}

	return line.slice(markerIndex + prefix.length).trim().split("|");
}

function parseDownloadLine(line: string): RawProgressEvent | undefined {
	const fields = fieldsAfter(line, DOWNLOAD_PROGRESS_PREFIX);
	if (!fields || fields.length < 8) {
		return undefined;
	}

	const [
		status,
		downloadedBytes,
		totalBytes,
		totalBytesEstimate,
		percentText,
		itemIndex,
		itemId,
	] = fields;

	return {
		phase: "download",
		status,
		downloadedBytes,
		totalBytes,
		totalBytesEstimate,
		percentText,
		itemIndex,
		itemId,
		title: fields.slice(7).join("|"),
	};
}

function parsePostprocessLine(line: string): RawProgressEvent | undefined {
	const fields = fieldsAfter(line, POSTPROCESS_PROGRESS_PREFIX);
	if (!fields || fields.length < 5) {
		return undefined;
	}

	const [status, postprocessor, itemIndex, itemId] = fields;

	return {
		phase: "postprocess",
		status,
		postprocessor,
		itemIndex,
		itemId,
		title: fields.slice(4).join("|"),
	};
}

/**
 * Reads one stdout line. Lines written by our progress templates carry every
 * field; a plain `[download]  42.0% of ...` line only yields the percent.
 */
export function parseYtDlpProgressLine(
	line: string,
): RawProgressEvent | undefined {
	const structured = parseDownloadLine(line) ?? parsePostprocessLine(line);
	if (structured) {
		return structured;
	}

	if (!line.includes("[download]")) {
		return undefined;
	}

	const percentMatch = line.match(/(\d+(?:\.\d+)?)%/);
	if (!percentMatch?.[1]) {
		return undefined;
	}

	return {
		phase: "download",
		status: "downloading",
		percentText: `${percentMatch[1]}%`,
	};
}
