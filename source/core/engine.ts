import type {
	DownloadPlan,
	MediaMetadata,
	RawProgressEvent,
} from "./types.js";

export type ProgressSink = (event: RawProgressEvent) => void;

export type LogEntry = {
	stream: "stdout" | "stderr" | "system";
	message: string;
};

export type LogEmitter = (entry: LogEntry) => void;

/**
 * The external downloader. Implementations must reject when `signal` aborts
 * and may call `sink` at any rate.
 */
export type DownloadEngine = {
	readonly name: string;
	fetchMetadata(url: string, signal: AbortSignal): Promise<MediaMetadata>;
	download(
		plan: DownloadPlan,
		sink: ProgressSink,
		signal: AbortSignal,
	): Promise<void>;
};
