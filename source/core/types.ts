export type DownloadKind = "video" | "audio";

export type VideoQuality = "360" | "720" | "1080";
export type AudioQuality = "160" | "256" | "320";
export type Quality = VideoQuality | AudioQuality;

export type JobStatus =
	| "idle"
	| "fetching_metadata"
	| "downloading"
	| "postprocessing"
	| "finished"
	| "error"
	| "cancelled";

export type BusyPolicy = "supersede" | "reject";

export type DownloadRequest = {
	url: string;
	kind: DownloadKind;
	quality: Quality;
};

export type ProgressSnapshot = {
	readonly jobId?: string;
	readonly percent: number;
	readonly current: number;
	readonly total: number;
	readonly title?: string;
	readonly status: JobStatus;
	readonly message?: string;
	readonly updatedAt: number;
};

export type MediaItem = {
	id?: string;
	title?: string;
};

export type MediaMetadata = {
	title?: string;
	itemCount: number;
	items: MediaItem[];
};

export type DownloadPlan = {
	jobId: string;
	request: DownloadRequest;
	outputDir: string;
};

/**
 * One progress tick as the engine reports it. Every field is optional and
 * may carry terminal noise; see `normalizeEvent`.
 */
export type RawProgressEvent = {
	phase?: "download" | "postprocess";
	status?: string;
	percentText?: string;
	downloadedBytes?: number | string;
	totalBytes?: number | string;
	totalBytesEstimate?: number | string;
	itemIndex?: number | string;
	itemId?: string;
	title?: string;
	postprocessor?: string;
};

export type NormalizedEvent = {
	percent: number;
	status?: JobStatus;
	itemFinished: boolean;
	itemKey: string;
	title?: string;
};

export type JobHandle = {
	id: string;
	total: number;
	done: Promise<ProgressSnapshot>;
};

export type JobEvents = {
	jobStarted: { jobId: string; request: DownloadRequest; total: number };
	jobProgress: { jobId: string; snapshot: ProgressSnapshot };
	jobFinished: { jobId: string; snapshot: ProgressSnapshot };
	jobFailed: { jobId: string; snapshot: ProgressSnapshot };
	jobCancelled: { jobId: string; snapshot: ProgressSnapshot };
	jobSuperseded: { jobId: string; supersededBy: string };
};

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
	"finished",
	"error",
	"cancelled",
]);

export function isTerminalStatus(status: JobStatus): boolean {
	return TERMINAL_STATUSES.has(status);
}
