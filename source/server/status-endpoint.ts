import type { JobStatus, ProgressSnapshot } from "../core/types.js";

export type ProgressResponse = {
	progress: string;
	current: number;
	total: number;
	title?: string;
	status: JobStatus;
	message?: string;
};

export type StatusSource = {
	status(): ProgressSnapshot;
};

export function formatPercent(percent: number): string {
	return `${percent.toFixed(1)}%`;
}

export function toProgressResponse(
	snapshot: ProgressSnapshot,
): ProgressResponse {
	return {
		progress: formatPercent(snapshot.percent),
		current: snapshot.current,
		total: snapshot.total,
		...(snapshot.title === undefined ? {} : { title: snapshot.title }),
		status: snapshot.status,
		...(snapshot.message === undefined ? {} : { message: snapshot.message }),
	};
}

/** Read-only view served to pollers; never waits on the running job. */
export function readProgress(source: StatusSource): ProgressResponse {
	return toProgressResponse(source.status());
}
