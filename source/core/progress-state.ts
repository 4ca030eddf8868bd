import { clampPercent } from "./event-normalizer.js";
import type { JobStatus, ProgressSnapshot } from "./types.js";

export type SnapshotInput = {
	jobId?: string;
	percent: number;
	current: number;
	total: number;
	title?: string;
	status: JobStatus;
	message?: string;
};

export const IDLE_SNAPSHOT: ProgressSnapshot = Object.freeze({
	percent: 0,
	current: 0,
	total: 0,
	status: "idle",
	updatedAt: 0,
});

function toCount(value: number): number {
	return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}

/**
 * Owner of the one snapshot that pollers see. A write swaps the whole frozen
 * record, so a reader holds either the old value or the new one.
 */
export class ProgressState {
	#snapshot: ProgressSnapshot = IDLE_SNAPSHOT;
	readonly #now: () => number;

	constructor(now: () => number = Date.now) {
		this.#now = now;
	}

	read(): ProgressSnapshot {
		return this.#snapshot;
	}

	write(input: SnapshotInput): ProgressSnapshot {
		const total = toCount(input.total);
		const snapshot: ProgressSnapshot = Object.freeze({
			...(input.jobId === undefined ? {} : { jobId: input.jobId }),
			percent: clampPercent(input.percent),
			current: Math.min(toCount(input.current), total),
			total,
			...(input.title === undefined ? {} : { title: input.title }),
			status: input.status,
			...(input.message === undefined ? {} : { message: input.message }),
			updatedAt: this.#now(),
		});

		this.#snapshot = snapshot;
		return snapshot;
	}

	reset(): void {
		this.#snapshot = IDLE_SNAPSHOT;
	}
}
