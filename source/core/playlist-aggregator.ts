export type AggregateView = {
	current: number;
	total: number;
	percent: number;
};

/**
 * Counts finished items across a job. The per-item percent is reported as
 * is and never blended with the completed count.
 */
export class PlaylistAggregator {
	readonly total: number;
	readonly #finished = new Set<string>();
	#completed = 0;

	constructor(itemsTotal?: number) {
		this.total =
			itemsTotal !== undefined && Number.isInteger(itemsTotal) && itemsTotal > 0
				? itemsTotal
				: 1;
	}

	get completed(): number {
		return this.#completed;
	}

	get isComplete(): boolean {
		return this.#completed === this.total;
	}

	/** Returns false for a key that already finished. */
	markItemFinished(itemKey: string): boolean {
		if (this.#finished.has(itemKey)) {
			return false;
		}

		this.#finished.add(itemKey);
		this.#completed = Math.min(this.total, this.#completed + 1);
		return true;
	}

	completeRemaining(): void {
		this.#completed = this.total;
	}

	view(percent: number): AggregateView {
		return {
			current: this.#completed,
			total: this.total,
			percent,
		};
	}
}
