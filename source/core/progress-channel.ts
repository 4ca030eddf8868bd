export type ChannelConsumer<T> = (batch: T[]) => void;

/**
 * Single-consumer queue between the engine callback and the state writer.
 * Ticks that arrive within one turn of the event loop are handed over as
 * one batch.
 */
export class ProgressChannel<T> {
	readonly #consumer: ChannelConsumer<T>;
	#pending: T[] = [];
	#scheduled: NodeJS.Immediate | undefined;
	#closed = false;

	constructor(consumer: ChannelConsumer<T>) {
		this.#consumer = consumer;
	}

	get pending(): number {
		return this.#pending.length;
	}

	push(item: T): void {
		if (this.#closed) {
			return;
		}

		this.#pending.push(item);
		if (!this.#scheduled) {
			this.#scheduled = setImmediate(() => {
				this.#scheduled = undefined;
				this.flush();
			});
		}
	}

	flush(): void {
		if (this.#pending.length === 0) {
			return;
		}

		const batch = this.#pending;
		this.#pending = [];
		this.#consumer(batch);
	}

	close(): void {
		this.#closed = true;
		this.#pending = [];
		if (this.#scheduled) {
			clearImmediate(this.#scheduled);
			this.#scheduled = undefined;
		}
	}
}
