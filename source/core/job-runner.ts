import { EventEmitter } from "node:events";
import { resolveOutputDir, type OutputDirs } from "../utils/fs.js";
import { parseHttpUrl } from "../utils/url-detect.js";
import type { DownloadEngine } from "./engine.js";
import {
	errorMessage,
	JobBusyError,
	MetadataError,
	TransferError,
} from "./errors.js";
import { normalizeEvent } from "./event-normalizer.js";
import { PlaylistAggregator } from "./playlist-aggregator.js";
import { ProgressChannel } from "./progress-channel.js";
import { ProgressState, type SnapshotInput } from "./progress-state.js";
import type {
	BusyPolicy,
	DownloadPlan,
	DownloadRequest,
	JobEvents,
	JobHandle,
	JobStatus,
	ProgressSnapshot,
	RawProgressEvent,
} from "./types.js";

export type JobControllerOptions = {
	engine: DownloadEngine;
	outputDirs: OutputDirs;
	state?: ProgressState;
	busyPolicy?: BusyPolicy;
	createJobId?: () => string;
};

type ActiveJob = {
	id: string;
	abort: AbortController;
	last: ProgressSnapshot;
	failure?: string;
};

let jobSequence = 0;

function defaultJobId(): string {
	jobSequence += 1;
	return `job-${Date.now()}-${jobSequence}`;
}

/**
 * Single-slot job controller. `submit` resolves once metadata is known and
 * leaves the transfer running in the background; pollers read `status()`.
 */
export class JobController extends EventEmitter {
	readonly state: ProgressState;
	readonly busyPolicy: BusyPolicy;
	readonly #engine: DownloadEngine;
	readonly #outputDirs: OutputDirs;
	readonly #createJobId: () => string;
	#active: ActiveJob | undefined;

	constructor(options: JobControllerOptions) {
		super();
		this.#engine = options.engine;
		this.#outputDirs = options.outputDirs;
		this.state = options.state ?? new ProgressState();
		this.busyPolicy = options.busyPolicy ?? "supersede";
		this.#createJobId = options.createJobId ?? defaultJobId;
	}

	override on<K extends keyof JobEvents>(
		event: K,
		listener: (payload: JobEvents[K]) => void,
	): this {
		return super.on(event, listener);
	}

	override off<K extends keyof JobEvents>(
		event: K,
		listener: (payload: JobEvents[K]) => void,
	): this {
		return super.off(event, listener);
	}

	override emit<K extends keyof JobEvents>(
		event: K,
		payload: JobEvents[K],
	): boolean {
		return super.emit(event, payload);
	}

	get activeJobId(): string | undefined {
		return this.#active?.id;
	}

	status(): ProgressSnapshot {
		return this.state.read();
	}

	async submit(request: DownloadRequest): Promise<JobHandle> {
		// A malformed URL never reaches the slot or the snapshot.
		const url = parseHttpUrl(request.url).toString();

		const previous = this.#active;
		if (previous && this.busyPolicy === "reject") {
			throw new JobBusyError(previous.id);
		}

		const id = this.#createJobId();
		const job: ActiveJob = {
			id,
			abort: new AbortController(),
			last: this.state.read(),
		};
		this.#active = job;

		if (previous) {
			previous.last = {
				...previous.last,
				status: "cancelled",
				message: `Superseded by ${id}`,
			};
			previous.abort.abort(new Error(`Superseded by ${id}`));
			this.emit("jobSuperseded", { jobId: previous.id, supersededBy: id });
		}

		this.#write(job, {
			status: "fetching_metadata",
			percent: 0,
			current: 0,
			total: 0,
		});

		let itemCount: number;
		try {
			const metadata = await this.#engine.fetchMetadata(
				url,
				job.abort.signal,
			);
			itemCount = metadata.itemCount;
		} catch (error) {
			throw this.#failBeforeStart(
				job,
				`Could not fetch info: ${errorMessage(error)}`,
			);
		}

		if (this.#active !== job) {
			throw new MetadataError(
				`Job ${id} was cancelled or superseded before it started`,
			);
		}

		if (itemCount < 1) {
			throw this.#failBeforeStart(job, "No downloadable items found");
		}

		const aggregator = new PlaylistAggregator(itemCount);
		this.#write(job, {
			status: "downloading",
			...aggregator.view(0),
		});
		this.emit("jobStarted", {
			jobId: id,
			request,
			total: aggregator.total,
		});

		const plan: DownloadPlan = {
			jobId: id,
			request: { ...request, url },
			outputDir: resolveOutputDir(request.kind, this.#outputDirs),
		};
		const done = this.#runInBackground(job, plan, aggregator).catch(
			(error: unknown) =>
				this.#settle(job, "jobFailed", {
					status: "error",
					percent: job.last.percent,
					current: job.last.current,
					total: job.last.total,
					title: job.last.title,
					message: errorMessage(error),
				}),
		);

		return { id, total: aggregator.total, done };
	}

	/** Aborts the active job. Returns false when nothing is running. */
	cancel(): boolean {
		const job = this.#active;
		if (!job) {
			return false;
		}

		this.#settle(job, "jobCancelled", {
			status: "cancelled",
			percent: job.last.percent,
			current: job.last.current,
			total: job.last.total,
			title: job.last.title,
			message: "Cancelled by user",
		});
		job.abort.abort(new Error("Cancelled by user"));
		return true;
	}

	shutdown(): void {
		const job = this.#active;
		this.#active = undefined;
		job?.abort.abort(new Error("Shutting down"));
	}

	async #runInBackground(
		job: ActiveJob,
		plan: DownloadPlan,
		aggregator: PlaylistAggregator,
	): Promise<ProgressSnapshot> {
		let status: JobStatus = "downloading";
		let percent = 0;
		let title: string | undefined;

		const channel = new ProgressChannel<RawProgressEvent>((batch) => {
			for (const raw of batch) {
				const event = normalizeEvent(raw);
				if (event.status === "error") {
					job.failure = "Engine reported a download error";
					job.abort.abort(new TransferError(job.failure));
					return;
				}

				if (event.title !== undefined) {
					title = event.title;
				}
				if (event.itemFinished) {
					aggregator.markItemFinished(event.itemKey);
				}
				if (event.status !== undefined) {
					status = event.status;
				}
				percent = event.percent;
			}

			const snapshot = this.#write(job, {
				status,
				title,
				...aggregator.view(percent),
			});
			if (!snapshot) {
				return;
			}

			// Runs on a setImmediate turn, so a throwing listener fails the job.
			try {
				this.emit("jobProgress", { jobId: job.id, snapshot });
			} catch (error) {
				job.failure = `Progress listener failed: ${errorMessage(error)}`;
				job.abort.abort(new TransferError(job.failure));
			}
		});

		try {
			await this.#engine.download(
				plan,
				(raw) => channel.push(raw),
				job.abort.signal,
			);
			channel.flush();
			if (job.failure) {
				throw new TransferError(job.failure);
			}

			aggregator.completeRemaining();
			return this.#settle(job, "jobFinished", {
				status: "finished",
				title,
				...aggregator.view(100),
			});
		} catch (error) {
			return this.#settle(job, "jobFailed", {
				status: "error",
				title,
				...aggregator.view(percent),
				message: job.failure ?? errorMessage(error),
			});
		} finally {
			channel.close();
		}
	}

	#failBeforeStart(job: ActiveJob, message: string): MetadataError {
		this.#settle(job, "jobFailed", {
			status: "error",
			percent: 0,
			current: 0,
			total: 0,
			message,
		});
		return new MetadataError(message);
	}

	/** Writes a terminal snapshot and frees the slot, if `job` still owns it. */
	#settle(
		job: ActiveJob,
		event: "jobFinished" | "jobFailed" | "jobCancelled",
		input: Omit<SnapshotInput, "jobId">,
	): ProgressSnapshot {
		const snapshot = this.#write(job, input);
		if (!snapshot) {
			return job.last;
		}

		this.#active = undefined;
		this.emit(event, { jobId: job.id, snapshot });
		return snapshot;
	}

	#write(
		job: ActiveJob,
		input: Omit<SnapshotInput, "jobId">,
	): ProgressSnapshot | undefined {
		if (this.#active !== job) {
			return undefined;
		}

		job.last = this.state.write({ ...input, jobId: job.id });
		return job.last;
	}
}
