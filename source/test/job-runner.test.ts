import { beforeEach, describe, expect, it, vi } from "vitest";
import { JobBusyError, MetadataError, TransferError } from "../core/errors.js";
import { JobController } from "../core/job-runner.js";
import type { DownloadRequest } from "../core/types.js";
import { drain, FakeEngine, sequentialIds } from "./fake-engine.js";

const VIDEO_REQUEST: DownloadRequest = {
	url: "https://media.test/watch?v=clip-1",
	kind: "video",
	quality: "720",
};

const OUTPUT_DIRS = { audioDir: "/downloads/audio", videoDir: "/downloads/video" };

describe("JobController", () => {
	let engine: FakeEngine;
	let controller: JobController;

	beforeEach(() => {
		engine = new FakeEngine();
		controller = new JobController({
			engine,
			outputDirs: OUTPUT_DIRS,
			createJobId: sequentialIds(),
		});
	});

	it("starts idle", () => {
		expect(controller.status()).toMatchObject({
			status: "idle",
			percent: 0,
			current: 0,
			total: 0,
		});
	});

	it("runs a single video from metadata to finished", async () => {
		const handle = await controller.submit(VIDEO_REQUEST);

		expect(handle).toMatchObject({ id: "job-1", total: 1 });
		expect(controller.status()).toMatchObject({
			jobId: "job-1",
			status: "downloading",
			percent: 0,
			current: 0,
			total: 1,
		});
		expect(engine.plans[0]).toEqual({
			jobId: "job-1",
			request: VIDEO_REQUEST,
			outputDir: "/downloads/video",
		});

		engine.tick({
			phase: "download",
			status: "downloading",
			percentText: "\u001b[0;94m 55.5%\u001b[0m",
			itemId: "clip-1",
			title: "First clip",
		});
		await drain();
		expect(controller.status()).toMatchObject({
			status: "downloading",
			percent: 55.5,
			current: 0,
			total: 1,
			title: "First clip",
		});

		engine.tick({ phase: "download", status: "finished", itemId: "clip-1" });
		engine.complete();
		const final = await handle.done;

		expect(final).toMatchObject({
			jobId: "job-1",
			status: "finished",
			percent: 100,
			current: 1,
			total: 1,
			title: "First clip",
		});
		expect(controller.status()).toBe(final);
		expect(controller.activeJobId).toBeUndefined();
	});

	it("reports the current item's percent alongside the completed count", async () => {
		engine.metadata = {
			itemCount: 3,
			items: [{ id: "a" }, { id: "b" }, { id: "c" }],
		};
		await controller.submit(VIDEO_REQUEST);
		expect(controller.status()).toMatchObject({ total: 3, current: 0 });

		engine.tick({ status: "downloading", percentText: "80.0%", itemIndex: "1" });
		engine.tick({ status: "finished", itemIndex: "1" });
		// audio stream of the same item finishing after the video stream
		engine.tick({ status: "finished", itemIndex: "1" });
		engine.tick({
			status: "downloading",
			percentText: "30.0%",
			itemIndex: "2",
			title: "Second clip",
		});
		await drain();

		expect(controller.status()).toMatchObject({
			status: "downloading",
			current: 1,
			total: 3,
			percent: 30,
			title: "Second clip",
		});
	});

	it("completes remaining items when the engine finishes", async () => {
		engine.metadata = { itemCount: 2, items: [] };
		const handle = await controller.submit(VIDEO_REQUEST);

		engine.tick({ status: "finished", itemIndex: "1" });
		engine.complete();

		expect(await handle.done).toMatchObject({
			status: "finished",
			current: 2,
			total: 2,
			percent: 100,
		});
	});

	it("moves to postprocessing when the engine reports it", async () => {
		await controller.submit({ ...VIDEO_REQUEST, kind: "audio", quality: "320" });

		engine.tick({ status: "finished", itemId: "clip-1" });
		engine.tick({
			phase: "postprocess",
			status: "started",
			postprocessor: "ExtractAudio",
			itemId: "clip-1",
		});
		await drain();

		expect(controller.status()).toMatchObject({
			status: "postprocessing",
			percent: 100,
			current: 1,
			total: 1,
		});
		expect(engine.plans[0]?.outputDir).toBe("/downloads/audio");
	});

	it("records a transfer failure after the submission has returned", async () => {
		const handle = await controller.submit(VIDEO_REQUEST);
		engine.tick({ status: "downloading", percentText: "12.0%" });
		await drain();

		engine.fail(
			new TransferError("yt-dlp failed with exit code 1: ERROR: HTTP Error 403"),
		);
		const final = await handle.done;

		expect(final).toMatchObject({
			status: "error",
			percent: 12,
			message: "yt-dlp failed with exit code 1: ERROR: HTTP Error 403",
		});
		expect(controller.status()).toBe(final);
		expect(controller.status()).toBe(controller.status());
	});

	it("fails the job when a tick carries the error token", async () => {
		const handle = await controller.submit(VIDEO_REQUEST);
		engine.tick({ status: "error" });

		expect(await handle.done).toMatchObject({
			status: "error",
			message: "Engine reported a download error",
		});
	});

	it("rejects an unparseable URL without calling the engine", async () => {
		await expect(
			controller.submit({ ...VIDEO_REQUEST, url: "not a url" }),
		).rejects.toBeInstanceOf(MetadataError);

		expect(engine.metadataCalls).toEqual([]);
		expect(controller.status().status).toBe("idle");
		expect(controller.activeJobId).toBeUndefined();
	});

	it("keeps the running job when a later submission has a bad URL", async () => {
		const superseded = vi.fn();
		controller.on("jobSuperseded", superseded);
		const handle = await controller.submit(VIDEO_REQUEST);
		engine.tick({ phase: "download", status: "downloading", percentText: "40%" });
		await drain();

		await expect(
			controller.submit({ ...VIDEO_REQUEST, url: "not a url" }),
		).rejects.toThrow(new MetadataError("Invalid URL: not a url"));

		expect(superseded).not.toHaveBeenCalled();
		expect(controller.activeJobId).toBe("job-1");
		expect(controller.status()).toMatchObject({
			jobId: "job-1",
			status: "downloading",
			percent: 40,
		});

		engine.complete();
		expect(await handle.done).toMatchObject({
			jobId: "job-1",
			status: "finished",
		});
	});

	it("answers a bad URL with a metadata error under the reject policy", async () => {
		const strict = new JobController({
			engine,
			outputDirs: OUTPUT_DIRS,
			busyPolicy: "reject",
			createJobId: sequentialIds(),
		});
		await strict.submit(VIDEO_REQUEST);

		await expect(
			strict.submit({ ...VIDEO_REQUEST, url: "ftp://media.test/clip" }),
		).rejects.toBeInstanceOf(MetadataError);
		expect(strict.status()).toMatchObject({
			jobId: "job-1",
			status: "downloading",
		});
	});

	it("fails the job instead of crashing when a progress listener throws", async () => {
		controller.on("jobProgress", () => {
			throw new Error("listener broke");
		});
		const handle = await controller.submit(VIDEO_REQUEST);

		engine.tick({ phase: "download", status: "downloading", percentText: "10%" });
		await drain();

		expect(await handle.done).toMatchObject({
			status: "error",
			message: "Progress listener failed: listener broke",
			percent: 10,
		});
		expect(controller.activeJobId).toBeUndefined();
	});

	it("surfaces metadata failures to the submitter", async () => {
		engine.metadata = new Error("ERROR: Unsupported URL");

		await expect(controller.submit(VIDEO_REQUEST)).rejects.toThrow(
			"Could not fetch info: ERROR: Unsupported URL",
		);
		expect(controller.status()).toMatchObject({
			status: "error",
			current: 0,
			total: 0,
		});
		expect(engine.plans).toEqual([]);
	});

	it("treats an empty playlist as a metadata failure", async () => {
		engine.metadata = { itemCount: 0, items: [] };

		await expect(controller.submit(VIDEO_REQUEST)).rejects.toThrow(
			"No downloadable items found",
		);
	});

	it("supersedes the running job by default", async () => {
		const superseded = vi.fn();
		controller.on("jobSuperseded", superseded);

		const first = await controller.submit(VIDEO_REQUEST);
		const second = await controller.submit(VIDEO_REQUEST);

		expect(await first.done).toMatchObject({
			jobId: "job-1",
			status: "cancelled",
			message: "Superseded by job-2",
		});
		expect(superseded).toHaveBeenCalledWith({
			jobId: "job-1",
			supersededBy: "job-2",
		});
		expect(controller.status()).toMatchObject({
			jobId: "job-2",
			status: "downloading",
		});
		expect(second.id).toBe("job-2");
	});

	it("rejects a second submission under the reject policy", async () => {
		const strict = new JobController({
			engine,
			outputDirs: OUTPUT_DIRS,
			busyPolicy: "reject",
			createJobId: sequentialIds(),
		});
		await strict.submit(VIDEO_REQUEST);

		await expect(strict.submit(VIDEO_REQUEST)).rejects.toBeInstanceOf(
			JobBusyError,
		);
		expect(strict.status().jobId).toBe("job-1");
	});

	it("cancels the active job", async () => {
		const handle = await controller.submit(VIDEO_REQUEST);

		expect(controller.cancel()).toBe(true);
		expect(controller.status()).toMatchObject({
			status: "cancelled",
			message: "Cancelled by user",
		});
		expect(await handle.done).toBe(controller.status());
		expect(controller.cancel()).toBe(false);
	});

	it("emits lifecycle events", async () => {
		const started = vi.fn();
		const finished = vi.fn();
		controller.on("jobStarted", started);
		controller.on("jobFinished", finished);

		const handle = await controller.submit(VIDEO_REQUEST);
		engine.complete();
		await handle.done;

		expect(started).toHaveBeenCalledWith({
			jobId: "job-1",
			request: VIDEO_REQUEST,
			total: 1,
		});
		expect(finished).toHaveBeenCalledTimes(1);
	});
});
