import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BinaryManager } from "../core/binary-manager.js";
import { DependencyError } from "../core/errors.js";
import { expandHome, resolveOutputDir } from "../utils/fs.js";
import { createLogger } from "../utils/logger.js";

describe("createLogger", () => {
	const now = () => new Date("2026-01-02T03:04:05.000Z");

	it("writes JSON lines", () => {
		const lines: string[] = [];
		const logger = createLogger({ json: true, now, write: (line) => lines.push(line) });
		logger.info("listening");

		expect(lines).toEqual([
			'{"time":"2026-01-02T03:04:05.000Z","level":"info","message":"listening"}',
		]);
	});

	it("drops debug output unless verbose", () => {
		const lines: string[] = [];
		createLogger({ json: true, now, write: (line) => lines.push(line) }).debug(
			"tick",
		);
		createLogger({
			json: true,
			verbose: true,
			now,
			write: (line) => lines.push(line),
		}).debug("tick");

		expect(lines).toHaveLength(1);
	});
});

describe("output routing", () => {
	const dirs = { audioDir: "/music", videoDir: "/videos" };

	it("sends each kind to its own directory", () => {
		expect(resolveOutputDir("audio", dirs)).toBe("/music");
		expect(resolveOutputDir("video", dirs)).toBe("/videos");
	});

	it("expands the home directory", () => {
		expect(expandHome("~/Music", "/home/tester")).toBe("/home/tester/Music");
		expect(expandHome("/abs/path", "/home/tester")).toBe("/abs/path");
	});
});

describe("BinaryManager", () => {
	let binDir: string;

	beforeEach(async () => {
		binDir = await mkdtemp(path.join(tmpdir(), "reelpoll-bin-"));
	});

	afterEach(async () => {
		await rm(binDir, { recursive: true, force: true });
	});

	it("finds yt-dlp on the search path", async () => {
		const ytDlp = path.join(binDir, "yt-dlp");
		await writeFile(ytDlp, "#!/bin/sh\n", { mode: 0o755 });

		await expect(new BinaryManager(binDir).resolveBinaries()).resolves.toEqual({
			ytDlpPath: ytDlp,
			ffmpegPath: undefined,
		});
	});

	it("fails when yt-dlp is missing", async () => {
		await expect(
			new BinaryManager(binDir).resolveBinaries(),
		).rejects.toBeInstanceOf(DependencyError);
	});

	it("rejects a configured path that does not exist", async () => {
		await expect(
			new BinaryManager(binDir).resolveBinaries({
				ytDlpPath: path.join(binDir, "missing"),
			}),
		).rejects.toThrow(DependencyError);
	});
});
