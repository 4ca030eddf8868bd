import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { BinaryPaths } from "../core/binary-manager.js";
import type {
	DownloadEngine,
	LogEmitter,
	ProgressSink,
} from "../core/engine.js";
import {
	errorMessage,
	MetadataError,
	TransferError,
} from "../core/errors.js";
import type { DownloadPlan, MediaItem, MediaMetadata } from "../core/types.js";
import { ensureOutputDir } from "../utils/fs.js";
import {
	DOWNLOAD_PROGRESS_TEMPLATE,
	parseYtDlpProgressLine,
	POSTPROCESS_PROGRESS_TEMPLATE,
} from "./yt-dlp-progress.js";

export const OUTPUT_TEMPLATE = "%(title)s.%(ext)s";

type ProcessOutput = {
	code: number | null;
	stdout: string;
	stderrLines: string[];
};

export class YtDlpEngine implements DownloadEngine {
	readonly name: string = "yt-dlp";
	readonly #paths: BinaryPaths;
	readonly #emitLog: LogEmitter | undefined;

	constructor(paths: BinaryPaths, emitLog?: LogEmitter) {
		this.#paths = paths;
		this.#emitLog = emitLog;
	}

	async fetchMetadata(
		url: string,
		signal: AbortSignal,
	): Promise<MediaMetadata> {
		const args = buildMetadataArgs(url);
		this.#logCommand(args);

		let output: ProcessOutput;
		try {
			output = await this.#collect(args, signal);
		} catch (error) {
			throw new MetadataError(errorMessage(error));
		}

		if (output.code !== 0) {
			throw new MetadataError(
				buildYtDlpErrorMessage(output.code, output.stderrLines.join("\n")),
			);
		}

		return parseMetadata(output.stdout);
	}

	async download(
		plan: DownloadPlan,
		sink: ProgressSink,
		signal: AbortSignal,
	): Promise<void> {
		await ensureOutputDir(plan.outputDir);
		const args = buildDownloadArgs(plan, this.#paths.ffmpegPath);
		this.#logCommand(args);
		const stderrLines: string[] = [];

		await new Promise<void>((resolve, reject) => {
			const child = spawn(this.#paths.ytDlpPath, args, {
				stdio: ["ignore", "pipe", "pipe"],
				shell: false,
				signal,
			});

			const stdoutReader = createInterface({ input: child.stdout });
			stdoutReader.on("line", (line) => {
				this.#emitLog?.({ stream: "stdout", message: line });
				const event = parseYtDlpProgressLine(line);
				if (event) {
					sink(event);
				}
			});

			const stderrReader = createInterface({ input: child.stderr });
			stderrReader.on("line", (line) => {
				this.#emitLog?.({ stream: "stderr", message: line });
				stderrLines.push(line);
			});

			child.on("error", (error) => {
				reject(
					signal.aborted ? signal.reason : new TransferError(error.message),
				);
			});

			child.on("close", (code) => {
				if (code === 0) {
					resolve();
					return;
				}

				const stderrSnippet = stderrLines.slice(-5).join("\n");
				reject(
					new TransferError(
						buildYtDlpErrorMessage(code, stderrSnippet),
						stderrSnippet,
					),
				);
			});
		});
	}

	#collect(args: string[], signal: AbortSignal): Promise<ProcessOutput> {
		return new Promise((resolve, reject) => {
			const child = spawn(this.#paths.ytDlpPath, args, {
				stdio: ["ignore", "pipe", "pipe"],
				shell: false,
				signal,
			});
			const stdout: string[] = [];
			const stderrLines: string[] = [];

			child.stdout.setEncoding("utf8");
			child.stdout.on("data", (chunk: string) => stdout.push(chunk));
			createInterface({ input: child.stderr }).on("line", (line) => {
				this.#emitLog?.({ stream: "stderr", message: line });
				stderrLines.push(line);
			});

			child.on("error", (error) => {
				reject(signal.aborted ? signal.reason : error);
			});
			child.on("close", (code) => {
				resolve({ code, stdout: stdout.join(""), stderrLines });
			});
		});
	}

	#logCommand(args: string[]): void {
		this.#emitLog?.({
			stream: "system",
			message: `exec ${formatCommand(this.#paths.ytDlpPath, args)}`,
		});
	}
}

export function buildMetadataArgs(url: string): string[] {
	return [
		"--dump-single-json",
		"--flat-playlist",
		"--no-warnings",
		"--",
		url,
	];
}

export function buildDownloadArgs(
	plan: DownloadPlan,
	ffmpegPath?: string,
): string[] {
	const { request } = plan;
	const args = [
		"--newline",
		"--progress",
		"--progress-template",
		DOWNLOAD_PROGRESS_TEMPLATE,
		"--progress-template",
		POSTPROCESS_PROGRESS_TEMPLATE,
		"--no-warnings",
		"-P",
		plan.outputDir,
		"-o",
		OUTPUT_TEMPLATE,
	];

	if (request.kind === "audio") {
		args.push(
			"-f",
			"bestaudio",
			"-x",
			"--audio-format",
			"mp3",
			"--audio-quality",
			`${request.quality}K`,
		);
	} else {
		args.push(
			"-f",
			`bestvideo[height<=${request.quality}]+bestaudio/best[height<=${request.quality}]`,
			"--merge-output-format",
			"mp4",
		);
	}

	if (ffmpegPath) {
		args.push("--ffmpeg-location", ffmpegPath);
	}

	args.push("--", request.url);
	return args;
}

export function parseMetadata(stdout: string): MediaMetadata {
	let payload: unknown;
	try {
		payload = JSON.parse(stdout);
	} catch {
		throw new MetadataError("yt-dlp returned unreadable metadata");
	}

	if (!isRecord(payload)) {
		throw new MetadataError("yt-dlp returned unreadable metadata");
	}

	const title = readString(payload, "title");
	const { entries } = payload;
	if (Array.isArray(entries)) {
		const items = entries.filter(isRecord).map(toMediaItem);
		return { title, itemCount: items.length, items };
	}

	return { title, itemCount: 1, items: [toMediaItem(payload)] };
}

function toMediaItem(entry: Record<string, unknown>): MediaItem {
	return { id: readString(entry, "id"), title: readString(entry, "title") };
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(
	record: Record<string, unknown>,
	key: string,
): string | undefined {
	const value = record[key];
	return typeof value === "string" ? value : undefined;
}

export function buildYtDlpErrorMessage(
	code: number | null,
	stderrSnippet: string,
): string {
	const hint = getMostRelevantErrorLine(stderrSnippet);
	if (!hint) {
		return `yt-dlp failed with exit code ${code ?? "unknown"}`;
	}

	return `yt-dlp failed with exit code ${code ?? "unknown"}: ${hint}`;
}

function getMostRelevantErrorLine(stderrSnippet: string): string | undefined {
	const lines = stderrSnippet
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean);
	if (lines.length === 0) {
		return undefined;
	}

	return (
		lines.findLast((line) => line.toLowerCase().includes("error:")) ??
		lines[lines.length - 1]
	);
}

function formatCommand(command: string, args: string[]): string {
	return [command, ...args.map(quoteArg)].join(" ");
}

function quoteArg(arg: string): string {
	return /\s|["'`$\\]/.test(arg)
		? `"${arg.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`
		: arg;
}
