#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import chalk from "chalk";
import { render } from "ink";
import meow from "meow";
import App from "./app.js";
import { type AppConfig, loadConfig } from "./config.js";
import { BinaryManager } from "./core/binary-manager.js";
import { errorMessage, InvalidInputError, toExitCode } from "./core/errors.js";
import { JobController } from "./core/job-runner.js";
import { isTerminalStatus } from "./core/types.js";
import { YtDlpEngine } from "./engines/yt-dlp.js";
import { createHttpServer, listen } from "./server/http-server.js";
import { fetchProgress, progressUrl } from "./server/progress-client.js";
import { parseDownloadRequest } from "./server/router.js";
import {
	formatPercent,
	type ProgressResponse,
	readProgress,
} from "./server/status-endpoint.js";
import { createLogger, type Logger } from "./utils/logger.js";

const cli = meow(
	`
	Usage
	  $ reelpoll serve [options]
	  $ reelpoll get <url> [options]
	  $ reelpoll watch [options]

	Commands
	  serve                  Start the HTTP API (POST /download, GET /progress, POST /cancel)
	  get <url>              Download in this process with a live progress view
	  watch                  Poll a running server and show its progress

	Options
	  --type <kind>          video|audio (default: video)
	  --quality <value>      video: 360|720|1080, audio: 160|256|320
	  --host <host>          Server host (default: 127.0.0.1)
	  --port <n>             Server port (default: 5000)
	  --server <url>         Server to watch (default: http://<host>:<port>)
	  --audio-dir <dir>      Audio destination (default: ~/Music/reelpoll)
	  --video-dir <dir>      Video destination (default: ~/Videos/reelpoll)
	  --busy-policy <p>      supersede|reject a submission while a job runs
	  --yt-dlp <path>        yt-dlp binary (default: found on PATH)
	  --ffmpeg <path>        ffmpeg binary (default: found on PATH)
	  --poll-interval <ms>   Progress poll interval (default: 500)
	  --no-progress          Disable Ink live progress UI
	  --json                 Emit JSON log lines
	  --verbose              Verbose logs

	Examples
	  $ reelpoll serve --port 8080
	  $ reelpoll get "https://www.youtube.com/watch?v=example" --type audio --quality 256
	  $ reelpoll watch --server http://127.0.0.1:8080
	`,
	{
		importMeta: import.meta,
		booleanDefault: undefined,
		flags: {
			type: { type: "string" },
			quality: { type: "string" },
			host: { type: "string" },
			port: { type: "number" },
			server: { type: "string" },
			audioDir: { type: "string" },
			videoDir: { type: "string" },
			busyPolicy: { type: "string" },
			ytDlp: { type: "string" },
			ffmpeg: { type: "string" },
			pollInterval: { type: "number" },
			progress: { type: "boolean", default: true },
			json: { type: "boolean" },
			verbose: { type: "boolean" },
		},
	},
);

try {
	await main();
} catch (error) {
	console.error(errorMessage(error));
	process.exitCode = toExitCode(error);
}

async function main(): Promise<void> {
	const [command, ...rest] = cli.input;
	const config = loadConfig(cli.flags);
	const logger = createLogger({ verbose: config.verbose, json: config.json });

	switch (command) {
		case "serve":
			printStartupBanner(await getCliVersion());
			await serve(config, logger);
			return;
		case "get": {
			if (rest.length !== 1 || !rest[0]) {
				throw new InvalidInputError("Expected one URL: reelpoll get <url>");
			}
			await get(rest[0], config, logger);
			return;
		}
		case "watch":
			await watch(config);
			return;
		default:
			cli.showHelp(2);
	}
}

async function createController(
	config: AppConfig,
	logger: Logger,
): Promise<JobController> {
	const binaries = await new BinaryManager().resolveBinaries({
		ytDlpPath: config.ytDlpPath,
		ffmpegPath: config.ffmpegPath,
	});
	if (!binaries.ffmpegPath) {
		logger.warn(
			"ffmpeg is unavailable. Merges and audio extraction may fail.",
		);
	}

	const engine = new YtDlpEngine(
		binaries,
		config.verbose
			? (entry) => logger.debug(`[${entry.stream}] ${entry.message}`)
			: undefined,
	);

	const controller = new JobController({
		engine,
		outputDirs: config,
		busyPolicy: config.busyPolicy,
	});
	attachJobLogging(controller, logger);
	return controller;
}

async function serve(config: AppConfig, logger: Logger): Promise<void> {
	const controller = await createController(config, logger);
	const server = createHttpServer({ api: controller, logger });
	await listen(server, config.port, config.host);
	logger.info(
		`listening on http://${config.host}:${config.port} (busy policy: ${config.busyPolicy})`,
	);

	const stop = (signal: string) => {
		logger.info(`received ${signal}, shutting down`);
		controller.shutdown();
		server.close((error) => {
			if (error) {
				logger.error(`close failed: ${error.message}`);
				process.exitCode = 1;
			}
		});
	};
	process.once("SIGINT", () => stop("SIGINT"));
	process.once("SIGTERM", () => stop("SIGTERM"));
}

async function get(
	url: string,
	config: AppConfig,
	logger: Logger,
): Promise<void> {
	const request = parseDownloadRequest({
		url,
		download_type: cli.flags.type,
		quality: cli.flags.quality,
	});
	const controller = await createController(config, logger);

	if (config.json || !cli.flags.progress || !process.stdout.isTTY) {
		const handle = await controller.submit(request);
		const final = await handle.done;
		if (final.status !== "finished") {
			process.exitCode = 1;
		}
		return;
	}

	console.clear();
	const ui = render(
		<App
			label={request.kind}
			poll={async () => readProgress(controller)}
			pollIntervalMs={config.pollIntervalMs}
			onQuit={() => controller.cancel()}
		/>,
	);
	const submission = controller.submit(request).then(
		(handle) => handle.done,
		(error: unknown) => {
			process.exitCode = toExitCode(error);
			return controller.status();
		},
	);

	await ui.waitUntilExit();
	controller.shutdown();
	await submission;
}

async function watch(config: AppConfig): Promise<void> {
	const url = progressUrl(
		cli.flags.server ?? `http://${config.host}:${config.port}`,
	);
	const poll = () => fetchProgress(url);

	if (config.json || !cli.flags.progress || !process.stdout.isTTY) {
		for (;;) {
			const response = await poll();
			console.log(
				config.json ? JSON.stringify(response) : formatProgressLine(response),
			);
			if (isTerminalStatus(response.status)) {
				if (response.status !== "finished") {
					process.exitCode = 1;
				}
				return;
			}
			await delay(config.pollIntervalMs);
		}
	}

	console.clear();
	const ui = render(
		<App label="watch" poll={poll} pollIntervalMs={config.pollIntervalMs} />,
	);
	await ui.waitUntilExit();
}

function attachJobLogging(controller: JobController, logger: Logger): void {
	controller.on("jobStarted", ({ jobId, request, total }) => {
		logger.info(
			`[jobStarted] ${jobId} kind=${request.kind} quality=${request.quality} items=${total}`,
		);
	});
	controller.on("jobProgress", ({ jobId, snapshot }) => {
		logger.debug(
			`[jobProgress] ${jobId} status=${snapshot.status} percent=${formatPercent(snapshot.percent)} item=${snapshot.current}/${snapshot.total}`,
		);
	});
	controller.on("jobFinished", ({ jobId, snapshot }) => {
		logger.info(`[jobFinished] ${jobId} items=${snapshot.total}`);
	});
	controller.on("jobFailed", ({ jobId, snapshot }) => {
		logger.error(`[jobFailed] ${jobId} error=${snapshot.message ?? "unknown"}`);
	});
	controller.on("jobCancelled", ({ jobId }) => {
		logger.warn(`[jobCancelled] ${jobId}`);
	});
	controller.on("jobSuperseded", ({ jobId, supersededBy }) => {
		logger.warn(`[jobSuperseded] ${jobId} replaced by ${supersededBy}`);
	});
}

function formatProgressLine(response: ProgressResponse): string {
	const title = response.title ? ` ${response.title}` : "";
	return `[${response.status}] ${response.progress} item=${response.current}/${response.total}${title}`;
}

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

async function getCliVersion(): Promise<string> {
	const { npm_package_version: envVersion } = process.env;
	if (envVersion) {
		return envVersion;
	}

	try {
		const packageJsonPath = new URL("../package.json", import.meta.url);
		const raw = await readFile(packageJsonPath, "utf8");
		const parsed = JSON.parse(raw) as { version?: string };
		return parsed.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

function printStartupBanner(version: string): void {
	const bannerLines = String.raw`
 ____  _____ _____ _     ____   ___  _     _
|  _ \| ____| ____| |   |  _ \ / _ \| |   | |
| |_) |  _| |  _| | |   | |_) | | | | |   | |
|  _ <| |___| |___| |___|  __/| |_| | |___| |___
|_| \_\_____|_____|_____|_|    \___/|_____|_____|
`
		.trim()
		.split("\n");

	const gradient = [
		[0, 150, 255],
		[40, 175, 255],
		[80, 200, 255],
		[120, 220, 255],
		[170, 235, 255],
	] as const;
	const fallbackColor: readonly [number, number, number] = [170, 235, 255];

	for (const [index, line] of bannerLines.entries()) {
		const color = gradient[index] ?? fallbackColor;
		const [r, g, b] = color;
		console.log(chalk.rgb(r, g, b).bold(line));
	}

	console.log(chalk.rgb(80, 200, 255)(`reelpoll v${version}`));
	console.log(
		chalk.rgb(
			145,
			170,
			205,
		)("Background media downloads with a pollable progress endpoint."),
	);
	console.log("");
}
