import { homedir } from "node:os";
import { InvalidInputError } from "./core/errors.js";
import type { BusyPolicy } from "./core/types.js";
import { expandHome } from "./utils/fs.js";

export type AppConfig = {
	host: string;
	port: number;
	audioDir: string;
	videoDir: string;
	busyPolicy: BusyPolicy;
	ytDlpPath?: string;
	ffmpegPath?: string;
	pollIntervalMs: number;
	verbose: boolean;
	json: boolean;
};

export type ConfigFlags = {
	host?: string;
	port?: number;
	audioDir?: string;
	videoDir?: string;
	busyPolicy?: string;
	ytDlp?: string;
	ffmpeg?: string;
	pollInterval?: number;
	verbose?: boolean;
	json?: boolean;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG = {
	host: "127.0.0.1",
	port: 5000,
	audioDir: "~/Music/reelpoll",
	videoDir: "~/Videos/reelpoll",
	busyPolicy: "supersede",
	pollIntervalMs: 500,
} as const;

function envValue(env: Env, key: string): string | undefined {
	const value = env[`REELPOLL_${key}`]?.trim();
	return value ? value : undefined;
}

function toInteger(
	name: string,
	value: number | string | undefined,
	min: number,
	max: number,
): number | undefined {
	if (value === undefined) {
		return undefined;
	}

	const parsed = typeof value === "number" ? value : Number(value);
	if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
		throw new InvalidInputError(
			`${name} must be an integer between ${min} and ${max}, got ${value}`,
		);
	}
	return parsed;
}

function toBusyPolicy(value: string): BusyPolicy {
	if (value === "supersede" || value === "reject") {
		return value;
	}

	throw new InvalidInputError(
		`busy policy must be supersede or reject, got ${value}`,
	);
}

function toBoolean(value: string | undefined): boolean | undefined {
	if (value === undefined) {
		return undefined;
	}

	return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

/** Flags win over `REELPOLL_*` variables, which win over defaults. */
export function loadConfig(
	flags: ConfigFlags = {},
	env: Env = process.env,
	home: string = homedir(),
): AppConfig {
	const port =
		toInteger("port", flags.port ?? envValue(env, "PORT"), 0, 65_535) ??
		DEFAULT_CONFIG.port;
	const pollIntervalMs =
		toInteger(
			"poll interval",
			flags.pollInterval ?? envValue(env, "POLL_INTERVAL_MS"),
			50,
			60_000,
		) ?? DEFAULT_CONFIG.pollIntervalMs;
	const ytDlpPath = flags.ytDlp ?? envValue(env, "YT_DLP");
	const ffmpegPath = flags.ffmpeg ?? envValue(env, "FFMPEG");

	return {
		host: flags.host ?? envValue(env, "HOST") ?? DEFAULT_CONFIG.host,
		port,
		audioDir: expandHome(
			flags.audioDir ?? envValue(env, "AUDIO_DIR") ?? DEFAULT_CONFIG.audioDir,
			home,
		),
		videoDir: expandHome(
			flags.videoDir ?? envValue(env, "VIDEO_DIR") ?? DEFAULT_CONFIG.videoDir,
			home,
		),
		busyPolicy: toBusyPolicy(
			flags.busyPolicy ??
				envValue(env, "BUSY_POLICY") ??
				DEFAULT_CONFIG.busyPolicy,
		),
		ytDlpPath: ytDlpPath ? expandHome(ytDlpPath, home) : undefined,
		ffmpegPath: ffmpegPath ? expandHome(ffmpegPath, home) : undefined,
		pollIntervalMs,
		verbose: flags.verbose ?? toBoolean(envValue(env, "VERBOSE")) ?? false,
		json: flags.json ?? false,
	};
}
