import { mkdir, stat } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import type { DownloadKind } from "../core/types.js";

export type OutputDirs = {
	audioDir: string;
	videoDir: string;
};

export async function ensureOutputDir(outputDir: string): Promise<string> {
	const resolved = path.resolve(outputDir);
	await mkdir(resolved, { recursive: true });
	const info = await stat(resolved);
	if (!info.isDirectory()) {
		throw new Error(`Output path is not a directory: ${resolved}`);
	}
	return resolved;
}

export function resolveOutputDir(kind: DownloadKind, dirs: OutputDirs): string {
	return kind === "audio" ? dirs.audioDir : dirs.videoDir;
}

export function expandHome(input: string, home: string = homedir()): string {
	if (input === "~") {
		return home;
	}

	if (input.startsWith("~/") || input.startsWith("~\\")) {
		return path.join(home, input.slice(2));
	}

	return input;
}
