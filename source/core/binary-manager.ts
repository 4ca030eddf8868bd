import { access, stat } from "node:fs/promises";
import { platform } from "node:os";
import path from "node:path";
import { DependencyError } from "./errors.js";

export type BinaryPaths = {
	ytDlpPath: string;
	ffmpegPath?: string;
};

export type BinaryOverrides = {
	ytDlpPath?: string;
	ffmpegPath?: string;
};

export class BinaryManager {
	readonly #searchPath: string | undefined;

	constructor(searchPath: string | undefined = process.env.PATH) {
		this.#searchPath = searchPath;
	}

	async resolveBinaries(overrides: BinaryOverrides = {}): Promise<BinaryPaths> {
		const ytDlpPath = await this.#resolve("yt-dlp", overrides.ytDlpPath);
		if (!ytDlpPath) {
			throw new DependencyError(
				"yt-dlp was not found. Install it or pass --yt-dlp <path>.",
			);
		}

		const ffmpegPath = await this.#resolve("ffmpeg", overrides.ffmpegPath);
		return { ytDlpPath, ffmpegPath };
	}

	async #resolve(name: string, override?: string): Promise<string | undefined> {
		if (override) {
			if (!(await isExecutable(override))) {
				throw new DependencyError(`${name} not found at ${override}`);
			}
			return override;
		}

		return this.#findBinary(name);
	}

	async #findBinary(name: string): Promise<string | undefined> {
		if (!this.#searchPath) {
			return undefined;
		}

		const extList =
			platform() === "win32" ? [".exe", ".cmd", ".bat", ""] : [""];
		for (const dir of this.#searchPath.split(path.delimiter)) {
			if (!dir) {
				continue;
			}
			for (const ext of extList) {
				const fullPath = path.join(dir, `${name}${ext}`);
				if (await isExecutable(fullPath)) {
					return fullPath;
				}
			}
		}

		return undefined;
	}
}

async function isExecutable(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		const info = await stat(filePath);
		return info.isFile();
	} catch {
		return false;
	}
}
