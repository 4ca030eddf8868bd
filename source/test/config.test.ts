import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { InvalidInputError } from "../core/errors.js";

const HOME = "/home/tester";

describe("loadConfig", () => {
	it("falls back to defaults", () => {
		expect(loadConfig({}, {}, HOME)).toEqual({
			host: "127.0.0.1",
			port: 5000,
			audioDir: "/home/tester/Music/reelpoll",
			videoDir: "/home/tester/Videos/reelpoll",
			busyPolicy: "supersede",
			ytDlpPath: undefined,
			ffmpegPath: undefined,
			pollIntervalMs: 500,
			verbose: false,
			json: false,
		});
	});

	it("reads REELPOLL_* variables", () => {
		const config = loadConfig(
			{},
			{
				REELPOLL_PORT: "8080",
				REELPOLL_AUDIO_DIR: "~/audio",
				REELPOLL_BUSY_POLICY: "reject",
				REELPOLL_YT_DLP: "/opt/bin/yt-dlp",
				REELPOLL_VERBOSE: "true",
			},
			HOME,
		);

		expect(config).toMatchObject({
			port: 8080,
			audioDir: "/home/tester/audio",
			busyPolicy: "reject",
			ytDlpPath: "/opt/bin/yt-dlp",
			verbose: true,
		});
	});

	it("lets flags win over the environment", () => {
		const config = loadConfig(
			{ port: 9000, videoDir: "/srv/video", verbose: false },
			{ REELPOLL_PORT: "8080", REELPOLL_VERBOSE: "1" },
			HOME,
		);

		expect(config).toMatchObject({
			port: 9000,
			videoDir: "/srv/video",
			verbose: false,
		});
	});

	it("rejects an invalid port", () => {
		expect(() => loadConfig({}, { REELPOLL_PORT: "abc" }, HOME)).toThrow(
			InvalidInputError,
		);
		expect(() => loadConfig({ port: 70_000 }, {}, HOME)).toThrow(
			"port must be an integer between 0 and 65535, got 70000",
		);
	});

	it("rejects an unknown busy policy", () => {
		expect(() => loadConfig({ busyPolicy: "queue" }, {}, HOME)).toThrow(
			"busy policy must be supersede or reject, got queue",
		);
	});
});
