import { Box, Text, useApp, useInput } from "ink";
import { useEffect, useState } from "react";
import { errorMessage } from "./core/errors.js";
import { isTerminalStatus, type JobStatus } from "./core/types.js";
import type { ProgressResponse } from "./server/status-endpoint.js";

type Props = {
	label: string;
	poll: () => Promise<ProgressResponse>;
	pollIntervalMs: number;
	onQuit?: () => void;
};

type StatusColor = "gray" | "blue" | "cyan" | "magenta" | "green" | "red";

const SPINNER_FRAMES = ["-", "\\", "|", "/"] as const;

export default function App({ label, poll, pollIntervalMs, onQuit }: Props) {
	const { exit } = useApp();
	const [startedAt] = useState(() => Date.now());
	const [now, setNow] = useState(() => Date.now());
	const [tick, setTick] = useState(0);
	const [progress, setProgress] = useState<ProgressResponse | undefined>();
	const [pollError, setPollError] = useState<string | undefined>();

	useInput((input, key) => {
		if (input === "q" || key.escape || (key.ctrl && input === "c")) {
			onQuit?.();
			process.exitCode = 130;
			exit();
		}
	});

	useEffect(() => {
		const timeInterval = setInterval(() => setNow(Date.now()), 1000);
		const spinnerInterval = setInterval(
			() => setTick((value) => value + 1),
			120,
		);

		return () => {
			clearInterval(timeInterval);
			clearInterval(spinnerInterval);
		};
	}, []);

	useEffect(() => {
		let stopped = false;
		let timer: NodeJS.Timeout | undefined;

		const run = async () => {
			try {
				const response = await poll();
				if (stopped) {
					return;
				}

				setProgress(response);
				setPollError(undefined);
				if (isTerminalStatus(response.status)) {
					if (response.status !== "finished") {
						process.exitCode = 1;
					}
					exit();
					return;
				}
			} catch (error) {
				if (stopped) {
					return;
				}
				setPollError(errorMessage(error));
			}

			timer = setTimeout(() => void run(), pollIntervalMs);
		};

		void run();

		return () => {
			stopped = true;
			if (timer) {
				clearTimeout(timer);
			}
		};
	}, [poll, pollIntervalMs, exit]);

	const spinner = SPINNER_FRAMES[tick % SPINNER_FRAMES.length] ?? "-";
	const elapsedSec = Math.max(0, Math.floor((now - startedAt) / 1000));
	const status = progress?.status ?? "idle";
	const statusColor = statusToColor(status);
	const percent = parsePercentLabel(progress?.progress);

	return (
		<Box flexDirection="column" width="100%">
			<Box
				borderStyle="round"
				borderColor="cyan"
				flexDirection="column"
				paddingX={1}
			>
				<Box justifyContent="space-between">
					<Text color="cyan" bold>
						{isTerminalStatus(status) ? "*" : spinner} reelpoll {label}
					</Text>
					<Text color="gray">elapsed {formatDuration(elapsedSec)}</Text>
				</Box>
				<Text color="gray">q/esc quit</Text>
			</Box>

			<Box
				marginTop={1}
				flexDirection="column"
				borderStyle="single"
				borderColor={statusColor}
				paddingX={1}
			>
				<Box justifyContent="space-between">
					<Text>{progress?.title ?? "waiting for metadata"}</Text>
					<Text color={statusColor} bold>
						{status}
					</Text>
				</Box>
				<Text color={statusColor}>
					{renderBar(percent, 28)} {progress?.progress ?? "0.0%"}
				</Text>
				<Text color="gray">
					item {Math.min(progress?.current ?? 0, progress?.total ?? 0)}/
					{progress?.total ?? 0} completed
				</Text>
				{progress?.message ? (
					<Text color={status === "error" ? "red" : "yellow"}>
						{progress.message}
					</Text>
				) : null}
			</Box>

			{pollError ? (
				<Box marginTop={1} borderStyle="round" borderColor="red" paddingX={1}>
					<Text color="red">Poll failed: {pollError}</Text>
				</Box>
			) : null}
		</Box>
	);
}

function statusToColor(status: JobStatus): StatusColor {
	switch (status) {
		case "idle":
			return "gray";
		case "fetching_metadata":
			return "blue";
		case "downloading":
			return "cyan";
		case "postprocessing":
			return "magenta";
		case "finished":
			return "green";
		case "error":
		case "cancelled":
			return "red";
	}
}

function parsePercentLabel(label?: string): number {
	const value = label ? Number.parseFloat(label) : 0;
	return Number.isFinite(value) ? Math.max(0, Math.min(100, value)) : 0;
}

function renderBar(percent: number, width: number): string {
	const filled = Math.round((percent / 100) * width);
	return `[${"=".repeat(filled)}${"-".repeat(Math.max(0, width - filled))}]`;
}

function formatDuration(totalSeconds: number): string {
	const seconds = Math.max(0, totalSeconds);
	const hours = Math.floor(seconds / 3600);
	const minutes = Math.floor((seconds % 3600) / 60);
	const remainderSeconds = seconds % 60;

	if (hours > 0) {
		return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}:${String(remainderSeconds).padStart(2, "0")}`;
	}

	return `${String(minutes).padStart(2, "0")}:${String(remainderSeconds).padStart(2, "0")}`;
}
