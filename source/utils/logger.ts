import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<LogLevel, (message: string) => void>;

export type LoggerOptions = {
	verbose?: boolean;
	json?: boolean;
	write?: (line: string) => void;
	now?: () => Date;
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
	debug: chalk.gray,
	info: chalk.cyan,
	warn: chalk.yellow,
	error: chalk.red,
};

export function createLogger(options: LoggerOptions = {}): Logger {
	const write = options.write ?? ((line: string) => console.error(line));
	const now = options.now ?? (() => new Date());

	const log = (level: LogLevel, message: string) => {
		if (level === "debug" && !options.verbose) {
			return;
		}

		if (options.json) {
			write(JSON.stringify({ time: now().toISOString(), level, message }));
			return;
		}

		const style = LEVEL_STYLE[level];
		const stamp = chalk.gray(now().toISOString());
		write(`${stamp} ${style(level.padEnd(5))} ${message}`);
	};

	return {
		debug: (message) => log("debug", message),
		info: (message) => log("info", message),
		warn: (message) => log("warn", message),
		error: (message) => log("error", message),
	};
}
