import chalk from "chalk";
import type { LogSeverity, SyncReporter } from "@simpletv-sync/core";

/** Console verbosity, from least to most verbose. */
export const LOG_LEVELS = ["error", "warning", "info"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Check whether a value names a log level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Level a severity is shown at. Headers and successes count as info.
 */
function levelOf(severity: LogSeverity): LogLevel {
	switch (severity) {
		case "error":
			return "error";
		case "warning":
			return "warning";
		default:
			return "info";
	}
}

/**
 * Whether a message of the given severity passes the configured level.
 *
 * @param severity - Severity of the message.
 * @param level - Configured console level.
 */
export function shouldLog(severity: LogSeverity, level: LogLevel): boolean {
	return LOG_LEVELS.indexOf(levelOf(severity)) <= LOG_LEVELS.indexOf(level);
}

/**
 * Render a log line for the console.
 */
export function formatLine(message: string, severity: LogSeverity): string {
	switch (severity) {
		case "header":
			return chalk.bold(message);
		case "success":
			return `${chalk.green("  ✓")} ${message}`;
		case "warning":
			return `${chalk.yellow("  !")} ${message}`;
		case "error":
			return `${chalk.red("  ✗")} ${message}`;
		case "info":
			return `${chalk.dim("  ~")} ${message}`;
	}
}

export interface ConsoleReporterOptions {
	level: LogLevel;
	/** Line sink, `console.log` by default. */
	write?: (line: string) => void;
}

/**
 * Reporter that prints core callbacks to the console, filtered by level.
 *
 * Progress is shown as a `[n/total]` counter before each entry.
 */
export function createConsoleReporter(options: ConsoleReporterOptions): SyncReporter {
	const { level, write = (line: string) => console.log(line) } = options;

	return {
		onLog: (message, severity) => {
			if (shouldLog(severity, level)) {
				write(formatLine(message, severity));
			}
		},
		onProgress: (current, total) => {
			if (current < total && shouldLog("info", level)) {
				write(chalk.cyan(`[${current + 1}/${total}]`));
			}
		},
	};
}
