/**
 * Callback interface through which the core reports to its caller.
 */

/**
 * Severity of a log line.
 *
 * `header` marks the start of a section such as the run banner or the final report.
 */
export type LogSeverity = "info" | "success" | "warning" | "error" | "header";

/**
 * Log callback.
 */
export type LogCallback = (message: string, severity: LogSeverity) => void;

/**
 * Callbacks supplied by the caller of a sync run.
 *
 * All members are optional; marshalling them onto another thread or event loop
 * is the caller's concern.
 */
export interface SyncReporter {
	/** Called before each entry with its zero-based index, and once more with `total` at the end. */
	onProgress?: (current: number, total: number) => void;
	/** Called for every log line. */
	onLog?: LogCallback;
	/** Called once when the run ends, with names in manifest order. */
	onRunComplete?: (succeeded: string[], failed: string[]) => void;
}
