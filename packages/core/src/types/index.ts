/**
 * Public type exports for @simpletv-sync/core.
 */

export type { LogSeverity, LogCallback, SyncReporter } from "./reporter.js";

export type { FileCategory, Route, ReleaseAsset, DownloadOutcome, SyncSummary } from "./route.js";
