/**
 * Route and outcome types for manifest entries.
 */

/**
 * Destination category of a single-file route.
 */
export type FileCategory = "scraper" | "youtube" | "timeshift" | "core" | "video";

/**
 * Where a manifest entry comes from and where it goes.
 */
export type Route =
	| { kind: "archive" }
	| {
			kind: "file";
			category: FileCategory;
			/** Absolute destination path. */
			destination: string;
			/** Source URL. */
			url: string;
	  }
	| { kind: "unknown"; name: string };

/**
 * A release asset found by the latest-release lookup.
 */
export interface ReleaseAsset {
	/** Asset file name (e.g., "TVSources_v5.zip"). */
	name: string;
	/** Direct download URL. */
	downloadUrl: string;
}

/**
 * Outcome of processing one manifest entry.
 */
export interface DownloadOutcome {
	/** Manifest entry. */
	name: string;
	/** Whether the entry was installed. */
	success: boolean;
	/** Reason for a failure, when known. */
	error?: string;
}

/**
 * Result of a whole sync run.
 */
export interface SyncSummary {
	/** Number of active entries attempted. */
	total: number;
	/** Entries that succeeded, in manifest order. */
	succeeded: string[];
	/** Entries that failed, in manifest order. */
	failed: string[];
	/** Per-entry outcomes, in manifest order. */
	outcomes: DownloadOutcome[];
}
