/**
 * @title Sync Orchestrator Module
 * @description Drives a full synchronisation run over the manifest.
 *
 * Entries are processed one at a time in manifest order and each is attempted
 * exactly once. A failing entry is logged and recorded; it never stops the
 * run. Only a manifest that cannot be read ends the run early.
 *
 * @module sync
 */

import * as path from "node:path";
import type { LogSeverity, SyncReporter } from "../types/reporter.js";
import type { DownloadOutcome, ReleaseAsset, Route, SyncSummary } from "../types/route.js";
import type { SyncConfig } from "../config/sync-config.js";
import { SyncError, UnrecognizedEntryError, getErrorMessage } from "../errors.js";
import { readManifest, activeEntries } from "../manifest/reader.js";
import { classify } from "../routing/classify.js";
import { resolveLatestArchive } from "../github/releases.js";
import { download } from "../download/fetcher.js";
import { installArchive } from "../archive/install.js";

/**
 * Lifecycle of an orchestrator.
 */
export type SyncState = "idle" | "running" | "completed";

/**
 * Steps the orchestrator delegates to. Overridable for alternative transports.
 */
export interface SyncServices {
	resolveArchive: typeof resolveLatestArchive;
	download: typeof download;
	installArchive: typeof installArchive;
}

const DEFAULT_SERVICES: SyncServices = {
	resolveArchive: resolveLatestArchive,
	download,
	installArchive,
};

const REPORT_RULE = "─".repeat(20);

function emptySummary(): SyncSummary {
	return { total: 0, succeeded: [], failed: [], outcomes: [] };
}

/**
 * Runs synchronisations for one installation.
 */
export class SyncOrchestrator {
	private currentState: SyncState = "idle";
	private readonly services: SyncServices;

	constructor(
		private readonly config: SyncConfig,
		private readonly reporter: SyncReporter = {},
		services: Partial<SyncServices> = {},
	) {
		this.services = { ...DEFAULT_SERVICES, ...services };
	}

	/** Current lifecycle state. */
	get state(): SyncState {
		return this.currentState;
	}

	/**
	 * Synchronise every active manifest entry.
	 *
	 * @param manifestPath - Path to the manifest file
	 * @returns Summary of the run
	 * @throws SyncError if a run is already in progress
	 */
	async run(manifestPath: string): Promise<SyncSummary> {
		if (this.currentState === "running") {
			throw new SyncError("A synchronisation is already running", "SYNC_IN_PROGRESS");
		}
		this.currentState = "running";

		try {
			return await this.execute(manifestPath);
		} finally {
			this.currentState = "completed";
		}
	}

	private async execute(manifestPath: string): Promise<SyncSummary> {
		this.log("Starting synchronisation...", "header");

		let entries: string[];
		try {
			entries = await readManifest(manifestPath);
		} catch (error) {
			this.log(`Cannot read manifest: ${getErrorMessage(error)}`, "error");
			return this.finishEmpty();
		}

		if (entries.length === 0) {
			this.log("Manifest is empty.", "warning");
			return this.finishEmpty();
		}

		const active = activeEntries(entries);
		const total = active.length;
		this.log(`Entries to process: ${total}`, "info");

		const outcomes: DownloadOutcome[] = [];

		for (const [index, name] of active.entries()) {
			this.reporter.onProgress?.(index, total);
			outcomes.push(await this.processEntry(name));
		}

		this.reporter.onProgress?.(total, total);

		const summary: SyncSummary = {
			total,
			succeeded: outcomes.filter((o) => o.success).map((o) => o.name),
			failed: outcomes.filter((o) => !o.success).map((o) => o.name),
			outcomes,
		};

		this.logReport(summary);
		this.reporter.onRunComplete?.(summary.succeeded, summary.failed);

		return summary;
	}

	private async processEntry(name: string): Promise<DownloadOutcome> {
		const route: Route = classify(name, this.config);

		switch (route.kind) {
			case "archive":
				return this.installLatestArchive(name);

			case "unknown": {
				const error = new UnrecognizedEntryError(route.name);
				this.log(`${error.message}. Skipped.`, "warning");
				return { name, success: false, error: error.message };
			}

			case "file": {
				const success = await this.services.download(route.url, route.destination, {
					timeout: this.config.downloadTimeout,
					onLog: this.reporter.onLog,
				});
				return success ? { name, success } : { name, success, error: "Download failed" };
			}
		}
	}

	private async installLatestArchive(name: string): Promise<DownloadOutcome> {
		const { layout, sources, releaseTimeout, downloadTimeout } = this.config;

		this.log("Resolving latest TVSources release...", "info");

		let asset: ReleaseAsset | null;
		try {
			asset = await this.services.resolveArchive({ endpoint: sources.releaseEndpoint, timeout: releaseTimeout });
		} catch (error) {
			const message = getErrorMessage(error);
			this.log(`Release lookup failed: ${message}`, "error");
			return { name, success: false, error: message };
		}

		if (!asset) {
			const message = "No TVSources .zip asset found in the latest release";
			this.log(message, "warning");
			return { name, success: false, error: message };
		}

		this.log(`Found release asset: ${asset.name}`, "success");

		// Asset names come from the remote; never let one point outside the root.
		const archivePath = path.join(layout.root, path.basename(asset.name));
		const downloaded = await this.services.download(asset.downloadUrl, archivePath, {
			timeout: downloadTimeout,
			onLog: this.reporter.onLog,
		});
		if (!downloaded) {
			return { name, success: false, error: "Download failed" };
		}

		const installed = await this.services.installArchive(archivePath, layout.root, { onLog: this.reporter.onLog });
		return installed ? { name, success: true } : { name, success: false, error: "Extraction failed" };
	}

	private finishEmpty(): SyncSummary {
		this.log("Nothing to do.", "warning");
		this.reporter.onRunComplete?.([], []);
		return emptySummary();
	}

	private logReport(summary: SyncSummary): void {
		this.log(`${REPORT_RULE} REPORT ${REPORT_RULE}`, "header");
		this.log("Synchronisation finished!", "info");

		if (summary.failed.length > 0) {
			this.log(`Failed: ${summary.failed.length} file${summary.failed.length === 1 ? "" : "s"}`, "error");
			for (const name of summary.failed) {
				this.log(`  - ${name}`, "error");
			}
		}

		if (summary.succeeded.length > 0) {
			this.log(`Downloaded: ${summary.succeeded.length} file${summary.succeeded.length === 1 ? "" : "s"}`, "success");
			for (const name of summary.succeeded) {
				this.log(`  - ${name}`, "success");
			}
		}
	}

	private log(message: string, severity: LogSeverity): void {
		this.reporter.onLog?.(message, severity);
	}
}

/**
 * Run a single synchronisation.
 *
 * @param manifestPath - Path to the manifest file
 * @param config - Sync configuration
 * @param reporter - Progress and log callbacks
 * @returns Summary of the run
 */
export async function syncScripts(manifestPath: string, config: SyncConfig, reporter?: SyncReporter): Promise<SyncSummary> {
	return new SyncOrchestrator(config, reporter).run(manifestPath);
}
