/**
 * @title Sync Configuration Module
 * @description Installation layout, remote sources and timeouts.
 *
 * All folders are resolved against a single installation root (the SimpleTV
 * directory). Source URLs are base URLs to which the entry name is appended,
 * so they must end with a slash.
 *
 * @module config
 */

import * as path from "node:path";

/** Name of the aggregate archive entry, compared case-insensitively. */
export const ARCHIVE_ENTRY_NAME = "TVSources.zip";

/** Default request timeout for the latest-release lookup. */
export const DEFAULT_RELEASE_TIMEOUT = 10_000;

/** Default request timeout for each file download. */
export const DEFAULT_DOWNLOAD_TIMEOUT = 15_000;

/** Folders relative to the installation root. */
export const DEFAULT_FOLDERS = {
	video: "luaScr/user/video",
	scrapers: "luaScr/user/TVSources/AutoSetup",
	timeshift: "luaScr/user/httptimeshift/extensions",
} as const;

/** Upstream locations. */
export const DEFAULT_SOURCES: RemoteSources = {
	videoUrl: "https://raw.githubusercontent.com/Nexterr-origin/simpleTV-Scripts/main/Video%20Scripts/",
	scrapersUrl: "https://raw.githubusercontent.com/Nexterr-origin/simpleTV-Scripts/main/Scrapers%20TVSources/",
	timeshiftUrl: "https://raw.githubusercontent.com/Nexterr-origin/simpleTV-Addons/main/timeshift-extensions/",
	youtubeUrl: "https://raw.githubusercontent.com/Nexterr-origin/simpleTV-YouTube/main/",
	releaseEndpoint: "https://api.github.com/repos/BMSimple/SimpleTV/releases/latest",
};

/**
 * Local folders the core writes into.
 */
export interface InstallLayout {
	/** Installation root; the aggregate archive is downloaded and extracted here. */
	root: string;
	/** Video scripts folder (the "core" subfolder lives below it). */
	videoDir: string;
	/** TVSources scrapers folder. */
	scrapersDir: string;
	/** HTTP timeshift extensions folder. */
	timeshiftDir: string;
}

/**
 * Remote base URLs and the release-metadata endpoint.
 */
export interface RemoteSources {
	videoUrl: string;
	scrapersUrl: string;
	timeshiftUrl: string;
	youtubeUrl: string;
	/** Endpoint returning the latest release with its `assets`. */
	releaseEndpoint: string;
}

/**
 * Complete configuration of a sync run.
 */
export interface SyncConfig {
	layout: InstallLayout;
	sources: RemoteSources;
	/** Timeout for the latest-release lookup in milliseconds. */
	releaseTimeout: number;
	/** Timeout for each download in milliseconds. */
	downloadTimeout: number;
}

/**
 * Overrides accepted by {@link createSyncConfig}.
 */
export interface SyncConfigOverrides {
	sources?: Partial<RemoteSources>;
	releaseTimeout?: number;
	downloadTimeout?: number;
}

/**
 * Ensure a base URL ends with a slash so entry names can be appended.
 */
function withTrailingSlash(url: string): string {
	return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Build the configuration for an installation root.
 *
 * @param installRoot - SimpleTV installation directory
 * @param overrides - Source URL and timeout overrides
 * @returns Resolved configuration
 */
export function createSyncConfig(installRoot: string, overrides: SyncConfigOverrides = {}): SyncConfig {
	const root = path.resolve(installRoot);
	const merged = { ...DEFAULT_SOURCES, ...overrides.sources };

	return {
		layout: {
			root,
			videoDir: path.join(root, DEFAULT_FOLDERS.video),
			scrapersDir: path.join(root, DEFAULT_FOLDERS.scrapers),
			timeshiftDir: path.join(root, DEFAULT_FOLDERS.timeshift),
		},
		sources: {
			videoUrl: withTrailingSlash(merged.videoUrl),
			scrapersUrl: withTrailingSlash(merged.scrapersUrl),
			timeshiftUrl: withTrailingSlash(merged.timeshiftUrl),
			youtubeUrl: withTrailingSlash(merged.youtubeUrl),
			releaseEndpoint: merged.releaseEndpoint,
		},
		releaseTimeout: overrides.releaseTimeout ?? DEFAULT_RELEASE_TIMEOUT,
		downloadTimeout: overrides.downloadTimeout ?? DEFAULT_DOWNLOAD_TIMEOUT,
	};
}
