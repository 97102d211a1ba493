/**
 * GitHub latest-release lookup for the TVSources archive.
 */

import type { ReleaseAsset } from "../types/route.js";
import { NetworkError } from "../errors.js";
import { fetchJson } from "../http/index.js";
import { DEFAULT_RELEASE_TIMEOUT, DEFAULT_SOURCES } from "../config/sync-config.js";

/** Keyword the archive asset name must contain (lower case). */
export const ARCHIVE_ASSET_KEYWORD = "tvsources";

/** Extension the archive asset name must end with (lower case). */
export const ARCHIVE_ASSET_EXTENSION = ".zip";

/**
 * Options for the latest-release lookup.
 */
export interface ReleaseLookupOptions {
	/** Release endpoint (e.g., https://api.github.com/repos/owner/repo/releases/latest). */
	endpoint?: string;
	/** Request timeout in milliseconds. */
	timeout?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract the asset list from a release document.
 *
 * Entries are returned unvalidated; {@link selectArchiveAsset} checks the
 * ones it looks at.
 *
 * @param body - Parsed JSON body
 * @param endpoint - Endpoint, for error messages
 * @returns Assets
 * @throws NetworkError if the body is not a release with an assets list
 */
export function parseReleaseAssets(body: unknown, endpoint: string): unknown[] {
	if (!isRecord(body) || !Array.isArray(body.assets)) {
		throw new NetworkError(`Malformed release response from ${endpoint}: missing "assets" list`);
	}

	const assets: unknown[] = body.assets;
	return assets;
}

/**
 * Pick the first asset that looks like the TVSources archive.
 *
 * Entries without a string `name` are skipped. Only the matching asset needs
 * a download URL.
 *
 * @param assets - Raw release assets
 * @param endpoint - Endpoint, for error messages
 * @throws NetworkError if the matching asset has no download URL
 */
export function selectArchiveAsset(
	assets: readonly unknown[],
	endpoint = DEFAULT_SOURCES.releaseEndpoint,
): ReleaseAsset | null {
	for (const asset of assets) {
		if (!isRecord(asset) || typeof asset.name !== "string") {
			continue;
		}

		const lower = asset.name.toLowerCase();
		if (lower.endsWith(ARCHIVE_ASSET_EXTENSION) && lower.includes(ARCHIVE_ASSET_KEYWORD)) {
			if (typeof asset.browser_download_url !== "string") {
				throw new NetworkError(`Malformed release response from ${endpoint}: asset "${asset.name}" has no download URL`);
			}
			return { name: asset.name, downloadUrl: asset.browser_download_url };
		}
	}
	return null;
}

/**
 * Find the TVSources archive in the latest release.
 *
 * Not cached: every call queries the endpoint.
 *
 * @param options - Lookup options
 * @returns The asset, or null when the release has none
 * @throws NetworkError on timeout, connection failure, HTTP error or malformed body
 */
export async function resolveLatestArchive(options: ReleaseLookupOptions = {}): Promise<ReleaseAsset | null> {
	const { endpoint = DEFAULT_SOURCES.releaseEndpoint, timeout = DEFAULT_RELEASE_TIMEOUT } = options;

	const body = await fetchJson(endpoint, {
		timeout,
		headers: { Accept: "application/vnd.github.v3+json" },
	});

	return selectArchiveAsset(parseReleaseAssets(body, endpoint), endpoint);
}
