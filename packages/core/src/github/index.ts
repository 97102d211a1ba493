/**
 * GitHub module exports.
 */

export {
	type ReleaseLookupOptions,
	ARCHIVE_ASSET_KEYWORD,
	ARCHIVE_ASSET_EXTENSION,
	parseReleaseAssets,
	selectArchiveAsset,
	resolveLatestArchive,
} from "./releases.js";
