/**
 * @simpletv-sync/core - Synchronisation engine for SimpleTV Lua scripts.
 *
 * This library provides functionality for:
 * - Manifest reading (one script name per line, `'` disables an entry)
 * - Routing entries to local folders and upstream URLs
 * - Latest-release lookup and extraction of the TVSources archive
 * - Sequential synchronisation with progress and log callbacks
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	type SyncErrorOptions,
	SyncError,
	ManifestMissingError,
	ManifestReadError,
	NetworkError,
	ArchiveError,
	SecurityError,
	UnrecognizedEntryError,
	SettingsError,
	isSyncError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Configuration exports
export * from "./config/index.js";

// Manifest exports
export * from "./manifest/index.js";

// Routing exports
export * from "./routing/index.js";

// GitHub exports
export * from "./github/index.js";

// Download exports
export * from "./download/index.js";

// Archive exports
export * from "./archive/index.js";

// Sync exports
export * from "./sync/index.js";

// Proxy exports
export * from "./proxy/index.js";
