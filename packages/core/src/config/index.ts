/**
 * Configuration module exports.
 */

export {
	type InstallLayout,
	type RemoteSources,
	type SyncConfig,
	type SyncConfigOverrides,
	ARCHIVE_ENTRY_NAME,
	DEFAULT_RELEASE_TIMEOUT,
	DEFAULT_DOWNLOAD_TIMEOUT,
	DEFAULT_FOLDERS,
	DEFAULT_SOURCES,
	createSyncConfig,
} from "./sync-config.js";
