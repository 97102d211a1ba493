/**
 * Archive module exports.
 */

export { type ZipExtractOptions, extractZip } from "./zip.js";

export {
	DEFAULT_MAX_SIZE,
	MAX_COMPRESSION_RATIO,
	MAX_FILE_COUNT,
	checkPathTraversal,
	resolveInside,
	formatSize,
} from "./security.js";

export { type InstallArchiveOptions, installArchive } from "./install.js";
