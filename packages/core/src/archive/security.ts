/**
 * @title Archive Security Module
 * @description Limits and path checks applied before anything is extracted.
 *
 * The archive is unpacked straight into the installation root, so an entry
 * must never resolve outside it.
 *
 * @module archive
 */

import * as path from "node:path";
import { SecurityError } from "../errors.js";

/** Default maximum extraction size: 100 MB. */
export const DEFAULT_MAX_SIZE = 100 * 1024 * 1024;

/** Maximum compression ratio allowed. */
export const MAX_COMPRESSION_RATIO = 100;

/** Maximum number of entries allowed in an archive. */
export const MAX_FILE_COUNT = 10_000;

/**
 * Reject absolute entry paths and entries that climb out of the destination.
 *
 * @param entryPath - Entry path from the archive
 * @throws SecurityError
 */
export function checkPathTraversal(entryPath: string): void {
	const normalised = path.normalize(entryPath.replace(/\\/g, "/"));

	if (path.isAbsolute(normalised) || /^[a-zA-Z]:/.test(normalised)) {
		throw new SecurityError(`Path traversal detected in archive: "${entryPath}"`);
	}

	if (normalised.split(/[\\/]/).some((segment) => segment === "..")) {
		throw new SecurityError(`Path traversal detected in archive: "${entryPath}"`);
	}
}

/**
 * Resolve an entry inside the destination directory.
 *
 * @throws SecurityError if the result is outside `destDir`
 */
export function resolveInside(destDir: string, entryPath: string): string {
	checkPathTraversal(entryPath);

	const root = path.resolve(destDir);
	const resolved = path.resolve(root, entryPath);
	if (resolved !== root && !resolved.startsWith(root + path.sep)) {
		throw new SecurityError(`Archive entry escapes the destination: "${entryPath}"`);
	}

	return resolved;
}

/**
 * Format a byte count for display.
 */
export function formatSize(bytes: number): string {
	if (bytes < 1024) {
		return `${bytes} B`;
	}
	if (bytes < 1024 * 1024) {
		return `${(bytes / 1024).toFixed(1)} KB`;
	}
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
