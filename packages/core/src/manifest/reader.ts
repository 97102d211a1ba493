/**
 * @description Reading the newline-delimited script manifest.
 *
 * One logical file name per line. Lines starting with a single quote are
 * disabled entries; the reader returns them untouched so callers can still
 * display them, and {@link activeEntries} drops them.
 *
 * @module manifest
 */

import * as fs from "node:fs";
import { ManifestMissingError, ManifestReadError, getErrorMessage } from "../errors.js";

/** Prefix of a disabled manifest entry. */
export const COMMENT_MARKER = "'";

/**
 * Split manifest text into trimmed, non-empty entries in file order.
 *
 * @param content - Manifest text
 * @returns Entries, comments included
 */
export function parseManifestText(content: string): string[] {
	return content
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

/**
 * Read a manifest file.
 *
 * @param manifestPath - Path to the manifest
 * @returns Entries in file order, comments included
 * @throws ManifestMissingError if the file does not exist
 * @throws ManifestReadError if the file cannot be read or is not valid UTF-8
 */
export async function readManifest(manifestPath: string): Promise<string[]> {
	if (!fs.existsSync(manifestPath)) {
		throw new ManifestMissingError(manifestPath);
	}

	let bytes: Buffer;
	try {
		bytes = await fs.promises.readFile(manifestPath);
	} catch (error) {
		throw new ManifestReadError(`Failed to read manifest: ${getErrorMessage(error)}`, {
			manifestPath,
			cause: error,
		});
	}

	let content: string;
	try {
		// The decoder drops a leading BOM.
		content = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
	} catch (error) {
		throw new ManifestReadError("Manifest is not valid UTF-8 text", { manifestPath, cause: error });
	}

	return parseManifestText(content);
}

/**
 * Check whether an entry is disabled.
 */
export function isCommentEntry(entry: string): boolean {
	return entry.startsWith(COMMENT_MARKER);
}

/**
 * Drop disabled entries, preserving order.
 */
export function activeEntries(entries: readonly string[]): string[] {
	return entries.filter((entry) => !isCommentEntry(entry));
}
