/**
 * Installing the TVSources archive into the installation root.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { LogCallback } from "../types/reporter.js";
import { getErrorMessage } from "../errors.js";
import { extractZip } from "./zip.js";

/**
 * Options for archive installation.
 */
export interface InstallArchiveOptions {
	/** Maximum total extraction size in bytes. */
	maxSize?: number;
	/** Log side channel. */
	onLog?: LogCallback;
}

/**
 * Extract an archive into the installation root and delete it.
 *
 * On failure the archive is kept on disk and entries already written stay in
 * place.
 *
 * @param archivePath - Downloaded archive
 * @param installRoot - Installation root
 * @param options - Installation options
 * @returns Whether extraction and removal both succeeded
 */
export async function installArchive(
	archivePath: string,
	installRoot: string,
	options: InstallArchiveOptions = {},
): Promise<boolean> {
	const { maxSize, onLog } = options;
	const name = path.basename(archivePath);

	onLog?.(`Extracting archive: ${name}`, "info");

	try {
		const files = await extractZip(archivePath, installRoot, { maxSize });
		await fs.promises.unlink(archivePath);
		onLog?.(`Archive extracted: ${files.length} file${files.length === 1 ? "" : "s"}`, "success");
		return true;
	} catch (error) {
		onLog?.(`Failed to extract ${name}: ${getErrorMessage(error)}`, "error");
		return false;
	}
}
