/**
 * @title ZIP Archive Extraction Module
 * @description ZIP archive extraction with security checks.
 *
 * All entries are validated before the first byte is written. Extraction is
 * not transactional: a failure part way leaves the entries written so far.
 *
 * @module archive
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as unzipper from "unzipper";
import { ArchiveError, SecurityError, getErrorMessage } from "../errors.js";
import { resolveInside, formatSize, DEFAULT_MAX_SIZE, MAX_COMPRESSION_RATIO, MAX_FILE_COUNT } from "./security.js";

/**
 * Options for ZIP extraction.
 */
export interface ZipExtractOptions {
	/** Maximum total extraction size in bytes. */
	maxSize?: number;
	/** Called with each entry path before it is written. */
	onProgress?: (file: string) => void;
}

/**
 * Open a ZIP archive's central directory.
 *
 * @throws ArchiveError if the file is missing, unreadable or not a ZIP archive
 */
async function openZip(archivePath: string): Promise<unzipper.CentralDirectory> {
	try {
		return await unzipper.Open.file(archivePath);
	} catch (error) {
		throw new ArchiveError(`Cannot open archive ${path.basename(archivePath)}: ${getErrorMessage(error)}`, {
			archivePath,
			cause: error,
		});
	}
}

/**
 * Extract a ZIP archive into a directory, preserving its internal structure.
 *
 * Existing files are overwritten.
 *
 * @param archivePath - Path to the ZIP file
 * @param destDir - Destination directory
 * @param options - Extraction options
 * @returns Extracted file paths
 * @throws ArchiveError on unreadable or corrupt archives
 * @throws SecurityError on unsafe contents
 */
export async function extractZip(
	archivePath: string,
	destDir: string,
	options: ZipExtractOptions = {},
): Promise<string[]> {
	const { maxSize = DEFAULT_MAX_SIZE, onProgress } = options;

	const compressedSize = (await fs.promises.stat(archivePath)).size;
	const directory = await openZip(archivePath);

	if (directory.files.length > MAX_FILE_COUNT) {
		throw new SecurityError(
			`Archive contains too many entries: ${directory.files.length} > ${MAX_FILE_COUNT}. This may indicate a file bomb.`,
		);
	}

	let totalUncompressedSize = 0;
	for (const file of directory.files) {
		resolveInside(destDir, file.path);

		totalUncompressedSize += file.uncompressedSize;
		if (totalUncompressedSize > maxSize) {
			throw new SecurityError(
				`Archive exceeds maximum size: ${formatSize(totalUncompressedSize)} > ${formatSize(maxSize)}`,
			);
		}

		// The Unix mode lives in the upper 16 bits of the external attributes.
		const unixMode = (file.externalFileAttributes >>> 16) & 0xffff;
		if ((unixMode & 0o170000) === 0o120000) {
			throw new SecurityError(`Archive contains a symbolic link ("${file.path}"), which is not permitted.`);
		}
	}

	if (compressedSize > 0) {
		const ratio = totalUncompressedSize / compressedSize;
		if (ratio > MAX_COMPRESSION_RATIO) {
			throw new SecurityError(
				`Suspicious compression ratio detected: ${ratio.toFixed(1)}:1. This may indicate a zip bomb.`,
			);
		}
	}

	await fs.promises.mkdir(destDir, { recursive: true });

	const extractedFiles: string[] = [];
	let extractedSize = 0;

	for (const file of directory.files) {
		const destPath = resolveInside(destDir, file.path);

		if (file.type === "Directory") {
			await fs.promises.mkdir(destPath, { recursive: true });
			continue;
		}

		onProgress?.(file.path);

		let content: Buffer;
		try {
			content = await file.buffer();
		} catch (error) {
			throw new ArchiveError(`Corrupt archive entry "${file.path}": ${getErrorMessage(error)}`, {
				archivePath,
				cause: error,
			});
		}

		// Declared sizes can lie; check what was actually inflated.
		extractedSize += content.length;
		if (extractedSize > maxSize) {
			throw new SecurityError(`Archive exceeds maximum size: ${formatSize(extractedSize)} > ${formatSize(maxSize)}`);
		}

		await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
		await fs.promises.writeFile(destPath, content);

		extractedFiles.push(destPath);
	}

	return extractedFiles;
}
