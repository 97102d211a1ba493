/**
 * Single-file download into the installation.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { LogCallback } from "../types/reporter.js";
import { DEFAULT_DOWNLOAD_TIMEOUT } from "../config/sync-config.js";
import { getErrorMessage } from "../errors.js";
import { fetchBytes } from "../http/index.js";

/**
 * Options for downloads.
 */
export interface DownloadOptions {
	/** Request timeout in milliseconds. */
	timeout?: number;
	/** Log side channel. */
	onLog?: LogCallback;
}

/**
 * Download a URL to a file, creating parent directories and overwriting any
 * existing file. Nothing is written unless the whole body was received.
 *
 * @param url - Source URL
 * @param destination - Destination file path
 * @param timeout - Request timeout in milliseconds
 * @returns Number of bytes written
 * @throws NetworkError on network faults, filesystem errors as thrown by node:fs
 */
export async function fetchToFile(url: string, destination: string, timeout = DEFAULT_DOWNLOAD_TIMEOUT): Promise<number> {
	const content = await fetchBytes(url, { timeout });

	await fs.promises.mkdir(path.dirname(destination), { recursive: true });
	await fs.promises.writeFile(destination, content);

	return content.length;
}

/**
 * Download a URL to a file, reporting instead of throwing.
 *
 * @param url - Source URL
 * @param destination - Destination file path
 * @param options - Download options
 * @returns Whether the file was written
 */
export async function download(url: string, destination: string, options: DownloadOptions = {}): Promise<boolean> {
	const { timeout = DEFAULT_DOWNLOAD_TIMEOUT, onLog } = options;
	const name = path.basename(destination);

	onLog?.(`Downloading: ${name}`, "info");

	try {
		await fetchToFile(url, destination, timeout);
		onLog?.(`Downloaded: ${name}`, "success");
		return true;
	} catch (error) {
		onLog?.(`Failed to download ${name}: ${getErrorMessage(error)}`, "error");
		return false;
	}
}
