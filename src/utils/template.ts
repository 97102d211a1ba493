import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { SyncError, getErrorMessage } from "@simpletv-sync/core";

/** Bundled list of recommended manifest entries. */
export const TEMPLATE_DATA_PATH = fileURLToPath(new URL("../data/default-manifest.json", import.meta.url));

/**
 * Parse the recommended entries from JSON text.
 *
 * @throws SyncError if the text is not a JSON array of non-empty strings.
 */
export function parseTemplateEntries(content: string, sourcePath = TEMPLATE_DATA_PATH): string[] {
	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new SyncError(`Failed to parse template list: ${getErrorMessage(error)}`, "TEMPLATE_ERROR", {
			suggestion: `Check the template list at: ${sourcePath}`,
			cause: error,
		});
	}

	if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === "string" && entry.trim() !== "")) {
		throw new SyncError("Template list must be an array of non-empty strings", "TEMPLATE_ERROR", {
			suggestion: `Check the template list at: ${sourcePath}`,
		});
	}

	return raw;
}

/**
 * Recommended manifest entries, sorted.
 */
export function templateEntries(): string[] {
	return parseTemplateEntries(fs.readFileSync(TEMPLATE_DATA_PATH, "utf-8")).sort();
}

/**
 * Manifest text for the recommended entries, one per line.
 */
export function renderTemplate(entries: readonly string[] = templateEntries()): string {
	return entries.join("\n");
}

/**
 * Write the manifest template unless a manifest already exists.
 *
 * @param manifestPath - Where the manifest lives.
 * @returns Whether a template was written.
 */
export async function writeTemplate(manifestPath: string): Promise<boolean> {
	if (fs.existsSync(manifestPath)) {
		return false;
	}

	await fs.promises.mkdir(path.dirname(manifestPath), { recursive: true });
	await fs.promises.writeFile(manifestPath, renderTemplate(), "utf-8");
	return true;
}
