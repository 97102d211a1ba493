import type { SyncReporter } from "@simpletv-sync/core";
import { writeTemplate } from "../utils/template.js";

/**
 * Write the recommended manifest unless one exists.
 *
 * @returns Whether the template was written.
 */
export async function initCommand(manifestPath: string, reporter: SyncReporter): Promise<boolean> {
	const created = await writeTemplate(manifestPath);

	if (created) {
		reporter.onLog?.(`Created manifest template: ${manifestPath}`, "success");
	} else {
		reporter.onLog?.(`Manifest already exists: ${manifestPath}`, "warning");
	}

	return created;
}
