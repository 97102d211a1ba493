import * as path from "node:path";
import { SyncOrchestrator, clearProxyAgents, type SyncReporter, type SyncSummary } from "@simpletv-sync/core";
import type { ResolvedOptions } from "../utils/settings.js";
import { writeTemplate } from "../utils/template.js";

/**
 * Synchronise the installation described by the resolved options.
 *
 * A missing manifest is replaced by the recommended template first, then
 * synchronised.
 *
 * @param options - Resolved command options.
 * @param reporter - Console reporter.
 * @returns Summary of the run.
 */
export async function syncCommand(options: ResolvedOptions, reporter: SyncReporter): Promise<SyncSummary> {
	const { manifestPath, config } = options;

	if (await writeTemplate(manifestPath)) {
		reporter.onLog?.(`Manifest not found. Created template: ${path.basename(manifestPath)}`, "warning");
	}

	try {
		return await new SyncOrchestrator(config, reporter).run(manifestPath);
	} finally {
		await clearProxyAgents();
	}
}
