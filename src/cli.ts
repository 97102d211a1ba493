/**
 * Command-line program: `sync` (default) and `init`.
 */

import chalk from "chalk";
import { Command, Option } from "commander";
import { wrapError } from "@simpletv-sync/core";
import { APP_NAME, APP_VERSION, DEFAULT_MANIFEST_NAME, ROOT_ENV_VAR, SETTINGS_FILE_NAME } from "./constants.js";
import { syncCommand } from "./commands/sync.js";
import { initCommand } from "./commands/init.js";
import { LOG_LEVELS, createConsoleReporter } from "./utils/log.js";
import { loadOptions, type CliOptions } from "./utils/settings.js";

/**
 * Where the program prints and which directory it resolves paths against.
 */
export interface ProgramContext {
	write: (line: string) => void;
	cwd: string;
}

function withCommonOptions(command: Command): Command {
	return command
		.option("-r, --root <dir>", `SimpleTV installation directory (default: $${ROOT_ENV_VAR} or the current directory)`)
		.option("-m, --manifest <file>", `manifest file, relative to the root (default: ${DEFAULT_MANIFEST_NAME})`)
		.option("-c, --config <file>", `settings file (default: ${SETTINGS_FILE_NAME})`)
		.addOption(new Option("-l, --log-level <level>", "console verbosity").choices(LOG_LEVELS));
}

function fail(error: unknown, context: ProgramContext): void {
	context.write(chalk.red(wrapError(error).format()));
	process.exitCode = 1;
}

/**
 * Build the command-line program.
 *
 * Commands set `process.exitCode`: 1 when any entry failed or the command
 * could not run.
 */
export function createProgram(context: Partial<ProgramContext> = {}): Command {
	const ctx: ProgramContext = {
		write: context.write ?? ((line: string) => console.log(line)),
		cwd: context.cwd ?? process.cwd(),
	};

	const program = new Command();

	program.name(APP_NAME).description("Synchronise SimpleTV Lua scripts and addons").version(APP_VERSION);

	withCommonOptions(program.command("sync", { isDefault: true }))
		.description("download every script listed in the manifest")
		.action(async (cliOptions: CliOptions) => {
			try {
				const options = await loadOptions(cliOptions, ctx.cwd);
				const reporter = createConsoleReporter({ level: options.logLevel, write: ctx.write });
				const summary = await syncCommand(options, reporter);
				process.exitCode = summary.failed.length > 0 ? 1 : 0;
			} catch (error) {
				fail(error, ctx);
			}
		});

	withCommonOptions(program.command("init"))
		.description("write the recommended manifest if none exists")
		.action(async (cliOptions: CliOptions) => {
			try {
				const options = await loadOptions(cliOptions, ctx.cwd);
				const reporter = createConsoleReporter({ level: options.logLevel, write: ctx.write });
				await initCommand(options.manifestPath, reporter);
				process.exitCode = 0;
			} catch (error) {
				fail(error, ctx);
			}
		});

	return program;
}
