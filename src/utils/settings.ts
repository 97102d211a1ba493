/**
 * @description Settings file loading and option resolution for the console front end.
 *
 * Precedence, highest first: command-line options, the settings file, the
 * `SIMPLETV_ROOT` environment variable, then the working directory.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import {
	SettingsError,
	createSyncConfig,
	getErrorMessage,
	type RemoteSources,
	type SyncConfig,
} from "@simpletv-sync/core";
import { DEFAULT_MANIFEST_NAME, ROOT_ENV_VAR, SETTINGS_FILE_NAME } from "../constants.js";
import { isLogLevel, type LogLevel } from "./log.js";

const SOURCE_KEYS = ["videoUrl", "scrapersUrl", "timeshiftUrl", "youtubeUrl", "releaseEndpoint"] as const;

/**
 * Contents of `simpletv-sync.yml`. Every key is optional.
 */
export interface Settings {
	root?: string;
	manifest?: string;
	logLevel?: LogLevel;
	sources?: Partial<RemoteSources>;
	timeouts?: {
		release?: number;
		download?: number;
	};
}

/**
 * Options taken from the command line.
 */
export interface CliOptions {
	root?: string;
	manifest?: string;
	config?: string;
	logLevel?: LogLevel;
}

/**
 * Everything a command needs to run.
 */
export interface ResolvedOptions {
	manifestPath: string;
	logLevel: LogLevel;
	config: SyncConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, settingsPath?: string): string | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "string" || value.trim() === "") {
		throw new SettingsError(`"${key}" must be a non-empty string`, { settingsPath });
	}
	return value;
}

function readTimeout(raw: Record<string, unknown>, key: string, settingsPath?: string): number | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new SettingsError(`"timeouts.${key}" must be a positive number of milliseconds`, { settingsPath });
	}
	return value;
}

/**
 * Parse and validate settings from YAML text.
 *
 * @param content - YAML content.
 * @param settingsPath - Source path for error messages.
 * @throws SettingsError if the YAML is malformed or a value has the wrong type.
 */
export function parseSettings(content: string, settingsPath?: string): Settings {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (error) {
		throw new SettingsError(`Failed to parse settings: ${getErrorMessage(error)}`, { settingsPath, cause: error });
	}

	if (raw === undefined || raw === null) {
		return {};
	}
	if (!isRecord(raw)) {
		throw new SettingsError("Settings must be a mapping", { settingsPath });
	}

	const settings: Settings = {
		root: readString(raw, "root", settingsPath),
		manifest: readString(raw, "manifest", settingsPath),
	};

	if (raw.logLevel !== undefined && raw.logLevel !== null) {
		if (!isLogLevel(raw.logLevel)) {
			throw new SettingsError('"logLevel" must be one of: error, warning, info', { settingsPath });
		}
		settings.logLevel = raw.logLevel;
	}

	if (raw.sources !== undefined && raw.sources !== null) {
		const sources = raw.sources;
		if (!isRecord(sources)) {
			throw new SettingsError('"sources" must be a mapping', { settingsPath });
		}
		const overrides: Partial<RemoteSources> = {};
		for (const key of SOURCE_KEYS) {
			const value = readString(sources, key, settingsPath);
			if (value !== undefined) {
				overrides[key] = value;
			}
		}
		settings.sources = overrides;
	}

	if (raw.timeouts !== undefined && raw.timeouts !== null) {
		const timeouts = raw.timeouts;
		if (!isRecord(timeouts)) {
			throw new SettingsError('"timeouts" must be a mapping', { settingsPath });
		}
		settings.timeouts = {
			release: readTimeout(timeouts, "release", settingsPath),
			download: readTimeout(timeouts, "download", settingsPath),
		};
	}

	return settings;
}

/**
 * Load the settings file. A missing file yields empty settings unless the
 * path was given explicitly.
 *
 * @param settingsPath - Path to the settings file.
 * @param required - Fail when the file does not exist.
 */
export async function loadSettings(settingsPath: string, required = false): Promise<Settings> {
	if (!fs.existsSync(settingsPath)) {
		if (required) {
			throw new SettingsError(`Settings file not found: ${settingsPath}`, { settingsPath });
		}
		return {};
	}

	let content: string;
	try {
		content = await fs.promises.readFile(settingsPath, "utf-8");
	} catch (error) {
		throw new SettingsError(`Failed to read settings: ${getErrorMessage(error)}`, { settingsPath, cause: error });
	}

	return parseSettings(content, settingsPath);
}

/**
 * Combine command-line options, settings and environment.
 *
 * @param cli - Command-line options.
 * @param settings - Parsed settings file.
 * @param env - Environment variables.
 * @param cwd - Directory relative paths are resolved against.
 */
export function resolveOptions(
	cli: CliOptions,
	settings: Settings,
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): ResolvedOptions {
	const envRoot = env[ROOT_ENV_VAR]?.trim();
	const root = path.resolve(cwd, cli.root ?? settings.root ?? (envRoot || "."));
	const manifest = cli.manifest ?? settings.manifest ?? DEFAULT_MANIFEST_NAME;

	return {
		manifestPath: path.resolve(root, manifest),
		logLevel: cli.logLevel ?? settings.logLevel ?? "info",
		config: createSyncConfig(root, {
			sources: settings.sources,
			releaseTimeout: settings.timeouts?.release,
			downloadTimeout: settings.timeouts?.download,
		}),
	};
}

/**
 * Load settings and resolve the options for a command.
 */
export async function loadOptions(cli: CliOptions, cwd: string = process.cwd()): Promise<ResolvedOptions> {
	const settingsPath = path.resolve(cwd, cli.config ?? SETTINGS_FILE_NAME);
	const settings = await loadSettings(settingsPath, cli.config !== undefined);
	return resolveOptions(cli, settings, process.env, cwd);
}
