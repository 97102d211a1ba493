/**
 * @title Route Classification Module
 * @description Maps a manifest entry to its destination and source.
 *
 * Names can satisfy several rules at once (e.g. "YT.lua" also ends with
 * ".lua"), so the rules are evaluated in order and the first match wins.
 *
 * @module routing
 */

import * as path from "node:path";
import type { FileCategory, Route } from "../types/route.js";
import { ARCHIVE_ENTRY_NAME, type SyncConfig } from "../config/sync-config.js";

/** Marker contained in TVSources scraper playlist names. */
export const SCRAPER_MARKER = "_pls.lua";

/** Prefix of the YouTube script. */
export const YOUTUBE_PREFIX = "YT.lua";

/** Marker contained in timeshift extension names. */
export const TIMESHIFT_MARKER = "timeshift_ext.lua";

/** Prefix of the player core script. */
export const PLAYER_CORE_PREFIX = "playerjs.lua";

/** Extension of a plain video script. */
export const SCRIPT_EXTENSION = ".lua";

/**
 * A classification rule: a predicate and the route it builds.
 */
export interface RouteRule {
	category: FileCategory;
	matches: (name: string) => boolean;
	build: (name: string, config: SyncConfig) => { destination: string; url: string };
}

/**
 * Single-file rules in priority order.
 */
export const ROUTE_RULES: readonly RouteRule[] = [
	{
		category: "scraper",
		matches: (name) => name.includes(SCRAPER_MARKER),
		build: (name, { layout, sources }) => ({
			destination: path.join(layout.scrapersDir, name),
			url: sources.scrapersUrl + name,
		}),
	},
	{
		category: "youtube",
		matches: (name) => name.startsWith(YOUTUBE_PREFIX),
		build: (name, { layout, sources }) => ({
			destination: path.join(layout.videoDir, name),
			url: sources.youtubeUrl + name,
		}),
	},
	{
		category: "timeshift",
		matches: (name) => name.includes(TIMESHIFT_MARKER),
		build: (name, { layout, sources }) => ({
			destination: path.join(layout.timeshiftDir, name),
			url: sources.timeshiftUrl + name,
		}),
	},
	{
		category: "core",
		matches: (name) => name.startsWith(PLAYER_CORE_PREFIX),
		build: (name, { layout, sources }) => ({
			destination: path.join(layout.videoDir, "core", name),
			url: `${sources.videoUrl}core/${name}`,
		}),
	},
	{
		category: "video",
		matches: (name) => name.endsWith(SCRIPT_EXTENSION),
		build: (name, { layout, sources }) => ({
			destination: path.join(layout.videoDir, name),
			url: sources.videoUrl + name,
		}),
	},
];

/**
 * Check whether an entry names the aggregate archive.
 */
export function isArchiveEntry(name: string): boolean {
	return name.toLowerCase() === ARCHIVE_ENTRY_NAME.toLowerCase();
}

/**
 * Classify a manifest entry.
 *
 * @param name - Manifest entry
 * @param config - Sync configuration
 * @returns Route; never throws
 */
export function classify(name: string, config: SyncConfig): Route {
	if (isArchiveEntry(name)) {
		return { kind: "archive" };
	}

	for (const rule of ROUTE_RULES) {
		if (rule.matches(name)) {
			return { kind: "file", category: rule.category, ...rule.build(name, config) };
		}
	}

	return { kind: "unknown", name };
}
