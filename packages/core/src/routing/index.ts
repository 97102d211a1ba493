/**
 * Routing module exports.
 */

export {
	type RouteRule,
	SCRAPER_MARKER,
	YOUTUBE_PREFIX,
	TIMESHIFT_MARKER,
	PLAYER_CORE_PREFIX,
	SCRIPT_EXTENSION,
	ROUTE_RULES,
	isArchiveEntry,
	classify,
} from "./classify.js";
