import { describe, it, expect, vi } from "vitest";
import * as path from "node:path";
import { classify, isArchiveEntry, ROUTE_RULES } from "../src/routing/classify.js";
import { createSyncConfig, DEFAULT_SOURCES } from "../src/config/sync-config.js";

const root = path.resolve("/opt/simpletv");
const config = createSyncConfig(root);
const videoDir = path.join(root, "luaScr/user/video");

describe("classify", () => {
	it("routes the aggregate archive case-insensitively", () => {
		expect(classify("TVSources.zip", config)).toEqual({ kind: "archive" });
		expect(classify("tvsources.ZIP", config)).toEqual({ kind: "archive" });
	});

	it("routes scraper playlists to the scrapers folder", () => {
		expect(classify("foo_pls.lua", config)).toEqual({
			kind: "file",
			category: "scraper",
			destination: path.join(root, "luaScr/user/TVSources/AutoSetup", "foo_pls.lua"),
			url: `${DEFAULT_SOURCES.scrapersUrl}foo_pls.lua`,
		});
	});

	it("routes the YouTube script to the video folder from the YouTube source", () => {
		expect(classify("YT.lua", config)).toEqual({
			kind: "file",
			category: "youtube",
			destination: path.join(videoDir, "YT.lua"),
			url: `${DEFAULT_SOURCES.youtubeUrl}YT.lua`,
		});
	});

	it("routes timeshift extensions to the timeshift folder", () => {
		expect(classify("wink-timeshift_ext.lua", config)).toEqual({
			kind: "file",
			category: "timeshift",
			destination: path.join(root, "luaScr/user/httptimeshift/extensions", "wink-timeshift_ext.lua"),
			url: `${DEFAULT_SOURCES.timeshiftUrl}wink-timeshift_ext.lua`,
		});
	});

	it("routes the player core into the core subfolder", () => {
		expect(classify("playerjs.lua", config)).toEqual({
			kind: "file",
			category: "core",
			destination: path.join(videoDir, "core", "playerjs.lua"),
			url: `${DEFAULT_SOURCES.videoUrl}core/playerjs.lua`,
		});
	});

	it("routes other scripts to the video folder", () => {
		expect(classify("filmix.lua", config)).toEqual({
			kind: "file",
			category: "video",
			destination: path.join(videoDir, "filmix.lua"),
			url: `${DEFAULT_SOURCES.videoUrl}filmix.lua`,
		});
	});

	it("returns unknown for names no rule matches", () => {
		expect(classify("readme.txt", config)).toEqual({ kind: "unknown", name: "readme.txt" });
		expect(classify("Other.zip", config)).toEqual({ kind: "unknown", name: "Other.zip" });
	});

	describe("rule order", () => {
		it("prefers scraper over YouTube for YT names containing the playlist marker", () => {
			const route = classify("YT.lua_pls.lua", config);
			expect(route.kind === "file" && route.category).toBe("scraper");
		});

		it("prefers YouTube over the generic extension rule", () => {
			const route = classify("YT.lua", config);
			expect(route.kind === "file" && route.category).toBe("youtube");
		});

		it("prefers timeshift over player core", () => {
			const route = classify("playerjs.lua-timeshift_ext.lua", config);
			expect(route.kind === "file" && route.category).toBe("timeshift");
		});

		it("prefers player core over the generic extension rule", () => {
			const route = classify("playerjs.lua.bak.lua", config);
			expect(route.kind === "file" && route.category).toBe("core");
		});

		it("treats prefix checks as case-sensitive", () => {
			const route = classify("yt.lua", config);
			expect(route.kind === "file" && route.category).toBe("video");
		});
	});

	it("is total over arbitrary names", () => {
		for (const name of ["x", "'", ".lua", "TVSources.zip.lua", "ütf-8.lua", "a b c"]) {
			expect(["archive", "file", "unknown"]).toContain(classify(name, config).kind);
		}
	});

	it("routes against the given root, not the working directory", () => {
		const cwd = vi.spyOn(process, "cwd").mockReturnValue(path.resolve("/elsewhere"));

		const route = classify("filmix.lua", config);

		expect(route.kind === "file" && route.destination).toBe(path.join(videoDir, "filmix.lua"));
		expect(cwd).not.toHaveBeenCalled();
		cwd.mockRestore();
	});

	it("uses overridden source URLs", () => {
		const mirror = createSyncConfig(root, { sources: { videoUrl: "https://mirror.example.com/video" } });

		const route = classify("filmix.lua", mirror);
		expect(route.kind === "file" && route.url).toBe("https://mirror.example.com/video/filmix.lua");
	});
});

describe("ROUTE_RULES", () => {
	it("lists single-file rules in priority order", () => {
		expect(ROUTE_RULES.map((rule) => rule.category)).toEqual(["scraper", "youtube", "timeshift", "core", "video"]);
	});
});

describe("isArchiveEntry", () => {
	it("matches only the exact archive name", () => {
		expect(isArchiveEntry("TVSOURCES.ZIP")).toBe(true);
		expect(isArchiveEntry("TVSources_v5.zip")).toBe(false);
	});
});
