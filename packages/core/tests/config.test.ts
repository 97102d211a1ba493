import { describe, it, expect } from "vitest";
import * as path from "node:path";
import {
	createSyncConfig,
	DEFAULT_DOWNLOAD_TIMEOUT,
	DEFAULT_RELEASE_TIMEOUT,
	DEFAULT_SOURCES,
} from "../src/config/sync-config.js";

describe("createSyncConfig", () => {
	it("lays out folders under the installation root", () => {
		const root = path.resolve("/opt/simpletv");
		const config = createSyncConfig(root);

		expect(config.layout).toEqual({
			root,
			videoDir: path.join(root, "luaScr", "user", "video"),
			scrapersDir: path.join(root, "luaScr", "user", "TVSources", "AutoSetup"),
			timeshiftDir: path.join(root, "luaScr", "user", "httptimeshift", "extensions"),
		});
	});

	it("resolves a relative root", () => {
		expect(createSyncConfig("simpletv").layout.root).toBe(path.resolve("simpletv"));
	});

	it("uses the default sources and timeouts", () => {
		const config = createSyncConfig("/opt/simpletv");

		expect(config.sources).toEqual(DEFAULT_SOURCES);
		expect(config.releaseTimeout).toBe(DEFAULT_RELEASE_TIMEOUT);
		expect(config.downloadTimeout).toBe(DEFAULT_DOWNLOAD_TIMEOUT);
		expect(DEFAULT_RELEASE_TIMEOUT).toBe(10_000);
		expect(DEFAULT_DOWNLOAD_TIMEOUT).toBe(15_000);
	});

	it("applies overrides and adds a trailing slash to base URLs", () => {
		const config = createSyncConfig("/opt/simpletv", {
			sources: { youtubeUrl: "https://mirror.example.com/yt", releaseEndpoint: "https://mirror.example.com/latest" },
			downloadTimeout: 500,
		});

		expect(config.sources.youtubeUrl).toBe("https://mirror.example.com/yt/");
		expect(config.sources.releaseEndpoint).toBe("https://mirror.example.com/latest");
		expect(config.sources.videoUrl).toBe(DEFAULT_SOURCES.videoUrl);
		expect(config.downloadTimeout).toBe(500);
		expect(config.releaseTimeout).toBe(DEFAULT_RELEASE_TIMEOUT);
	});
});
