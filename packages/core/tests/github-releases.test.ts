import { describe, it, expect, vi, beforeEach } from "vitest";
import { NetworkError } from "../src/errors.js";

const mockRelease = {
	tag_name: "v5.0",
	assets: [
		{ name: "SimpleTV_setup.exe", browser_download_url: "https://github.com/owner/repo/releases/download/v5.0/SimpleTV_setup.exe" },
		{ name: "TVSources_v5.zip", browser_download_url: "https://github.com/owner/repo/releases/download/v5.0/TVSources_v5.zip" },
		{ name: "tvsources-extra.zip", browser_download_url: "https://github.com/owner/repo/releases/download/v5.0/tvsources-extra.zip" },
	],
};

vi.mock("../src/http/index.js", () => ({
	fetchJson: vi.fn(),
}));

import { fetchJson } from "../src/http/index.js";
import { parseReleaseAssets, resolveLatestArchive, selectArchiveAsset } from "../src/github/releases.js";

describe("selectArchiveAsset", () => {
	it("picks the first zip whose name contains tvsources", () => {
		expect(selectArchiveAsset(mockRelease.assets)).toEqual({
			name: "TVSources_v5.zip",
			downloadUrl: "https://github.com/owner/repo/releases/download/v5.0/TVSources_v5.zip",
		});
	});

	it("matches case-insensitively", () => {
		const asset = selectArchiveAsset([{ name: "TVSOURCES.ZIP", browser_download_url: "https://example.com/a" }]);

		expect(asset?.name).toBe("TVSOURCES.ZIP");
	});

	it("skips malformed sibling assets", () => {
		const asset = selectArchiveAsset([
			null,
			{ browser_download_url: "https://example.com/unnamed" },
			{ name: "notes.txt" },
			{ name: "TVSources_v5.zip", browser_download_url: "https://example.com/TVSources_v5.zip" },
		]);

		expect(asset).toEqual({ name: "TVSources_v5.zip", downloadUrl: "https://example.com/TVSources_v5.zip" });
	});

	it("rejects a matching asset without a download URL", () => {
		expect(() => selectArchiveAsset([{ name: "TVSources_v5.zip" }], "https://api.example.com")).toThrow(
			'Malformed release response from https://api.example.com: asset "TVSources_v5.zip" has no download URL',
		);
	});

	it("returns null when nothing matches", () => {
		expect(
			selectArchiveAsset([
				{ name: "TVSources.7z", browser_download_url: "https://example.com/a" },
				{ name: "scripts.zip", browser_download_url: "https://example.com/b" },
			]),
		).toBeNull();
	});
});

describe("parseReleaseAssets", () => {
	it("rejects a body without an assets list", () => {
		expect(() => parseReleaseAssets({ message: "Not Found" }, "https://api.example.com")).toThrow(NetworkError);
		expect(() => parseReleaseAssets([], "https://api.example.com")).toThrow(NetworkError);
	});

	it("returns assets without validating each entry", () => {
		const assets = [{ name: "notes.txt" }, 42];

		expect(parseReleaseAssets({ assets }, "https://api.example.com")).toEqual(assets);
	});

	it("accepts an empty assets list", () => {
		expect(parseReleaseAssets({ assets: [] }, "https://api.example.com")).toEqual([]);
	});
});

describe("resolveLatestArchive", () => {
	beforeEach(() => {
		vi.resetAllMocks();
	});

	it("queries the endpoint with the given timeout", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce(mockRelease);

		const asset = await resolveLatestArchive({ endpoint: "https://api.example.com/latest", timeout: 1234 });

		expect(asset?.name).toBe("TVSources_v5.zip");
		expect(fetchJson).toHaveBeenCalledWith("https://api.example.com/latest", {
			timeout: 1234,
			headers: { Accept: "application/vnd.github.v3+json" },
		});
	});

	it("defaults to a 10 second timeout", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce({ assets: [] });

		await resolveLatestArchive({ endpoint: "https://api.example.com/latest" });

		expect(vi.mocked(fetchJson).mock.calls[0]?.[1].timeout).toBe(10_000);
	});

	it("resolves the archive when another asset is malformed", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce({
			assets: [{ name: "notes.txt" }, { name: "TVSources_v5.zip", browser_download_url: "http://x/TVSources_v5.zip" }],
		});

		expect(await resolveLatestArchive({ endpoint: "https://api.example.com/latest" })).toEqual({
			name: "TVSources_v5.zip",
			downloadUrl: "http://x/TVSources_v5.zip",
		});
	});

	it("throws NetworkError when the matching asset has no download URL", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce({ assets: [{ name: "TVSources_v5.zip" }] });

		await expect(resolveLatestArchive({ endpoint: "https://api.example.com/latest" })).rejects.toBeInstanceOf(
			NetworkError,
		);
	});

	it("returns null when the release has no archive", async () => {
		vi.mocked(fetchJson).mockResolvedValueOnce({ assets: [] });

		expect(await resolveLatestArchive()).toBeNull();
	});

	it("propagates network errors", async () => {
		vi.mocked(fetchJson).mockRejectedValueOnce(new NetworkError("Request timed out after 10000ms"));

		await expect(resolveLatestArchive()).rejects.toThrow("Request timed out after 10000ms");
	});

	it("queries again on every call", async () => {
		vi.mocked(fetchJson).mockResolvedValue(mockRelease);

		await resolveLatestArchive();
		await resolveLatestArchive();

		expect(fetchJson).toHaveBeenCalledTimes(2);
	});
});
