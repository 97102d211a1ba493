import { beforeAll, describe, expect, it } from "vitest";
import chalk from "chalk";
import { createConsoleReporter, formatLine, isLogLevel, shouldLog } from "../../utils/log.js";

describe("log utils", () => {
	beforeAll(() => {
		chalk.level = 0;
	});

	it("recognises log levels", () => {
		expect(isLogLevel("warning")).toBe(true);
		expect(isLogLevel("debug")).toBe(false);
		expect(isLogLevel(2)).toBe(false);
	});

	it("filters severities by level", () => {
		expect(shouldLog("error", "error")).toBe(true);
		expect(shouldLog("warning", "error")).toBe(false);
		expect(shouldLog("warning", "warning")).toBe(true);
		expect(shouldLog("success", "warning")).toBe(false);
		expect(shouldLog("header", "info")).toBe(true);
	});

	it("formats each severity", () => {
		expect(formatLine("Starting", "header")).toBe("Starting");
		expect(formatLine("Downloaded: a.lua", "success")).toBe("  ✓ Downloaded: a.lua");
		expect(formatLine("Skipped", "warning")).toBe("  ! Skipped");
		expect(formatLine("Failed", "error")).toBe("  ✗ Failed");
		expect(formatLine("Downloading: a.lua", "info")).toBe("  ~ Downloading: a.lua");
	});

	it("prints progress counters before each entry only", () => {
		const lines: string[] = [];
		const reporter = createConsoleReporter({ level: "info", write: (line) => lines.push(line) });

		reporter.onProgress?.(0, 2);
		reporter.onProgress?.(1, 2);
		reporter.onProgress?.(2, 2);

		expect(lines).toEqual(["[1/2]", "[2/2]"]);
	});

	it("drops messages below the configured level", () => {
		const lines: string[] = [];
		const reporter = createConsoleReporter({ level: "warning", write: (line) => lines.push(line) });

		reporter.onProgress?.(0, 1);
		reporter.onLog?.("Downloading: a.lua", "info");
		reporter.onLog?.("Unrecognized file type: a.txt. Skipped.", "warning");
		reporter.onLog?.("Failed to download b.lua: HTTP 404: url", "error");

		expect(lines).toEqual(["  ! Unrecognized file type: a.txt. Skipped.", "  ✗ Failed to download b.lua: HTTP 404: url"]);
	});
});
