import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as logger from "./logger.js";
import { formatMessage, getLogLevel, log, logDebug, logError } from "./logger.js";

const TS = "2024-01-01T00:00:00.000Z";

describe("formatMessage", () => {
	it("formats a plain line", () => {
		expect(formatMessage("INFO", "analyzer", "hello", undefined, TS)).toBe(
			"[2024-01-01T00:00:00.000Z] [INFO] [analyzer] hello\n",
		);
	});

	it("appends JSON data", () => {
		expect(formatMessage("WARN", "slots", "skipped", { a: 1 }, TS)).toBe(
			'[2024-01-01T00:00:00.000Z] [WARN] [slots] skipped\n  DATA: {\n  "a": 1\n}\n',
		);
	});

	it("truncates long data", () => {
		const line = formatMessage("DEBUG", "collector", "long", "x".repeat(2500), TS);
		expect(line).toBe(`[${TS}] [DEBUG] [collector] long\n  DATA: ${"x".repeat(2000)}... (truncated)\n`);
	});

	it("marks data that cannot be serialized", () => {
		const circular: { self?: unknown } = {};
		circular.self = circular;
		expect(formatMessage("ERROR", "analyzer", "boom", circular, TS)).toBe(
			`[${TS}] [ERROR] [analyzer] boom\n  DATA: [unserializable]\n`,
		);
	});
});

describe("logger exports", () => {
	it("exposes only the level helpers and sinks", () => {
		expect(Object.keys(logger).sort()).toEqual([
			"formatMessage",
			"getLogLevel",
			"getLogPath",
			"log",
			"logDebug",
			"logError",
			"logWarn",
		]);
	});
});

describe("log sinks", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "layout-lens-log-"));
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		vi.restoreAllMocks();
		rmSync(dir, { recursive: true, force: true });
	});

	it("falls back to info for unknown levels", () => {
		vi.stubEnv("LAYOUT_LENS_LOG_LEVEL", "constructor");
		expect(getLogLevel()).toBe("info");
		vi.stubEnv("LAYOUT_LENS_LOG_LEVEL", "WARN");
		expect(getLogLevel()).toBe("warn");
	});

	it("writes to stderr at or above the level", () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
		vi.stubEnv("LAYOUT_LENS_LOG_LEVEL", "info");
		log("analyzer", "started");
		logError("analyzer", "failed", new Error("boom"));
		expect(stderr.mock.calls).toEqual([["[layout-lens] started"], ["[layout-lens] ERROR: failed"]]);
	});

	it("stays quiet when silent", () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
		vi.stubEnv("LAYOUT_LENS_LOG_LEVEL", "silent");
		log("analyzer", "started");
		logError("analyzer", "failed");
		expect(stderr).not.toHaveBeenCalled();
	});

	it("appends debug entries to the log file", () => {
		const file = join(dir, "nested", "engine.log");
		vi.stubEnv("LAYOUT_LENS_LOG_LEVEL", "debug");
		vi.stubEnv("LAYOUT_LENS_LOG_FILE", file);
		logDebug("collector", "skipped element", { n: 1 });
		logDebug("collector", "second");
		const lines = readFileSync(file, "utf-8").split("\n");
		expect(lines[0]).toMatch(/^\[.+\] \[DEBUG\] \[collector\] skipped element$/);
		expect(lines.slice(1, 4)).toEqual(["  DATA: {", '  "n": 1', "}"]);
		expect(lines[4]).toMatch(/^\[.+\] \[DEBUG\] \[collector\] second$/);
	});

	it("reports a log file that cannot be written", () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
		const blocker = join(dir, "blocker");
		writeFileSync(blocker, "");
		vi.stubEnv("LAYOUT_LENS_LOG_LEVEL", "info");
		vi.stubEnv("LAYOUT_LENS_LOG_FILE", join(blocker, "engine.log"));
		expect(() => log("analyzer", "started")).not.toThrow();
		expect(stderr).toHaveBeenCalledWith(expect.stringContaining("Cannot write log file"));
		expect(stderr).toHaveBeenLastCalledWith("[layout-lens] started");
	});
});
