/**
 * Component-tagged logger for the layout engine.
 * Writes to stderr and, when LAYOUT_LENS_LOG_FILE is set, appends to that file.
 * LAYOUT_LENS_LOG_LEVEL selects the threshold (debug|info|warn|error|silent).
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

const MAX_DATA_LENGTH = 2000;

function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value);
}

export function getLogLevel(): LogLevel {
	const raw = process.env.LAYOUT_LENS_LOG_LEVEL?.toLowerCase();
	return raw && isLogLevel(raw) ? raw : "info";
}

export function getLogPath(): string | undefined {
	return process.env.LAYOUT_LENS_LOG_FILE || undefined;
}

function timestamp(): string {
	return new Date().toISOString();
}

export function formatMessage(level: string, component: string, message: string, data?: unknown, ts: string = timestamp()): string {
	let line = `[${ts}] [${level}] [${component}] ${message}`;
	if (data !== undefined) {
		try {
			const dataStr = typeof data === "string" ? data : JSON.stringify(data, null, 2);
			// Truncate very long data
			const truncated = dataStr.length > MAX_DATA_LENGTH ? dataStr.slice(0, MAX_DATA_LENGTH) + "... (truncated)" : dataStr;
			line += `\n  DATA: ${truncated}`;
		} catch {
			line += `\n  DATA: [unserializable]`;
		}
	}
	return line + "\n";
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
	return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}

function writeToFile(line: string): void {
	const file = getLogPath();
	if (!file) return;
	try {
		mkdirSync(dirname(file), { recursive: true });
		appendFileSync(file, line);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		console.error(`[layout-lens] Cannot write log file ${file}: ${reason}`);
	}
}

function serializeError(error: unknown): unknown {
	if (error instanceof Error) {
		return { name: error.name, message: error.message, stack: error.stack };
	}
	return error;
}

export function log(component: string, message: string, data?: unknown): void {
	if (!shouldLog("info")) return;
	writeToFile(formatMessage("INFO", component, message, data));
	console.error(`[layout-lens] ${message}`);
}

export function logWarn(component: string, message: string, data?: unknown): void {
	if (!shouldLog("warn")) return;
	writeToFile(formatMessage("WARN", component, message, data));
	console.error(`[layout-lens] WARN: ${message}`);
}

export function logError(component: string, message: string, error?: unknown): void {
	if (!shouldLog("error")) return;
	writeToFile(formatMessage("ERROR", component, message, serializeError(error)));
	console.error(`[layout-lens] ERROR: ${message}`);
}

/** Debug entries go to the log file only. */
export function logDebug(component: string, message: string, data?: unknown): void {
	if (!shouldLog("debug")) return;
	writeToFile(formatMessage("DEBUG", component, message, data));
}
