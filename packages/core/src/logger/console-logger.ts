// =============================================================================
// CONSOLE LOGGER: human-readable BeaconLogger backed by console.*
// =============================================================================

import type { BeaconLogger, LogLevel } from "../types/config.js";
import { renderCell } from "../utils/format-table.js";
import { bold, cyan, dim, gray, red, yellow } from "./colors.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: gray,
	info: cyan,
	warn: yellow,
	error: red,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"beacon"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys whose values are replaced with "[REDACTED]" in log data. */
	redactKeys?: string[];
}

function renderValue(value: unknown): string {
	if (value instanceof Error) return `${value.name}: ${value.message}`;
	return renderCell(value);
}

/** `key=value` pairs on the log line; undefined values are left out. */
function renderData(data: Record<string, unknown>): string {
	return Object.entries(data)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${renderValue(value)}`)
		.join(" ");
}

/**
 * Create a console-based logger. Log data is appended to the line as
 * `key=value` pairs; errors render as `Name: message`, with the stack on
 * following lines when the logger is at `debug`.
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger({ level: "debug" });
 * logger.warn("Telemetry could not be sent", { event: "cli.send", error });
 * // WARN  [beacon]: Telemetry could not be sent event=cli.send error=TypeError: fetch failed
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): BeaconLogger {
	const { level = "info", prefix = "beacon", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function format(lvl: LogLevel, message: string, data?: Record<string, unknown>): string {
		const head = [
			...(timestamps ? [dim(new Date().toISOString())] : []),
			LEVEL_COLOR[lvl](bold(lvl.toUpperCase().padEnd(5))),
			`[${prefix}]:`,
			message,
		];
		const safeData = redactData(data, redactKeys);
		if (!safeData) return head.join(" ");

		const pairs = renderData(safeData);
		const line = pairs ? `${head.join(" ")} ${dim(pairs)}` : head.join(" ");
		const { error } = safeData;
		if (level === "debug" && error instanceof Error && error.stack) {
			return `${line}\n${dim(error.stack)}`;
		}
		return line;
	}

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;
		const line = format(lvl, message, data);
		if (lvl === "error") console.error(line);
		else if (lvl === "warn") console.warn(line);
		else console.log(line);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
