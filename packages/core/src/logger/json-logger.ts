// =============================================================================
// JSON LOGGER: one JSON object per line, for CI and log shippers
// =============================================================================

import type { BeaconLogger, LogLevel } from "../types/config.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"beacon"` */
	service?: string;
	/** Keys whose values are replaced with "[REDACTED]" in log data. */
	redactKeys?: string[];
}

function serializeValue(value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	return value;
}

/**
 * Create a structured JSON logger. `warn` and `error` entries go to stderr,
 * everything else to stdout.
 *
 * @example
 * ```ts
 * const logger = createJsonLogger({ level: "debug", service: "beacon-cli" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): BeaconLogger {
	const { level = "info", service = "beacon" } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
		};
		const safeData = redactData(data, redactKeys);
		if (safeData) {
			for (const [key, value] of Object.entries(safeData)) {
				entry[key] = serializeValue(value);
			}
		}

		const stream = LEVEL_PRIORITY[lvl] >= LEVEL_PRIORITY.warn ? process.stderr : process.stdout;
		stream.write(`${JSON.stringify(entry)}\n`);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
