export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { isLogLevel, LOG_LEVELS } from "./levels.js";

import type { BeaconLogger } from "../types/config.js";

/** Logger that drops everything. */
export const silentLogger: BeaconLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
