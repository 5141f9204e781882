// Configuration
export * from "./config/index.js";

// Errors
export type { BaseErrorCode, BeaconErrorOptions, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, BeaconError } from "./error/index.js";

// Logging
export * from "./logger/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
