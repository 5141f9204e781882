export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger consumed by every beacon package. `debug` is the verbose channel.
 * An exception travels in `data.error`.
 */
export interface BeaconLogger {
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
}

export interface BeaconConfig {
	/** Skip all telemetry. Default: false */
	disableTelemetry: boolean;
	/** Send user names and other identifiers in clear text. Default: false */
	disablePiiProtection: boolean;
	/** Do not print the "telemetry is enabled" reminder. Default: false */
	suppressTelemetryReminder: boolean;
	/** Application Insights instrumentation key events are sent under. */
	applicationInsightsKey: string;
	/** HTTP timeout per delivery attempt, in seconds. 0 disables the timeout. */
	webRequestTimeoutSec: number;
	/** Deliver on the caller's context without a progress indicator. Default: false */
	defaultNoStatus: boolean;
}

export type BeaconConfigKey = keyof BeaconConfig;

/** Key/value access to configuration. */
export interface ConfigProvider {
	get<K extends BeaconConfigKey>(key: K): BeaconConfig[K];
	set<K extends BeaconConfigKey>(key: K, value: BeaconConfig[K]): void;
}
