// =============================================================================
// CONFIG STORAGE: persists settings in ~/.beacon/config.json
// =============================================================================

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import type { BeaconConfig, BeaconConfigKey, ConfigProvider } from "../types/config.js";
import { CONFIG_DEFAULTS, parseStoredConfig } from "./schema.js";

export function getDefaultConfigPath(): string {
	return join(homedir(), ".beacon", "config.json");
}

/** Read stored settings. A missing or unreadable file reads as empty. */
export function readStoredConfig(path: string): Partial<BeaconConfig> {
	if (!existsSync(path)) return {};

	try {
		return parseStoredConfig(JSON.parse(readFileSync(path, "utf-8")));
	} catch {
		return {};
	}
}

export function writeStoredConfig(path: string, values: Partial<BeaconConfig>): void {
	const dir = dirname(path);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true });
	}
	writeFileSync(path, `${JSON.stringify(values, null, 2)}\n`, "utf-8");
}

export interface FileConfigOptions {
	/** Settings file. Default: `~/.beacon/config.json` */
	path?: string;
	/** Environment used for overrides. Default: `process.env` */
	env?: NodeJS.ProcessEnv;
}

/**
 * Environment overrides win over stored values:
 * - `BEACON_DISABLE_TELEMETRY=1` or `DO_NOT_TRACK=1` disable telemetry
 * - `BEACON_APPLICATION_INSIGHTS_KEY` supplies the instrumentation key
 */
function environmentOverrides(env: NodeJS.ProcessEnv): Partial<BeaconConfig> {
	const overrides: Partial<BeaconConfig> = {};
	if (env.BEACON_DISABLE_TELEMETRY === "1" || env.DO_NOT_TRACK === "1") {
		overrides.disableTelemetry = true;
	}
	if (env.BEACON_APPLICATION_INSIGHTS_KEY) {
		overrides.applicationInsightsKey = env.BEACON_APPLICATION_INSIGHTS_KEY;
	}
	return overrides;
}

/**
 * File-backed ConfigProvider. The file is read once; `set` writes through.
 */
export function createFileConfig(options: FileConfigOptions = {}): ConfigProvider & {
	readonly path: string;
} {
	const path = options.path ?? getDefaultConfigPath();
	const overrides = environmentOverrides(options.env ?? process.env);
	let stored: Partial<BeaconConfig> | undefined;

	function load(): Partial<BeaconConfig> {
		stored ??= readStoredConfig(path);
		return stored;
	}

	return {
		path,
		get<K extends BeaconConfigKey>(key: K): BeaconConfig[K] {
			const values: BeaconConfig = { ...CONFIG_DEFAULTS, ...load(), ...overrides };
			return values[key];
		},
		set<K extends BeaconConfigKey>(key: K, value: BeaconConfig[K]): void {
			const next: Partial<BeaconConfig> = { ...load() };
			next[key] = value;
			writeStoredConfig(path, next);
			stored = next;
		},
	};
}
