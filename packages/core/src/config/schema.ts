// =============================================================================
// CONFIG SCHEMA: defaults and runtime validation of stored values
// =============================================================================
// Stored configuration is untrusted JSON. Values with the wrong type are
// dropped so the default applies.

import { BeaconError } from "../error/index.js";
import type { BeaconConfig, BeaconConfigKey, ConfigProvider } from "../types/config.js";

export const CONFIG_DEFAULTS: Readonly<BeaconConfig> = Object.freeze({
	disableTelemetry: false,
	disablePiiProtection: false,
	suppressTelemetryReminder: false,
	applicationInsightsKey: "",
	webRequestTimeoutSec: 0,
	defaultNoStatus: false,
});

const BOOLEAN_KEYS = [
	"disableTelemetry",
	"disablePiiProtection",
	"suppressTelemetryReminder",
	"defaultNoStatus",
] as const satisfies readonly BeaconConfigKey[];
const NUMBER_KEYS = ["webRequestTimeoutSec"] as const satisfies readonly BeaconConfigKey[];
const STRING_KEYS = ["applicationInsightsKey"] as const satisfies readonly BeaconConfigKey[];

type BooleanKey = (typeof BOOLEAN_KEYS)[number];
type NumberKey = (typeof NUMBER_KEYS)[number];
type StringKey = (typeof STRING_KEYS)[number];

export const CONFIG_KEYS: readonly BeaconConfigKey[] = [...BOOLEAN_KEYS, ...NUMBER_KEYS, ...STRING_KEYS];

function isBooleanKey(key: string): key is BooleanKey {
	return BOOLEAN_KEYS.some((k) => k === key);
}

function isNumberKey(key: string): key is NumberKey {
	return NUMBER_KEYS.some((k) => k === key);
}

function isStringKey(key: string): key is StringKey {
	return STRING_KEYS.some((k) => k === key);
}

export function isConfigKey(key: string): key is BeaconConfigKey {
	return isBooleanKey(key) || isNumberKey(key) || isStringKey(key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimeout(value: number): boolean {
	return Number.isInteger(value) && value >= 0;
}

/** Keep only the entries of `raw` whose type matches the key. */
export function parseStoredConfig(raw: unknown): Partial<BeaconConfig> {
	if (!isRecord(raw)) return {};

	const parsed: Partial<BeaconConfig> = {};
	for (const key of BOOLEAN_KEYS) {
		const value = raw[key];
		if (typeof value === "boolean") parsed[key] = value;
	}
	for (const key of NUMBER_KEYS) {
		const value = raw[key];
		if (typeof value === "number" && isTimeout(value)) parsed[key] = value;
	}
	for (const key of STRING_KEYS) {
		const value = raw[key];
		if (typeof value === "string") parsed[key] = value;
	}
	return parsed;
}

function parseBoolean(key: string, text: string): boolean {
	const normalized = text.trim().toLowerCase();
	if (["true", "1", "yes", "on"].includes(normalized)) return true;
	if (["false", "0", "no", "off"].includes(normalized)) return false;
	throw BeaconError.invalidConfig(`"${key}" expects a boolean, got "${text}"`);
}

function parseTimeout(key: string, text: string): number {
	const value = Number(text.trim());
	if (text.trim() === "" || !isTimeout(value)) {
		throw BeaconError.invalidConfig(`"${key}" expects a non-negative integer, got "${text}"`);
	}
	return value;
}

/**
 * Parse `text` according to the type of `key` and store it.
 * Throws INVALID_CONFIG for unknown keys or values of the wrong shape.
 */
export function applyConfigValue(provider: ConfigProvider, key: string, text: string): void {
	if (isBooleanKey(key)) {
		provider.set(key, parseBoolean(key, text));
	} else if (isNumberKey(key)) {
		provider.set(key, parseTimeout(key, text));
	} else if (isStringKey(key)) {
		provider.set(key, text.trim());
	} else {
		throw BeaconError.invalidConfig(
			`Unknown configuration key "${key}". Known keys: ${CONFIG_KEYS.join(", ")}`,
		);
	}
}
