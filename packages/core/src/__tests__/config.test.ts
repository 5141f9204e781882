import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	applyConfigValue,
	CONFIG_DEFAULTS,
	createFileConfig,
	createMemoryConfig,
	isConfigKey,
	parseStoredConfig,
} from "../config/index.js";
import { BeaconError } from "../error/index.js";

describe("createMemoryConfig", () => {
	it("returns defaults for unset keys", () => {
		const config = createMemoryConfig();
		expect(config.get("disableTelemetry")).toBe(false);
		expect(config.get("applicationInsightsKey")).toBe("");
		expect(config.get("webRequestTimeoutSec")).toBe(0);
	});

	it("applies initial values and set", () => {
		const config = createMemoryConfig({ applicationInsightsKey: "test-key" });
		config.set("defaultNoStatus", true);
		expect(config.get("applicationInsightsKey")).toBe("test-key");
		expect(config.get("defaultNoStatus")).toBe(true);
	});
});

describe("parseStoredConfig", () => {
	it("keeps values of the right type", () => {
		expect(
			parseStoredConfig({
				disableTelemetry: true,
				webRequestTimeoutSec: 30,
				applicationInsightsKey: "k",
			}),
		).toEqual({ disableTelemetry: true, webRequestTimeoutSec: 30, applicationInsightsKey: "k" });
	});

	it("drops values of the wrong type and unknown keys", () => {
		expect(
			parseStoredConfig({
				disableTelemetry: "yes",
				webRequestTimeoutSec: -1,
				extra: true,
			}),
		).toEqual({});
	});

	it("reads non-objects as empty", () => {
		expect(parseStoredConfig([1, 2])).toEqual({});
		expect(parseStoredConfig(null)).toEqual({});
	});
});

describe("applyConfigValue", () => {
	it("parses booleans", () => {
		const config = createMemoryConfig();
		applyConfigValue(config, "disablePiiProtection", "yes");
		expect(config.get("disablePiiProtection")).toBe(true);
		applyConfigValue(config, "disablePiiProtection", "off");
		expect(config.get("disablePiiProtection")).toBe(false);
	});

	it("parses timeouts", () => {
		const config = createMemoryConfig();
		applyConfigValue(config, "webRequestTimeoutSec", " 15 ");
		expect(config.get("webRequestTimeoutSec")).toBe(15);
	});

	it("trims strings", () => {
		const config = createMemoryConfig();
		applyConfigValue(config, "applicationInsightsKey", "  test-key ");
		expect(config.get("applicationInsightsKey")).toBe("test-key");
	});

	it("rejects malformed values", () => {
		const config = createMemoryConfig();
		expect(() => applyConfigValue(config, "disableTelemetry", "maybe")).toThrow(BeaconError);
		expect(() => applyConfigValue(config, "webRequestTimeoutSec", "1.5")).toThrow(
			'"webRequestTimeoutSec" expects a non-negative integer, got "1.5"',
		);
	});

	it("rejects unknown keys", () => {
		const config = createMemoryConfig();
		expect(() => applyConfigValue(config, "colour", "red")).toThrow(/Unknown configuration key "colour"/);
	});
});

describe("isConfigKey", () => {
	it("recognizes every key", () => {
		for (const key of Object.keys(CONFIG_DEFAULTS)) {
			expect(isConfigKey(key)).toBe(true);
		}
		expect(isConfigKey("nope")).toBe(false);
	});
});

describe("createFileConfig", () => {
	let dir: string;
	let path: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "beacon-config-"));
		path = join(dir, "nested", "config.json");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("reads defaults when the file does not exist", () => {
		const config = createFileConfig({ path, env: {} });
		expect(config.get("disableTelemetry")).toBe(false);
		expect(config.path).toBe(path);
	});

	it("writes through on set, creating the directory", () => {
		const config = createFileConfig({ path, env: {} });
		config.set("disableTelemetry", true);

		expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({ disableTelemetry: true });
		expect(createFileConfig({ path, env: {} }).get("disableTelemetry")).toBe(true);
	});

	it("reads a corrupt file as empty", () => {
		const file = join(dir, "config.json");
		writeFileSync(file, "{ not json", "utf-8");
		expect(createFileConfig({ path: file, env: {} }).get("webRequestTimeoutSec")).toBe(0);
	});

	it("lets DO_NOT_TRACK override the stored value", () => {
		const config = createFileConfig({ path, env: { DO_NOT_TRACK: "1" } });
		config.set("disableTelemetry", false);
		expect(config.get("disableTelemetry")).toBe(true);
	});

	it("takes the instrumentation key from the environment", () => {
		const config = createFileConfig({
			path,
			env: { BEACON_APPLICATION_INSIGHTS_KEY: "env-key" },
		});
		expect(config.get("applicationInsightsKey")).toBe("env-key");
	});
});
