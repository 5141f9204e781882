import type { BeaconConfig, BeaconConfigKey, ConfigProvider } from "../types/config.js";
import { CONFIG_DEFAULTS } from "./schema.js";

/** In-memory ConfigProvider, for embedding hosts and tests. */
export function createMemoryConfig(initial: Partial<BeaconConfig> = {}): ConfigProvider {
	const values: BeaconConfig = { ...CONFIG_DEFAULTS, ...initial };

	return {
		get: (key) => values[key],
		set<K extends BeaconConfigKey>(key: K, value: BeaconConfig[K]): void {
			values[key] = value;
		},
	};
}
