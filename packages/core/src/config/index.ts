export { createMemoryConfig } from "./memory.js";
export {
	applyConfigValue,
	CONFIG_DEFAULTS,
	CONFIG_KEYS,
	isConfigKey,
	parseStoredConfig,
} from "./schema.js";
export {
	createFileConfig,
	type FileConfigOptions,
	getDefaultConfigPath,
	readStoredConfig,
	writeStoredConfig,
} from "./storage.js";
