export type {
	BeaconConfig,
	BeaconConfigKey,
	BeaconLogger,
	ConfigProvider,
	LogLevel,
} from "./config.js";
