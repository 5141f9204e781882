// =============================================================================
// CLI context: one config, logger and telemetry service per process
// =============================================================================

import {
	type BeaconLogger,
	type ConfigProvider,
	createConsoleLogger,
	createFileConfig,
	createJsonLogger,
	type LogLevel,
} from "@beacon/core";
import { createTelemetry, type ProgressReporter, type Telemetry } from "@beacon/telemetry";
import * as p from "@clack/prompts";
import type { Command } from "commander";
import { readCliVersion } from "./version.js";

export interface GlobalOptions {
	logLevel: LogLevel;
	jsonLogs?: boolean;
	configFile?: string;
}

export interface CliContext {
	version: string;
	config: ConfigProvider & { readonly path: string };
	logger: BeaconLogger;
	telemetry: Telemetry;
}

const REMINDER =
	"beacon sends anonymous usage telemetry. Run `beacon telemetry off` to disable it, or `beacon config suppressTelemetryReminder true` to hide this message.";

function spinnerProgress(): ProgressReporter {
	const spinner = p.spinner();
	return {
		start: (message) => spinner.start(message),
		stop: (message) => spinner.stop(message),
	};
}

let context: CliContext | undefined;

/** Build the context from the root command's options on first use. */
export function getCliContext(command: Command): CliContext {
	if (context) return context;

	const options = command.optsWithGlobals<GlobalOptions>();
	const version = readCliVersion();
	const config = createFileConfig({ path: options.configFile });
	const logger = options.jsonLogs
		? createJsonLogger({ level: options.logLevel, service: "beacon-cli" })
		: createConsoleLogger({ level: options.logLevel, timestamps: false });
	const interactive = process.stdout.isTTY === true && !options.jsonLogs;

	context = {
		version,
		config,
		logger,
		telemetry: createTelemetry({
			config,
			logger,
			logLevel: options.logLevel,
			moduleVersion: version,
			reminder: REMINDER,
			progress: interactive ? spinnerProgress() : undefined,
		}),
	};
	return context;
}
