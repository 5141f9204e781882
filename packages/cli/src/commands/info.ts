import { arch, platform, release } from "node:os";
import { CONFIG_KEYS } from "@beacon/core";
import { currentUsername, INGESTION_ENDPOINT, SDK_VERSION } from "@beacon/telemetry";
import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { getCliContext } from "../utils/context.js";

export const infoCommand = new Command("info")
	.description("Show environment and telemetry information")
	.option("--json", "Output as JSON")
	.action((options: { json?: boolean }, command: Command) => {
		const { config, telemetry, version } = getCliContext(command);

		const settings: Record<string, unknown> = {};
		for (const key of CONFIG_KEYS) {
			settings[key] = key === "applicationInsightsKey" && config.get(key) ? "[SET]" : config.get(key);
		}

		const info = {
			system: {
				os: `${platform()} ${arch()}`,
				osVersion: release(),
				node: process.version,
			},
			beacon: {
				version,
				sdkVersion: SDK_VERSION,
				endpoint: INGESTION_ENDPOINT,
				configFile: config.path,
				sessionId: telemetry.events.session(),
				userId: telemetry.redact(currentUsername()),
			},
			settings,
		};

		if (options.json) {
			process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" beacon info ")));
		p.note(
			[
				`${pc.bold("OS:")}        ${info.system.os} (${info.system.osVersion})`,
				`${pc.bold("Node:")}      ${info.system.node}`,
			].join("\n"),
			"System",
		);
		p.note(
			[
				`${pc.bold("Version:")}   v${info.beacon.version}`,
				`${pc.bold("SDK:")}       ${info.beacon.sdkVersion}`,
				`${pc.bold("Endpoint:")}  ${info.beacon.endpoint}`,
				`${pc.bold("Config:")}    ${info.beacon.configFile}`,
				`${pc.bold("Session:")}   ${info.beacon.sessionId}`,
				`${pc.bold("User id:")}   ${info.beacon.userId}`,
			].join("\n"),
			"Beacon",
		);
		p.outro(pc.dim("Run with --json for machine-readable output"));
	});
