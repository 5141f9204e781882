import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { getCliContext } from "../utils/context.js";

export const telemetryCommand = new Command("telemetry")
	.description("Manage anonymous usage telemetry")
	.argument("[action]", "on | off | status")
	.action((action: string | undefined, _options: unknown, command: Command) => {
		const { config } = getCliContext(command);

		p.intro(pc.bgCyan(pc.black(" beacon telemetry ")));

		switch (action) {
			case "on":
				config.set("disableTelemetry", false);
				p.log.success(pc.green("Telemetry enabled."));
				p.note(
					[
						"beacon reports anonymous usage data to help improve the tool.",
						"",
						`${pc.bold("What is collected:")}`,
						`  - Commands run ${pc.dim("(name and duration)")}`,
						`  - Failures ${pc.dim("(error type, message and stack frames)")}`,
						`  - Day of week, session id and CLI version`,
						"",
						`${pc.bold("Identifiers:")}`,
						`  - Your user name is sent as a SHA-512 hash`,
						`    ${pc.dim("unless disablePiiProtection is set")}`,
					].join("\n"),
					"Telemetry info",
				);
				break;

			case "off":
				config.set("disableTelemetry", true);
				p.log.info(pc.dim("Telemetry disabled."));
				break;

			case "status":
			case undefined: {
				if (config.get("disableTelemetry")) {
					p.log.info(`Telemetry: ${pc.dim("disabled")}`);
				} else {
					p.log.success(`Telemetry: ${pc.green("enabled")}`);
				}
				p.log.info(
					pc.dim(
						`Run ${pc.cyan("beacon telemetry on")} or ${pc.cyan("beacon telemetry off")} to change.`,
					),
				);
				break;
			}

			default:
				p.log.error(`Unknown action: ${pc.bold(action)}. Use "on", "off", or "status".`);
				process.exitCode = 1;
		}

		p.outro(pc.dim(config.path));
	});
