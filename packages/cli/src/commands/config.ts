import { applyConfigValue, CONFIG_KEYS, isConfigKey } from "@beacon/core";
import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { getCliContext } from "../utils/context.js";

function display(value: unknown): string {
	return typeof value === "string" && value === "" ? pc.dim("(not set)") : String(value);
}

export const configCommand = new Command("config")
	.description("Show or change beacon settings")
	.argument("[key]", `Setting name (${CONFIG_KEYS.join(", ")})`)
	.argument("[value]", "New value")
	.action(
		(key: string | undefined, value: string | undefined, _options: unknown, command: Command) => {
			const { config } = getCliContext(command);

			if (key === undefined) {
				const width = Math.max(...CONFIG_KEYS.map((k) => k.length));
				const lines = CONFIG_KEYS.map(
					(k) => `${pc.bold(k.padEnd(width))}  ${display(config.get(k))}`,
				);
				p.note(lines.join("\n"), config.path);
				return;
			}

			if (value === undefined) {
				if (!isConfigKey(key)) {
					p.log.error(`Unknown setting: ${pc.bold(key)}`);
					process.exitCode = 1;
					return;
				}
				process.stdout.write(`${String(config.get(key))}\n`);
				return;
			}

			applyConfigValue(config, key, value);
			p.log.success(`${pc.bold(key)} = ${display(value.trim())}`);
		},
	);
