#!/usr/bin/env node
import "dotenv/config";
import { LOG_LEVELS } from "@beacon/core";
import { Command, Option } from "commander";
import pc from "picocolors";
import { configCommand } from "./commands/config.js";
import { infoCommand } from "./commands/info.js";
import { sendCommand } from "./commands/send.js";
import { telemetryCommand } from "./commands/telemetry.js";
import { getCliContext } from "./utils/context.js";
import { readCliVersion } from "./utils/version.js";

// Graceful shutdown
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const cliVersion = readCliVersion();

const BANNER = `
  ${pc.bold(pc.cyan("beacon"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Best-effort usage telemetry for Application Insights")}
`;

const startedAt = new Map<Command, number>();

const program = new Command()
	.name("beacon")
	.description("CLI for beacon: usage and failure telemetry")
	.version(cliVersion, "-v, --version")
	.addOption(new Option("--log-level <level>", "Minimum log level").choices(LOG_LEVELS).default("info"))
	.option("--json-logs", "Write logs as JSON lines")
	.option("--config-file <path>", "Settings file (default: ~/.beacon/config.json)")
	.action(() => {
		console.log(BANNER);
		program.help();
	})
	.hook("preAction", (_root, actionCommand) => {
		startedAt.set(actionCommand, performance.now());
	})
	.hook("postAction", async (_root, actionCommand) => {
		if (actionCommand === program) return;
		const { telemetry } = getCliContext(actionCommand);
		const name = actionCommand.name();
		const started = startedAt.get(actionCommand) ?? performance.now();
		await telemetry.emitEvent(
			`cli.${name}`,
			{ Command: name },
			{ DurationMs: Math.round(performance.now() - started) },
		);
	});

program.addCommand(sendCommand);
program.addCommand(configCommand);
program.addCommand(infoCommand);
program.addCommand(telemetryCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && String(error.code).startsWith("commander.")) {
		// Commander already printed the usage error
		process.exit(1);
	}

	const message = error instanceof Error ? error.message : String(error);
	const command = process.argv[2] ?? "beacon";

	const { telemetry } = getCliContext(program);
	await telemetry.emitException(error, `cli.${command}`, { Command: command });

	console.error(pc.red(message));
	process.exit(1);
}
