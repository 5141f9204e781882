import { BeaconError } from "@beacon/core";
import { Command } from "commander";
import { getCliContext } from "../utils/context.js";
import { collectMetric, collectProperty } from "../utils/pairs.js";

interface SendOptions {
	property?: Record<string, string>;
	metric?: Record<string, number>;
	exception?: string;
	bucket?: string;
	sync?: boolean;
}

export const sendCommand = new Command("send")
	.description("Send a custom event, or an exception event with --exception")
	.argument("[name]", "Event name")
	.option("-p, --property <key=value>", "Event property (repeatable)", collectProperty)
	.option("-m, --metric <key=number>", "Event measurement (repeatable)", collectMetric)
	.option("-e, --exception <message>", "Send an exception event with this message")
	.option("-b, --bucket <name>", "Error bucket for --exception")
	.option("--sync", "Send on the main thread without a progress spinner")
	.action(async (name: string | undefined, options: SendOptions, command: Command) => {
		const { telemetry, logger } = getCliContext(command);
		// Undefined lets the defaultNoStatus setting decide
		const runSynchronously = options.sync ? true : undefined;

		if (options.exception !== undefined) {
			await telemetry.emitException(
				new Error(options.exception),
				options.bucket,
				options.property,
				runSynchronously,
			);
			logger.info("Exception event processed");
			return;
		}

		if (!name) {
			throw BeaconError.invalidArgument("An event name is required unless --exception is given");
		}
		await telemetry.emitEvent(name, options.property, options.metric, runSynchronously);
		logger.info(`Event "${name}" processed`);
	});
