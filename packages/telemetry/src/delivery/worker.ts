// Delivery worker entry. Receives a WorkerInput as workerData and posts back
// exactly one WorkerResult.

import { parentPort, workerData } from "node:worker_threads";
import { createConsoleLogger, isLogLevel } from "@beacon/core";
import { serializeFailure } from "./failure.js";
import { runDelivery } from "./runner.js";
import type { DeliveryRequest } from "./transport.js";

function isDeliveryRequest(value: unknown): value is DeliveryRequest {
	return (
		typeof value === "object" &&
		value !== null &&
		"url" in value &&
		typeof value.url === "string" &&
		"body" in value &&
		typeof value.body === "string" &&
		"timeoutMs" in value &&
		typeof value.timeoutMs === "number" &&
		"headers" in value &&
		typeof value.headers === "object"
	);
}

const input: unknown = workerData;
const port = parentPort;

if (port && typeof input === "object" && input !== null && "request" in input) {
	const { request } = input;
	const logLevel =
		"logLevel" in input && typeof input.logLevel === "string" && isLogLevel(input.logLevel)
			? input.logLevel
			: "info";

	if (isDeliveryRequest(request)) {
		const logger = createConsoleLogger({ level: logLevel, prefix: "beacon:worker" });
		port.postMessage(await runDelivery(request, logger));
	} else {
		port.postMessage({
			ok: false,
			failure: serializeFailure({ message: "Malformed delivery request" }),
		});
	}
} else {
	throw new Error("Delivery worker started without a parent port or request");
}
