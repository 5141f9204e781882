// =============================================================================
// TELEMETRY: usage and failure events for Application Insights
// =============================================================================

import {
	type BeaconLogger,
	type ConfigProvider,
	createConsoleLogger,
	type LogLevel,
} from "@beacon/core";
import { createEventBuilder, type EventBuilder, type EventBuilderOptions } from "./builder.js";
import { createDispatcher, type ProgressReporter } from "./delivery/dispatcher.js";
import type { IsolatedRunner } from "./delivery/runner.js";
import type { EventMetrics, EventProperties, TelemetryEvent } from "./events.js";
import { createPiiRedactor, type PiiRedactor } from "./pii.js";

export { createEventBuilder, currentUsername, type EventBuilder, SDK_VERSION } from "./builder.js";
export {
	createDispatcher,
	type DeliveryDispatcher,
	INGESTION_ENDPOINT,
	noopProgress,
	type ProgressReporter,
	type SendOptions,
	serializeEvent,
} from "./delivery/dispatcher.js";
export {
	captureFailure,
	type DeliveryFailure,
	IsolatedUnitError,
	parseFailure,
	serializeFailure,
	TransportError,
} from "./delivery/failure.js";
export { describeFailure, normalizeDeliveryError, toDeliveryFailure } from "./delivery/normalize.js";
export {
	type IsolatedRunner,
	runDelivery,
	runInWorker,
	spawnDeliveryWorker,
	type WorkerInput,
	type WorkerResult,
} from "./delivery/runner.js";
export { type DeliveryRequest, type DeliveryResponse, postEvent } from "./delivery/transport.js";
export * from "./events.js";
export { formatHResult, parseStack, toExceptionRecords } from "./exception.js";
export { createPiiRedactor, type PiiRedactor } from "./pii.js";

const DEFAULT_REMINDER =
	'Telemetry is enabled. Set "disableTelemetry" to true to turn it off, or set "suppressTelemetryReminder" to true to hide this message.';

export interface TelemetryOptions {
	config: ConfigProvider;
	/** Default: console logger at `logLevel` */
	logger?: BeaconLogger;
	/** Default: `"info"` */
	logLevel?: LogLevel;
	/** Version of the module whose usage is reported. Default: `"unknown"` */
	moduleVersion?: string;
	/** Ingestion URL override. */
	endpoint?: string;
	/** Shown while an isolated delivery is in flight. */
	progress?: ProgressReporter;
	/** Isolated-unit runner override. Default: worker thread */
	runner?: IsolatedRunner;
	/** Logged once, on the first delivery, unless suppressed by config. */
	reminder?: string;
	/** Clock, session id and user name sources for the base event. */
	identity?: Pick<EventBuilderOptions, "now" | "sessionId" | "username">;
}

export interface Telemetry {
	/**
	 * Send a custom event. Resolves once delivery finished or failed; never
	 * rejects. `runSynchronously` defaults to the `defaultNoStatus` setting.
	 */
	emitEvent(
		name: string,
		properties?: EventProperties,
		metrics?: EventMetrics,
		runSynchronously?: boolean,
	): Promise<void>;
	/** Send an exception event. Never rejects. */
	emitException(
		exception: unknown,
		errorBucket?: string,
		properties?: EventProperties,
		runSynchronously?: boolean,
	): Promise<void>;
	readonly events: EventBuilder;
	readonly redact: PiiRedactor;
}

/**
 * Create the telemetry service. Create one per process and pass it to every
 * call site: the session id and instrumentation key are fixed on first use.
 *
 * @example
 * ```ts
 * const telemetry = createTelemetry({ config: createFileConfig(), moduleVersion: "1.2.0" });
 * await telemetry.emitEvent("cli.send", { Command: "send" });
 * ```
 */
export function createTelemetry(options: TelemetryOptions): Telemetry {
	const { config, logLevel = "info" } = options;
	const logger = options.logger ?? createConsoleLogger({ level: logLevel });
	const redact = createPiiRedactor(config);
	const events = createEventBuilder({
		config,
		redact,
		moduleVersion: options.moduleVersion ?? "unknown",
		...options.identity,
	});
	const dispatcher = createDispatcher({
		logger,
		logLevel,
		endpoint: options.endpoint,
		runner: options.runner,
		progress: options.progress,
	});
	let reminded = false;

	function remind(): void {
		if (reminded) return;
		reminded = true;
		if (!config.get("suppressTelemetryReminder")) {
			logger.info(options.reminder ?? DEFAULT_REMINDER);
		}
	}

	async function deliver(
		label: string,
		build: () => TelemetryEvent,
		runSynchronously: boolean | undefined,
	): Promise<void> {
		try {
			if (config.get("disableTelemetry")) {
				logger.debug("Telemetry is disabled; event not sent", { event: label });
				return;
			}
			remind();
			const event = build();
			await dispatcher.send(event, {
				synchronous: runSynchronously ?? config.get("defaultNoStatus"),
				timeoutSeconds: config.get("webRequestTimeoutSec"),
			});
			logger.debug("Telemetry sent", { event: label });
		} catch (error) {
			// Telemetry never fails the caller
			logger.warn("Telemetry could not be sent", { event: label, error });
		}
	}

	return {
		events,
		redact,
		emitEvent(name, properties, metrics, runSynchronously) {
			return deliver(name, () => events.customEvent(name, properties, metrics), runSynchronously);
		},
		emitException(exception, errorBucket, properties, runSynchronously) {
			return deliver(
				"exception",
				() => events.exceptionEvent(exception, errorBucket, properties),
				runSynchronously,
			);
		},
	};
}
