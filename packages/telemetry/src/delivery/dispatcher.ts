// =============================================================================
// DELIVERY DISPATCHER: serialize and send one event, in-process or isolated
// =============================================================================

import { BeaconError, type BeaconLogger, type LogLevel } from "@beacon/core";
import stringify from "safe-stable-stringify";
import type { TelemetryEvent } from "../events.js";
import { type DeliveryFailure, IsolatedUnitError } from "./failure.js";
import { describeFailure, toDeliveryFailure } from "./normalize.js";
import { type IsolatedRunner, runInWorker } from "./runner.js";
import { type DeliveryRequest, type DeliveryResponse, postEvent } from "./transport.js";

export const INGESTION_ENDPOINT = "https://dc.services.visualstudio.com/v2/track";

const CONTENT_TYPE = "application/json; charset=UTF-8";
const MAX_DEPTH = 10;

// Insertion order is kept: property bags are ordered.
const serialize = stringify.configure({ deterministic: false, maximumDepth: MAX_DEPTH });

/** Progress indicator shown while an isolated delivery is in flight. */
export interface ProgressReporter {
	start(message: string): void;
	stop(message?: string): void;
}

export const noopProgress: ProgressReporter = {
	start: () => {},
	stop: () => {},
};

export interface DispatcherOptions {
	logger: BeaconLogger;
	/** Level the delivery worker logs at. Default: `"info"` */
	logLevel?: LogLevel;
	/** Ingestion URL. Default: {@link INGESTION_ENDPOINT} */
	endpoint?: string;
	/** Runs isolated deliveries. Default: a worker thread per send */
	runner?: IsolatedRunner;
	progress?: ProgressReporter;
}

export interface SendOptions {
	/** Send on the caller's context instead of in the isolated unit. */
	synchronous: boolean;
	/** 0 disables the timeout. */
	timeoutSeconds: number;
}

export interface DeliveryDispatcher {
	/**
	 * Send one event, once. Failures are logged at error level and rethrown
	 * as a single DELIVERY_FAILED BeaconError carrying the diagnostic; a
	 * failure of unknown shape is logged and rethrown as is.
	 */
	send(event: TelemetryEvent, options: SendOptions): Promise<DeliveryResponse>;
}

function failureDetails({ statusCode, requestId }: DeliveryFailure): Record<string, unknown> {
	const details: Record<string, unknown> = {};
	if (statusCode !== undefined) details.statusCode = statusCode;
	if (requestId !== undefined) details.requestId = requestId;
	return details;
}

export function serializeEvent(event: TelemetryEvent): string {
	return serialize(event);
}

export function createDispatcher(options: DispatcherOptions): DeliveryDispatcher {
	const {
		logger,
		logLevel = "info",
		endpoint = INGESTION_ENDPOINT,
		runner = runInWorker,
		progress = noopProgress,
	} = options;

	function buildRequest(event: TelemetryEvent, timeoutSeconds: number): DeliveryRequest {
		return {
			url: endpoint,
			method: "POST",
			headers: { "Content-Type": CONTENT_TYPE },
			body: serializeEvent(event),
			timeoutMs: Math.max(0, timeoutSeconds) * 1000,
		};
	}

	async function sendIsolated(request: DeliveryRequest): Promise<DeliveryResponse> {
		progress.start("Sending telemetry");
		try {
			const result = await runner({ request, logLevel });
			if (!result.ok) throw new IsolatedUnitError(result.failure);
			return { status: result.status, statusText: result.statusText };
		} finally {
			progress.stop();
		}
	}

	return {
		async send(event, { synchronous, timeoutSeconds }) {
			const request = buildRequest(event, timeoutSeconds);
			try {
				return synchronous ? await postEvent(request, logger) : await sendIsolated(request);
			} catch (failure) {
				const resolved = toDeliveryFailure(failure);
				if (!resolved) {
					logger.error("Unrecognized telemetry delivery failure", { error: failure });
					throw failure;
				}
				const diagnostic = describeFailure(resolved);
				logger.error(diagnostic);
				throw BeaconError.deliveryFailed(diagnostic, {
					cause: failure,
					details: failureDetails(resolved),
				});
			}
		},
	};
}
