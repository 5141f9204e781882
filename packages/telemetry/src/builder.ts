// =============================================================================
// EVENT BUILDER: base envelope, custom events and exception events
// =============================================================================

import { randomUUID } from "node:crypto";
import { userInfo } from "node:os";
import { BeaconError, type ConfigProvider } from "@beacon/core";
import {
	BASE_DATA_VERSION,
	EVENT_ENVELOPE_NAME,
	type EventMetrics,
	type EventProperties,
	type TelemetryEvent,
} from "./events.js";
import { exceptionMessage, formatHResult, toExceptionRecords } from "./exception.js";
import type { PiiRedactor } from "./pii.js";

export const SDK_VERSION = "beacon-node:0.1.0";

const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

export interface EventBuilderOptions {
	config: ConfigProvider;
	redact: PiiRedactor;
	/** Version of the module whose usage is reported. */
	moduleVersion: string;
	/** Clock read once, when the base event is first built. */
	now?: () => Date;
	/** Session id source. Default: random UUID */
	sessionId?: () => string;
	/** Current user name source. Default: the OS account */
	username?: () => string;
}

export interface EventBuilder {
	/** Session id for this builder's lifetime. Needs no instrumentation key. */
	session(): string;
	baseEvent(): TelemetryEvent;
	customEvent(name: string, properties?: EventProperties, metrics?: EventMetrics): TelemetryEvent;
	exceptionEvent(
		exception: unknown,
		errorBucket?: string,
		properties?: EventProperties,
	): TelemetryEvent;
}

export function currentUsername(): string {
	try {
		return userInfo().username;
	} catch {
		// userInfo() throws when the uid has no passwd entry (some containers)
		return process.env.USER ?? process.env.USERNAME ?? "";
	}
}

export function createEventBuilder(options: EventBuilderOptions): EventBuilder {
	const { config, redact, moduleVersion } = options;
	let template: TelemetryEvent | undefined;
	let sessionId: string | undefined;

	function session(): string {
		sessionId ??= (options.sessionId ?? randomUUID)();
		return sessionId;
	}

	function buildTemplate(): TelemetryEvent {
		const iKey = config.get("applicationInsightsKey").trim();
		if (!iKey) {
			throw BeaconError.invalidConfig(
				'No Application Insights key configured ("applicationInsightsKey")',
			);
		}

		const now = options.now?.() ?? new Date();
		const username = redact((options.username ?? currentUsername)());

		return {
			name: EVENT_ENVELOPE_NAME,
			time: now.toISOString(),
			iKey,
			tags: {
				"ai.session.id": session(),
				"ai.user.id": username,
				"ai.application.ver": moduleVersion,
				"ai.internal.sdkVersion": SDK_VERSION,
			},
			data: {
				baseType: "EventData",
				baseData: {
					ver: BASE_DATA_VERSION,
					properties: {
						DayOfWeek: DAY_NAMES[now.getDay()] ?? "",
						Username: username,
					},
				},
			},
		};
	}

	function baseEvent(): TelemetryEvent {
		template ??= buildTemplate();
		return structuredClone(template);
	}

	return {
		session,
		baseEvent,

		customEvent(name, properties = {}, metrics = {}) {
			const event = baseEvent();
			const { baseData } = event.data;
			baseData.name = name;
			Object.assign(baseData.properties, properties);
			if (Object.keys(metrics).length > 0) {
				baseData.measurements = { ...metrics };
			}
			return event;
		},

		exceptionEvent(exception, errorBucket, properties = {}) {
			const event = baseEvent();
			event.data.baseType = "ExceptionData";
			const { baseData } = event.data;
			baseData.handledAt = "UserCode";
			if (errorBucket?.trim()) {
				baseData.properties.ErrorBucket = errorBucket;
			}
			baseData.properties.Message = exceptionMessage(exception);
			baseData.properties.HResult = formatHResult(exception);
			Object.assign(baseData.properties, properties);
			baseData.exceptions = toExceptionRecords(exception);
			return event;
		},
	};
}
