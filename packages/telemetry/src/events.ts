// =============================================================================
// TELEMETRY EVENTS: Application Insights envelope types
// =============================================================================

/** Schema identifier the ingestion endpoint routes envelopes by. */
export const EVENT_ENVELOPE_NAME = "Microsoft.ApplicationInsights.Event";

/** Version of the `data.baseData` schema. */
export const BASE_DATA_VERSION = 2;

export type BaseType = "EventData" | "ExceptionData";

export interface EventTags {
	"ai.session.id": string;
	"ai.user.id": string;
	"ai.application.ver": string;
	"ai.internal.sdkVersion": string;
	[tag: string]: string;
}

export interface StackFrame {
	level: number;
	method: string;
	assembly: string;
	fileName: string;
	line: number;
}

export interface ExceptionRecord {
	id: number;
	outerId: number;
	typeName: string;
	message: string;
	hasFullStack: boolean;
	parsedStack: StackFrame[];
}

export interface BaseData {
	ver: number;
	/** Custom event name. */
	name?: string;
	/** Always carries `DayOfWeek` and `Username`. */
	properties: Record<string, string>;
	/** Present only when at least one metric was given. */
	measurements?: Record<string, number>;
	handledAt?: "UserCode";
	/** Present only on exception events. */
	exceptions?: ExceptionRecord[];
}

export interface TelemetryEvent {
	name: string;
	/** ISO-8601 UTC, captured when the base event was first built. */
	time: string;
	/** Instrumentation key. */
	iKey: string;
	tags: EventTags;
	data: {
		baseType: BaseType;
		baseData: BaseData;
	};
}

export type EventProperties = Record<string, string>;
export type EventMetrics = Record<string, number>;
