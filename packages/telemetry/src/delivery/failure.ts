// =============================================================================
// DELIVERY FAILURES: the two shapes a failed send arrives in
// =============================================================================
// In-process sends fail with a live TransportError. The worker cannot hand a
// live error back across the thread boundary, so it flattens the failure into
// a DeliveryFailure, sends it as JSON text, and the caller re-raises that text
// as an IsolatedUnitError.

import { BeaconError } from "@beacon/core";

export interface DeliveryFailure {
	message: string;
	statusCode?: number;
	statusDescription?: string;
	/** Error-detail payload; often JSON itself. */
	innerMessage?: string;
	rawResponseBody?: string;
	requestId?: string;
}

/** HTTP or network failure raised on the caller's own context. */
export class TransportError extends BeaconError {
	readonly statusCode?: number;
	readonly statusDescription?: string;
	readonly innerMessage?: string;
	readonly rawResponseBody?: string;
	readonly requestId?: string;

	constructor(failure: DeliveryFailure, options?: { cause?: unknown }) {
		super("TRANSPORT_FAILURE", failure.message, { cause: options?.cause });
		this.name = "TransportError";
		this.statusCode = failure.statusCode;
		this.statusDescription = failure.statusDescription;
		this.innerMessage = failure.innerMessage;
		this.rawResponseBody = failure.rawResponseBody;
		this.requestId = failure.requestId;
	}

	toFailure(): DeliveryFailure {
		return {
			message: this.message,
			statusCode: this.statusCode,
			statusDescription: this.statusDescription,
			innerMessage: this.innerMessage,
			rawResponseBody: this.rawResponseBody,
			requestId: this.requestId,
		};
	}
}

/** Failure reported by the delivery worker. `message` is the JSON payload. */
export class IsolatedUnitError extends BeaconError {
	constructor(payload: string) {
		super("ISOLATED_UNIT_FAILURE", payload);
		this.name = "IsolatedUnitError";
	}
}

/**
 * Flatten whatever the transport threw into a DeliveryFailure. Anything that
 * is not a TransportError keeps only its message.
 */
export function captureFailure(error: unknown): DeliveryFailure {
	if (error instanceof TransportError) return error.toFailure();
	return { message: error instanceof Error ? error.message : String(error) };
}

export function serializeFailure(failure: DeliveryFailure): string {
	return JSON.stringify(failure);
}

function optional<T>(value: unknown, guard: (v: unknown) => v is T): T | undefined | null {
	if (value === undefined || value === null) return undefined;
	return guard(value) ? value : null;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number";

/**
 * Parse a worker payload back into a DeliveryFailure. Returns null when the
 * text is not JSON or does not have the expected fields.
 */
export function parseFailure(payload: string): DeliveryFailure | null {
	let raw: unknown;
	try {
		raw = JSON.parse(payload);
	} catch {
		return null;
	}
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return null;
	if (!("message" in raw) || typeof raw.message !== "string") return null;
	const message = raw.message;

	const record: Record<string, unknown> = { ...raw };
	const statusCode = optional(record.statusCode, isNumber);
	const statusDescription = optional(record.statusDescription, isString);
	const innerMessage = optional(record.innerMessage, isString);
	const rawResponseBody = optional(record.rawResponseBody, isString);
	const requestId = optional(record.requestId, isString);
	if (
		statusCode === null ||
		statusDescription === null ||
		innerMessage === null ||
		rawResponseBody === null ||
		requestId === null
	) {
		return null;
	}

	return {
		message,
		statusCode,
		statusDescription,
		innerMessage,
		rawResponseBody,
		requestId,
	};
}
