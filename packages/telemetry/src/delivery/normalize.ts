// =============================================================================
// ERROR NORMALIZER: one multi-line diagnostic from any delivery failure
// =============================================================================

import { EOL } from "node:os";
import { formatTable, renderCell } from "@beacon/core";
import { type DeliveryFailure, IsolatedUnitError, parseFailure, TransportError } from "./failure.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
	return typeof value === "string" ? value.trim() : renderCell(value).trim();
}

/**
 * Resolve a thrown value into a DeliveryFailure. Returns null for shapes that
 * did not come from the transport or the delivery worker.
 */
export function toDeliveryFailure(failure: unknown): DeliveryFailure | null {
	if (failure instanceof TransportError) return failure.toFailure();
	if (failure instanceof IsolatedUnitError) return parseFailure(failure.message);
	return null;
}

/** Lines describing an error-detail payload. */
function describeInnerMessage(innerMessage: string): string[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(innerMessage);
	} catch {
		return [innerMessage.trim()];
	}

	if (typeof parsed === "string") return [parsed.trim()];

	if (isRecord(parsed) && text(parsed.message) !== "") {
		const lines = [`${text(parsed.message)} | ${text(parsed.documentation_url)}`];
		if (parsed.details !== undefined && parsed.details !== null) {
			lines.push(formatTable(parsed.details));
		}
		return lines;
	}

	return [renderCell(parsed)];
}

export function describeFailure(failure: DeliveryFailure): string {
	const lines = [failure.message];

	if (failure.statusCode !== undefined) {
		lines.push(`${failure.statusCode} | ${(failure.statusDescription ?? "").trim()}`);
	}
	if (failure.innerMessage !== undefined) {
		lines.push(...describeInnerMessage(failure.innerMessage));
	}
	if (failure.rawResponseBody?.trim()) {
		lines.push(failure.rawResponseBody);
	}
	if (failure.requestId) {
		lines.push(`RequestId: ${failure.requestId}`);
	}

	return lines.join(EOL);
}

/**
 * Build the diagnostic for a failed delivery. Anything that is neither a
 * TransportError nor a parsable IsolatedUnitError is re-thrown unchanged.
 */
export function normalizeDeliveryError(failure: unknown): string {
	const resolved = toDeliveryFailure(failure);
	if (!resolved) throw failure;
	return describeFailure(resolved);
}
