// =============================================================================
// TRANSPORT: a single POST of a serialized event
// =============================================================================
// Shared by the in-process path and the delivery worker. Every failure leaves
// here as a TransportError.

import type { BeaconLogger } from "@beacon/core";
import { TransportError } from "./failure.js";

/** Everything a send needs, passed by value so it can cross into a worker. */
export interface DeliveryRequest {
	url: string;
	method: "POST";
	headers: Record<string, string>;
	body: string;
	/** 0 disables the timeout. */
	timeoutMs: number;
}

export interface DeliveryResponse {
	status: number;
	statusText: string;
}

const REQUEST_ID_HEADERS = ["request-id", "x-ms-request-id", "x-request-id"];

function requestIdOf(headers: Headers): string | undefined {
	for (const name of REQUEST_ID_HEADERS) {
		const value = headers.get(name);
		if (value) return value;
	}
	return undefined;
}

function isJson(text: string): boolean {
	if (!text.trim()) return false;
	try {
		JSON.parse(text);
		return true;
	} catch {
		return false;
	}
}

async function readBody(response: Response, logger: BeaconLogger): Promise<string | undefined> {
	try {
		return await response.text();
	} catch (error) {
		logger.warn("Unable to retrieve the raw HTTP response body", { error });
		return undefined;
	}
}

/**
 * POST the request once. Resolves on a 2xx response; rejects with a
 * TransportError for non-2xx responses, network errors and timeouts.
 */
export async function postEvent(
	request: DeliveryRequest,
	logger: BeaconLogger,
): Promise<DeliveryResponse> {
	let response: Response;
	try {
		response = await fetch(request.url, {
			method: request.method,
			headers: request.headers,
			body: request.body,
			signal: request.timeoutMs > 0 ? AbortSignal.timeout(request.timeoutMs) : undefined,
		});
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		const cause = error instanceof Error ? error.cause : undefined;
		throw new TransportError(
			{
				message,
				innerMessage: cause instanceof Error ? cause.message : undefined,
			},
			{ cause: error },
		);
	}

	if (response.ok) {
		// Drain the body so the connection can be reused
		await readBody(response, logger);
		return { status: response.status, statusText: response.statusText };
	}

	const body = await readBody(response, logger);
	const jsonBody = body !== undefined && isJson(body);
	throw new TransportError({
		message: `The remote server returned an error: (${response.status}) ${response.statusText}.`,
		statusCode: response.status,
		statusDescription: response.statusText,
		innerMessage: jsonBody ? body : undefined,
		rawResponseBody: jsonBody ? undefined : body,
		requestId: requestIdOf(response.headers),
	});
}
