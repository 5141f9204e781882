// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes raised inside beacon, with default messages.

export type RawErrorCode = {
	message: string;
};

export const BASE_ERROR_CODES = {
	// Delivery
	TRANSPORT_FAILURE: { message: "Telemetry transport failed" },
	ISOLATED_UNIT_FAILURE: { message: "Telemetry delivery worker reported a failure" },
	DELIVERY_FAILED: { message: "Telemetry event could not be delivered" },

	// Caller input
	INVALID_CONFIG: { message: "Invalid configuration" },
	INVALID_ARGUMENT: { message: "Invalid argument" },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
