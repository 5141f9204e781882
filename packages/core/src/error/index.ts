import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export interface BeaconErrorOptions {
	cause?: unknown;
	/** Structured context for logs, e.g. the HTTP status of a failed send. */
	details?: Record<string, unknown>;
}

export class BeaconError extends Error {
	readonly code: BaseErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(code: BaseErrorCode, message: string, options?: BeaconErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.details = options?.details;
		this.name = "BeaconError";
	}

	static deliveryFailed(
		message: string = BASE_ERROR_CODES.DELIVERY_FAILED.message,
		options?: BeaconErrorOptions,
	) {
		return new BeaconError("DELIVERY_FAILED", message, options);
	}

	static invalidConfig(message: string = BASE_ERROR_CODES.INVALID_CONFIG.message, cause?: unknown) {
		return new BeaconError("INVALID_CONFIG", message, { cause });
	}

	static invalidArgument(message: string = BASE_ERROR_CODES.INVALID_ARGUMENT.message, cause?: unknown) {
		return new BeaconError("INVALID_ARGUMENT", message, { cause });
	}
}
