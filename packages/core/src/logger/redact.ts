// =============================================================================
// LOG DATA REDACTION: shared by the console and JSON loggers
// =============================================================================

const DEFAULT_REDACT_KEYS = ["iKey", "instrumentationKey", "applicationInsightsKey", "password", "token"];

/**
 * Shallow-redact keys from a log data object.
 * Matching values are replaced with "[REDACTED]"; the input is never mutated.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: ReadonlySet<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const key of Object.keys(data)) {
		if (keys.has(key)) {
			if (!redacted) redacted = { ...data };
			redacted[key] = "[REDACTED]";
		}
	}
	return redacted ?? data;
}

export function buildRedactKeys(userKeys?: string[]): Set<string> {
	return new Set(userKeys ?? DEFAULT_REDACT_KEYS);
}
