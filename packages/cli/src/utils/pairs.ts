// =============================================================================
// key=value option parsing for `beacon send`
// =============================================================================

import { InvalidArgumentError } from "commander";

function splitPair(input: string): [string, string] {
	const index = input.indexOf("=");
	if (index <= 0) {
		throw new InvalidArgumentError(`Expected key=value, got "${input}".`);
	}
	return [input.slice(0, index).trim(), input.slice(index + 1)];
}

/** Commander collector for repeated `-p key=value`. Later keys win. */
export function collectProperty(
	input: string,
	previous: Record<string, string> = {},
): Record<string, string> {
	const [key, value] = splitPair(input);
	return { ...previous, [key]: value };
}

/** Commander collector for repeated `-m key=number`. */
export function collectMetric(
	input: string,
	previous: Record<string, number> = {},
): Record<string, number> {
	const [key, raw] = splitPair(input);
	const value = Number(raw);
	if (raw.trim() === "" || !Number.isFinite(value)) {
		throw new InvalidArgumentError(`Metric "${key}" must be a number, got "${raw}".`);
	}
	return { ...previous, [key]: value };
}
