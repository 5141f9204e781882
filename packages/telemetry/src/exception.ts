// =============================================================================
// EXCEPTION RECORDS: turns thrown values into ExceptionData entries
// =============================================================================

import { basename } from "node:path";
import type { ExceptionRecord, StackFrame } from "./events.js";

const MAX_CAUSE_DEPTH = 10;

// `    at method (file:line:column)` or `    at file:line:column`
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

export function parseStack(stack: string | undefined): StackFrame[] {
	if (!stack) return [];

	const frames: StackFrame[] = [];
	for (const line of stack.split("\n")) {
		const match = FRAME_PATTERN.exec(line);
		if (!match) continue;

		const [, method, fileName = "", lineNumber = "0"] = match;
		frames.push({
			level: frames.length,
			method: method ?? "<anonymous>",
			assembly: basename(fileName),
			fileName,
			line: Number(lineNumber),
		});
	}
	return frames;
}

/**
 * One record per error in the `cause` chain, outermost first. Each nested
 * record's `outerId` points at the error that wrapped it.
 */
export function toExceptionRecords(exception: unknown): ExceptionRecord[] {
	const records: ExceptionRecord[] = [];
	let current: unknown = exception;
	let outerId = 0;

	while (current !== undefined && records.length < MAX_CAUSE_DEPTH) {
		const error = toError(current);
		const parsedStack = parseStack(error.stack);
		const id = records.length + 1;
		records.push({
			id,
			outerId,
			typeName: error.name,
			message: error.message,
			hasFullStack: parsedStack.length > 0,
			parsedStack,
		});
		outerId = id;
		current = error.cause;
	}
	return records;
}

/**
 * HRESULT-style code of an error, `0x` + eight uppercase hex digits. Taken
 * from a numeric `hresult` or `errno` property; 0 when neither is present.
 */
export function formatHResult(exception: unknown): string {
	let code = 0;
	if (typeof exception === "object" && exception !== null) {
		if ("hresult" in exception && typeof exception.hresult === "number") {
			code = exception.hresult;
		} else if ("errno" in exception && typeof exception.errno === "number") {
			code = exception.errno;
		}
	}
	return `0x${(code >>> 0).toString(16).toUpperCase().padStart(8, "0")}`;
}

export function exceptionMessage(exception: unknown): string {
	return toError(exception).message;
}
