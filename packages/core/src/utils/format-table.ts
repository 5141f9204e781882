// =============================================================================
// TABLE FORMATTING: plain-text tables for diagnostics
// =============================================================================
// Renders an array of records as a column table:
//
//   resource field code
//   -------- ----- -------
//   Issue    title missing
//
// Columns are the union of keys in first-seen order. Scalars render as text,
// nested values as compact JSON.

import stringify from "safe-stable-stringify";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function renderCell(value: unknown): string {
	if (value === null || value === undefined) return "";
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
		return String(value);
	}
	return stringify(value) ?? "";
}

/**
 * Format `value` as a table. A single record renders as a one-row table and
 * a list of scalars as one line per item.
 */
export function formatTable(value: unknown): string {
	const items: unknown[] = Array.isArray(value) ? value : [value];
	if (items.length === 0) return "";

	if (!items.every(isRecord)) {
		return items.map(renderCell).join("\n");
	}

	const columns: string[] = [];
	for (const item of items) {
		for (const key of Object.keys(item)) {
			if (!columns.includes(key)) columns.push(key);
		}
	}

	const rows = items.map((item) => columns.map((column) => renderCell(item[column])));
	const widths = columns.map((column, i) =>
		Math.max(column.length, ...rows.map((row) => row[i]?.length ?? 0)),
	);

	const renderRow = (cells: string[]) =>
		cells
			.map((cell, i) => cell.padEnd(widths[i] ?? 0))
			.join(" ")
			.trimEnd();

	return [
		renderRow(columns),
		renderRow(widths.map((width) => "-".repeat(width))),
		...rows.map(renderRow),
	].join("\n");
}
