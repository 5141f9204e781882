import { describe, expect, it } from "vitest";
import { formatTable, renderCell } from "../utils/format-table.js";

describe("formatTable", () => {
	it("renders records as padded columns", () => {
		const table = formatTable([
			{ resource: "Issue", field: "title", code: "missing" },
			{ resource: "Label", field: "name", code: "invalid" },
		]);
		expect(table).toBe(
			[
				"resource field code",
				"-------- ----- -------",
				"Issue    title missing",
				"Label    name  invalid",
			].join("\n"),
		);
	});

	it("uses the union of keys in first-seen order", () => {
		const table = formatTable([{ a: "1" }, { b: "2" }]);
		expect(table).toBe(["a b", "- -", "1", "  2"].join("\n"));
	});

	it("renders a single record as a one-row table", () => {
		expect(formatTable({ code: 42 })).toBe(["code", "----", "42"].join("\n"));
	});

	it("renders scalars one per line", () => {
		expect(formatTable(["first", 2, true])).toBe("first\n2\ntrue");
	});

	it("returns an empty string for an empty list", () => {
		expect(formatTable([])).toBe("");
	});
});

describe("renderCell", () => {
	it("renders null and undefined as empty", () => {
		expect(renderCell(null)).toBe("");
		expect(renderCell(undefined)).toBe("");
	});

	it("renders nested values as compact JSON", () => {
		expect(renderCell({ b: 1, a: [2] })).toBe('{"a":[2],"b":1}');
	});
});
