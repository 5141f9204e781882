import { describe, expect, it } from "vitest";
import { formatHResult, parseStack, toExceptionRecords } from "../exception.js";

describe("parseStack", () => {
	it("parses named and anonymous V8 frames", () => {
		const stack = [
			"Error: boom",
			"    at runCommand (/srv/app/dist/cli.js:42:13)",
			"    at file:///srv/app/dist/index.js:7:1",
			"    at async Promise.all (index 0)",
		].join("\n");

		expect(parseStack(stack)).toEqual([
			{
				level: 0,
				method: "runCommand",
				assembly: "cli.js",
				fileName: "/srv/app/dist/cli.js",
				line: 42,
			},
			{
				level: 1,
				method: "<anonymous>",
				assembly: "index.js",
				fileName: "file:///srv/app/dist/index.js",
				line: 7,
			},
		]);
	});

	it("returns no frames for a missing stack", () => {
		expect(parseStack(undefined)).toEqual([]);
	});
});

describe("toExceptionRecords", () => {
	it("follows the cause chain outermost first", () => {
		const root = new RangeError("inner");
		const outer = new Error("outer", { cause: root });

		const records = toExceptionRecords(outer);

		expect(records.map(({ id, outerId, typeName, message }) => ({ id, outerId, typeName, message }))).toEqual([
			{ id: 1, outerId: 0, typeName: "Error", message: "outer" },
			{ id: 2, outerId: 1, typeName: "RangeError", message: "inner" },
		]);
	});

	it("wraps thrown non-errors", () => {
		const [record] = toExceptionRecords("plain string");
		expect(record?.typeName).toBe("Error");
		expect(record?.message).toBe("plain string");
	});
});

describe("formatHResult", () => {
	it("prefers hresult over errno", () => {
		expect(formatHResult({ hresult: 0x80070005, errno: 1 })).toBe("0x80070005");
	});

	it("formats negative errno as unsigned", () => {
		expect(formatHResult({ errno: -2 })).toBe("0xFFFFFFFE");
	});

	it("defaults to zero", () => {
		expect(formatHResult(new Error("x"))).toBe("0x00000000");
		expect(formatHResult("x")).toBe("0x00000000");
	});
});
