import { type BeaconConfig, BeaconError, type BeaconLogger, createMemoryConfig, silentLogger } from "@beacon/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type IsolatedRunner, runDelivery } from "../delivery/runner.js";
import { createTelemetry } from "../index.js";

function mockLogger() {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	} satisfies BeaconLogger;
}

function setup(settings: Partial<BeaconConfig> = {}, runner?: IsolatedRunner) {
	const logger = mockLogger();
	const isolated = vi.fn<IsolatedRunner>(
		runner ?? (async ({ request }) => structuredClone(await runDelivery(request, silentLogger))),
	);
	const telemetry = createTelemetry({
		config: createMemoryConfig({ applicationInsightsKey: "test-ikey", ...settings }),
		logger,
		moduleVersion: "2.0.0",
		runner: isolated,
		identity: { username: () => "test-user" },
	});
	return { telemetry, logger, runner: isolated };
}

function sentBody(call = 0): unknown {
	const init: unknown = fetchMock.mock.calls[call]?.[1];
	if (typeof init !== "object" || init === null || !("body" in init) || typeof init.body !== "string") {
		throw new Error(`fetch call ${call} has no string body`);
	}
	return JSON.parse(init.body);
}

function sessionOf(body: unknown): string {
	if (typeof body === "object" && body !== null && "tags" in body) {
		const { tags } = body;
		if (typeof tags === "object" && tags !== null && "ai.session.id" in tags) {
			const id = tags["ai.session.id"];
			if (typeof id === "string") return id;
		}
	}
	throw new Error("body has no session id");
}

let fetchMock: ReturnType<typeof vi.fn>;

beforeEach(() => {
	fetchMock = vi.fn().mockImplementation(async () => new Response(null, { status: 200 }));
	vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
	vi.unstubAllGlobals();
});

describe("createTelemetry", () => {
	it("returns the entry points", () => {
		const { telemetry } = setup();
		expect(typeof telemetry.emitEvent).toBe("function");
		expect(typeof telemetry.emitException).toBe("function");
	});

	describe("when telemetry is disabled", () => {
		it("makes no network calls and resolves", async () => {
			const { telemetry, logger, runner } = setup({ disableTelemetry: true });

			await expect(telemetry.emitEvent("cli.info", { A: "B" })).resolves.toBeUndefined();
			await expect(telemetry.emitException(new Error("x"))).resolves.toBeUndefined();

			expect(fetchMock).not.toHaveBeenCalled();
			expect(runner).not.toHaveBeenCalled();
			expect(logger.debug).toHaveBeenCalledWith("Telemetry is disabled; event not sent", {
				event: "cli.info",
			});
		});

		it("does not need an instrumentation key", async () => {
			const { telemetry, logger } = setup({ disableTelemetry: true, applicationInsightsKey: "" });
			await telemetry.emitEvent("cli.info");
			expect(logger.warn).not.toHaveBeenCalled();
		});
	});

	describe("emitEvent", () => {
		it("sends synchronously when asked", async () => {
			const { telemetry, runner } = setup();

			await telemetry.emitEvent("cli.send", { Command: "send" }, { DurationMs: 4 }, true);

			expect(runner).not.toHaveBeenCalled();
			expect(fetchMock).toHaveBeenCalledTimes(1);
			expect(sentBody()).toMatchObject({
				iKey: "test-ikey",
				data: {
					baseType: "EventData",
					baseData: {
						name: "cli.send",
						properties: { Command: "send" },
						measurements: { DurationMs: 4 },
					},
				},
			});
		});

		it("uses the isolated unit by default", async () => {
			const { telemetry, runner } = setup();
			await telemetry.emitEvent("cli.info");
			expect(runner).toHaveBeenCalledTimes(1);
			expect(fetchMock).toHaveBeenCalledTimes(1);
		});

		it("follows defaultNoStatus when no mode is given", async () => {
			const { telemetry, runner } = setup({ defaultNoStatus: true });
			await telemetry.emitEvent("cli.info");
			expect(runner).not.toHaveBeenCalled();
			expect(fetchMock).toHaveBeenCalledTimes(1);
		});

		it("passes the configured timeout through", async () => {
			const { telemetry, runner } = setup({ webRequestTimeoutSec: 7 });
			await telemetry.emitEvent("cli.info");
			expect(runner.mock.calls[0]?.[0].request.timeoutMs).toBe(7000);
		});

		it("keeps the same session across events", async () => {
			const { telemetry } = setup();
			await telemetry.emitEvent("a", {}, {}, true);
			await telemetry.emitEvent("b", {}, {}, true);

			const [first, second] = [sentBody(0), sentBody(1)];
			expect(first).toMatchObject({ tags: { "ai.application.ver": "2.0.0" } });
			expect(sessionOf(second)).toBe(sessionOf(first));
			expect(sessionOf(first)).toBe(telemetry.events.session());
		});
	});

	describe("emitException", () => {
		it("sends an ExceptionData event", async () => {
			const { telemetry } = setup();

			await telemetry.emitException(new Error("bad input"), "cli.send", { Command: "send" }, true);

			expect(sentBody()).toMatchObject({
				data: {
					baseType: "ExceptionData",
					baseData: {
						handledAt: "UserCode",
						properties: { ErrorBucket: "cli.send", Message: "bad input", Command: "send" },
						exceptions: [{ id: 1, typeName: "Error", message: "bad input" }],
					},
				},
			});
		});
	});

	describe("never throws", () => {
		it("swallows HTTP failures after logging them", async () => {
			fetchMock.mockImplementation(
				async () => new Response("nope", { status: 400, statusText: "Bad Request" }),
			);
			const { telemetry, logger } = setup();

			await expect(telemetry.emitEvent("cli.info", {}, {}, true)).resolves.toBeUndefined();

			expect(logger.error).toHaveBeenCalledTimes(1);
			expect(logger.warn).toHaveBeenCalledWith("Telemetry could not be sent", {
				event: "cli.info",
				error: expect.any(BeaconError),
			});
		});

		it("swallows isolated-unit failures", async () => {
			fetchMock.mockRejectedValue(new TypeError("fetch failed"));
			const { telemetry, logger } = setup();

			await expect(telemetry.emitEvent("cli.info")).resolves.toBeUndefined();
			expect(logger.warn).toHaveBeenCalledTimes(1);
		});

		it("swallows failures of unknown shape", async () => {
			const oddity = { reason: "not an error at all" };
			const { telemetry, logger } = setup({}, () => Promise.reject(oddity));

			await expect(telemetry.emitEvent("cli.info")).resolves.toBeUndefined();
			expect(logger.error).toHaveBeenCalledWith("Unrecognized telemetry delivery failure", {
				error: oddity,
			});
			expect(logger.warn).toHaveBeenCalledWith("Telemetry could not be sent", {
				event: "cli.info",
				error: oddity,
			});
		});

		it("swallows a missing instrumentation key", async () => {
			const { telemetry, logger } = setup({ applicationInsightsKey: "" });

			await expect(telemetry.emitEvent("cli.info")).resolves.toBeUndefined();
			expect(fetchMock).not.toHaveBeenCalled();
			expect(logger.warn.mock.calls[0]?.[1]).toMatchObject({
				error: { code: "INVALID_CONFIG" },
			});
		});
	});

	describe("reminder", () => {
		it("is logged once, on the first delivery", async () => {
			const { telemetry, logger } = setup();
			await telemetry.emitEvent("a", {}, {}, true);
			await telemetry.emitEvent("b", {}, {}, true);

			expect(logger.info).toHaveBeenCalledTimes(1);
			expect(logger.info.mock.calls[0]?.[0]).toContain('"disableTelemetry"');
		});

		it("is suppressed by configuration", async () => {
			const { telemetry, logger } = setup({ suppressTelemetryReminder: true });
			await telemetry.emitEvent("a", {}, {}, true);
			expect(logger.info).not.toHaveBeenCalled();
		});
	});
});
