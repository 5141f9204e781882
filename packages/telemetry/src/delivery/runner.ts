// =============================================================================
// ISOLATED UNIT: runs a delivery on a worker thread
// =============================================================================

import { Worker } from "node:worker_threads";
import type { BeaconLogger, LogLevel } from "@beacon/core";
import { captureFailure, serializeFailure } from "./failure.js";
import { type DeliveryRequest, postEvent } from "./transport.js";

/** Tagged result a worker posts back. Failures carry DeliveryFailure JSON. */
export type WorkerResult =
	| { ok: true; status: number; statusText: string }
	| { ok: false; failure: string };

export interface WorkerInput {
	request: DeliveryRequest;
	/** The worker builds its own logger at this level. */
	logLevel: LogLevel;
}

/** Runs one delivery somewhere other than the caller's context. */
export type IsolatedRunner = (input: WorkerInput) => Promise<WorkerResult>;

/** The body a delivery worker executes. Never rejects. */
export async function runDelivery(
	request: DeliveryRequest,
	logger: BeaconLogger,
): Promise<WorkerResult> {
	try {
		const response = await postEvent(request, logger);
		return { ok: true, status: response.status, statusText: response.statusText };
	} catch (error) {
		return { ok: false, failure: serializeFailure(captureFailure(error)) };
	}
}

export function isWorkerResult(value: unknown): value is WorkerResult {
	if (typeof value !== "object" || value === null || !("ok" in value)) return false;
	if (value.ok === true) {
		return (
			"status" in value &&
			typeof value.status === "number" &&
			"statusText" in value &&
			typeof value.statusText === "string"
		);
	}
	return value.ok === false && "failure" in value && typeof value.failure === "string";
}

// From sources (tsx, vitest) the entry is TypeScript. Node does not apply a
// parent's loader hooks to a worker's entry module, so a small eval worker
// imports it through tsx's API instead.
function spawnWorker(workerData: unknown): Worker {
	if (!import.meta.url.endsWith(".ts")) {
		return new Worker(new URL("./worker.js", import.meta.url), { workerData });
	}
	const entry = JSON.stringify(new URL("./worker.ts", import.meta.url).href);
	const bootstrap = `import("tsx/esm/api").then(({ tsImport }) => tsImport(${entry}, ${entry}));`;
	return new Worker(bootstrap, { eval: true, workerData });
}

/**
 * Start the delivery worker with `workerData` and wait for the one result it
 * posts. A worker that crashes or exits without posting rejects with a plain
 * Error.
 */
export function spawnDeliveryWorker(workerData: unknown): Promise<WorkerResult> {
	return new Promise<WorkerResult>((resolve, reject) => {
		const worker = spawnWorker(workerData);
		let settled = false;

		worker.once("message", (message: unknown) => {
			settled = true;
			if (isWorkerResult(message)) {
				resolve(message);
			} else {
				reject(new Error("Delivery worker posted an unexpected message"));
			}
		});
		worker.once("error", (error) => {
			settled = true;
			reject(error);
		});
		worker.once("exit", (code) => {
			if (!settled) {
				reject(new Error(`Delivery worker exited with code ${code} before reporting`));
			}
		});
	});
}

/** Default isolated runner: one worker thread per delivery. */
export const runInWorker: IsolatedRunner = (input) => spawnDeliveryWorker(input);
