import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const FALLBACK_VERSION = "0.1.0";

/** Version from the CLI's package.json, or a fallback when it cannot be read. */
export function readCliVersion(): string {
	const here = dirname(fileURLToPath(import.meta.url));
	try {
		const pkg: unknown = JSON.parse(readFileSync(resolve(here, "../../package.json"), "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch {
		// Fallback version
	}
	return FALLBACK_VERSION;
}
