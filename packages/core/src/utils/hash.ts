import { createHash } from "node:crypto";

/** SHA-512 digest of `text` (UTF-8), uppercase hex. */
export function sha512Hex(text: string): string {
	return createHash("sha512").update(text, "utf8").digest("hex").toUpperCase();
}
