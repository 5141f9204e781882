import { type ConfigProvider, sha512Hex } from "@beacon/core";

export type PiiRedactor = (plainText: string | null | undefined) => string;

/**
 * Create a redactor bound to `config`. The `disablePiiProtection` flag is read
 * on every call so a change made through the provider applies immediately.
 *
 * null and undefined are treated as the empty string in both modes. With
 * protection enabled the result is the uppercase SHA-512 hex digest of the
 * text; with it disabled the text is returned unchanged, so null and
 * undefined come back as `""`.
 */
export function createPiiRedactor(config: ConfigProvider): PiiRedactor {
	return (plainText) => {
		const text = plainText ?? "";
		if (config.get("disablePiiProtection")) return text;
		return sha512Hex(text);
	};
}
