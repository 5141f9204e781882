// =============================================================================
// ANSI color helpers: respects NO_COLOR / FORCE_COLOR and non-TTY streams
// =============================================================================

const enabled =
	typeof process !== "undefined" &&
	!process.env.NO_COLOR &&
	(process.env.FORCE_COLOR !== undefined || process.stderr?.isTTY === true);

function wrap(open: number, close: number): (s: string) => string {
	return enabled ? (s) => `\x1b[${open}m${s}\x1b[${close}m` : (s) => s;
}

export const bold = wrap(1, 22);
export const dim = wrap(2, 22);
export const red = wrap(31, 39);
export const yellow = wrap(33, 39);
export const cyan = wrap(36, 39);
export const gray = wrap(90, 39);
