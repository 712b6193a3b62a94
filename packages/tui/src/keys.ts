/**
 * Key identification for raw terminal reads.
 *
 * A read is the byte slice one blocking read of the terminal would return:
 * a single byte for ordinary keys, `ESC [ x` for cursor keys, and longer
 * sequences for keys the picker does not bind. Only legacy (non-Kitty)
 * encodings are recognized.
 *
 * API:
 * - parseKey(bytes) - Parse a read and return the key identifier
 * - matchesKey(bytes, keyId) - Check if a read matches a key identifier
 * - Key - Helper object for creating typed key identifiers
 */

// =============================================================================
// Type-Safe Key Identifiers
// =============================================================================

type Letter =
	| "a"
	| "b"
	| "c"
	| "d"
	| "e"
	| "f"
	| "g"
	| "h"
	| "i"
	| "j"
	| "k"
	| "l"
	| "m"
	| "n"
	| "o"
	| "p"
	| "q"
	| "r"
	| "s"
	| "t"
	| "u"
	| "v"
	| "w"
	| "x"
	| "y"
	| "z";

type SpecialKey =
	| "escape"
	| "enter"
	| "tab"
	| "space"
	| "backspace"
	| "home"
	| "end"
	| "up"
	| "down"
	| "left"
	| "right";

type BaseKey = Letter | SpecialKey;

/**
 * Union type of all key identifiers `parseKey` can produce, apart from
 * printable characters which are returned as themselves.
 */
export type KeyId = BaseKey | `ctrl+${Letter}` | "ctrl+space";

/**
 * Helper object for creating typed key identifiers with autocomplete.
 *
 * Usage:
 * - Key.escape, Key.enter, Key.up, etc. for special keys
 * - Key.ctrl("c") for control combinations
 */
export const Key = {
	escape: "escape" as const,
	enter: "enter" as const,
	tab: "tab" as const,
	space: "space" as const,
	backspace: "backspace" as const,
	home: "home" as const,
	end: "end" as const,
	up: "up" as const,
	down: "down" as const,
	left: "left" as const,
	right: "right" as const,
	ctrlSpace: "ctrl+space" as const,

	ctrl: <K extends Letter>(key: K): `ctrl+${K}` => `ctrl+${key}`,
} as const;

// =============================================================================
// Constants
// =============================================================================

const ESC = 0x1b;
const CSI_INTRODUCER = 0x5b; // "["

/**
 * Final bytes of the 3-byte `ESC [ x` cursor sequences.
 */
const CSI_FINAL_KEYS: Record<number, KeyId> = {
	0x41: "up",
	0x42: "down",
	0x43: "right",
	0x44: "left",
	0x48: "home",
	0x46: "end",
};

// =============================================================================
// Parsing
// =============================================================================

function parseSingleByte(byte: number): string | undefined {
	if (byte === 0x00) return "ctrl+space";
	if (byte === ESC) return "escape";
	if (byte === 0x09) return "tab";
	if (byte === 0x0a || byte === 0x0d) return "enter";
	if (byte === 0x7f) return "backspace";
	if (byte === 0x20) return "space";

	// Raw Ctrl+letter
	if (byte >= 1 && byte <= 26) {
		return `ctrl+${String.fromCharCode(byte + 96)}`;
	}
	if (byte >= 33 && byte <= 126) {
		return String.fromCharCode(byte);
	}
	return undefined;
}

/**
 * Parse one terminal read and return the key identifier if recognized.
 *
 * Printable ASCII bytes are returned as the character itself ("a", "/"),
 * except space which is "space". Reads of any length other than 1 or 3, and
 * 3-byte reads that are not `ESC [ x`, are not keys.
 *
 * @param bytes - Bytes of a single read
 * @returns Key identifier string (e.g., "ctrl+c") or undefined
 */
export function parseKey(bytes: Uint8Array): string | undefined {
	if (bytes.length === 1) {
		return parseSingleByte(bytes[0]);
	}

	if (bytes.length === 3 && bytes[0] === ESC && bytes[1] === CSI_INTRODUCER) {
		return CSI_FINAL_KEYS[bytes[2]];
	}

	return undefined;
}

/**
 * Match a terminal read against a key identifier.
 *
 * @param bytes - Bytes of a single read
 * @param keyId - Key identifier (e.g., "ctrl+c", "escape", Key.ctrl("c"))
 */
export function matchesKey(bytes: Uint8Array, keyId: KeyId): boolean {
	return parseKey(bytes) === keyId;
}

/**
 * Whether a read is a single printable ASCII character (space through tilde).
 */
export function isPrintable(bytes: Uint8Array): boolean {
	return bytes.length === 1 && bytes[0] >= 0x20 && bytes[0] <= 0x7e;
}
