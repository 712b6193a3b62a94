/**
 * Splits a chunk of terminal input into individual reads.
 *
 * A stream `data` event can carry several keystrokes at once (fast typing,
 * a paste, a key held down). The picker decodes one keystroke per read, so a
 * chunk is cut the way successive blocking reads would have seen it:
 *
 * - `ESC [` followed by parameter bytes and a final byte (0x40-0x7E) is one
 *   read, so `ESC [ A` stays together and `ESC [ 1 ; 5 A` never leaks
 *   `;5A` into the filter
 * - `ESC O x` (SS3) is one read
 * - `ESC` followed by any other byte is one 2-byte read (Alt+key)
 * - `ESC` at the end of the chunk is a lone escape
 * - every other byte is a read of its own
 *
 * A CSI sequence cut off by the end of the chunk is returned as it is; the
 * decoder ignores reads it does not recognize.
 */

const ESC = 0x1b;
const CSI_INTRODUCER = 0x5b; // "["
const SS3_INTRODUCER = 0x4f; // "O"

function isCsiFinalByte(byte: number): boolean {
	return byte >= 0x40 && byte <= 0x7e;
}

/**
 * Find the end (exclusive) of the escape sequence starting at `start`.
 */
function escapeSequenceEnd(chunk: Uint8Array, start: number): number {
	const next = start + 1;
	if (next >= chunk.length) {
		return next;
	}

	if (chunk[next] === CSI_INTRODUCER) {
		let end = next + 1;
		while (end < chunk.length) {
			if (isCsiFinalByte(chunk[end])) {
				return end + 1;
			}
			end++;
		}
		return end;
	}

	if (chunk[next] === SS3_INTRODUCER) {
		return Math.min(next + 2, chunk.length);
	}

	return next + 1;
}

/**
 * Split a chunk of raw terminal input into reads.
 */
export function splitInput(chunk: Uint8Array): Uint8Array[] {
	const reads: Uint8Array[] = [];
	let pos = 0;

	while (pos < chunk.length) {
		const end = chunk[pos] === ESC ? escapeSequenceEnd(chunk, pos) : pos + 1;
		reads.push(chunk.subarray(pos, end));
		pos = end;
	}

	return reads;
}
