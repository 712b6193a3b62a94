/**
 * Tests for keyboard input handling
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { isPrintable, Key, matchesKey, parseKey } from "../src/keys.js";

const bytes = (...values: number[]) => Uint8Array.from(values);

describe("parseKey", () => {
	describe("single-byte reads", () => {
		it("should parse control keys", () => {
			assert.strictEqual(parseKey(bytes(0)), "ctrl+space");
			assert.strictEqual(parseKey(bytes(3)), "ctrl+c");
			assert.strictEqual(parseKey(bytes(27)), "escape");
			assert.strictEqual(parseKey(bytes(127)), "backspace");
			assert.strictEqual(parseKey(bytes(9)), "tab");
		});

		it("should treat both carriage return and line feed as enter", () => {
			assert.strictEqual(parseKey(bytes(13)), "enter");
			assert.strictEqual(parseKey(bytes(10)), "enter");
		});

		it("should name raw ctrl+letter bytes", () => {
			assert.strictEqual(parseKey(bytes(1)), "ctrl+a");
			assert.strictEqual(parseKey(bytes(8)), "ctrl+h");
			assert.strictEqual(parseKey(bytes(26)), "ctrl+z");
		});

		it("should return printable characters as themselves", () => {
			assert.strictEqual(parseKey(bytes(0x61)), "a");
			assert.strictEqual(parseKey(bytes(0x41)), "A");
			assert.strictEqual(parseKey(bytes(0x7e)), "~");
			assert.strictEqual(parseKey(bytes(0x20)), "space");
		});

		it("should not parse bytes outside ASCII", () => {
			assert.strictEqual(parseKey(bytes(0x80)), undefined);
			assert.strictEqual(parseKey(bytes(0xff)), undefined);
			assert.strictEqual(parseKey(bytes(0x1c)), undefined);
		});
	});

	describe("three-byte reads", () => {
		it("should parse cursor keys", () => {
			assert.strictEqual(parseKey(bytes(27, 91, 65)), "up");
			assert.strictEqual(parseKey(bytes(27, 91, 66)), "down");
			assert.strictEqual(parseKey(bytes(27, 91, 67)), "right");
			assert.strictEqual(parseKey(bytes(27, 91, 68)), "left");
			assert.strictEqual(parseKey(bytes(27, 91, 72)), "home");
			assert.strictEqual(parseKey(bytes(27, 91, 70)), "end");
		});

		it("should not parse unknown final bytes", () => {
			assert.strictEqual(parseKey(bytes(27, 91, 90)), undefined);
		});

		it("should not parse SS3 sequences", () => {
			assert.strictEqual(parseKey(bytes(27, 79, 65)), undefined);
		});

		it("should not parse three printable bytes", () => {
			assert.strictEqual(parseKey(bytes(0x61, 0x62, 0x63)), undefined);
		});
	});

	describe("other lengths", () => {
		it("should not parse empty reads", () => {
			assert.strictEqual(parseKey(bytes()), undefined);
		});

		it("should not parse alt+key or longer CSI sequences", () => {
			assert.strictEqual(parseKey(bytes(27, 0x61)), undefined);
			assert.strictEqual(parseKey(bytes(27, 91, 49, 59, 53, 65)), undefined);
			assert.strictEqual(parseKey(bytes(27, 91, 51, 126)), undefined);
		});
	});
});

describe("matchesKey", () => {
	it("should match key identifiers built with the Key helper", () => {
		assert.strictEqual(matchesKey(bytes(3), Key.ctrl("c")), true);
		assert.strictEqual(matchesKey(bytes(0), Key.ctrlSpace), true);
		assert.strictEqual(matchesKey(bytes(27, 91, 65), Key.up), true);
	});

	it("should not match a different key", () => {
		assert.strictEqual(matchesKey(bytes(27, 91, 65), Key.down), false);
		assert.strictEqual(matchesKey(bytes(27), Key.ctrl("c")), false);
	});
});

describe("isPrintable", () => {
	it("should accept single bytes from space to tilde", () => {
		assert.strictEqual(isPrintable(bytes(0x20)), true);
		assert.strictEqual(isPrintable(bytes(0x7e)), true);
	});

	it("should reject control bytes and multi-byte reads", () => {
		assert.strictEqual(isPrintable(bytes(0x1f)), false);
		assert.strictEqual(isPrintable(bytes(0x7f)), false);
		assert.strictEqual(isPrintable(bytes(0x61, 0x62)), false);
	});
});
