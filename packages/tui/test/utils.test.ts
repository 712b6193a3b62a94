import assert from "node:assert";
import { describe, it } from "node:test";
import { padToWidth, truncateToWidth, visibleWidth } from "../src/utils.js";

describe("visibleWidth", () => {
	it("should count ASCII characters", () => {
		assert.strictEqual(visibleWidth(""), 0);
		assert.strictEqual(visibleWidth("hello"), 5);
	});

	it("should count wide characters as two columns", () => {
		assert.strictEqual(visibleWidth("世界"), 4);
		assert.strictEqual(visibleWidth("a世"), 3);
	});

	it("should count combining marks as zero columns", () => {
		assert.strictEqual(visibleWidth("e\u0301"), 1);
	});
});

describe("truncateToWidth", () => {
	it("should return text that fits unchanged", () => {
		assert.strictEqual(truncateToWidth("hello", 5), "hello");
	});

	it("should cut text and append the ellipsis within the width", () => {
		assert.strictEqual(truncateToWidth("abcdefghijklmnopqrst", 8), "abcde...");
	});

	it("should use a custom ellipsis", () => {
		assert.strictEqual(truncateToWidth("abcdefghij", 5, "~"), "abcd~");
	});

	it("should not split a wide character", () => {
		assert.strictEqual(truncateToWidth("世界世界", 6), "世...");
	});

	it("should cut the ellipsis itself when there is no room for text", () => {
		assert.strictEqual(truncateToWidth("abcdef", 2), "..");
	});
});

describe("padToWidth", () => {
	it("should pad with trailing spaces", () => {
		assert.strictEqual(padToWidth("ab", 5), "ab   ");
	});

	it("should pad by visible width", () => {
		assert.strictEqual(padToWidth("世", 4), "世  ");
	});

	it("should leave longer text unchanged", () => {
		assert.strictEqual(padToWidth("abcdef", 3), "abcdef");
	});
});
