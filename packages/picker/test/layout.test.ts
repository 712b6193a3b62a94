import { describe, expect, it } from "vitest";
import { contentWidth, rowsFor } from "../src/core/layout.js";

const twenty = "abcdefghijklmnopqrst";

describe("contentWidth", () => {
	it("leaves room for the row prefix", () => {
		expect(contentWidth(10)).toBe(8);
	});
});

describe("rowsFor", () => {
	it("takes one row in truncate mode", () => {
		expect(rowsFor(twenty, 10, true)).toBe(1);
	});

	it("wraps over the content width", () => {
		expect(rowsFor(twenty, 10, false)).toBe(3);
		expect(rowsFor("abcdefgh", 10, false)).toBe(1);
		expect(rowsFor("abcdefghi", 10, false)).toBe(2);
	});

	it("takes one row for an empty string", () => {
		expect(rowsFor("", 10, false)).toBe(1);
	});

	it("takes one row when there is no room for text", () => {
		expect(rowsFor(twenty, 2, false)).toBe(1);
		expect(rowsFor(twenty, 1, false)).toBe(1);
	});

	it("counts wide characters as two columns", () => {
		expect(rowsFor("世界世界", 6, false)).toBe(2);
	});
});
