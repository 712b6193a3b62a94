import { describe, expect, it } from "vitest";
import { createDisplaySpec } from "../src/core/display.js";
import { appendToFilter, applyFilter, deleteFromFilter, filterPositions, setFilter } from "../src/core/filter.js";
import { createPickerState } from "../src/core/state.js";
import type { PickerRecord } from "../src/core/records.js";
import { createTestContext, GREEK } from "./utilities.js";

describe("filterPositions", () => {
	const values = ["Alpha", "Beta", "Gamma"];

	it("matches case-insensitive substrings in order", () => {
		expect(filterPositions(values, "a")).toEqual([0, 1, 2]);
		expect(filterPositions(values, "al")).toEqual([0]);
		expect(filterPositions(values, "AL")).toEqual([0]);
		expect(filterPositions(values, "mm")).toEqual([2]);
	});

	it("matches everything with an empty filter", () => {
		expect(filterPositions(values, "")).toEqual([0, 1, 2]);
	});

	it("matches nothing when no value contains the text", () => {
		expect(filterPositions(values, "z")).toEqual([]);
	});

	it("never grows the match set when the filter is extended", () => {
		const words = ["banana", "bandana", "cabana", "ban", "nab", "Banner"];
		const text = "banana";
		let previous = filterPositions(words, "");
		for (let i = 1; i <= text.length; i++) {
			const current = filterPositions(words, text.slice(0, i));
			expect(current.every((position) => previous.includes(position))).toBe(true);
			previous = current;
		}
		expect(previous).toEqual([0]);
	});
});

describe("applyFilter", () => {
	it("filters records by their display value", () => {
		const spec = createDisplaySpec(GREEK, { fields: ["name"] });
		expect(applyFilter(GREEK, spec, "et")).toEqual([1]);
	});

	it("matches against the serialized record without display fields", () => {
		const records: PickerRecord[] = [{ id: 1 }, { id: 2, tag: "x" }];
		expect(applyFilter(records, createDisplaySpec(records), "tag")).toEqual([1]);
	});

	it("matches against key-sorted JSON", () => {
		const records = [{ zeta: 1, alpha: { y: 2, b: 3 } }];
		expect(applyFilter(records, createDisplaySpec(records), '"alpha":{"b"')).toEqual([0]);
	});
});

describe("setFilter", () => {
	const context = createTestContext(GREEK);

	it("recomputes matches and clamps the cursor", () => {
		const state = { ...createPickerState(context), cursor: 2 };
		const next = setFilter(state, "al", context);
		expect(next.filter).toBe("al");
		expect(next.matches).toEqual([0]);
		expect(next.cursor).toBe(0);
	});

	it("sets the cursor to 0 when nothing matches", () => {
		const state = { ...createPickerState(context), cursor: 1 };
		const next = setFilter(state, "z", context);
		expect(next.matches).toEqual([]);
		expect(next.cursor).toBe(0);
	});

	it("keeps the cursor when it is still inside the matches", () => {
		const state = { ...createPickerState(context), cursor: 1 };
		expect(setFilter(state, "a", context).cursor).toBe(1);
	});

	it("keeps marks on records that no longer match", () => {
		const state = { ...createPickerState(context), marked: new Set([2]) };
		const next = setFilter(state, "al", context);
		expect([...next.marked]).toEqual([2]);
	});
});

describe("appendToFilter / deleteFromFilter", () => {
	const context = createTestContext(GREEK);

	it("appends a character", () => {
		const next = appendToFilter(appendToFilter(createPickerState(context), "a", context), "l", context);
		expect(next.filter).toBe("al");
		expect(next.matches).toEqual([0]);
	});

	it("removes the last character", () => {
		const state = setFilter(createPickerState(context), "al", context);
		const next = deleteFromFilter(state, context);
		expect(next.filter).toBe("a");
		expect(next.matches).toEqual([0, 1, 2]);
	});

	it("leaves an empty filter unchanged", () => {
		const state = createPickerState(context);
		expect(deleteFromFilter(state, context)).toBe(state);
	});
});
