import { computeDisplayValues, type DisplaySpec } from "./display.js";
import type { PickerRecord } from "./records.js";

/**
 * Everything fixed for the length of a picker session.
 */
export interface PickerContext {
	readonly records: readonly PickerRecord[];
	readonly display: DisplaySpec;
	/** Display value of each record, by record position */
	readonly displayValues: readonly string[];
	/** Terminal size captured at session start */
	readonly width: number;
	readonly height: number;
}

/**
 * Picker state for one frame. Update functions return a new value and never
 * modify the one they are given.
 */
export interface PickerState {
	readonly filter: string;
	/** Record positions passing the filter, in record order */
	readonly matches: readonly number[];
	/** Index into `matches`; 0 when there are none */
	readonly cursor: number;
	/** Marked record positions, kept across filter changes */
	readonly marked: ReadonlySet<number>;
}

export function createPickerContext(
	records: readonly PickerRecord[],
	display: DisplaySpec,
	geometry: { width: number; height: number },
): PickerContext {
	return {
		records,
		display,
		displayValues: computeDisplayValues(records, display),
		width: geometry.width,
		height: geometry.height,
	};
}

export function createPickerState(context: PickerContext): PickerState {
	return {
		filter: "",
		matches: context.records.map((_, position) => position),
		cursor: 0,
		marked: new Set(),
	};
}
