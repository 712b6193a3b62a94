import { computeDisplayValues, type DisplaySpec } from "./display.js";
import type { PickerRecord } from "./records.js";
import type { PickerContext, PickerState } from "./state.js";

/**
 * Positions of the display values containing `filterText`, case-insensitively,
 * in their original order. An empty filter matches everything.
 */
export function filterPositions(displayValues: readonly string[], filterText: string): number[] {
	const needle = filterText.toLowerCase();
	const positions: number[] = [];
	for (let i = 0; i < displayValues.length; i++) {
		if (needle === "" || displayValues[i].toLowerCase().includes(needle)) {
			positions.push(i);
		}
	}
	return positions;
}

/**
 * Filter records by their display value under `spec`.
 */
export function applyFilter(records: readonly PickerRecord[], spec: DisplaySpec, filterText: string): number[] {
	return filterPositions(computeDisplayValues(records, spec), filterText);
}

/**
 * Replace the filter text, recomputing matches and pulling the cursor back
 * inside them.
 */
export function setFilter(state: PickerState, filter: string, context: PickerContext): PickerState {
	const matches = filterPositions(context.displayValues, filter);
	return {
		...state,
		filter,
		matches,
		cursor: Math.min(state.cursor, Math.max(0, matches.length - 1)),
	};
}

export function appendToFilter(state: PickerState, char: string, context: PickerContext): PickerState {
	return setFilter(state, state.filter + char, context);
}

/**
 * Remove the last filter character. An empty filter is left as it is.
 */
export function deleteFromFilter(state: PickerState, context: PickerContext): PickerState {
	if (state.filter.length === 0) {
		return state;
	}
	return setFilter(state, state.filter.slice(0, -1), context);
}
