import { rowsFor } from "./layout.js";
import type { PickerContext, PickerState } from "./state.js";

/**
 * Half-open range of match indices painted this frame.
 */
export interface ViewportWindow {
	readonly start: number;
	readonly end: number;
}

/** Rows taken by the filter prompt plus margin */
export const CHROME_ROWS = 4;

/**
 * Rows left for items on a terminal `height` rows tall, at least one.
 */
export function availableRows(height: number): number {
	return Math.max(1, height - CHROME_ROWS);
}

/**
 * Choose the slice of matches to paint so the cursor is visible and roughly
 * centered.
 *
 * Items above the cursor may use at most half of the row budget, counted
 * before the cursor item's own rows; items below get whatever remains. A tall
 * cursor item therefore leaves less room below than a symmetric split would.
 *
 * @param matches - Record positions passing the filter
 * @param cursor - Index into `matches`
 * @param rowBudget - Rows available for items; values below 1 count as 1
 * @param costOf - Rows occupied by the item at a record position
 */
export function computeWindow(
	matches: readonly number[],
	cursor: number,
	rowBudget: number,
	costOf: (position: number) => number,
): ViewportWindow {
	if (matches.length === 0) {
		return { start: 0, end: 0 };
	}

	const budget = Math.max(1, rowBudget);
	const upwardBudget = Math.floor(budget / 2);

	let usedRows = 0;
	let start = cursor;
	while (start > 0) {
		const cost = costOf(matches[start - 1]);
		if (usedRows + cost > upwardBudget) {
			break;
		}
		start--;
		usedRows += cost;
	}

	usedRows += costOf(matches[cursor]);

	let end = cursor + 1;
	while (end < matches.length) {
		const cost = costOf(matches[end]);
		if (usedRows + cost > budget) {
			break;
		}
		usedRows += cost;
		end++;
	}

	return { start, end };
}

/**
 * The window for the current state, costing items with the layout rules.
 */
export function viewportFor(state: PickerState, context: PickerContext): ViewportWindow {
	return computeWindow(state.matches, state.cursor, availableRows(context.height), (position) =>
		rowsFor(context.displayValues[position], context.width, context.display.truncate),
	);
}
