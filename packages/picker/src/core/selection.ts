import type { PickerState } from "./state.js";

/**
 * Move the cursor up one match. Stops at the first match.
 */
export function moveUp(state: PickerState): PickerState {
	if (state.cursor <= 0) {
		return state;
	}
	return { ...state, cursor: state.cursor - 1 };
}

/**
 * Move the cursor down one match. Stops at the last match.
 */
export function moveDown(state: PickerState): PickerState {
	if (state.cursor >= state.matches.length - 1) {
		return state;
	}
	return { ...state, cursor: state.cursor + 1 };
}

/**
 * Flip the mark on the record under the cursor, then step to the next match
 * unless already on the last one.
 */
export function toggleMark(state: PickerState): PickerState {
	if (state.matches.length === 0) {
		return state;
	}

	const position = state.matches[state.cursor];
	const marked = new Set(state.marked);
	if (marked.has(position)) {
		marked.delete(position);
	} else {
		marked.add(position);
	}

	const cursor = state.cursor < state.matches.length - 1 ? state.cursor + 1 : state.cursor;
	return { ...state, marked, cursor };
}

/**
 * Record positions a confirm would return: every marked record in ascending
 * position order, or else the record under the cursor.
 */
export function currentSelection(state: PickerState): number[] {
	if (state.marked.size > 0) {
		return [...state.marked].sort((a, b) => a - b);
	}
	if (state.matches.length === 0) {
		return [];
	}
	return [state.matches[state.cursor]];
}
