import { appendToFilter, deleteFromFilter } from "./filter.js";
import type { PickerAction } from "./input.js";
import { currentSelection, moveDown, moveUp, toggleMark } from "./selection.js";
import type { PickerContext, PickerState } from "./state.js";

export type PickerOutcome = { type: "confirm"; positions: number[] } | { type: "cancel" };

export interface PickerStep {
	state: PickerState;
	/** Set when the action ends the session */
	outcome?: PickerOutcome;
}

/**
 * Apply one action to the picker state.
 */
export function reducePicker(state: PickerState, action: PickerAction, context: PickerContext): PickerStep {
	switch (action.type) {
		case "insert":
			return { state: appendToFilter(state, action.char, context) };
		case "backspace":
			return { state: deleteFromFilter(state, context) };
		case "moveUp":
			return { state: moveUp(state) };
		case "moveDown":
			return { state: moveDown(state) };
		case "toggleMark":
			return { state: toggleMark(state) };
		case "confirm":
			return { state, outcome: { type: "confirm", positions: currentSelection(state) } };
		case "cancel":
			return { state, outcome: { type: "cancel" } };
	}
}
