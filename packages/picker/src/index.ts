// Records and display
export {
	computeDisplayValues,
	createDisplaySpec,
	DEFAULT_SEPARATOR,
	type DisplayOptions,
	type DisplaySpec,
	displayValue,
	TABLE_SEPARATOR,
} from "./core/display.js";
export { applyFilter, filterPositions } from "./core/filter.js";
// Rendering
export { DEFAULT_PICKER_THEME, frameToString, NO_MATCHES_LINE, type PickerTheme, renderFrame } from "./core/frame.js";
export { decodeInput, type PickerAction } from "./core/input.js";
// Keybindings
export {
	commandForKey,
	DEFAULT_PICKER_KEYBINDINGS,
	PICKER_COMMANDS,
	type PickerCommand,
	type PickerKeybindings,
	withKeybindings,
} from "./core/keybindings.js";
export { contentWidth, ROW_PREFIX_WIDTH, rowsFor } from "./core/layout.js";
export {
	collectFields,
	formatFieldValue,
	getField,
	isPickerRecord,
	type JsonValue,
	type PickerRecord,
	stringifyJson,
} from "./core/records.js";
export { type PickerOutcome, type PickerStep, reducePicker } from "./core/reducer.js";
export { currentSelection, moveDown, moveUp, toggleMark } from "./core/selection.js";
// Session
export { type PickerOptions, renderPicker, runPicker } from "./core/session.js";
export { createPickerContext, createPickerState, type PickerContext, type PickerState } from "./core/state.js";
export { availableRows, CHROME_ROWS, computeWindow, type ViewportWindow, viewportFor } from "./core/viewport.js";
