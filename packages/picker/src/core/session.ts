import type { Terminal } from "@jpick/tui";
import { createDisplaySpec, type DisplayOptions } from "./display.js";
import { DEFAULT_PICKER_THEME, frameToString, type PickerTheme, renderFrame } from "./frame.js";
import { decodeInput } from "./input.js";
import { DEFAULT_PICKER_KEYBINDINGS, type PickerKeybindings } from "./keybindings.js";
import type { PickerRecord } from "./records.js";
import { reducePicker } from "./reducer.js";
import { createPickerContext, createPickerState, type PickerContext, type PickerState } from "./state.js";
import { viewportFor } from "./viewport.js";

export interface PickerOptions {
	display?: DisplayOptions;
	keybindings?: PickerKeybindings;
	theme?: PickerTheme;
}

/**
 * Render the lines of one frame for the current state.
 */
export function renderPicker(
	state: PickerState,
	context: PickerContext,
	theme: PickerTheme = DEFAULT_PICKER_THEME,
): string[] {
	return renderFrame(state, viewportFor(state, context), context, theme);
}

/**
 * Run an interactive picker session on `terminal`.
 *
 * Resolves with the selected record positions in ascending order, or an
 * empty array when the user cancels. Rejects when the terminal input fails.
 * The terminal is restored before the promise settles either way.
 */
export async function runPicker(
	terminal: Terminal,
	records: readonly PickerRecord[],
	options: PickerOptions = {},
): Promise<number[]> {
	const keybindings = options.keybindings ?? DEFAULT_PICKER_KEYBINDINGS;
	const theme = options.theme ?? DEFAULT_PICKER_THEME;

	// Geometry is read once; resizes during the session are not followed
	const context = createPickerContext(records, createDisplaySpec(records, options.display), {
		width: terminal.columns,
		height: terminal.rows,
	});
	let state = createPickerState(context);

	const paint = (): void => {
		terminal.write(frameToString(renderPicker(state, context, theme)));
	};

	terminal.start();
	try {
		terminal.enterAlternateScreen();
		terminal.hideCursor();
		paint();

		while (true) {
			const action = decodeInput(await terminal.read(), keybindings);
			if (!action) continue;

			const step = reducePicker(state, action, context);
			if (step.outcome) {
				return step.outcome.type === "confirm" ? step.outcome.positions : [];
			}
			if (step.state !== state) {
				state = step.state;
				paint();
			}
		}
	} finally {
		terminal.showCursor();
		terminal.leaveAlternateScreen();
		terminal.stop();
	}
}
