import {
	BG_GREEN,
	CLEAR_SCREEN,
	CURSOR_HOME,
	FG_CYAN,
	padToWidth,
	REVERSE,
	styled,
	truncateToWidth,
	visibleWidth,
} from "@jpick/tui";
import { contentWidth } from "./layout.js";
import type { PickerContext, PickerState } from "./state.js";
import type { ViewportWindow } from "./viewport.js";

export interface PickerTheme {
	label: (text: string) => string;
	cursorRow: (text: string) => string;
	markedRow: (text: string) => string;
	markedCursorRow: (text: string) => string;
	noMatch: (text: string) => string;
}

export const DEFAULT_PICKER_THEME: PickerTheme = {
	label: (text) => styled(FG_CYAN, text),
	cursorRow: (text) => styled(REVERSE, text),
	markedRow: (text) => styled(BG_GREEN, text),
	markedCursorRow: (text) => styled(REVERSE + BG_GREEN, text),
	noMatch: (text) => text,
};

export const NO_MATCHES_LINE = "  (no matches)";

/** Ellipsis used when truncating; only applied when the row has room for more than it */
const ELLIPSIS = "...";

/**
 * Render the picker as terminal lines: the filter prompt, then one line per
 * item in `window`. Wrapped items are single lines here; the terminal wraps
 * them.
 */
export function renderFrame(
	state: PickerState,
	window: ViewportWindow,
	context: PickerContext,
	theme: PickerTheme = DEFAULT_PICKER_THEME,
): string[] {
	const lines = [`${theme.label("Filter:")} ${state.filter}`];

	if (state.matches.length === 0) {
		lines.push(theme.noMatch(NO_MATCHES_LINE));
		return lines;
	}

	const available = contentWidth(context.width);
	const { truncate } = context.display;

	const positions = state.matches.slice(window.start, window.end);
	const texts = positions.map((position) => {
		const text = context.displayValues[position];
		return truncate && available > ELLIPSIS.length ? truncateToWidth(text, available, ELLIPSIS) : text;
	});

	// Highlighted rows share one width unless a visible row wraps
	const wraps = !truncate && texts.some((text) => visibleWidth(text) > available);
	const padWidth = wraps ? 0 : Math.max(...texts.map((text) => visibleWidth(text)));

	positions.forEach((position, offset) => {
		const text = texts[offset];
		const rowText = padToWidth(text, padWidth);
		const isCursor = window.start + offset === state.cursor;
		const isMarked = state.marked.has(position);

		if (isCursor) {
			lines.push((isMarked ? theme.markedCursorRow : theme.cursorRow)(`> ${rowText}`));
		} else if (isMarked) {
			lines.push(theme.markedRow(`  ${rowText}`));
		} else {
			lines.push(`  ${text}`);
		}
	});

	return lines;
}

/**
 * The bytes that repaint the whole screen with `lines`.
 */
export function frameToString(lines: readonly string[]): string {
	return CLEAR_SCREEN + CURSOR_HOME + lines.map((line) => `${line}\r\n`).join("");
}
