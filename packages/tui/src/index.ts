// Terminal plumbing for the picker

// ANSI control sequences
export {
	ALT_SCREEN_OFF,
	ALT_SCREEN_ON,
	BG_GREEN,
	CLEAR_SCREEN,
	CURSOR_HOME,
	FG_CYAN,
	HIDE_CURSOR,
	RESET,
	REVERSE,
	SHOW_CURSOR,
	styled,
} from "./ansi.js";
// Input splitting for batched reads
export { splitInput } from "./input-splitter.js";
// Keyboard input handling
export { isPrintable, Key, type KeyId, matchesKey, parseKey } from "./keys.js";
// Terminal interface and implementations
export { DEFAULT_COLUMNS, DEFAULT_ROWS, type Terminal, TtyTerminal, type TtyTerminalOptions } from "./terminal.js";
// Utilities
export { padToWidth, truncateToWidth, visibleWidth } from "./utils.js";
