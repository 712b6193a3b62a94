// ANSI control sequences written verbatim to the terminal

export const CLEAR_SCREEN = "\x1b[2J";
export const CURSOR_HOME = "\x1b[H";
export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";
export const ALT_SCREEN_ON = "\x1b[?1049h";
export const ALT_SCREEN_OFF = "\x1b[?1049l";

// SGR styles
export const RESET = "\x1b[0m";
export const REVERSE = "\x1b[7m";
export const FG_CYAN = "\x1b[36m";
export const BG_GREEN = "\x1b[42m";

/**
 * Wrap text in an SGR style, resetting afterwards.
 */
export function styled(style: string, text: string): string {
	return `${style}${text}${RESET}`;
}
