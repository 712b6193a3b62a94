import { isPrintable, parseKey } from "@jpick/tui";
import { commandForKey, DEFAULT_PICKER_KEYBINDINGS, type PickerKeybindings } from "./keybindings.js";

export type PickerAction =
	| { type: "insert"; char: string }
	| { type: "backspace" }
	| { type: "moveUp" }
	| { type: "moveDown" }
	| { type: "toggleMark" }
	| { type: "confirm" }
	| { type: "cancel" };

/**
 * Decode one terminal read into a picker action.
 *
 * Bound keys win over text input; any other printable byte is typed into the
 * filter. Everything else, including escape sequences for keys the picker
 * does not bind, yields no action.
 */
export function decodeInput(
	bytes: Uint8Array,
	keybindings: PickerKeybindings = DEFAULT_PICKER_KEYBINDINGS,
): PickerAction | undefined {
	const key = parseKey(bytes);
	if (key === undefined) {
		return undefined;
	}

	const command = commandForKey(key, keybindings);
	if (command) {
		return { type: command };
	}

	if (isPrintable(bytes)) {
		return { type: "insert", char: String.fromCharCode(bytes[0]) };
	}

	return undefined;
}
