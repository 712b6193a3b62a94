import type { KeyId } from "@jpick/tui";

/**
 * Picker commands that can be bound to keys.
 */
export const PICKER_COMMANDS = ["moveUp", "moveDown", "toggleMark", "confirm", "cancel", "backspace"] as const;

export type PickerCommand = (typeof PICKER_COMMANDS)[number];

export type PickerKeybindings = Record<PickerCommand, readonly KeyId[]>;

/**
 * Default picker keybindings.
 */
export const DEFAULT_PICKER_KEYBINDINGS: PickerKeybindings = {
	moveUp: ["up"],
	moveDown: ["down"],
	toggleMark: ["ctrl+space"],
	confirm: ["enter"],
	cancel: ["escape", "ctrl+c"],
	backspace: ["backspace"],
};

/**
 * Override some bindings, keeping the defaults for the rest.
 */
export function withKeybindings(overrides: Partial<PickerKeybindings>): PickerKeybindings {
	return { ...DEFAULT_PICKER_KEYBINDINGS, ...overrides };
}

/**
 * Find the command bound to a key identifier.
 */
export function commandForKey(key: string, keybindings: PickerKeybindings): PickerCommand | undefined {
	return PICKER_COMMANDS.find((command) => keybindings[command].some((bound) => bound === key));
}
