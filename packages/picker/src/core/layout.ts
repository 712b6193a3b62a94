import { visibleWidth } from "@jpick/tui";

/** Columns taken by the "> " / "  " row prefix */
export const ROW_PREFIX_WIDTH = 2;

/**
 * Columns available to item text on a terminal `width` columns wide.
 */
export function contentWidth(width: number): number {
	return width - ROW_PREFIX_WIDTH;
}

/**
 * Terminal rows an item occupies. Truncated items always take one row;
 * wrapped items take as many rows as their text needs, at least one.
 */
export function rowsFor(displayString: string, width: number, truncate: boolean): number {
	if (truncate || displayString === "") {
		return 1;
	}
	const available = contentWidth(width);
	if (available <= 0) {
		return 1;
	}
	return Math.max(1, Math.ceil(visibleWidth(displayString) / available));
}
