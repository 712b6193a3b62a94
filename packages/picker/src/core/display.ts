import { padToWidth, visibleWidth } from "@jpick/tui";
import { formatFieldValue, getField, type PickerRecord, stringifyJson } from "./records.js";

export const DEFAULT_SEPARATOR = " - ";
export const TABLE_SEPARATOR = "  ";

export interface DisplayOptions {
	/** Fields to project, in order. Empty shows the whole record as JSON. */
	fields?: readonly string[];
	separator?: string;
	/** Align fields in columns */
	table?: boolean;
	/** Truncate long items to one row instead of wrapping */
	truncate?: boolean;
}

/**
 * How a record becomes its display value.
 */
export interface DisplaySpec {
	readonly fields: readonly string[];
	readonly separator: string;
	readonly table: boolean;
	readonly truncate: boolean;
	/** Width of each column in table mode, measured over every record */
	readonly columnWidths: readonly number[];
}

// Control characters would move the terminal cursor mid-row
const toSingleLine = (text: string): string => text.replace(/[\x00-\x1f\x7f]/g, " ");

function fieldText(record: PickerRecord, field: string): string {
	const value = getField(record, field);
	return value === undefined ? "" : toSingleLine(formatFieldValue(value));
}

export function createDisplaySpec(records: readonly PickerRecord[], options: DisplayOptions = {}): DisplaySpec {
	const fields = options.fields ?? [];
	const table = options.table ?? false;

	const columnWidths = fields.map(() => 0);
	if (table) {
		for (const record of records) {
			fields.forEach((field, i) => {
				columnWidths[i] = Math.max(columnWidths[i], visibleWidth(fieldText(record, field)));
			});
		}
	}

	return {
		fields,
		separator: options.separator ?? DEFAULT_SEPARATOR,
		table,
		truncate: options.truncate ?? false,
		columnWidths,
	};
}

/**
 * The text a record is filtered on and painted as. Absent fields contribute
 * an empty string.
 */
export function displayValue(record: PickerRecord, spec: DisplaySpec): string {
	if (spec.fields.length === 0) {
		return toSingleLine(stringifyJson(record));
	}

	const values = spec.fields.map((field, i) => {
		const text = fieldText(record, field);
		// The last column is never padded
		if (spec.table && i < spec.fields.length - 1) {
			return padToWidth(text, spec.columnWidths[i]);
		}
		return text;
	});

	return values.join(spec.table ? TABLE_SEPARATOR : spec.separator);
}

/**
 * Display values for every record, indexed by record position. Records are
 * immutable for a session, so these are computed once.
 */
export function computeDisplayValues(records: readonly PickerRecord[], spec: DisplaySpec): string[] {
	return records.map((record) => displayValue(record, spec));
}
