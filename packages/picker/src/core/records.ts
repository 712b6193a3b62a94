/**
 * Records browsed by the picker: JSON objects addressed by their position in
 * the input sequence.
 */

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type PickerRecord = { readonly [field: string]: JsonValue };

export function isPickerRecord(value: unknown): value is PickerRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a field, distinguishing an absent field from a present `null`.
 */
export function getField(record: PickerRecord, field: string): JsonValue | undefined {
	return Object.hasOwn(record, field) ? record[field] : undefined;
}

/**
 * Serialize a JSON value compactly with object keys sorted at every level.
 * Integer-like keys sort as strings: `"10"` comes before `"9"`.
 */
export function stringifyJson(value: JsonValue): string {
	if (Array.isArray(value)) {
		return `[${value.map(stringifyJson).join(",")}]`;
	}
	if (value !== null && typeof value === "object") {
		const object = value;
		const entries = Object.keys(object)
			.sort()
			.map((key) => `${JSON.stringify(key)}:${stringifyJson(object[key])}`);
		return `{${entries.join(",")}}`;
	}
	return JSON.stringify(value);
}

/**
 * Render a field value as display text. Total over every JSON value:
 * strings as is, scalars as JSON, arrays and objects as key-sorted compact JSON.
 */
export function formatFieldValue(value: JsonValue): string {
	if (typeof value === "string") {
		return value;
	}
	if (value === null || typeof value === "boolean" || typeof value === "number") {
		return String(value);
	}
	return stringifyJson(value);
}

/**
 * Every field name present in any record, sorted.
 */
export function collectFields(records: readonly PickerRecord[]): string[] {
	const fields = new Set<string>();
	for (const record of records) {
		for (const field of Object.keys(record)) {
			fields.add(field);
		}
	}
	return [...fields].sort();
}
