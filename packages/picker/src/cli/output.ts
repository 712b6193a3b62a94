import { formatFieldValue, getField, type JsonValue, type PickerRecord, stringifyJson } from "../core/records.js";

/**
 * Format an attribute value for output. Integral numbers are printed in full
 * rather than in exponent form.
 */
export function formatOutputValue(value: JsonValue): string {
	if (typeof value === "number" && Number.isInteger(value)) {
		return BigInt(value).toString();
	}
	return formatFieldValue(value);
}

/**
 * Output lines for the selected records, in the given order: the `output`
 * attribute when set, otherwise the whole record as key-sorted compact JSON.
 *
 * Lines are produced one at a time; a record missing the attribute throws
 * when it is reached, after the lines before it.
 */
export function* selectionLines(
	records: readonly PickerRecord[],
	positions: readonly number[],
	output?: string,
): Generator<string> {
	for (const position of positions) {
		const record = records[position];

		if (output === undefined) {
			yield stringifyJson(record);
			continue;
		}

		const value = getField(record, output);
		if (value === undefined) {
			throw new Error(`attribute '${output}' not found in selected object`);
		}
		yield formatOutputValue(value);
	}
}
