/**
 * Reading and parsing the records to pick from
 */

import { readFile } from "fs/promises";
import type { Readable } from "stream";
import { collectFields, isPickerRecord, type PickerRecord } from "../core/records.js";
import type { Args } from "./args.js";

/** Field holding each line's text in line mode */
export const LINE_FIELD = "line";

/**
 * Neither a file nor piped stdin was given. Reported together with the usage.
 */
export class NoInputError extends Error {
	constructor() {
		super("no input provided");
		this.name = "NoInputError";
	}
}

export type InputStream = Readable & { isTTY?: boolean };

async function readStream(stream: Readable): Promise<string> {
	return new Promise((resolve, reject) => {
		let data = "";
		stream.setEncoding("utf8");
		stream.on("data", (chunk: string) => {
			data += chunk;
		});
		stream.on("end", () => {
			resolve(data);
		});
		stream.on("error", reject);
		stream.resume();
	});
}

/**
 * Read the raw input from `file` or, when stdin is not a terminal, from stdin.
 * Exactly one of the two must be present.
 */
export async function readInput(file: string | undefined, stdin: InputStream): Promise<string> {
	const piped = !stdin.isTTY;

	if (piped && file !== undefined) {
		throw new Error("cannot use both stdin and filename input");
	}
	if (!piped && file === undefined) {
		throw new NoInputError();
	}

	if (file !== undefined) {
		return readFile(file, "utf-8");
	}
	return readStream(stdin);
}

function splitLines(text: string): string[] {
	const lines = text.split("\n");
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

function parseJsonRecords(text: string): PickerRecord[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`error parsing JSON: ${message}`);
	}

	if (parsed === null) {
		return [];
	}
	if (!Array.isArray(parsed)) {
		throw new Error("error parsing JSON: expected an array of objects");
	}

	const records: PickerRecord[] = [];
	parsed.forEach((item: unknown, i) => {
		if (!isPickerRecord(item)) {
			throw new Error(`error parsing JSON: element ${i} is not an object`);
		}
		records.push(item);
	});
	return records;
}

/**
 * Parse input into records: a JSON array of objects, or in line mode one
 * `{ line }` record per line.
 */
export function parseRecords(text: string, lineMode: boolean): PickerRecord[] {
	const records = lineMode ? splitLines(text).map((line) => ({ [LINE_FIELD]: line })) : parseJsonRecords(text);

	if (records.length === 0) {
		throw new Error("no objects found in input");
	}
	return records;
}

export interface FieldSelection {
	/** Attributes shown in the list; empty shows whole objects */
	display: string[];
	/** Attribute printed for each selection; undefined prints whole objects */
	output?: string;
}

/**
 * Decide which attributes are displayed and printed.
 */
export function resolveFields(args: Args, records: readonly PickerRecord[]): FieldSelection {
	if (args.lines) {
		return { display: [LINE_FIELD], output: LINE_FIELD };
	}
	if (args.all) {
		return { display: collectFields(records), output: args.output };
	}
	return { display: args.display, output: args.output };
}
