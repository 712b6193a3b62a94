/**
 * Main entry point for the jpick CLI
 */

import { TtyTerminal } from "@jpick/tui";
import chalk from "chalk";
import { getHelpText, parseArgs, printHelp, validateArgs } from "./cli/args.js";
import { NoInputError, parseRecords, readInput, resolveFields } from "./cli/input.js";
import { selectionLines } from "./cli/output.js";
import { getTtyPath, getWriteLogPath, VERSION } from "./config.js";
import { runPicker } from "./core/session.js";

function openTerminal(): TtyTerminal {
	const path = getTtyPath();
	try {
		return new TtyTerminal({ path, writeLogPath: getWriteLogPath() });
	} catch (error: unknown) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`opening ${path}: ${message}`);
	}
}

async function run(args: string[]): Promise<void> {
	const parsed = parseArgs(args);

	if (parsed.version) {
		console.log(VERSION);
		return;
	}

	if (parsed.help) {
		printHelp();
		return;
	}

	const invalid = validateArgs(parsed);
	if (invalid) {
		throw new Error(invalid);
	}

	const records = parseRecords(await readInput(parsed.file, process.stdin), parsed.lines);
	const fields = resolveFields(parsed, records);

	const terminal = openTerminal();
	const positions = await runPicker(terminal, records, {
		display: {
			fields: fields.display,
			separator: parsed.separator,
			table: parsed.table,
			truncate: parsed.truncate,
		},
	}).finally(() => terminal.close());

	for (const line of selectionLines(records, positions, fields.output)) {
		console.log(line);
	}
}

export async function main(args: string[]): Promise<void> {
	try {
		await run(args);
	} catch (error: unknown) {
		if (error instanceof NoInputError) {
			console.error(getHelpText());
		}
		const message = error instanceof Error ? error.message : String(error);
		console.error(chalk.red(`Error: ${message}`));
		process.exitCode = 1;
	}
}
