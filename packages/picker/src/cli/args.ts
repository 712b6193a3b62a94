/**
 * CLI argument parsing, validation and help display
 */

import chalk from "chalk";
import { APP_NAME, ENV_TTY, ENV_WRITE_LOG } from "../config.js";
import { DEFAULT_SEPARATOR } from "../core/display.js";

export interface Args {
	/** First non-flag argument */
	file?: string;
	/** Attributes to display, in order */
	display: string[];
	/** Attribute to print for each selected object */
	output?: string;
	separator?: string;
	truncate: boolean;
	table: boolean;
	lines: boolean;
	all: boolean;
	help: boolean;
	version: boolean;
}

const VALUE_FLAGS = new Set(["--display", "-d", "--output", "-o", "--separator", "-s"]);

export function parseArgs(args: string[]): Args {
	const result: Args = {
		display: [],
		truncate: false,
		table: false,
		lines: false,
		all: false,
		help: false,
		version: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (VALUE_FLAGS.has(arg) && i + 1 >= args.length) {
			console.error(chalk.yellow(`Warning: ${arg} requires a value`));
		} else if (arg === "--display" || arg === "-d") {
			result.display.push(args[++i]);
		} else if (arg === "--output" || arg === "-o") {
			result.output = args[++i];
		} else if (arg === "--separator" || arg === "-s") {
			result.separator = args[++i];
		} else if (arg === "--truncate" || arg === "-t") {
			result.truncate = true;
		} else if (arg === "--table" || arg === "-T") {
			result.table = true;
		} else if (arg === "--lines" || arg === "-l") {
			result.lines = true;
		} else if (arg === "--all" || arg === "-a") {
			result.all = true;
		} else if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if (arg.startsWith("-")) {
			console.error(chalk.yellow(`Warning: Unknown option ${arg}`));
		} else if (result.file === undefined) {
			result.file = arg;
		}
	}

	return result;
}

/**
 * Check option combinations. Returns an error message, or undefined when the
 * arguments are usable.
 */
export function validateArgs(args: Args): string | undefined {
	if (args.all && args.display.length > 0) {
		return "cannot use both -a and -d";
	}

	if (args.lines) {
		const conflicts: [boolean, string][] = [
			[args.display.length > 0, "-d"],
			[args.all, "-a"],
			[args.output !== undefined, "-o"],
			[args.separator !== undefined && args.separator !== DEFAULT_SEPARATOR, "-s"],
			[args.truncate, "-t"],
			[args.table, "-T"],
		];
		const conflict = conflicts.find(([present]) => present);
		if (conflict) {
			return `cannot use ${conflict[1]} in line mode`;
		}
	}

	return undefined;
}

export function getHelpText(): string {
	return `${chalk.bold(APP_NAME)} - interactively pick objects from a JSON array or lines of text

${chalk.bold("Usage:")}
  ${APP_NAME} [file] [options]
  ${APP_NAME} [options] < input

Input can be provided via stdin or a file, but not both.
Without display attributes, the whole object is displayed.

${chalk.bold("Options:")}
  --display, -d <attr>     Display an attribute in the list (can be used multiple times)
  --output, -o <attr>      Print this attribute of the selected object(s) instead of the object
  --separator, -s <sep>    Separator between displayed attributes (default: "${DEFAULT_SEPARATOR}")
  --truncate, -t           Truncate long items instead of wrapping
  --table, -T              Table mode: align attributes in columns
  --lines, -l              Line mode: pick from plain text lines
  --all, -a                Display every attribute (cannot be used with -d)
  --help, -h               Show this help
  --version, -v            Show version number

${chalk.bold("Controls:")}
  Up/Down                  Move the cursor
  Ctrl+Space               Mark or unmark the item and move down (multi-select)
  Enter                    Confirm the marked items, or the item under the cursor
  Esc, Ctrl+C              Cancel
  Other keys               Edit the filter

${chalk.bold("Examples:")}
  # Show names, print the id of the chosen object
  ${APP_NAME} users.json -d name -o id

  # Two attributes aligned in columns
  ${APP_NAME} -d name -d email -T < users.json

  # Pick a line of text
  ls | ${APP_NAME} -l

${chalk.bold("Environment Variables:")}
  ${ENV_TTY.padEnd(24)} - Terminal device to draw on (default: /dev/tty)
  ${ENV_WRITE_LOG.padEnd(24)} - Append everything written to the terminal to this file
`;
}

export function printHelp(): void {
	console.log(getHelpText());
}
