import { afterEach, describe, expect, it, vi } from "vitest";
import { getHelpText, parseArgs, validateArgs } from "../src/cli/args.js";

describe("parseArgs", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("parses every option", () => {
		const args = parseArgs(["data.json", "-d", "name", "--display", "id", "-o", "id", "-s", "|", "-t", "-T"]);
		expect(args).toEqual({
			file: "data.json",
			display: ["name", "id"],
			output: "id",
			separator: "|",
			truncate: true,
			table: true,
			lines: false,
			all: false,
			help: false,
			version: false,
		});
	});

	it("parses long boolean flags", () => {
		const args = parseArgs(["--truncate", "--table", "--lines", "--all", "--help", "--version"]);
		expect(args.truncate && args.table && args.lines && args.all && args.help && args.version).toBe(true);
	});

	it("parses short mode flags", () => {
		const args = parseArgs(["-l", "-a", "-h", "-v"]);
		expect(args.lines).toBe(true);
		expect(args.all).toBe(true);
		expect(args.help).toBe(true);
		expect(args.version).toBe(true);
	});

	it("takes the first positional argument as the file", () => {
		expect(parseArgs(["a.json", "b.json"]).file).toBe("a.json");
		expect(parseArgs(["-t"]).file).toBeUndefined();
	});

	it("accepts a flag-like value after a value option", () => {
		expect(parseArgs(["-s", "-"]).separator).toBe("-");
	});

	it("warns about a missing value", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const args = parseArgs(["-d"]);
		expect(args.display).toEqual([]);
		expect(error).toHaveBeenCalledWith(expect.stringContaining("Warning: -d requires a value"));
	});

	it("warns about unknown options", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		parseArgs(["--frobnicate"]);
		expect(error).toHaveBeenCalledWith(expect.stringContaining("Warning: Unknown option --frobnicate"));
	});
});

describe("validateArgs", () => {
	it("accepts ordinary combinations", () => {
		expect(validateArgs(parseArgs(["-d", "name", "-o", "id", "-T"]))).toBeUndefined();
		expect(validateArgs(parseArgs(["-a", "-t"]))).toBeUndefined();
		expect(validateArgs(parseArgs(["-l"]))).toBeUndefined();
	});

	it("rejects -a with -d", () => {
		expect(validateArgs(parseArgs(["-a", "-d", "name"]))).toBe("cannot use both -a and -d");
	});

	it("rejects display and output options in line mode", () => {
		expect(validateArgs(parseArgs(["-l", "-d", "name"]))).toBe("cannot use -d in line mode");
		expect(validateArgs(parseArgs(["-l", "-a"]))).toBe("cannot use -a in line mode");
		expect(validateArgs(parseArgs(["-l", "-o", "id"]))).toBe("cannot use -o in line mode");
		expect(validateArgs(parseArgs(["-l", "-s", ","]))).toBe("cannot use -s in line mode");
		expect(validateArgs(parseArgs(["-l", "-t"]))).toBe("cannot use -t in line mode");
		expect(validateArgs(parseArgs(["-l", "-T"]))).toBe("cannot use -T in line mode");
	});

	it("accepts the default separator in line mode", () => {
		expect(validateArgs(parseArgs(["-l", "-s", " - "]))).toBeUndefined();
	});
});

describe("getHelpText", () => {
	it("lists the options and environment variables", () => {
		const help = getHelpText();
		expect(help).toContain("--display, -d <attr>");
		expect(help).toContain("--lines, -l");
		expect(help).toContain("JPICK_TTY");
		expect(help).toContain("JPICK_WRITE_LOG");
	});
});
