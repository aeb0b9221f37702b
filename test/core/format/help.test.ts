import { describe, expect, it } from "vitest";

import { displayOptionName, formatHelp } from "../../../src/core/format/help.js";
import { addPlainArgument } from "../../../src/core/settings/index.js";
import { integer, option, settingsOf, text } from "../../utils/settings.js";

describe("displayOptionName", () => {
	it("uses one dash for single letters and two otherwise", () => {
		expect(displayOptionName("v")).toBe("-v");
		expect(displayOptionName("verbose")).toBe("--verbose");
	});
});

describe("formatHelp", () => {
	it("renders options, standard options and plain arguments", () => {
		const settings = settingsOf(
			[
				option(["f", "format"], {
					parameter: text({ name: "FORMAT" }),
					help: "Output format.",
				}),
				option(["v", "verbose"], { mandatory: true }),
				option(["p", "port"], {
					parameter: integer({ name: "PORT", mandatory: false }),
				}),
				addPlainArgument(0, "command", "Program to run."),
			],
			{ programName: "time", minPlainArgs: 1 },
		);

		expect(formatHelp(settings)).toEqual([
			"Usage: time [options] [-- arguments...]",
			"",
			"Options:",
			"    -f FORMAT, --format=FORMAT",
			"        Output format.",
			"    -v, --verbose (mandatory)",
			"    -p [PORT], --port[=PORT]",
			"",
			"Standard options:",
			"    --",
			"        Terminate the option list; every following token is a plain argument.",
			"",
			"Arguments (following --):",
			"    At least 1 plain argument must be given.",
			"    Argument at position 0: command",
			"        Program to run.",
		]);
	});

	it("includes program help and marks empty sections", () => {
		const lines = formatHelp(
			settingsOf([], { programName: "noop", help: "Does nothing.", maxPlainArgs: 2 }),
		);
		expect(lines.slice(0, 5)).toEqual([
			"Usage: noop [options] [-- arguments...]",
			"Does nothing.",
			"",
			"Options:",
			"    (none)",
		]);
		expect(lines.at(-1)).toBe("    At most 2 plain arguments may be given.");
	});

	it("says any number when plain arguments are unbounded", () => {
		expect(formatHelp(settingsOf([option(["a"])])).at(-1)).toBe(
			"    Any number of plain arguments may be given.",
		);
	});
});
