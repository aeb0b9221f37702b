// CHANGE: End-to-end specs for parse() over small registries
// PURITY: CORE
// INVARIANT: Every failure carries exactly one reason and one message

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { ParameterValue } from "../../../src/core/models.js";
import { parseEffect } from "../../../src/core/parse/index.js";
import { addDependency } from "../../../src/core/settings/index.js";
import {
	accept,
	integer,
	option,
	reject,
	settingsOf,
	text,
	valueOf,
} from "../../utils/settings.js";

const flagsAndValues = settingsOf([
	option(["a", "aa"]),
	option(["b", "bb"]),
	option(["d"], { parameter: integer({ name: "D", mandatory: false }) }),
	option(["e"], { parameter: integer({ name: "E" }) }),
]);

describe("option matching", () => {
	it("resolves aliases to the full name list", () => {
		const result = accept("-a --bb", flagsAndValues);
		expect(result.parsedOptions.map((parsed) => parsed.names)).toEqual([
			["a", "aa"],
			["b", "bb"],
		]);
		expect(valueOf(result, "aa")).toBeNull();
		expect(result.wasParsed("b")).toBe(true);
		expect(result.wasParsed("d")).toBe(false);
	});

	it("groups flags and resolves the last option from the next token", () => {
		const result = accept("-abde 42", flagsAndValues);
		expect(result.parsedOptions.map((parsed) => parsed.names[0])).toEqual([
			"a",
			"b",
			"d",
			"e",
		]);
		expect(valueOf(result, "d")).toBeNull();
		expect(valueOf(result, "e")).toEqual(ParameterValue.Integer({ value: 42 }));
	});

	it("takes inline and attached values", () => {
		const result = accept("-e=7 -d-5 -ae3", flagsAndValues);
		expect(result.occurrences("e")).toHaveLength(2);
		expect(valueOf(result, "e")).toEqual(ParameterValue.Integer({ value: 7 }));
		expect(valueOf(result, "d")).toEqual(ParameterValue.Integer({ value: -5 }));
	});

	it("stops matching at the separator", () => {
		const result = accept("-e 3 -- -a --bb", flagsAndValues);
		expect(result.parsedOptions).toHaveLength(1);
		expect(valueOf(result, "e")).toEqual(ParameterValue.Integer({ value: 3 }));
		expect(result.plainArguments).toEqual(["-a", "--bb"]);
	});

	it("skips the program name and stray parameter tokens", () => {
		const result = accept(["prog", "stray", "-a", "1"], flagsAndValues);
		expect(result.parsedOptions.map((parsed) => parsed.names[0])).toEqual(["a"]);
		expect(result.plainArguments).toEqual([]);
		expect(accept("prog", flagsAndValues).parsedOptions).toHaveLength(0);
	});

	it("keeps every occurrence of a repeated option", () => {
		const result = accept("-e 1 -e 2", flagsAndValues);
		expect(result.occurrences("e")).toHaveLength(2);
		expect(valueOf(result, "e")).toEqual(ParameterValue.Integer({ value: 1 }));
		expect(result.occurrences("e")[1]?.names).toEqual(["e"]);
	});

	it("leaves an optional parameter empty when nothing follows", () => {
		const result = accept("-d -a", flagsAndValues);
		expect(result.wasParsed("d")).toBe(true);
		expect(valueOf(result, "d")).toBeNull();
	});
});

describe("eager lookahead", () => {
	it("consumes the next parameter-shaped token for an optional string", () => {
		const settings = settingsOf([
			option(["f"], { parameter: text({ name: "F", mandatory: false }) }),
			option(["a"]),
		]);
		const result = accept("-f hello -a", settings);
		expect(valueOf(result, "f")).toEqual(ParameterValue.Text({ value: "hello" }));
		expect(result.wasParsed("a")).toBe(true);
	});

	it("fails when the consumed token does not convert", () => {
		const settings = settingsOf([
			option(["f"], { parameter: integer({ name: "F", mandatory: false }) }),
			option(["a"]),
		]);
		const error = reject("-f hello -a", settings);
		expect(error.reason).toBe("InvalidParameter");
		expect(error.message).toBe('Invalid parameter value "hello" for option "f".');
	});
});

describe("matching failures", () => {
	const cases: ReadonlyArray<readonly [string, string, string]> = [
		["-e -- x", "MissingParameter", 'Option "e" requires a parameter value.'],
		["-ae", "MissingParameter", 'Option "e" requires a parameter value.'],
		[
			"-ea",
			"MissingParameter",
			'Option "e" requires a parameter value and cannot be grouped.',
		],
		["-e=x", "InvalidParameter", 'Invalid parameter value "x" for option "e".'],
		["-z", "UnknownOption", 'Unknown option "z".'],
		["-az", "UnknownOption", 'Unknown option "z".'],
		["--aa=1", "UnexpectedParameter", 'Option "aa" does not accept a parameter.'],
		["prog --x", "MalformedOption", 'Invalid option at position 1: "--x".'],
		["-a ---", "MalformedOption", 'Invalid option at position 1: "---".'],
		["", "NoArguments", "No arguments were given."],
	];

	for (const [commandLine, reason, message] of cases) {
		it(`rejects "${commandLine}"`, () => {
			const error = reject(commandLine, flagsAndValues);
			expect(error.reason).toBe(reason);
			expect(error.message).toBe(message);
		});
	}
});

describe("validation", () => {
	it("requires mandatory options", () => {
		const settings = settingsOf([option(["a"]), option(["m", "must"], { mandatory: true })]);
		expect(reject("-a", settings).message).toBe('Mandatory option "m" is missing.');
		expect(accept("--must", settings).wasParsed("m")).toBe(true);
	});

	it("checks dependencies by canonical name", () => {
		const settings = settingsOf([
			option(["a", "aa"]),
			option(["b", "bb"]),
			addDependency("aa", "b"),
		]);
		const error = reject("--aa", settings);
		expect(error.reason).toBe("UnmetDependency");
		expect(error.message).toBe('Option "a" requires option "b".');
		expect(accept("--aa --bb", settings).wasParsed("a")).toBe(true);
	});

	it("enforces plain-argument bounds", () => {
		const settings = settingsOf([option(["a"])], {
			programName: "prog",
			minPlainArgs: 3,
			maxPlainArgs: 5,
		});
		expect(reject("-- arg1 arg2", settings).message).toBe(
			"Expected between 3 and 5 plain arguments, got 2.",
		);
		expect(reject("-- a b c d e f", settings).message).toBe(
			"Expected between 3 and 5 plain arguments, got 6.",
		);
		expect(accept("-a -- a b c", settings).plainArguments).toEqual(["a", "b", "c"]);
	});
});

describe("parseEffect", () => {
	it("moves the outcome into the Effect channels", () => {
		const accepted = Effect.runSync(Effect.either(parseEffect("-a", flagsAndValues)));
		expect(Either.isRight(accepted)).toBe(true);
		const rejected = Effect.runSync(Effect.either(parseEffect("-z", flagsAndValues)));
		expect(Either.isLeft(rejected) ? rejected.left.reason : null).toBe("UnknownOption");
	});
});
