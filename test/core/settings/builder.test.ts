// CHANGE: Specs for the immutable settings builder
// PURITY: CORE
// INVARIANT: Every rejected step leaves no trace; every accepted step returns a new draft

import { Either, pipe } from "effect";
import { describe, expect, it } from "vitest";

import type { SettingsError } from "../../../src/core/errors.js";
import {
	addConflict,
	addDependency,
	addOption,
	addPlainArgument,
	addShortLongOption,
	buildSettings,
	createSettings,
	defineSettings,
	type SettingsStep,
	UNBOUNDED,
} from "../../../src/core/settings/index.js";
import type { SettingsDraft } from "../../../src/core/types/index.js";
import { expectLeft, expectRight } from "../../utils/either.js";
import { integer, option } from "../../utils/settings.js";

const emptyDraft = (): SettingsDraft => expectRight(createSettings({ programName: "prog" }));

const draftWith = (...steps: ReadonlyArray<SettingsStep>): SettingsDraft =>
	expectRight(
		steps.reduce<Either.Either<SettingsDraft, SettingsError>>(
			(draft, step) => Either.flatMap(draft, step),
			Either.right(emptyDraft()),
		),
	);

describe("createSettings", () => {
	it("defaults to any number of plain arguments", () => {
		const draft = emptyDraft();
		expect(draft.minPlainArgs).toBe(0);
		expect(draft.maxPlainArgs).toBe(UNBOUNDED);
		expect(draft.options).toHaveLength(0);
	});

	it("rejects an empty program name", () => {
		expect(expectLeft(createSettings({ programName: " " })).message).toBe(
			"Program name must not be empty.",
		);
	});

	it("rejects invalid plain-argument bounds", () => {
		expect(expectLeft(createSettings({ programName: "p", minPlainArgs: -1 })).message).toBe(
			"Minimum plain argument count must be a non-negative integer.",
		);
		expect(expectLeft(createSettings({ programName: "p", minPlainArgs: 1.5 })).message).toBe(
			"Minimum plain argument count must be a non-negative integer.",
		);
		expect(expectLeft(createSettings({ programName: "p", maxPlainArgs: 2.5 })).message).toBe(
			"Maximum plain argument count must be an integer or unbounded.",
		);
		expect(
			expectLeft(createSettings({ programName: "p", minPlainArgs: 4, maxPlainArgs: 3 }))
				.message,
		).toBe("Minimum plain argument count 4 exceeds maximum 3.");
	});
});

describe("addOption", () => {
	it("maps every alias to the same option", () => {
		const draft = draftWith(addOption({ names: ["v", "verbose"], help: "Talk more." }));
		const short = draft.optionsByName.get("v");
		expect(short).toBeDefined();
		expect(draft.optionsByName.get("verbose")).toBe(short);
		expect(short?.names).toEqual(["v", "verbose"]);
		expect(short?.mandatory).toBe(false);
		expect(short?.help).toBe("Talk more.");
	});

	it("tracks mandatory options", () => {
		const draft = draftWith(option(["o"], { mandatory: true }), option(["a"]));
		expect(draft.mandatoryOptions.map((o) => o.names[0])).toEqual(["o"]);
	});

	it("never mutates the previous draft", () => {
		const before = emptyDraft();
		const after = expectRight(addOption({ names: ["a"] })(before));
		expect(before.options).toHaveLength(0);
		expect(before.optionsByName.has("a")).toBe(false);
		expect(after.options).toHaveLength(1);
	});

	it("rejects missing, malformed, repeated and taken names", () => {
		const draft = draftWith(option(["a"]));
		expect(expectLeft(addOption({ names: [] })(draft)).message).toBe(
			"An option must have at least one name.",
		);
		expect(expectLeft(addOption({ names: ["a-b"] })(draft)).message).toBe(
			'Option name "a-b" must consist of letters only.',
		);
		expect(expectLeft(addOption({ names: ["x", "x"] })(draft)).message).toBe(
			'Option name "x" is declared more than once.',
		);
		expect(expectLeft(addOption({ names: ["x", "a"] })(draft)).message).toBe(
			'Option name "a" is already registered.',
		);
	});
});

describe("addShortLongOption", () => {
	it("puts the short name first", () => {
		const draft = draftWith(addShortLongOption("o", "output", { parameter: integer({ name: "N" }) }));
		expect(draft.options[0]?.names).toEqual(["o", "output"]);
		expect(draft.options[0]?.parameter?.name).toBe("N");
	});

	it("allows either name to be omitted", () => {
		const draft = draftWith(addShortLongOption(undefined, "verbose"), addShortLongOption("q", undefined));
		expect(draft.options.map((o) => o.names)).toEqual([["verbose"], ["q"]]);
	});

	it("validates name lengths", () => {
		const draft = emptyDraft();
		expect(expectLeft(addShortLongOption(undefined, undefined)(draft)).message).toBe(
			"An option must have at least one name.",
		);
		expect(expectLeft(addShortLongOption("ab", undefined)(draft)).message).toBe(
			'Short option name "ab" must be a single letter.',
		);
		expect(expectLeft(addShortLongOption(undefined, "x")(draft)).message).toBe(
			'Long option name "x" must have at least two letters.',
		);
	});
});

describe("addDependency", () => {
	const base = () => draftWith(option(["a", "aa"]), option(["b"]));

	it("records the dependency once", () => {
		const draft = expectRight(addDependency("a", "b")(base()));
		expect(draft.dependencies).toHaveLength(1);
		expect(expectRight(addDependency("aa", "b")(draft))).toBe(draft);
	});

	it("rejects undefined options and synonyms", () => {
		const unknown = expectLeft(addDependency("a", "z")(base()));
		expect(unknown._tag).toBe("ConstraintError");
		expect(unknown.message).toBe('Option "z" is not defined.');
		const synonyms = expectLeft(addDependency("a", "aa")(base()));
		expect(synonyms.message).toBe('Options "a" and "aa" are synonyms.');
	});

	it("rejects malformed names as invalid arguments", () => {
		const error = expectLeft(addDependency("a", "1")(base()));
		expect(error._tag).toBe("InvalidArgument");
		expect(error.message).toBe('Option name "1" must consist of letters only.');
	});

	it("rejects a dependency between conflicting options", () => {
		const draft = expectRight(addConflict("a", "b")(base()));
		expect(expectLeft(addDependency("b", "a")(draft)).message).toBe(
			'Options "b" and "a" are in conflict; the dependency could never be met.',
		);
	});
});

describe("addConflict", () => {
	const base = () => draftWith(option(["a", "aa"]), option(["b"]), option(["c"]));

	it("records groups of two or more options", () => {
		const draft = expectRight(addConflict("a", "b", "c")(base()));
		expect(draft.conflicts).toHaveLength(1);
		expect(draft.conflicts[0]?.map((o) => o.names[0])).toEqual(["a", "b", "c"]);
	});

	it("rejects a conflict over dependent options in either order", () => {
		const draft = expectRight(addDependency("a", "b")(base()));
		const message = 'Option "a" depends on option "b"; they cannot be in conflict.';
		expect(expectLeft(addConflict("a", "b")(draft)).message).toBe(message);
		expect(expectLeft(addConflict("b", "c", "aa")(draft)).message).toBe(message);
	});

	it("rejects synonyms and undefined options", () => {
		expect(expectLeft(addConflict("a", "b", "aa")(base())).message).toBe(
			'Options "a" and "aa" are synonyms.',
		);
		expect(expectLeft(addConflict("a", "z")(base())).message).toBe(
			'Option "z" is not defined.',
		);
	});
});

describe("addPlainArgument", () => {
	it("keeps documented positions sorted", () => {
		const draft = draftWith(addPlainArgument(2, "dir"), addPlainArgument(0, "file", "Input."));
		expect(draft.plainArguments).toEqual([
			{ position: 0, name: "file", help: "Input." },
			{ position: 2, name: "dir", help: undefined },
		]);
	});

	it("rejects empty names, bad positions and duplicates", () => {
		const bounded = expectRight(createSettings({ programName: "p", maxPlainArgs: 3 }));
		expect(expectLeft(addPlainArgument(0, "")(bounded)).message).toBe(
			"Plain argument name must not be empty.",
		);
		expect(expectLeft(addPlainArgument(-1, "x")(bounded)).message).toBe(
			"Plain argument position -1 is out of range.",
		);
		expect(expectLeft(addPlainArgument(3, "x")(bounded)).message).toBe(
			"Plain argument position 3 is out of range.",
		);
		const documented = expectRight(addPlainArgument(0, "x")(bounded));
		expect(expectLeft(addPlainArgument(0, "y")(documented)).message).toBe(
			"Plain argument at position 0 is already documented.",
		);
	});
});

describe("buildSettings and defineSettings", () => {
	it("freezes the registry", () => {
		const settings = buildSettings(draftWith(option(["a"])));
		expect(settings._tag).toBe("ProgramSettings");
		expect(Object.isFrozen(settings)).toBe(true);
	});

	it("stops at the first failing step", () => {
		const result = defineSettings({ programName: "p" }, [
			option(["a"]),
			addDependency("a", "b"),
			option(["a"]),
		]);
		expect(expectLeft(result).message).toBe('Option "b" is not defined.');
	});

	it("composes with pipe", () => {
		const settings = pipe(
			createSettings({ programName: "p", minPlainArgs: 1 }),
			Either.flatMap(addOption({ names: ["a"] })),
			Either.flatMap(addOption({ names: ["b"] })),
			Either.flatMap(addDependency("a", "b")),
			Either.map(buildSettings),
		);
		expect(expectRight(settings).dependencies).toHaveLength(1);
	});
});
