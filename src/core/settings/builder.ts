// CHANGE: Immutable settings builder with registration-time validation
// WHY: Every step checks the addition against the accumulated draft and returns a new draft or a typed error
// FORMAT THEOREM: ∀ draft, step: step(draft) = right(draft') → invariants(draft) ⇒ invariants(draft')
// PURITY: CORE
// INVARIANT: Drafts are never mutated; buildSettings freezes the final registry
// COMPLEXITY: O(n) per step where n = |registered names| + |constraints|

import { Either, pipe } from "effect";

import { ConstraintError, InvalidArgument, type SettingsError } from "../errors.js";
import type {
	ConflictGroup,
	OptionDeclaration,
	OptionDefinition,
	OptionDependency,
	OptionNames,
	ProgramSettings,
	SettingsDeclaration,
	SettingsDraft,
} from "../types/index.js";
import { canonicalName, checkOptionNames } from "./names.js";

/** Upper plain-argument bound meaning "no limit". */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

/** One registration step, composable with `Either.flatMap`. */
export type SettingsStep = (
	draft: SettingsDraft,
) => Either.Either<SettingsDraft, SettingsError>;

const invalid = (message: string): Either.Either<never, InvalidArgument> =>
	Either.left(new InvalidArgument({ message }));

const constraint = (message: string): Either.Either<never, ConstraintError> =>
	Either.left(new ConstraintError({ message }));

function checkBounds(
	min: number,
	max: number,
): Either.Either<void, InvalidArgument> {
	if (!Number.isSafeInteger(min) || min < 0) {
		return invalid("Minimum plain argument count must be a non-negative integer.");
	}
	if (max !== UNBOUNDED && !Number.isSafeInteger(max)) {
		return invalid("Maximum plain argument count must be an integer or unbounded.");
	}
	if (min > max) {
		return invalid(`Minimum plain argument count ${min} exceeds maximum ${max}.`);
	}
	return Either.right(undefined);
}

/**
 * Starts a settings draft for a program.
 *
 * @param declaration - Program name, optional help and plain-argument bounds
 * @returns Empty draft, or InvalidArgument for an empty name or invalid bounds
 *
 * @pure true
 * @invariant right(d) → 0 ≤ d.minPlainArgs ≤ d.maxPlainArgs
 * @complexity O(1)
 */
export function createSettings(
	declaration: SettingsDeclaration,
): Either.Either<SettingsDraft, InvalidArgument> {
	const minPlainArgs = declaration.minPlainArgs ?? 0;
	const maxPlainArgs = declaration.maxPlainArgs ?? UNBOUNDED;
	if (declaration.programName.trim().length === 0) {
		return invalid("Program name must not be empty.");
	}
	return Either.map(checkBounds(minPlainArgs, maxPlainArgs), () => ({
		_tag: "SettingsDraft" as const,
		programName: declaration.programName,
		help: declaration.help,
		minPlainArgs,
		maxPlainArgs,
		options: [],
		optionsByName: new Map<string, OptionDefinition>(),
		mandatoryOptions: [],
		dependencies: [],
		conflicts: [],
		plainArguments: [],
	}));
}

function checkNewNames(
	names: ReadonlyArray<string>,
	draft: SettingsDraft,
): Either.Either<OptionNames, InvalidArgument> {
	const [first, ...rest] = names;
	if (first === undefined) return invalid("An option must have at least one name.");
	const tuple: OptionNames = [first, ...rest];
	return pipe(
		checkOptionNames(names),
		Either.flatMap(() => {
			const repeated = names.find((name, index) => names.indexOf(name) !== index);
			return repeated === undefined
				? Either.right(tuple)
				: invalid(`Option name "${repeated}" is declared more than once.`);
		}),
		Either.flatMap(() => {
			const taken = names.find((name) => draft.optionsByName.has(name));
			return taken === undefined
				? Either.right(tuple)
				: invalid(`Option name "${taken}" is already registered.`);
		}),
	);
}

function withOption(draft: SettingsDraft, option: OptionDefinition): SettingsDraft {
	const entries = option.names.map((name) => [name, option] as const);
	return {
		...draft,
		options: [...draft.options, option],
		optionsByName: new Map<string, OptionDefinition>([
			...draft.optionsByName,
			...entries,
		]),
		mandatoryOptions: option.mandatory
			? [...draft.mandatoryOptions, option]
			: draft.mandatoryOptions,
	};
}

/**
 * Registers an option under one or more names.
 *
 * @returns Step yielding InvalidArgument for missing, malformed or duplicate names
 *
 * @pure true
 * @invariant right(d') → ∀ n ∈ declaration.names: d'.optionsByName.get(n) is the new option
 * @complexity O(|names| + |registered names|)
 *
 * @example
 * ```ts
 * const draft = pipe(
 *   createSettings({ programName: "time" }),
 *   Either.flatMap(addOption({ names: ["v", "verbose"], help: "Verbose output." })),
 * );
 * ```
 */
export const addOption =
	(declaration: OptionDeclaration) =>
	(draft: SettingsDraft): Either.Either<SettingsDraft, InvalidArgument> =>
		Either.map(checkNewNames(declaration.names, draft), (names) =>
			withOption(draft, {
				names,
				mandatory: declaration.mandatory ?? false,
				parameter: declaration.parameter,
				help: declaration.help,
			}),
		);

/**
 * Registers an option from a short (one letter) and/or long (2+ letters) name.
 *
 * @pure true
 * @invariant short precedes long in the resulting alias list
 * @complexity O(|registered names|)
 */
export const addShortLongOption =
	(
		shortName: string | undefined,
		longName: string | undefined,
		rest: Omit<OptionDeclaration, "names"> = {},
	) =>
	(draft: SettingsDraft): Either.Either<SettingsDraft, InvalidArgument> => {
		if (shortName === undefined && longName === undefined) {
			return invalid("An option must have at least one name.");
		}
		if (shortName !== undefined && shortName.length !== 1) {
			return invalid(`Short option name "${shortName}" must be a single letter.`);
		}
		if (longName !== undefined && longName.length < 2) {
			return invalid(`Long option name "${longName}" must have at least two letters.`);
		}
		const names = [shortName, longName].filter(
			(name): name is string => name !== undefined,
		);
		return addOption({ ...rest, names })(draft);
	};

const resolveOption = (
	draft: SettingsDraft,
	name: string,
): Either.Either<OptionDefinition, ConstraintError> => {
	const option = draft.optionsByName.get(name);
	return option === undefined
		? constraint(`Option "${name}" is not defined.`)
		: Either.right(option);
};

function checkDependency(
	draft: SettingsDraft,
	dependency: OptionDependency,
	names: readonly [string, string],
): Either.Either<OptionDependency, ConstraintError> {
	const [dependentName, independentName] = names;
	if (dependency.dependent === dependency.independent) {
		return constraint(
			`Options "${dependentName}" and "${independentName}" are synonyms.`,
		);
	}
	const contradicted = draft.conflicts.some(
		(group) =>
			group.includes(dependency.dependent) &&
			group.includes(dependency.independent),
	);
	return contradicted
		? constraint(
				`Options "${dependentName}" and "${independentName}" are in conflict; the dependency could never be met.`,
			)
		: Either.right(dependency);
}

/**
 * Declares that `dependentName` requires `independentName` in every command.
 *
 * @returns Step yielding InvalidArgument for malformed names, ConstraintError for
 *          undefined options, synonyms, or a contradicting conflict
 *
 * @pure true
 * @invariant registering an identical pair twice leaves the draft unchanged
 * @complexity O(|conflicts| · |group|)
 */
export const addDependency =
	(dependentName: string, independentName: string): SettingsStep =>
	(draft) =>
		pipe(
			checkOptionNames([dependentName, independentName]),
			Either.flatMap(() => resolveOption(draft, dependentName)),
			Either.flatMap((dependent) =>
				Either.map(
					resolveOption(draft, independentName),
					(independent): OptionDependency => ({ dependent, independent }),
				),
			),
			Either.flatMap((dependency) =>
				checkDependency(draft, dependency, [dependentName, independentName]),
			),
			Either.map((dependency) => {
				const known = draft.dependencies.some(
					(existing) =>
						existing.dependent === dependency.dependent &&
						existing.independent === dependency.independent,
				);
				return known
					? draft
					: { ...draft, dependencies: [...draft.dependencies, dependency] };
			}),
		);

function checkConflict(
	draft: SettingsDraft,
	group: ConflictGroup,
	names: ReadonlyArray<string>,
): Either.Either<ConflictGroup, ConstraintError> {
	const synonymAt = group.findIndex((option, index) => group.indexOf(option) !== index);
	if (synonymAt !== -1) {
		const firstAt = group.findIndex((option) => option === group[synonymAt]);
		return constraint(
			`Options "${names[firstAt] ?? ""}" and "${names[synonymAt] ?? ""}" are synonyms.`,
		);
	}
	const negating = draft.dependencies.find(
		(dependency) =>
			group.includes(dependency.dependent) && group.includes(dependency.independent),
	);
	return negating === undefined
		? Either.right(group)
		: constraint(
				`Option "${canonicalName(negating.dependent)}" depends on option "${canonicalName(negating.independent)}"; they cannot be in conflict.`,
			);
}

/**
 * Declares that at most one of the named options may appear in a command.
 *
 * @returns Step yielding InvalidArgument for malformed names, ConstraintError for
 *          undefined options, synonyms, or a contradicting dependency
 *
 * @pure true
 * @invariant right(d') → the new group has ≥ 2 distinct options
 * @complexity O(|group| · |dependencies|)
 */
export const addConflict =
	(first: string, second: string, ...others: ReadonlyArray<string>): SettingsStep =>
	(draft) => {
		const names = [first, second, ...others];
		return pipe(
			checkOptionNames(names),
			Either.flatMap(() =>
				Either.all(names.map((name) => resolveOption(draft, name))),
			),
			Either.flatMap((group) => checkConflict(draft, group, names)),
			Either.map((group) => ({ ...draft, conflicts: [...draft.conflicts, group] })),
		);
	};

/**
 * Documents the plain argument at a 0-based position (help rendering only).
 *
 * @pure true
 * @invariant plainArguments stays sorted by position with unique positions
 * @complexity O(|plainArguments|)
 */
export const addPlainArgument =
	(position: number, name: string, help?: string): SettingsStep =>
	(draft) => {
		if (name.trim().length === 0) {
			return invalid("Plain argument name must not be empty.");
		}
		if (!Number.isSafeInteger(position) || position < 0 || position >= draft.maxPlainArgs) {
			return invalid(`Plain argument position ${position} is out of range.`);
		}
		if (draft.plainArguments.some((argument) => argument.position === position)) {
			return invalid(`Plain argument at position ${position} is already documented.`);
		}
		const plainArguments = [...draft.plainArguments, { position, name, help }].sort(
			(a, b) => a.position - b.position,
		);
		return Either.right({ ...draft, plainArguments });
	};

/**
 * Freezes a draft into the registry consumed by the parser.
 *
 * @pure true
 * @invariant result is shallowly frozen
 * @complexity O(1)
 */
export function buildSettings(draft: SettingsDraft): ProgramSettings {
	return Object.freeze({ ...draft, _tag: "ProgramSettings" as const });
}

/**
 * Creates, populates and builds settings in one pass.
 *
 * @pure true
 * @invariant stops at the first failing step
 * @complexity O(Σ steps)
 */
export function defineSettings(
	declaration: SettingsDeclaration,
	steps: ReadonlyArray<SettingsStep>,
): Either.Either<ProgramSettings, SettingsError> {
	const initial: Either.Either<SettingsDraft, SettingsError> =
		createSettings(declaration);
	return Either.map(
		steps.reduce((draft, step) => Either.flatMap(draft, step), initial),
		buildSettings,
	);
}
