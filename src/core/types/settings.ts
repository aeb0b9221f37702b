// CHANGE: Immutable settings registry types
// WHY: The engine and validator read the registry through these shapes only
// PURITY: CORE
// INVARIANT: Every name of every option maps to exactly one option in optionsByName
// COMPLEXITY: O(1)

import type { ParameterConverter } from "./parameter.js";

/** Non-empty alias list; the first entry is the canonical name. */
export type OptionNames = readonly [string, ...string[]];

/**
 * A declared option. Identity is by reference; names are aliases.
 *
 * @property names Aliases, canonical name first
 * @property mandatory Whether the option must appear in every valid command
 * @property parameter Converter for the option parameter, if it takes one
 * @property help Help text shown by help rendering
 */
export interface OptionDefinition {
	readonly names: OptionNames;
	readonly mandatory: boolean;
	readonly parameter: ParameterConverter | undefined;
	readonly help: string | undefined;
}

/** If `dependent` appears in a command, `independent` must appear too. */
export interface OptionDependency {
	readonly dependent: OptionDefinition;
	readonly independent: OptionDefinition;
}

/** At most one member of a conflict group may appear; size ≥ 2. */
export type ConflictGroup = ReadonlyArray<OptionDefinition>;

/** Documentation of the plain argument at a given position. */
export interface PlainArgumentDoc {
	readonly position: number;
	readonly name: string;
	readonly help: string | undefined;
}

/**
 * Registry state shared by drafts and finished settings.
 *
 * @invariant 0 ≤ minPlainArgs ≤ maxPlainArgs (maxPlainArgs may be +∞)
 * @invariant mandatoryOptions ⊆ options
 * @invariant ∀ d ∈ dependencies, ∀ g ∈ conflicts: ¬(d.dependent ∈ g ∧ d.independent ∈ g)
 */
export interface SettingsState {
	readonly programName: string;
	readonly help: string | undefined;
	readonly minPlainArgs: number;
	readonly maxPlainArgs: number;
	readonly options: ReadonlyArray<OptionDefinition>;
	readonly optionsByName: ReadonlyMap<string, OptionDefinition>;
	readonly mandatoryOptions: ReadonlyArray<OptionDefinition>;
	readonly dependencies: ReadonlyArray<OptionDependency>;
	readonly conflicts: ReadonlyArray<ConflictGroup>;
	readonly plainArguments: ReadonlyArray<PlainArgumentDoc>;
}

/** Registry under construction; only the builder produces it. */
export interface SettingsDraft extends SettingsState {
	readonly _tag: "SettingsDraft";
}

/** Finished, frozen registry consumed by the parser. */
export interface ProgramSettings extends SettingsState {
	readonly _tag: "ProgramSettings";
}

/**
 * Program-level declaration passed to `createSettings`.
 *
 * @property maxPlainArgs Defaults to +∞ (unbounded)
 */
export interface SettingsDeclaration {
	readonly programName: string;
	readonly help?: string | undefined;
	readonly minPlainArgs?: number | undefined;
	readonly maxPlainArgs?: number | undefined;
}

/** Option declaration passed to `addOption`. */
export interface OptionDeclaration {
	readonly names: ReadonlyArray<string>;
	readonly mandatory?: boolean | undefined;
	readonly parameter?: ParameterConverter | undefined;
	readonly help?: string | undefined;
}
