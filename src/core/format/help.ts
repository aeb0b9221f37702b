// CHANGE: Pure help rendering for built settings
// WHY: Settings expose a passive query surface; turning it into text is a separate pure step
// PURITY: CORE
// INVARIANT: Output depends only on the settings; options appear in registration order
// COMPLEXITY: O(|options| + |plainArguments|)

import type {
	OptionDefinition,
	PlainArgumentDoc,
	ProgramSettings,
} from "../types/index.js";

export const INDENT = "    ";

/**
 * Command-line spelling of an option name: `-x` for one letter, `--name` otherwise.
 *
 * @pure true
 * @complexity O(1)
 */
export const displayOptionName = (name: string): string =>
	name.length === 1 ? `-${name}` : `--${name}`;

function optionSignature(option: OptionDefinition): string {
	const parameter = option.parameter;
	return option.names
		.map((name) => {
			const flag = displayOptionName(name);
			if (parameter === undefined) return flag;
			if (name.length === 1) {
				return parameter.mandatory
					? `${flag} ${parameter.name}`
					: `${flag} [${parameter.name}]`;
			}
			return parameter.mandatory
				? `${flag}=${parameter.name}`
				: `${flag}[=${parameter.name}]`;
		})
		.join(", ");
}

function optionLines(option: OptionDefinition): ReadonlyArray<string> {
	const marker = option.mandatory ? " (mandatory)" : "";
	const head = `${INDENT}${optionSignature(option)}${marker}`;
	return option.help === undefined ? [head] : [head, `${INDENT}${INDENT}${option.help}`];
}

const plural = (count: number): string => (count === 1 ? "argument" : "arguments");

function boundLines(min: number, max: number): ReadonlyArray<string> {
	const lines: string[] = [];
	if (min > 0) lines.push(`${INDENT}At least ${min} plain ${plural(min)} must be given.`);
	if (max !== Number.POSITIVE_INFINITY) {
		lines.push(`${INDENT}At most ${max} plain ${plural(max)} may be given.`);
	}
	return lines.length > 0 ? lines : [`${INDENT}Any number of plain arguments may be given.`];
}

function plainArgumentLines(argument: PlainArgumentDoc): ReadonlyArray<string> {
	const head = `${INDENT}Argument at position ${argument.position}: ${argument.name}`;
	return argument.help === undefined
		? [head]
		: [head, `${INDENT}${INDENT}${argument.help}`];
}

/**
 * Renders the usage text of a program.
 *
 * Sections: usage header (plus program help), options, standard options,
 * plain arguments. Short names render as `-x PARAM`, long names as
 * `--name=PARAM`; optional parameters are bracketed.
 *
 * @param settings - Built settings
 * @returns Lines without trailing newlines
 *
 * @pure true
 * @invariant result[0] starts with "Usage: " + settings.programName
 * @complexity O(|options| + |plainArguments|)
 *
 * @example
 * ```ts
 * formatHelp(settings).join("\n");
 * // Usage: time [options] [-- arguments...]
 * // ...
 * ```
 */
export function formatHelp(settings: ProgramSettings): ReadonlyArray<string> {
	const options = settings.options.flatMap(optionLines);
	return [
		`Usage: ${settings.programName} [options] [-- arguments...]`,
		...(settings.help === undefined ? [] : [settings.help]),
		"",
		"Options:",
		...(options.length > 0 ? options : [`${INDENT}(none)`]),
		"",
		"Standard options:",
		`${INDENT}--`,
		`${INDENT}${INDENT}Terminate the option list; every following token is a plain argument.`,
		"",
		"Arguments (following --):",
		...boundLines(settings.minPlainArgs, settings.maxPlainArgs),
		...settings.plainArguments.flatMap(plainArgumentLines),
	];
}
