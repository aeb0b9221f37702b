// CHANGE: Configuration and front-end option types
// PURITY: CORE
// INVARIANT: Types only, no runtime code
// COMPLEXITY: O(1)

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

/** JSON object node. */
export interface JSONObject {
	readonly [key: string]: JSONValue;
}

/**
 * Options of the `argv-contract` command.
 *
 * @property settingsPath Path of the JSON settings declaration
 * @property json Print the result as JSON
 * @property quiet Print nothing, report through the exit code only
 * @property help Print help of the loaded declaration instead of parsing
 * @property command Command line to check, verbatim
 */
export interface CLIOptions {
	readonly settingsPath: string;
	readonly json: boolean;
	readonly quiet: boolean;
	readonly help: boolean;
	readonly command: ReadonlyArray<string>;
}
