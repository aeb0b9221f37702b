// CHANGE: Parameter converter contract consumed by the matching engine
// PURITY: CORE
// INVARIANT: convert is total, pure and deterministic
// COMPLEXITY: O(1)

import type { Option } from "effect";

import type { ParameterValue } from "../models.js";

/**
 * Converts the raw text of an option parameter into a typed value.
 *
 * Custom converters (lists, novel value kinds, values with complex rules of
 * compliance) are written by implementing this interface.
 *
 * @property name Display name of the parameter, used by help rendering
 * @property mandatory Whether a value must follow whenever the owning option appears
 * @property convert Returns `none` when the raw text is rejected
 */
export interface ParameterConverter {
	readonly name: string;
	readonly mandatory: boolean;
	readonly convert: (raw: string) => Option.Option<ParameterValue>;
}
