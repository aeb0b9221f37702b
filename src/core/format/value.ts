// CHANGE: Rendering of converted parameter values
// PURITY: CORE
// INVARIANT: Lists render in stored order, joined with ","
// COMPLEXITY: O(|value|)

import { match } from "ts-pattern";

import type { ParameterValue } from "../models.js";
import type { JSONValue } from "../types/index.js";

/**
 * @pure true
 * @invariant formatParameterValue(Integer(n)) = String(n)
 */
export const formatParameterValue = (value: ParameterValue): string =>
	match(value)
		.with({ _tag: "Integer" }, ({ value: n }) => String(n))
		.with({ _tag: "Text" }, ({ value: text }) => text)
		.with({ _tag: "IntegerList" }, ({ value: items }) => items.join(","))
		.with({ _tag: "TextList" }, ({ value: items }) => items.join(","))
		.exhaustive();

/**
 * JSON form of a value: numbers, strings, or arrays of them.
 *
 * @pure true
 * @complexity O(|value|)
 */
export const parameterValueToJSON = (value: ParameterValue): JSONValue =>
	match<ParameterValue, JSONValue>(value)
		.with({ _tag: "Integer" }, ({ value: n }) => n)
		.with({ _tag: "Text" }, ({ value: text }) => text)
		.with({ _tag: "IntegerList" }, ({ value: items }) => items)
		.with({ _tag: "TextList" }, ({ value: items }) => items)
		.exhaustive();
