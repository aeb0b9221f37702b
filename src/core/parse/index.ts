export {
	classifyToken,
	isParameterToken,
	PLAIN_ARGUMENT_SEPARATOR,
	type TokenShape,
} from "./lexer.js";
export { type MatchOutcome, matchTokens } from "./matcher.js";
export { parse, parseEffect } from "./parser.js";
export { ParseResult } from "./result.js";
export { type CommandLine, splitCommandLine, tokenize } from "./tokenizer.js";
export { validateResult } from "./validator.js";
