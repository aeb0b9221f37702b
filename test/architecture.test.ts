// CHANGE: Tests for the architecture checks and the layering of src/
// WHY: CORE must stay free of console/process access and of SHELL/APP imports

import { Project } from "ts-morph";
import { describe, expect, it } from "vitest";

import {
	checkCoreImports,
	checkCorePurity,
	checkMathematicalComments,
	collectViolations,
	loadSourceProject,
} from "../scripts/verify-architecture.js";

const inMemory = (filePath: string, text: string) =>
	new Project({ useInMemoryFileSystem: true }).createSourceFile(filePath, text);

describe("architecture checks", () => {
	it("flags CORE imports of SHELL and APP", () => {
		const file = inMemory(
			"/src/core/bad.ts",
			[
				'import { readTextFile } from "../shell/config/loader.js";',
				'import { main } from "../app/runCheck.js";',
				'import { Either } from "effect";',
			].join("\n"),
		);
		expect(checkCoreImports(file).map((v) => [v.rule, v.line])).toEqual([
			["core-no-shell-imports", 1],
			["core-no-app-imports", 2],
		]);
	});

	it("flags console and process access in CORE only", () => {
		const text = 'export const f = () => { console.log("x"); return process.argv; };';
		const core = checkCorePurity(inMemory("/src/core/impure.ts", text));
		expect(core.map((v) => v.message)).toEqual([
			"CORE contains side effect: console.log",
			"CORE contains side effect: process.argv",
		]);
		expect(checkCorePurity(inMemory("/src/shell/impure.ts", text))).toEqual([]);
	});

	it("warns about exported CORE functions without tags", () => {
		const file = inMemory(
			"/src/core/docs.ts",
			[
				"/**",
				" * @pure true",
				" * @invariant x > 0",
				" * @complexity O(1)",
				" */",
				"export function tagged(x: number): number { return x; }",
				"/** @pure true */",
				"export function partial(x: number): number { return x; }",
			].join("\n"),
		);
		const warnings = checkMathematicalComments(file);
		expect(warnings.map((v) => [v.severity, v.message])).toEqual([
			["warning", "Function 'partial' missing tags: @invariant, @complexity"],
		]);
	});
});

describe("src/ layering", () => {
	it("has no architecture errors", () => {
		const errors = collectViolations(loadSourceProject()).filter(
			(v) => v.severity === "error",
		);
		expect(errors).toEqual([]);
	});
});
