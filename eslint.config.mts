// eslint.config.mts
// @ts-check
import eslint from "@eslint/js";
import { defineConfig } from "eslint/config";
import tseslint from "typescript-eslint";
import vitest from "eslint-plugin-vitest";
import globals from "globals";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		files: ["**/*.ts"],
		rules: {
			complexity: ["error", 8],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{
					allowNumber: true,
					allowBoolean: true,
					allowNullish: false,
					allowAny: false,
					allowRegExp: false,
				},
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{
					"ts-ignore": true,
					"ts-nocheck": true,
					"ts-expect-error": true,
					"ts-check": true,
				},
			],
			"@eslint-community/eslint-comments/no-unlimited-disable": "error",
			"@eslint-community/eslint-comments/disable-enable-pair": "error",
			"@eslint-community/eslint-comments/no-unused-disable": "error",
			"no-restricted-syntax": [
				"error",
				{
					selector: "TSUnknownKeyword",
					message: "'unknown' is forbidden. Narrow the type at its source.",
				},
				{
					selector: "SwitchStatement",
					message: [
						"Switch statements are forbidden in functional programming paradigm.",
						"How to fix: Use ts-pattern match() instead.",
						"Example:",
						"  import { match } from 'ts-pattern';",
						"  const result = match(shape)",
						"    .with({ _tag: 'Separator' }, () => ...)",
						"    .with({ _tag: 'Single' }, (s) => ...)",
						"    .exhaustive();",
					].join("\n"),
				},
				{
					selector: 'CallExpression[callee.name="require"]',
					message: "Avoid using require(). Use ES6 imports instead.",
				},
				{
					selector:
						"FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
					message: "async/await is forbidden; use Effect.gen / Effect.tryPromise.",
				},
				{
					selector: "NewExpression[callee.name='Promise']",
					message: "new Promise is forbidden; use Effect.async / Effect.tryPromise.",
				},
			],
			"@typescript-eslint/only-throw-error": [
				"error",
				{ allowThrowingUnknown: false, allowThrowingAny: false },
			],
		},
	},
	{
		files: ["**/*.{test,spec}.ts"],
		...vitest.configs.all,
		languageOptions: {
			globals: {
				...vitest.environments.env.globals,
			},
		},
		rules: {
			"max-lines-per-function": "off",
			"vitest/prefer-expect-assertions": "off",
		},
	},
	{
		files: ["**/*.{js,cjs,mjs}"],
		extends: [tseslint.configs.disableTypeChecked],
	},
	{ ignores: ["dist/**", "coverage/**"] },
);
