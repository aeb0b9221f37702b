// CHANGE: Automated architecture verification using ts-morph
// WHY: Ensure CORE never imports SHELL or APP and never touches the console or the process
// FORMAT THEOREM: ∀ file ∈ Core: dependencies(file) ⊆ PureModules
// PURITY: SHELL (reads filesystem via ts-morph)
// INVARIANT: Returns violations or empty array
// COMPLEXITY: O(n) where n = number of AST nodes inspected

import { pathToFileURL } from "node:url";
import { Project, type SourceFile, SyntaxKind } from "ts-morph";

export interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly rule: string;
	readonly message: string;
	readonly severity: "error" | "warning";
}

const isCoreFile = (sourceFile: SourceFile): boolean =>
	sourceFile.getFilePath().includes("/core/");

/**
 * CORE files must not import SHELL or APP modules.
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App) = ∅
 * @complexity O(m) where m = number of imports in file
 */
export function checkCoreImports(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCoreFile(sourceFile)) return [];
	const filePath = sourceFile.getFilePath();

	return sourceFile.getImportDeclarations().flatMap((importDecl) => {
		const moduleSpecifier = importDecl.getModuleSpecifierValue();
		const layer = moduleSpecifier.includes("/shell/")
			? "SHELL"
			: moduleSpecifier.includes("/app/")
				? "APP"
				: undefined;
		return layer === undefined
			? []
			: [
					{
						file: filePath,
						line: importDecl.getStartLineNumber(),
						rule: `core-no-${layer.toLowerCase()}-imports`,
						message: `CORE file imports ${layer}: ${moduleSpecifier}`,
						severity: "error" as const,
					},
				];
	});
}

const IMPURE_ROOTS = new Set(["console", "process"]);

/**
 * CORE files must not reach the console or the process.
 *
 * @invariant ∀ f ∈ Core: ¬∃ access to console.* or process.*
 * @complexity O(n) where n = number of property accesses
 */
export function checkCorePurity(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCoreFile(sourceFile)) return [];
	const filePath = sourceFile.getFilePath();

	return sourceFile
		.getDescendantsOfKind(SyntaxKind.PropertyAccessExpression)
		.filter((access) => IMPURE_ROOTS.has(access.getExpression().getText()))
		.map((access) => ({
			file: filePath,
			line: access.getStartLineNumber(),
			rule: "core-purity",
			message: `CORE contains side effect: ${access.getText()}`,
			severity: "error" as const,
		}));
}

/**
 * Exported CORE functions should carry @pure, @invariant and @complexity tags.
 *
 * @invariant violations are warnings only
 * @complexity O(n) where n = number of exported functions
 */
export function checkMathematicalComments(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!isCoreFile(sourceFile)) return [];
	const filePath = sourceFile.getFilePath();
	const requiredTags = ["@pure", "@invariant", "@complexity"];

	return sourceFile
		.getFunctions()
		.filter((func) => func.isExported())
		.flatMap((func) => {
			const docText = func.getJsDocs().map((doc) => doc.getFullText()).join("\n");
			const missingTags = requiredTags.filter((tag) => !docText.includes(tag));
			return missingTags.length === 0
				? []
				: [
						{
							file: filePath,
							line: func.getStartLineNumber(),
							rule: "mathematical-comments",
							message: `Function '${func.getName() ?? "<anonymous>"}' missing tags: ${missingTags.join(", ")}`,
							severity: "warning" as const,
						},
					];
		});
}

/**
 * Runs every checker over the project's source files.
 *
 * @complexity O(n * m) where n = files, m = avg nodes per file
 */
export function collectViolations(project: Project): readonly ArchitectureViolation[] {
	return project
		.getSourceFiles()
		.filter((sourceFile) => !sourceFile.getFilePath().includes("node_modules"))
		.flatMap((sourceFile) => [
			...checkCoreImports(sourceFile),
			...checkCorePurity(sourceFile),
			...checkMathematicalComments(sourceFile),
		]);
}

/**
 * Loads `src/**` without resolving the whole tsconfig program.
 */
export function loadSourceProject(pattern = "src/**/*.ts"): Project {
	const project = new Project({
		tsConfigFilePath: "tsconfig.json",
		skipAddingFilesFromTsConfig: true,
	});
	project.addSourceFilesAtPaths(pattern);
	return project;
}

function verifyArchitecture(): number {
	console.log("🔍 Verifying architecture rules...\n");
	const violations = collectViolations(loadSourceProject());
	const errors = violations.filter((v) => v.severity === "error");
	const warnings = violations.filter((v) => v.severity === "warning");

	for (const v of errors) {
		console.error(`  [ERROR] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`);
	}
	for (const v of warnings) {
		console.warn(`  [WARN] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`);
	}

	if (violations.length === 0) {
		console.log("✅ Architecture verification passed!");
		return 0;
	}
	console.error(`\n📊 Total: ${errors.length} errors, ${warnings.length} warnings\n`);
	return errors.length > 0 ? 1 : 0;
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
	process.exit(verifyArchitecture());
}
