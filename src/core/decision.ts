// CHANGE: Pure decision functions mapping run outcomes to exit codes
// WHY: Termination logic lives in the core; the bin only forwards the code to the process
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀o ∈ RunOutcome: computeExitCode(o) = 0 ⇔ o = "accepted"
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping RunOutcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";
import { match } from "ts-pattern";

import type { AppError } from "./errors.js";
import type { ExitCode, RunOutcome } from "./models.js";

/**
 * Computes the process exit code for an outcome.
 *
 * @returns 0 accepted, 1 rejected command line, 2 usage or configuration failure
 *
 * @pure true
 * @invariant exitCode ∈ {0,1,2}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode("rejected"); // 1
 * ```
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	match<RunOutcome, ExitCode>(outcome)
		.with("accepted", () => 0)
		.with("rejected", () => 1)
		.with("usage-error", () => 2)
		.exhaustive();

/**
 * Classifies a failure: only a ParseError means the checked command line was rejected.
 *
 * @pure true
 * @invariant outcomeOfError(e) = "rejected" ⇔ e._tag = "ParseError"
 * @complexity O(1)
 */
export const outcomeOfError = (error: AppError): RunOutcome =>
	error._tag === "ParseError" ? "rejected" : "usage-error";

/**
 * Exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const exitCode = pipe(runCheck(options), Effect.flatMap(computeExitCodeEffect));
 * ```
 */
export const computeExitCodeEffect = (outcome: RunOutcome): Effect.Effect<ExitCode> =>
	pipe(outcome, computeExitCode, Effect.succeed);
