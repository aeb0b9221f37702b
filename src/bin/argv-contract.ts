#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1,2} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../app/runCheck.js";

/**
 * CLI entry point for argv-contract.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 accepted, 1 rejected, 2 usage or configuration failure
 * - @postcondition process terminates exactly once
 */
try {
	const code = Effect.runSync(main(process.argv.slice(2)));
	process.exit(code);
} catch (error) {
	console.error("Fatal error:", error);
	process.exit(2);
}
