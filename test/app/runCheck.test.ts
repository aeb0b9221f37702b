// CHANGE: Tests for the application layer: printing and exit codes
// WHY: Every path through runCheck/main must print once and end with the documented code

import { fileURLToPath } from "node:url";
import { Effect } from "effect";
import { beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";

import { main, runCheck } from "../../src/app/runCheck.js";
import type { CLIOptions } from "../../src/core/types/index.js";

const timePath = fileURLToPath(new URL("../../examples/time.json", import.meta.url));

const optionsFor = (
	command: ReadonlyArray<string>,
	overrides: Partial<CLIOptions> = {},
): CLIOptions => ({
	settingsPath: timePath,
	json: false,
	quiet: false,
	help: false,
	command,
	...overrides,
});

const printed = (spy: MockInstance<typeof console.log>): ReadonlyArray<string> =>
	spy.mock.calls.map((call) => String(call[0]));

describe("runCheck", () => {
	let log: MockInstance<typeof console.log>;
	let error: MockInstance<typeof console.log>;

	beforeEach(() => {
		log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		error = vi.spyOn(console, "error").mockImplementation(() => undefined);
	});

	it("prints an accepted command line", () => {
		const outcome = Effect.runSync(runCheck(optionsFor(["time", "-v", "--", "ls"])));
		expect(outcome).toBe("accepted");
		expect(printed(log)).toEqual([
			"Parsed options:",
			"    -v, --verbose",
			"Plain arguments:",
			"    ls",
		]);
		expect(error).not.toHaveBeenCalled();
	});

	it("reports a rejected command line on stderr", () => {
		const outcome = Effect.runSync(runCheck(optionsFor(["time", "-a", "--", "ls"])));
		expect(outcome).toBe("rejected");
		expect(printed(error)).toEqual(['Parse error: Option "a" requires option "o".']);
		expect(log).not.toHaveBeenCalled();
	});

	it("prints nothing in quiet mode", () => {
		const outcome = Effect.runSync(
			runCheck(optionsFor(["time", "-x"], { quiet: true })),
		);
		expect(outcome).toBe("rejected");
		expect(log).not.toHaveBeenCalled();
		expect(error).not.toHaveBeenCalled();
	});

	it("prints one JSON document in JSON mode", () => {
		Effect.runSync(
			runCheck(optionsFor(["time", "-o", "out.txt", "--", "ls"], { json: true })),
		);
		expect(log).toHaveBeenCalledTimes(1);
		expect(JSON.parse(printed(log)[0] ?? "")).toEqual({
			options: [{ names: ["o", "output"], value: "out.txt" }],
			plainArguments: ["ls"],
		});
	});

	it("prints errors as JSON in JSON mode", () => {
		Effect.runSync(runCheck(optionsFor(["time", "-a", "--", "ls"], { json: true })));
		expect(JSON.parse(printed(log)[0] ?? "")).toEqual({
			error: {
				tag: "ParseError",
				message: 'Parse error: Option "a" requires option "o".',
			},
		});
		expect(error).not.toHaveBeenCalled();
	});

	it("prints the declaration's help instead of parsing", () => {
		const outcome = Effect.runSync(runCheck(optionsFor([], { help: true })));
		expect(outcome).toBe("accepted");
		expect(printed(log)[0]).toBe("Usage: time [options] [-- arguments...]");
	});

	it("classifies an unreadable declaration as a usage error", () => {
		const outcome = Effect.runSync(
			runCheck(optionsFor(["time"], { settingsPath: "/nonexistent/settings.json" })),
		);
		expect(outcome).toBe("usage-error");
		expect(printed(error)[0]?.startsWith("Cannot read /nonexistent/settings.json: ")).toBe(
			true,
		);
	});
});

describe("main", () => {
	let log: MockInstance<typeof console.log>;
	let error: MockInstance<typeof console.log>;

	beforeEach(() => {
		log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		error = vi.spyOn(console, "error").mockImplementation(() => undefined);
	});

	it("maps outcomes to exit codes", () => {
		expect(Effect.runSync(main(["-s", timePath, "--", "time", "-v", "--", "ls"]))).toBe(0);
		expect(Effect.runSync(main(["-q", "-s", timePath, "--", "time", "-a", "--", "ls"]))).toBe(
			1,
		);
		expect(Effect.runSync(main(["-s", "/nonexistent/settings.json", "--", "time"]))).toBe(2);
	});

	it("prints the diagnostic and its own help on misuse", () => {
		expect(Effect.runSync(main([]))).toBe(2);
		expect(printed(error)).toEqual(["Parse error: No arguments were given."]);
		expect(printed(log)[0]).toBe("Usage: argv-contract [options] [-- arguments...]");
	});
});
