// CHANGE: Common execFile + Effect pattern for xrandr, swaymsg and notify-send
// WHY: Every external tool is run the same way; callers decide what an exit status means
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, ExecError, never>
// INVARIANT: ∀ command: runCommand(command) → CommandResult ∨ ExecError (spawn failure only)
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import { execFile, promisify } from "./node-mods.js";

const execFileAsync = promisify(execFile);

/**
 * Captured result of a finished process.
 *
 * @invariant exitCode === 0 ↔ the process reported success
 */
export interface CommandResult {
	readonly stdout: string;
	readonly stderr: string;
	readonly exitCode: number;
}

interface ProcessFailure {
	readonly code: number;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Distinguishes "ran and exited non-zero" from "could not be spawned".
 *
 * @pure true
 * @invariant numeric `code` ↔ the process ran (spawn errors carry string codes like "ENOENT")
 */
export function asProcessFailure(error: unknown): ProcessFailure | null {
	if (typeof error !== "object" || error === null) return null;
	if (!("code" in error) || typeof error.code !== "number") return null;
	const stdout =
		"stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
	const stderr =
		"stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
	return { code: error.code, stdout, stderr };
}

function describeUnknown(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Run a command without a shell and capture its output.
 *
 * @param file - Executable name resolved through PATH
 * @param args - Arguments passed verbatim (no shell quoting)
 * @returns Effect with stdout/stderr/exitCode, failing only when spawning fails
 *
 * @pure false (executes external command)
 * @effect Effect<CommandResult, ExecError>
 * @complexity O(n) where n = command execution time
 */
export function runCommand(
	file: string,
	args: readonly string[],
): Effect.Effect<CommandResult, ExecError> {
	const command = [file, ...args].join(" ");
	return Effect.tryPromise({
		try: () => execFileAsync(file, [...args], { encoding: "utf8" }),
		catch: (error) => error,
	}).pipe(
		Effect.map(({ stdout, stderr }) => ({ stdout, stderr, exitCode: 0 })),
		Effect.catchAll((error) => {
			const failure = asProcessFailure(error);
			if (failure !== null) {
				return Effect.succeed({
					stdout: failure.stdout,
					stderr: failure.stderr,
					exitCode: failure.code,
				});
			}
			return Effect.fail(
				new ExecError({ command, detail: describeUnknown(error) }),
			);
		}),
	);
}
