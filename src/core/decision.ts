// CHANGE: Pure mapping of run outcomes to exit codes and user-facing messages
// WHY: Termination logic stays in the Functional Core; SHELL only prints and exits
// PURITY: CORE
// FORMAT THEOREM: ∀o ∈ Outcome: computeExitCode(o) = 0 ↔ o._tag = "Done"
// INVARIANT: No side effects, deterministic mapping Outcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";
import { match } from "ts-pattern";

import type { FatalError } from "./errors.js";
import type { ExitCode } from "./models.js";

/**
 * Result of one run of a mode.
 *
 * @invariant Failed carries exactly one fatal error
 */
export type RunOutcome =
	| { readonly _tag: "Done" }
	| { readonly _tag: "Failed"; readonly error: FatalError };

export const done: RunOutcome = { _tag: "Done" };

export const failed = (error: FatalError): RunOutcome => ({
	_tag: "Failed",
	error,
});

/**
 * Computes process exit code from a run outcome (pure function).
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode(done); // 0
 * computeExitCode(failed(new NoConnectedOutputs())); // 1
 * ```
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	pipe(
		outcome,
		(o) => o._tag === "Failed",
		(hasFailed): ExitCode => (hasFailed ? 1 : 0),
	);

/**
 * Terminal text for a fatal error.
 *
 * @pure true
 * @invariant Exhaustive over FatalError tags
 */
export const describeError = (error: FatalError): string =>
	match(error)
		.with({ _tag: "DisplayQueryFailed" }, () => "Error: xrandr --query failed.")
		.with({ _tag: "NoConnectedOutputs" }, () => "No connected X11 outputs found.")
		.with({ _tag: "NoPrimary" }, () => "(none)")
		.with({ _tag: "InvalidSelection" }, () => "Invalid selection.")
		.with({ _tag: "InputReadFailed" }, () => "Failed to read input.")
		.with(
			{ _tag: "ApplyPrimaryFailed" },
			(e) => `Failed to set primary to ${e.output}.`,
		)
		.exhaustive();

/**
 * Notification body for a fatal error; only the display failure carries a hint.
 *
 * @pure true
 */
export const describeNotice = (error: FatalError): string =>
	error._tag === "DisplayQueryFailed"
		? "xrandr --query failed. Are you in a Wayland session with XWayland? Is xrandr installed?"
		: describeError(error);

/**
 * Whether the error is announced through the notification sink.
 *
 * @pure true
 * @invariant Only an unset primary in status mode stays silent
 */
export const isNotified = (error: FatalError): boolean =>
	error._tag !== "NoPrimary";
