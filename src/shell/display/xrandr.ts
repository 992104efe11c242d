// CHANGE: xrandr integration (display query + apply-primary)
// WHY: The only two points where the switcher talks to the X server
// PURITY: SHELL
// EFFECT: Effect<string, DisplayQueryFailed> | Effect<boolean, never>
// INVARIANT: Non-zero exit of `xrandr --query` is fatal; apply-primary reports a boolean only
// COMPLEXITY: O(1) calls

import { Effect } from "effect";

import { DisplayQueryFailed } from "../../core/errors.js";
import { runCommand } from "../utils/exec.js";

export const XRANDR = "xrandr";

/**
 * Runs `xrandr --query` and returns its stdout.
 *
 * @effect Effect<string, DisplayQueryFailed>
 */
export function queryDisplayOutputs(): Effect.Effect<string, DisplayQueryFailed> {
	return runCommand(XRANDR, ["--query"]).pipe(
		Effect.mapError((error) => new DisplayQueryFailed({ detail: error.detail })),
		Effect.flatMap((result) =>
			result.exitCode === 0
				? Effect.succeed(result.stdout)
				: Effect.fail(
						new DisplayQueryFailed({
							detail:
								result.stderr.trim().length > 0
									? result.stderr.trim()
									: `xrandr --query exited with ${result.exitCode}`,
						}),
					),
		),
	);
}

/**
 * Runs `xrandr --output <name> --primary`.
 *
 * @returns true when xrandr exited 0; spawn failures are false
 * @effect Effect<boolean, never>
 */
export function applyPrimary(output: string): Effect.Effect<boolean> {
	return runCommand(XRANDR, ["--output", output, "--primary"]).pipe(
		Effect.map((result) => result.exitCode === 0),
		Effect.orElseSucceed(() => false),
	);
}
