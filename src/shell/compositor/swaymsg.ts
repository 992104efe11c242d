// CHANGE: Sway output listing used by the hint resolver
// WHY: Connector names are looked up by description or make/model/serial
// PURITY: SHELL
// EFFECT: Effect<string, CompositorQueryFailed>
// INVARIANT: Fetched on demand, never cached
// COMPLEXITY: O(1) calls

import { Effect } from "effect";

import { CompositorQueryFailed } from "../../core/errors.js";
import { runCommand } from "../utils/exec.js";

export const SWAYMSG = "swaymsg";

/**
 * Runs `swaymsg -t get_outputs` and returns the raw JSON.
 *
 * @effect Effect<string, CompositorQueryFailed>
 */
export function queryCompositorOutputs(): Effect.Effect<
	string,
	CompositorQueryFailed
> {
	return runCommand(SWAYMSG, ["-t", "get_outputs"]).pipe(
		Effect.mapError(
			(error) => new CompositorQueryFailed({ detail: error.detail }),
		),
		Effect.flatMap((result) =>
			result.exitCode === 0
				? Effect.succeed(result.stdout)
				: Effect.fail(
						new CompositorQueryFailed({
							detail: `swaymsg exited with ${result.exitCode}`,
						}),
					),
		),
	);
}
