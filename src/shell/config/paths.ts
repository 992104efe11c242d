// CHANGE: Isolate environment lookups behind one resolution step
// WHY: CORE stays a pure function of explicit inputs; only this module reads HOME
// PURITY: SHELL (reads the environment passed in)
// INVARIANT: explicit --config path always wins over the default location
// COMPLEXITY: O(1)

import { Either } from "effect";

import { SWAY_CONFIG_RELATIVE_PATH } from "../../core/constants.js";
import { ConfigPathUnavailable } from "../../core/errors.js";
import { path } from "../utils/node-mods.js";

/**
 * Subset of the process environment the switcher reads.
 */
export interface SwitcherEnv {
	readonly HOME?: string | undefined;
}

/**
 * `$HOME/.config/sway/config`.
 *
 * @returns Path, or ConfigPathUnavailable when HOME is unset or empty
 */
export function defaultSwayConfigPath(
	env: SwitcherEnv,
): Either.Either<string, ConfigPathUnavailable> {
	const home = env.HOME;
	if (home === undefined || home.length === 0) {
		return Either.left(new ConfigPathUnavailable({ variable: "HOME" }));
	}
	return Either.right(path.join(home, SWAY_CONFIG_RELATIVE_PATH));
}

/**
 * Config path for Config-Default mode.
 *
 * @param explicit - Value of --config, if given
 */
export function resolveConfigPath(
	explicit: string | undefined,
	env: SwitcherEnv,
): Either.Either<string, ConfigPathUnavailable> {
	return explicit === undefined
		? defaultSwayConfigPath(env)
		: Either.right(explicit);
}
