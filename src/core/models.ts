// CHANGE: Functional Core domain models for primary output selection (pure, immutable)
// WHY: Every query result is replaced, never mutated; CORE holds only data and invariants
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { Array } from "effect";

/**
 * Exit code for the switcher process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * One physical output as reported by `xrandr --query`.
 *
 * @invariant name is unique inside a single query result
 */
export interface Output {
	readonly name: string;
	readonly connected: boolean;
	readonly isPrimary: boolean;
}

/**
 * Connected outputs in display-server order.
 *
 * @invariant order is the cycle order and the interactive list order
 * @invariant at most one element is consumed as primary (the first one flagged)
 */
export type OutputSet = readonly Output[];

/**
 * Output set proven non-empty by the parser; every mode consumes this shape.
 */
export type ConnectedOutputs = Array.NonEmptyReadonlyArray<Output>;

/**
 * Inclusive line range of a preference block inside a config file.
 *
 * @invariant start < end
 */
export interface PreferenceBlock {
	readonly start: number;
	readonly end: number;
}

/**
 * Substring markers that open and close a preference block.
 */
export interface BlockMarkers {
	readonly start: string;
	readonly end: string;
}

/**
 * Output entry from `swaymsg -t get_outputs`; missing JSON fields are "".
 */
export interface CompositorOutputRecord {
	readonly name: string;
	readonly make: string;
	readonly model: string;
	readonly serial: string;
	readonly description: string;
}

/**
 * Mutually exclusive run modes.
 *
 * @invariant precedence on the CLI: status > auto > default > interactive
 */
export type SwitchMode = "status" | "auto" | "default" | "interactive";

/**
 * Output chosen by a mode together with the primary it replaces.
 */
export interface ResolutionResult {
	readonly target: string;
	readonly previous: string | null;
}

/**
 * Why Config-Default mode landed on the first output instead of the preference.
 */
export type DefaultFallback = "no-preference" | "not-connected";

/**
 * Config-Default decision; fallback is null when the preference was honoured.
 */
export interface DefaultSelection extends ResolutionResult {
	readonly fallback: DefaultFallback | null;
}
