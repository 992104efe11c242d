// CHANGE: Pure per-mode decisions of the next primary output
// WHY: Mode logic is a function of (outputs, preference, resolved hint, input); IO stays in SHELL
// PURITY: CORE
// FORMAT THEOREM: ∀S, |S| = N ≥ 1, primary(S) = i: nextAutoCycle(S).target = S[(i + 1) mod N].name
// INVARIANT: Every decision targets an output of the given set
// COMPLEXITY: O(n) where n = |outputs|

import { Either } from "effect";

import { InvalidSelection } from "../errors.js";
import type {
	ConnectedOutputs,
	DefaultSelection,
	OutputSet,
	ResolutionResult,
} from "../models.js";
import { findPrimary } from "../outputs/parser.js";

const SELECTION_INPUT = /^\+?\d+$/;

/**
 * Name of the current primary.
 *
 * @pure true
 * @returns Name, or null when no output is primary
 */
export function statusOf(outputs: OutputSet): string | null {
	return findPrimary(outputs)?.output.name ?? null;
}

/**
 * Next output after the current primary, wrapping around.
 *
 * @pure true
 * @invariant No primary → first output; N = 1 → the sole output again
 * @complexity O(n)
 */
export function nextAutoCycle(outputs: ConnectedOutputs): ResolutionResult {
	const current = findPrimary(outputs);
	const nextIndex = current === null ? 0 : (current.index + 1) % outputs.length;
	const target = outputs[nextIndex] ?? outputs[0];
	return { target: target.name, previous: current?.output.name ?? null };
}

/**
 * Picks the Config-Default target.
 *
 * @param preference - Hint from the config block, null when absent
 * @param resolved - Connector the hint resolved to, null when unresolved
 *
 * @pure true
 * @invariant candidate = resolved ?? preference; a candidate missing from outputs falls back to outputs[0]
 * @complexity O(n)
 */
export function chooseConfigDefault(
	outputs: ConnectedOutputs,
	preference: string | null,
	resolved: string | null,
): DefaultSelection {
	const [first] = outputs;
	const previous = statusOf(outputs);
	if (preference === null) {
		return { target: first.name, previous, fallback: "no-preference" };
	}
	const candidate = resolved ?? preference;
	const exists = outputs.some((o) => o.name === candidate);
	return exists
		? { target: candidate, previous, fallback: null }
		: { target: first.name, previous, fallback: "not-connected" };
}

/**
 * Interprets one line of interactive input as a 1-based list position.
 *
 * @returns Zero-based index, or InvalidSelection for 0, out-of-range or non-numeric input
 *
 * @pure true
 * @postcondition Right(i) → 0 ≤ i < count
 */
export function parseSelection(
	input: string,
	count: number,
): Either.Either<number, InvalidSelection> {
	const trimmed = input.trim();
	const position = SELECTION_INPUT.test(trimmed)
		? Number.parseInt(trimmed, 10)
		: Number.NaN;
	return position >= 1 && position <= count
		? Either.right(position - 1)
		: Either.left(new InvalidSelection({ input: trimmed, count }));
}

/**
 * Numbered list shown before the interactive prompt.
 *
 * @pure true
 */
export function formatOutputList(outputs: OutputSet): readonly string[] {
	return [
		"Detected X11 outputs:",
		...outputs.map(
			(o, i) => `  ${i + 1}. ${o.name}${o.isPrimary ? "  (current primary)" : ""}`,
		),
	];
}
