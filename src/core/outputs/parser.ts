// CHANGE: Pure parser for `xrandr --query` text
// WHY: Output list is the input of every mode; the parser must not depend on IO
// PURITY: CORE
// FORMAT THEOREM: ∀t ∈ Text: ∀o ∈ parseOutputs(t): o.connected = true
// INVARIANT: Result order = order of first appearance in the source text
// COMPLEXITY: O(n) where n = |lines|

import { Array, Either } from "effect";

import { NoConnectedOutputs } from "../errors.js";
import type { ConnectedOutputs, Output, OutputSet } from "../models.js";

// Lines look like:
// DP-2 connected primary 2560x1440+0+0 (normal left inverted right) 597mm x 336mm
// HDMI-0 connected 1920x1080+2560+0 ...
// DP-1 disconnected (normal left inverted right x axis y axis)
const OUTPUT_LINE = /^([A-Za-z0-9\-_.+:/]+)\s+(connected|disconnected)/;
const PRIMARY_TOKEN = /\sprimary\s/;

/**
 * Parse one line; continuation lines (modes, screen header) yield null.
 *
 * @pure true
 * @complexity O(|line|)
 */
export function parseOutputLine(line: string): Output | null {
	const match = OUTPUT_LINE.exec(line);
	const name = match?.[1];
	const status = match?.[2];
	if (name === undefined || status === undefined) return null;
	return {
		name,
		connected: status === "connected",
		isPrimary: PRIMARY_TOKEN.test(line),
	};
}

/**
 * Parses display query text into the connected outputs.
 *
 * @param text - Raw stdout of `xrandr --query`
 * @returns Connected outputs in source order; disconnected ones are dropped
 *
 * @pure true
 * @invariant ∀o ∈ result: o.connected
 * @complexity O(n) where n = |lines|
 *
 * @example
 * ```ts
 * parseOutputs("eDP-1 connected primary 1920x1080+0+0\nDP-1 disconnected");
 * // => [{ name: "eDP-1", connected: true, isPrimary: true }]
 * ```
 */
export function parseOutputs(text: string): OutputSet {
	const outputs: Output[] = [];
	for (const line of text.split(/\r?\n/)) {
		const output = parseOutputLine(line);
		if (output?.connected === true) {
			outputs.push(output);
		}
	}
	return outputs;
}

/**
 * Parses and rejects an empty result.
 *
 * @pure true
 * @postcondition Right(outputs) → outputs.length > 0, carried by the type
 */
export function requireOutputs(
	text: string,
): Either.Either<ConnectedOutputs, NoConnectedOutputs> {
	const outputs = parseOutputs(text);
	return Array.isNonEmptyReadonlyArray(outputs)
		? Either.right(outputs)
		: Either.left(new NoConnectedOutputs());
}

/**
 * Locates the current primary; the first flagged output wins.
 *
 * @pure true
 * @complexity O(n)
 */
export function findPrimary(
	outputs: OutputSet,
): { readonly index: number; readonly output: Output } | null {
	const index = outputs.findIndex((o) => o.isPrimary);
	const output = outputs[index];
	return output === undefined ? null : { index, output };
}
