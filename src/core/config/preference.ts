// CHANGE: Two-pass extraction of the preferred monitor from a Sway config
// WHY: Block discovery and per-block declaration lookup are tested separately
// PURITY: CORE
// FORMAT THEOREM: ∀b_i, b_j ∈ findBlocks(lines), i < j: b_i.end < b_j.start
// INVARIANT: First block holding an uncommented `output "<value>"` line wins
// COMPLEXITY: O(n) where n = |lines|

import { DEFAULT_MARKERS } from "../constants.js";
import type { BlockMarkers, PreferenceBlock } from "../models.js";

const OUTPUT_DECLARATION = /^\s*output\s+"([^"]+)"/;
const COMMENT_MARKER = "#";

/**
 * Splits config content into lines without line terminators.
 *
 * @pure true
 */
export function toLines(content: string): readonly string[] {
	return content.split(/\r?\n/);
}

function indexOfMarker(
	lines: readonly string[],
	marker: string,
	from: number,
): number {
	for (let i = from; i < lines.length; i++) {
		if (lines[i]?.includes(marker) === true) return i;
	}
	return -1;
}

/**
 * Discovers ordered, non-overlapping preference blocks.
 *
 * @param lines - Config lines
 * @param markers - Start/end substrings (substring test, not anchored)
 * @returns Inclusive line ranges
 *
 * @pure true
 * @invariant An unterminated start marker ends discovery; nothing after it is a block
 * @complexity O(n)
 */
export function findBlocks(
	lines: readonly string[],
	markers: BlockMarkers = DEFAULT_MARKERS,
): readonly PreferenceBlock[] {
	const blocks: PreferenceBlock[] = [];
	let searchFrom = 0;
	for (;;) {
		const start = indexOfMarker(lines, markers.start, searchFrom);
		if (start === -1) break;
		const end = indexOfMarker(lines, markers.end, start + 1);
		if (end === -1) break;
		blocks.push({ start, end });
		searchFrom = end + 1;
	}
	return blocks;
}

/**
 * Whether the first non-whitespace character is the comment marker.
 *
 * @pure true
 */
export function isCommented(line: string): boolean {
	return line.trimStart().startsWith(COMMENT_MARKER);
}

/**
 * Returns the quoted value of the first uncommented `output` line in a block.
 *
 * @pure true
 * @complexity O(end - start)
 */
export function findDeclaration(
	lines: readonly string[],
	block: PreferenceBlock,
): string | null {
	for (const line of lines.slice(block.start, block.end + 1)) {
		if (isCommented(line)) continue;
		const value = OUTPUT_DECLARATION.exec(line)?.[1];
		if (value !== undefined) return value;
	}
	return null;
}

/**
 * Extracts the preferred output hint from config content.
 *
 * @param content - Whole config file text
 * @param markers - Block markers, `Primary Monitor Start/End` by default
 * @returns Hint string, or null when no block yields a declaration
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * extractPreference([
 *   "#! Primary Monitor Start !#",
 *   'output "Dell Inc. DELL U2720Q 1234ABC" scale 1.5',
 *   "#! Primary Monitor End !#",
 * ].join("\n"));
 * // => "Dell Inc. DELL U2720Q 1234ABC"
 * ```
 */
export function extractPreference(
	content: string,
	markers: BlockMarkers = DEFAULT_MARKERS,
): string | null {
	const lines = toLines(content);
	for (const block of findBlocks(lines, markers)) {
		const value = findDeclaration(lines, block);
		if (value !== null) return value;
	}
	return null;
}
