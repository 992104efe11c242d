// CHANGE: Specs for preference block discovery and declaration lookup
// WHY: Commented declarations must fall through to later blocks; unterminated blocks end the scan
// PURITY: CORE
// INVARIANT: Blocks are ordered and non-overlapping
// COMPLEXITY: O(n) per fixture

import { describe, expect, it } from "vitest";

import {
	extractPreference,
	findBlocks,
	findDeclaration,
	isCommented,
	toLines,
} from "../../../src/core/config/preference.js";
import { readFixture } from "../../utils/fixtures.js";

const START = "#! Primary Monitor Start !#";
const END = "#! Primary Monitor End !#";

describe("findBlocks", () => {
	it("finds ordered, non-overlapping blocks with inclusive ends", () => {
		const lines = ["x", START, "a", END, "y", START, END, "z"];
		expect(findBlocks(lines)).toEqual([
			{ start: 1, end: 3 },
			{ start: 5, end: 6 },
		]);
	});

	it("matches markers as substrings anywhere in the line", () => {
		const lines = ["  # -- Primary Monitor Start --", "# Primary Monitor End here"];
		expect(findBlocks(lines)).toEqual([{ start: 0, end: 1 }]);
	});

	it("does not close a block on its own start line", () => {
		const lines = ["Primary Monitor Start Primary Monitor End", "b", END];
		expect(findBlocks(lines)).toEqual([{ start: 0, end: 2 }]);
	});

	it("stops at an unterminated start marker", () => {
		const lines = [START, "a", END, START, 'output "DP-1"'];
		expect(findBlocks(lines)).toEqual([{ start: 0, end: 2 }]);
	});

	it("resumes strictly after the previous end line", () => {
		const lines = [START, "Primary Monitor End Primary Monitor Start", "a", END];
		expect(findBlocks(lines)).toEqual([{ start: 0, end: 1 }]);
	});

	it("honours custom markers", () => {
		expect(
			findBlocks(["BEGIN", "x", "FINISH"], { start: "BEGIN", end: "FINISH" }),
		).toEqual([{ start: 0, end: 2 }]);
	});
});

describe("isCommented", () => {
	it("looks at the first non-whitespace character", () => {
		expect(isCommented('   # output "DP-1"')).toBe(true);
		expect(isCommented('output "DP-1" # note')).toBe(false);
		expect(isCommented("")).toBe(false);
	});
});

describe("findDeclaration", () => {
	it("returns the quoted value including spaces", () => {
		const lines = [START, 'output "Dell Inc. DELL U2720Q 7WLMT23" scale 1.5', END];
		expect(findDeclaration(lines, { start: 0, end: 2 })).toBe(
			"Dell Inc. DELL U2720Q 7WLMT23",
		);
	});

	it("skips commented declarations", () => {
		const lines = [START, '# output "DP-1"', '  output "HDMI-A-1"', END];
		expect(findDeclaration(lines, { start: 0, end: 3 })).toBe("HDMI-A-1");
	});

	it("ignores unquoted and empty declarations", () => {
		const lines = [START, "output DP-1 enable", 'output ""', END];
		expect(findDeclaration(lines, { start: 0, end: 3 })).toBeNull();
	});
});

describe("extractPreference", () => {
	it("yields X for start, output \"X\", end", () => {
		expect(extractPreference([START, 'output "DP-3"', END].join("\n"))).toBe(
			"DP-3",
		);
	});

	it("yields null when the only declaration is commented", () => {
		expect(
			extractPreference([START, '#output "DP-3"', END].join("\n")),
		).toBeNull();
	});

	it("falls through to the second block when the first has only comments", () => {
		expect(extractPreference(readFixture("sway-config"))).toBe(
			"Acer Technologies Acer XF270H B 0x0000A1B2",
		);
	});

	it("does not read blocks after the first match", () => {
		const content = [START, 'output "DP-1"', END, START, 'output "DP-2"', END].join(
			"\n",
		);
		expect(extractPreference(content)).toBe("DP-1");
	});

	it("ignores declarations outside any block", () => {
		expect(extractPreference('output "DP-1" scale 2')).toBeNull();
	});

	it("ignores declarations after an unterminated start", () => {
		expect(extractPreference([START, 'output "DP-1"'].join("\n"))).toBeNull();
	});

	it("handles CRLF content", () => {
		expect(extractPreference([START, 'output "DP-4"', END].join("\r\n"))).toBe(
			"DP-4",
		);
		expect(toLines("a\r\nb")).toEqual(["a", "b"]);
	});
});
