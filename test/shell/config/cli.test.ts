// CHANGE: Unit tests for CLI argument parsing
// WHY: Flags and mode precedence are parsed deterministically with strict typing
// INVARIANT: status > auto > default > interactive

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../../src/core/types/index.js";
import { parseArgs, selectMode } from "../../../src/shell/config/cli.js";

const parsed = (args: readonly string[]): CLIOptions =>
	Either.getOrThrow(parseArgs(args));

describe("parseArgs: defaults", () => {
	it("selects interactive mode without flags", (): void => {
		expect(parsed([])).toEqual({
			mode: "interactive",
			help: false,
			version: false,
		});
	});

	it("ignores empty string arguments", (): void => {
		expect(parsed(["", "--status"]).mode).toBe("status");
	});
});

describe("parseArgs: modes", () => {
	it.each([
		[["--status"], "status"],
		[["--auto-switch"], "auto"],
		[["--default"], "default"],
		[["--default", "--auto-switch"], "auto"],
		[["--auto-switch", "--status"], "status"],
		[["--default", "--status", "--auto-switch"], "status"],
	] as const)("%j selects %s", (args, mode): void => {
		expect(parsed(args).mode).toBe(mode);
	});

	it("selectMode follows precedence", (): void => {
		expect(selectMode({ status: false, auto: false, default: true })).toBe(
			"default",
		);
		expect(selectMode({ status: false, auto: false, default: false })).toBe(
			"interactive",
		);
	});
});

describe("parseArgs: --config", () => {
	it("takes the next token as the path", (): void => {
		expect(parsed(["--default", "--config", "/tmp/sway/config"])).toEqual({
			mode: "default",
			configPath: "/tmp/sway/config",
			help: false,
			version: false,
		});
	});

	it("accepts the --config=PATH form", (): void => {
		expect(parsed(["--config=/etc/sway/config"]).configPath).toBe(
			"/etc/sway/config",
		);
	});

	it("does not treat the value as a flag", (): void => {
		expect(parsed(["--config", "--status"]).mode).toBe("interactive");
		expect(parsed(["--config", "--status"]).configPath).toBe("--status");
	});

	it.each([["--config"], ["--config="], ["--config", ""]])(
		"rejects %j without a value",
		(...args): void => {
			const result = parseArgs(args);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left.detail).toBe("--config requires a value <PATH>");
			}
		},
	);
});

describe("parseArgs: help, version and unknown input", () => {
	it("recognises short and long help/version flags", (): void => {
		expect(parsed(["-h"]).help).toBe(true);
		expect(parsed(["--help"]).help).toBe(true);
		expect(parsed(["-V"]).version).toBe(true);
		expect(parsed(["--version"]).version).toBe(true);
	});

	it("rejects unknown flags and positionals", (): void => {
		const flag = parseArgs(["--primary"]);
		const positional = parseArgs(["DP-2"]);
		expect(Either.isLeft(flag) && flag.left.detail).toBe(
			"unexpected argument '--primary'",
		);
		expect(Either.isLeft(positional) && positional.left.detail).toBe(
			"unexpected argument 'DP-2'",
		);
	});
});
