// CHANGE: CLI argument parsing for the primary switcher
// WHY: Flag handling is a lookup table; mode precedence is resolved in one pure step
// PURITY: SHELL boundary; parseArgs itself is pure (argv is passed in by main)
// INVARIANT: Flags never combine: status > auto > default > interactive
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { APP_NAME } from "../../core/constants.js";
import { UsageError } from "../../core/errors.js";
import type { SwitchMode } from "../../core/models.js";
import type { CLIOptions, ModeFlags } from "../../core/types/index.js";

export const USAGE = [
	`Usage: ${APP_NAME} [--status | --auto-switch | --default] [--config <PATH>]`,
	"",
	"Switch X11 (XWayland) primary monitor with interactive or automatic modes, using Sway config hints.",
	"",
	"Options:",
	"  --auto-switch    Cycle the primary to the next connected X11 output",
	"  --default        Set primary to the monitor indicated by the Sway config Primary Monitor block",
	"  --status         Print the current primary X11 output and exit",
	"  --config <PATH>  Path to Sway config (default: ~/.config/sway/config)",
	"  -h, --help       Print help",
	"  -V, --version    Print version",
].join("\n");

interface ArgState extends ModeFlags {
	readonly configPath: string | undefined;
	readonly help: boolean;
	readonly version: boolean;
}

type BooleanKey = "status" | "auto" | "default" | "help" | "version";

const booleanFlags: Readonly<Record<string, BooleanKey | undefined>> = {
	"--status": "status",
	"--auto-switch": "auto",
	"--default": "default",
	"-h": "help",
	"--help": "help",
	"-V": "version",
	"--version": "version",
};

const CONFIG_FLAG = "--config";

/**
 * Applies mode precedence.
 *
 * @pure true
 */
export function selectMode(flags: ModeFlags): SwitchMode {
	if (flags.status) return "status";
	if (flags.auto) return "auto";
	if (flags.default) return "default";
	return "interactive";
}

interface Step {
	readonly state: ArgState;
	readonly consumed: number;
}

function processArgument(
	arg: string,
	next: string | undefined,
	state: ArgState,
): Either.Either<Step, UsageError> {
	const key = booleanFlags[arg];
	if (key !== undefined) {
		return Either.right({ state: { ...state, [key]: true }, consumed: 1 });
	}
	if (arg === CONFIG_FLAG) {
		if (next === undefined || next.length === 0) {
			return Either.left(
				new UsageError({ detail: "--config requires a value <PATH>" }),
			);
		}
		return Either.right({ state: { ...state, configPath: next }, consumed: 2 });
	}
	if (arg.startsWith(`${CONFIG_FLAG}=`)) {
		const value = arg.slice(CONFIG_FLAG.length + 1);
		if (value.length === 0) {
			return Either.left(
				new UsageError({ detail: "--config requires a value <PATH>" }),
			);
		}
		return Either.right({ state: { ...state, configPath: value }, consumed: 1 });
	}
	return Either.left(
		new UsageError({ detail: `unexpected argument '${arg}'` }),
	);
}

/**
 * Parses an argument vector (without node and script entries).
 *
 * @pure true
 * @returns CLIOptions, or UsageError for unknown arguments and a missing --config value
 *
 * @example
 * ```ts
 * parseArgs(["--default", "--config", "/tmp/sway"]);
 * // Right({ mode: "default", configPath: "/tmp/sway", help: false, version: false })
 * ```
 */
export function parseArgs(
	args: readonly string[],
): Either.Either<CLIOptions, UsageError> {
	let state: ArgState = {
		status: false,
		auto: false,
		default: false,
		configPath: undefined,
		help: false,
		version: false,
	};

	let i = 0;
	while (i < args.length) {
		const arg = args.at(i) ?? "";
		if (arg.length === 0) {
			i++;
			continue;
		}
		const step = processArgument(arg, args.at(i + 1), state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		i += step.right.consumed;
	}

	// exactOptionalPropertyTypes: absence of the field models "no --config"
	const base: CLIOptions = {
		mode: selectMode(state),
		help: state.help,
		version: state.version,
	};
	return Either.right(
		state.configPath === undefined
			? base
			: { ...base, configPath: state.configPath },
	);
}
