// CHANGE: Capabilities the APP layer needs, injected as one record
// WHY: Mode logic runs against canned xrandr text / swaymsg JSON in tests, no display session needed
// PURITY: APP (interface only)
// INVARIANT: Each run calls queryDisplay, queryCompositor, readConfig and applyPrimary at most once
// COMPLEXITY: O(1)

import { Effect } from "effect";

import type {
	CompositorQueryFailed,
	ConfigPathUnavailable,
	DisplayQueryFailed,
	FSError,
	InputReadFailed,
} from "../core/errors.js";
import { queryCompositorOutputs } from "../shell/compositor/swaymsg.js";
import { readConfigFile, resolveConfigPath } from "../shell/config/index.js";
import type { SwitcherEnv } from "../shell/config/index.js";
import { applyPrimary, queryDisplayOutputs } from "../shell/display/xrandr.js";
import { type Notice, notify } from "../shell/notify/notify-send.js";
import { readLine } from "../shell/prompt/stdin.js";

/**
 * Console sink; stdout for results, stderr for fatal errors.
 */
export interface Terminal {
	readonly print: (line: string) => void;
	readonly error: (line: string) => void;
}

export interface SwitcherServices {
	readonly queryDisplay: () => Effect.Effect<string, DisplayQueryFailed>;
	readonly queryCompositor: () => Effect.Effect<string, CompositorQueryFailed>;
	readonly applyPrimary: (output: string) => Effect.Effect<boolean>;
	readonly resolveConfigPath: (
		explicit: string | undefined,
	) => Effect.Effect<string, ConfigPathUnavailable>;
	readonly readConfig: (path: string) => Effect.Effect<string, FSError>;
	readonly readLine: (prompt: string) => Effect.Effect<string, InputReadFailed>;
	readonly notify: (notice: Notice) => Effect.Effect<void>;
	readonly terminal: Terminal;
}

export const consoleTerminal: Terminal = {
	print: (line) => console.log(line),
	error: (line) => console.error(line),
};

/**
 * Services backed by xrandr, swaymsg, notify-send, the filesystem and stdin.
 *
 * @pure false (captures the process environment)
 */
export function createLiveServices(
	env: SwitcherEnv = process.env,
): SwitcherServices {
	return {
		queryDisplay: queryDisplayOutputs,
		queryCompositor: queryCompositorOutputs,
		applyPrimary,
		resolveConfigPath: (explicit) => resolveConfigPath(explicit, env),
		readConfig: readConfigFile,
		readLine: (prompt) => readLine(prompt),
		notify,
		terminal: consoleTerminal,
	};
}
