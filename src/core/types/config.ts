// CHANGE: CLI option types for the primary switcher
// WHY: Shared by SHELL (parsing) and APP (dispatch) without a dependency between them

import type { SwitchMode } from "../models.js";

/**
 * Parsed command line.
 *
 * @property mode Selected mode after precedence (status > auto > default > interactive)
 * @property configPath Value of --config; absent means the default Sway config
 * @property help -h/--help was given
 * @property version -V/--version was given
 */
export interface CLIOptions {
	readonly mode: SwitchMode;
	readonly configPath?: string;
	readonly help: boolean;
	readonly version: boolean;
}

/**
 * Mode flags as they appeared on the command line.
 */
export interface ModeFlags {
	readonly status: boolean;
	readonly auto: boolean;
	readonly default: boolean;
}
