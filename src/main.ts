// CHANGE: Make main.ts a thin APP delegator
// WHY: main wires live services and delegates orchestration to app/runSwitcher
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runCli } from "./app/runSwitcher.js";
import { createLiveServices, type SwitcherServices } from "./app/services.js";
import type { ExitCode } from "./core/models.js";

export type { SwitcherServices, Terminal } from "./app/services.js";
export { runCli, runMode, runSwitcher } from "./app/runSwitcher.js";
export type { CLIOptions } from "./core/types/index.js";
export type {
	CompositorOutputRecord,
	ConnectedOutputs,
	ExitCode,
	Output,
	OutputSet,
	SwitchMode,
} from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
	services: SwitcherServices = createLiveServices(),
): Promise<ExitCode> {
	return Effect.runPromise(runCli(services, args));
}
