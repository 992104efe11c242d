// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// WHY: APP composes pure CORE decisions with injected SHELL capabilities and returns an exit code
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never, never>
// INVARIANT: At most one display query, one compositor query, one config read and one mutation per run
// COMPLEXITY: O(n + m) where n = |outputs|, m = |config lines|

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import { APP_NAME, APP_VERSION } from "../core/constants.js";
import { extractPreference } from "../core/config/preference.js";
import {
	computeExitCode,
	describeError,
	describeNotice,
	done,
	failed,
	isNotified,
	type RunOutcome,
} from "../core/decision.js";
import {
	ApplyPrimaryFailed,
	type FatalError,
	InvalidSelection,
	NoPrimary,
} from "../core/errors.js";
import { resolveHint } from "../core/hints/resolver.js";
import type { ConnectedOutputs, ExitCode, SwitchMode } from "../core/models.js";
import { requireOutputs } from "../core/outputs/parser.js";
import {
	chooseConfigDefault,
	formatOutputList,
	nextAutoCycle,
	parseSelection,
	statusOf,
} from "../core/selection/selector.js";
import type { CLIOptions } from "../core/types/index.js";
import { parseArgs, USAGE } from "../shell/config/index.js";
import type { SwitcherServices } from "./services.js";

export const SELECTION_PROMPT = "Pick a number to set as primary: ";
export const NO_PREFERENCE_NOTICE =
	"No primary monitor set in Sway config. Choosing first monitor.";

/**
 * Applies the target and announces success.
 *
 * @effect Effect<void, ApplyPrimaryFailed>
 */
function applyAndAnnounce(
	services: SwitcherServices,
	target: string,
	message: string,
): Effect.Effect<void, ApplyPrimaryFailed> {
	return Effect.gen(function* () {
		const ok = yield* services.applyPrimary(target);
		if (!ok) {
			return yield* Effect.fail(new ApplyPrimaryFailed({ output: target }));
		}
		yield* services.notify({ level: "ok", body: message });
	});
}

function runStatus(
	services: SwitcherServices,
	outputs: ConnectedOutputs,
): Effect.Effect<void, NoPrimary> {
	const name = statusOf(outputs);
	if (name === null) return Effect.fail(new NoPrimary());
	return Effect.sync(() => services.terminal.print(`Primary monitor: ${name}.`));
}

function runAutoCycle(
	services: SwitcherServices,
	outputs: ConnectedOutputs,
): Effect.Effect<void, ApplyPrimaryFailed> {
	const { target, previous } = nextAutoCycle(outputs);
	return applyAndAnnounce(
		services,
		target,
		`Auto-switched primary: ${previous ?? "none"} -> ${target}.`,
	);
}

/**
 * Reads the preference hint; every failure on the way means "no preference".
 *
 * @effect Effect<string | null, never>
 */
export function loadPreference(
	services: SwitcherServices,
	configPath: string | undefined,
): Effect.Effect<string | null> {
	return services.resolveConfigPath(configPath).pipe(
		Effect.flatMap(services.readConfig),
		Effect.map((content) => extractPreference(content)),
		Effect.orElseSucceed(() => null),
	);
}

function runConfigDefault(
	services: SwitcherServices,
	outputs: ConnectedOutputs,
	configPath: string | undefined,
): Effect.Effect<void, ApplyPrimaryFailed> {
	return Effect.gen(function* () {
		const preference = yield* loadPreference(services, configPath);
		const resolved =
			preference === null
				? null
				: yield* resolveHint(preference, services.queryCompositor());
		const selection = chooseConfigDefault(outputs, preference, resolved);
		if (selection.fallback === "no-preference") {
			yield* services.notify({ level: "info", body: NO_PREFERENCE_NOTICE });
		}
		yield* applyAndAnnounce(
			services,
			selection.target,
			`Primary set (default mode) -> ${selection.target}`,
		);
	});
}

function runInteractive(
	services: SwitcherServices,
	outputs: ConnectedOutputs,
): Effect.Effect<void, FatalError> {
	return Effect.gen(function* () {
		for (const line of formatOutputList(outputs)) {
			services.terminal.print(line);
		}
		const input = yield* services.readLine(SELECTION_PROMPT);
		const index = yield* parseSelection(input, outputs.length);
		const target = outputs[index]?.name;
		if (target === undefined) {
			return yield* Effect.fail(
				new InvalidSelection({ input, count: outputs.length }),
			);
		}
		yield* applyAndAnnounce(
			services,
			target,
			`Primary set (interactive) -> ${target}.`,
		);
	});
}

/**
 * Runs one mode against the live output list.
 *
 * @effect Effect<void, FatalError>
 * @invariant Display query and empty-result failures abort before any mode logic
 */
export function runMode(
	services: SwitcherServices,
	mode: SwitchMode,
	configPath?: string,
): Effect.Effect<void, FatalError> {
	return Effect.gen(function* () {
		const text = yield* services.queryDisplay();
		const outputs = yield* requireOutputs(text);
		yield* match(mode)
			.returnType<Effect.Effect<void, FatalError>>()
			.with("status", () => runStatus(services, outputs))
			.with("auto", () => runAutoCycle(services, outputs))
			.with("default", () => runConfigDefault(services, outputs, configPath))
			.with("interactive", () => runInteractive(services, outputs))
			.exhaustive();
	});
}

/**
 * Prints a fatal error and sends the error notification.
 *
 * @effect Effect<void, never>
 * @invariant An unset primary in status mode prints "(none)" on stdout and is not notified
 */
export function reportFailure(
	services: SwitcherServices,
	error: FatalError,
): Effect.Effect<void> {
	return Effect.gen(function* () {
		const message = describeError(error);
		if (error._tag === "NoPrimary") {
			services.terminal.print(message);
		} else {
			services.terminal.error(message);
		}
		if (isNotified(error)) {
			yield* services.notify({ level: "error", body: describeNotice(error) });
		}
	});
}

/**
 * Runs a mode and folds every fatal error into the outcome.
 *
 * @effect Effect<RunOutcome, never>
 */
export function runSwitcherOutcome(
	services: SwitcherServices,
	options: CLIOptions,
): Effect.Effect<RunOutcome> {
	return runMode(services, options.mode, options.configPath).pipe(
		Effect.as(done),
		Effect.catchAll((error) =>
			reportFailure(services, error).pipe(Effect.as(failed(error))),
		),
	);
}

/**
 * Parsed options → exit code.
 *
 * @effect Effect<ExitCode, never>
 * @invariant help/version never query the display server
 */
export function runSwitcher(
	services: SwitcherServices,
	options: CLIOptions,
): Effect.Effect<ExitCode> {
	if (options.help) {
		return Effect.sync((): ExitCode => {
			services.terminal.print(USAGE);
			return 0;
		});
	}
	if (options.version) {
		return Effect.sync((): ExitCode => {
			services.terminal.print(`${APP_NAME} ${APP_VERSION}`);
			return 0;
		});
	}
	return runSwitcherOutcome(services, options).pipe(Effect.map(computeExitCode));
}

/**
 * Raw argument vector → exit code; usage errors print the usage text on stderr.
 *
 * @effect Effect<ExitCode, never>
 */
export function runCli(
	services: SwitcherServices,
	args: readonly string[],
): Effect.Effect<ExitCode> {
	const parsed = parseArgs(args);
	if (Either.isLeft(parsed)) {
		return Effect.sync((): ExitCode => {
			services.terminal.error(`error: ${parsed.left.detail}`);
			services.terminal.error(USAGE);
			return 1;
		});
	}
	return runSwitcher(services, parsed.right);
}
