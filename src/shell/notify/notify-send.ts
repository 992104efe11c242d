// CHANGE: Best-effort desktop notifications through notify-send
// WHY: Success, info and fatal outcomes are surfaced outside the terminal (keybinding use)
// PURITY: SHELL
// EFFECT: Effect<void, never, never>
// INVARIANT: Notification failures never abort or alter a run
// COMPLEXITY: O(1)

import { Effect } from "effect";

import {
	APP_NAME,
	NOTICE_STYLES,
	type NoticeLevel,
} from "../../core/constants.js";
import { runCommand } from "../utils/exec.js";

export const NOTIFY_SEND = "notify-send";

/**
 * One desktop notification.
 */
export interface Notice {
	readonly level: NoticeLevel;
	readonly body: string;
}

/**
 * notify-send argument vector for a notice.
 *
 * @pure true
 *
 * @example
 * ```ts
 * buildNotifyArgs({ level: "info", body: "hi" });
 * // ["--app-name=xprimary", "--icon=dialog-information", "--expire-time=6000", "X11 Primary Monitor Switcher", "hi"]
 * ```
 */
export function buildNotifyArgs(notice: Notice): readonly string[] {
	const style = NOTICE_STYLES[notice.level];
	const hint =
		style.category === null ? [] : [`--hint=string:category:${style.category}`];
	return [
		`--app-name=${APP_NAME}`,
		`--icon=${style.icon}`,
		`--expire-time=${style.timeoutMs}`,
		...hint,
		style.summary,
		notice.body,
	];
}

/**
 * Shows a notification; every failure is dropped.
 *
 * @effect Effect<void, never>
 */
export function notify(notice: Notice): Effect.Effect<void> {
	return runCommand(NOTIFY_SEND, buildNotifyArgs(notice)).pipe(
		Effect.asVoid,
		Effect.catchAll(() => Effect.void),
	);
}
