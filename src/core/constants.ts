// CHANGE: Single place for identity strings, markers and notification settings
// WHY: Shell and app read these values; nothing here depends on the environment
// PURITY: CORE
// INVARIANT: Values are compile-time constants

import type { BlockMarkers } from "./models.js";

export const APP_NAME = "xprimary";
export const APP_VERSION = "1.0.0";
export const APP_SUMMARY = "X11 Primary Monitor Switcher";
export const APP_ERROR_SUMMARY = "X11 Primary Switcher — Error";

/**
 * Markers of the Sway config block that names the preferred monitor.
 *
 * @example
 * ```
 * #! Primary Monitor Start !#
 * output "Acer Technologies Acer XF270H B 0x9372943C" resolution 1920x1080
 * #! Primary Monitor End !#
 * ```
 */
export const DEFAULT_MARKERS: BlockMarkers = {
	start: "Primary Monitor Start",
	end: "Primary Monitor End",
};

/** Path of the Sway config relative to $HOME. */
export const SWAY_CONFIG_RELATIVE_PATH = ".config/sway/config";

export type NoticeLevel = "ok" | "info" | "error";

export interface NoticeStyle {
	readonly summary: string;
	readonly icon: string;
	readonly timeoutMs: number;
	readonly category: string | null;
}

export const NOTICE_STYLES: Readonly<Record<NoticeLevel, NoticeStyle>> = {
	ok: {
		summary: APP_SUMMARY,
		icon: "video-display",
		timeoutMs: 5000,
		category: "device",
	},
	info: {
		summary: APP_SUMMARY,
		icon: "dialog-information",
		timeoutMs: 6000,
		category: null,
	},
	error: {
		summary: APP_ERROR_SUMMARY,
		icon: "dialog-error",
		timeoutMs: 8000,
		category: null,
	},
};
