// CHANGE: Map a Sway output hint (connector or hardware description) to a connector name
// WHY: Descriptions survive replugging into another port; connector names do not
// PURITY: CORE (fetchListing is injected; no IO happens here)
// EFFECT: Effect<string | null, never, R>
// INVARIANT: Connector-style hints never trigger a compositor query
// COMPLEXITY: O(n) where n = |records|

import { Effect } from "effect";

import type { CompositorOutputRecord } from "../models.js";

const CONNECTOR_NAME = /^(e?DP|HDMI|DVI|VGA|USB-C|LVDS|Virtual|X11)-/;

/**
 * Whether the hint already looks like a connector (`DP-2`, `eDP-1`, `HDMI-A-1`).
 *
 * @pure true
 */
export function isConnectorName(hint: string): boolean {
	return CONNECTOR_NAME.test(hint);
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(entry: Record<string, unknown>, key: string): string {
	const value = entry[key];
	return typeof value === "string" ? value : "";
}

/**
 * Decodes `swaymsg -t get_outputs` JSON.
 *
 * @param json - Raw payload
 * @returns Records, or null for invalid JSON or a non-array payload
 *
 * @pure true
 * @invariant Missing or non-string fields read as ""
 * @complexity O(n)
 */
export function parseCompositorOutputs(
	json: string,
): readonly CompositorOutputRecord[] | null {
	let payload: unknown;
	try {
		payload = JSON.parse(json);
	} catch {
		// Unparseable payload is the same as an unavailable compositor
		return null;
	}
	if (!Array.isArray(payload)) return null;

	const records: CompositorOutputRecord[] = [];
	for (const entry of payload) {
		if (!isRecordObject(entry)) continue;
		records.push({
			name: stringField(entry, "name"),
			make: stringField(entry, "make"),
			model: stringField(entry, "model"),
			serial: stringField(entry, "serial"),
			description: stringField(entry, "description"),
		});
	}
	return records;
}

/**
 * `"<make> <model> <serial>"` with outer whitespace trimmed.
 *
 * @pure true
 */
export function hardwareIdentity(record: CompositorOutputRecord): string {
	return `${record.make} ${record.model} ${record.serial}`.trim();
}

/**
 * Finds the record a hint refers to.
 *
 * @pure true
 * @invariant Per record: description match is tried before make/model/serial
 * @invariant Empty description or identity never matches
 * @complexity O(n)
 */
export function matchHint(
	hint: string,
	records: readonly CompositorOutputRecord[],
): string | null {
	for (const record of records) {
		if (record.description.length > 0 && record.description === hint) {
			return record.name;
		}
		const identity = hardwareIdentity(record);
		if (identity.length > 0 && identity === hint) {
			return record.name;
		}
	}
	return null;
}

/**
 * Resolves a hint, querying the compositor only when needed.
 *
 * @param hint - Value of the config `output "..."` declaration
 * @param fetchListing - Effect producing the raw compositor JSON
 * @returns Connector name, or null when the listing is unavailable or nothing matches
 *
 * @pure false (runs fetchListing at most once)
 * @effect Effect<string | null, never, R>
 *
 * @example
 * ```ts
 * const name = yield* resolveHint("Acer Technologies Acer XF270H B 0x9372943C", queryCompositorOutputs());
 * ```
 */
export function resolveHint<E, R>(
	hint: string,
	fetchListing: Effect.Effect<string, E, R>,
): Effect.Effect<string | null, never, R> {
	if (isConnectorName(hint)) return Effect.succeed(hint);
	return fetchListing.pipe(
		Effect.map((json) => {
			const records = parseCompositorOutputs(json);
			return records === null ? null : matchHint(hint, records);
		}),
		Effect.orElseSucceed(() => null),
	);
}
