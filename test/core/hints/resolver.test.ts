// CHANGE: Specs for hint → connector resolution
// WHY: Description match precedes make/model/serial; connector hints never query the compositor
// PURITY: CORE (fetchListing replaced by counted Effects)
// INVARIANT: Resolution failures are null values, never errors
// COMPLEXITY: O(n) per fixture

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { CompositorQueryFailed } from "../../../src/core/errors.js";
import {
	hardwareIdentity,
	isConnectorName,
	matchHint,
	parseCompositorOutputs,
	resolveHint,
} from "../../../src/core/hints/resolver.js";
import type { CompositorOutputRecord } from "../../../src/core/models.js";
import { readFixture } from "../../utils/fixtures.js";

const record = (
	over: Partial<CompositorOutputRecord> = {},
): CompositorOutputRecord => ({
	name: "DP-1",
	make: "",
	model: "",
	serial: "",
	description: "",
	...over,
});

const countingListing = (json: string) => {
	const calls = { count: 0 };
	const effect = Effect.sync(() => {
		calls.count++;
		return json;
	});
	return { calls, effect };
};

describe("isConnectorName", () => {
	it.each(["DP-2", "eDP-1", "HDMI-A-1", "DVI-D-1", "VGA-1", "USB-C-0", "LVDS-1", "Virtual-1", "X11-0"])(
		"treats %s as a connector",
		(hint) => {
			expect(isConnectorName(hint)).toBe(true);
		},
	);

	it.each(["Dell Inc. DELL U2720Q 7WLMT23", "DP2", "XWAYLAND0", "hdmi-1"])(
		"treats %s as a description",
		(hint) => {
			expect(isConnectorName(hint)).toBe(false);
		},
	);
});

describe("parseCompositorOutputs", () => {
	it("reads the swaymsg fixture, defaulting missing fields to empty strings", () => {
		const records = parseCompositorOutputs(readFixture("get_outputs.json"));
		expect(records?.map((r) => r.name)).toEqual(["DP-2", "HDMI-A-1", "eDP-1"]);
		expect(records?.[1]?.description).toBe("");
	});

	it("returns null for invalid JSON and non-array payloads", () => {
		expect(parseCompositorOutputs("not json")).toBeNull();
		expect(parseCompositorOutputs('{"name":"DP-1"}')).toBeNull();
	});

	it("skips non-object entries and blanks non-string fields", () => {
		expect(
			parseCompositorOutputs('[1, null, ["x"], {"name": "DP-1", "serial": 42}]'),
		).toEqual([record({ name: "DP-1" })]);
	});
});

describe("hardwareIdentity", () => {
	it("joins make, model and serial with single spaces and trims the ends", () => {
		expect(
			hardwareIdentity(record({ make: "Acme", model: "Panel 27", serial: "" })),
		).toBe("Acme Panel 27");
		expect(hardwareIdentity(record())).toBe("");
	});
});

describe("matchHint", () => {
	it("matches the description exactly", () => {
		const records = [
			record({ name: "DP-1", description: "Acme Panel 27 SN1" }),
			record({ name: "DP-2", description: "Built-in Laptop Panel" }),
		];
		expect(matchHint("Built-in Laptop Panel", records)).toBe("DP-2");
	});

	it("falls back to make/model/serial when the description differs", () => {
		const records = readFixture("get_outputs.json");
		const parsed = parseCompositorOutputs(records) ?? [];
		expect(matchHint("Acer Technologies Acer XF270H B 0x0000A1B2", parsed)).toBe(
			"HDMI-A-1",
		);
		expect(matchHint("Dell Inc. DELL U2720Q 7WLMT23", parsed)).toBe("DP-2");
	});

	it("walks records in order, checking description then identity per record", () => {
		const records = [
			record({ name: "DP-1", make: "Acme", model: "X", serial: "1" }),
			record({ name: "DP-2", description: "Acme X 1" }),
		];
		expect(matchHint("Acme X 1", records)).toBe("DP-1");
	});

	it("never matches an empty hint against empty fields", () => {
		expect(matchHint("", [record()])).toBeNull();
	});

	it("returns null when nothing matches", () => {
		expect(matchHint("Unknown Monitor", [record({ description: "Other" })])).toBeNull();
	});
});

describe("resolveHint", () => {
	it("returns connector-style hints without querying the compositor", async () => {
		const { calls, effect } = countingListing("[]");
		await expect(Effect.runPromise(resolveHint("DP-2", effect))).resolves.toBe(
			"DP-2",
		);
		expect(calls.count).toBe(0);
	});

	it("queries once and resolves through the listing", async () => {
		const { calls, effect } = countingListing(readFixture("get_outputs.json"));
		await expect(
			Effect.runPromise(resolveHint("Built-in Laptop Panel", effect)),
		).resolves.toBe("eDP-1");
		expect(calls.count).toBe(1);
	});

	it("yields null when the listing fails", async () => {
		const failing = Effect.fail(new CompositorQueryFailed({ detail: "no sway" }));
		await expect(
			Effect.runPromise(resolveHint("Acme Panel", failing)),
		).resolves.toBeNull();
	});

	it("yields null for an unparseable listing", async () => {
		const { effect } = countingListing("<html>");
		await expect(
			Effect.runPromise(resolveHint("Acme Panel", effect)),
		).resolves.toBeNull();
	});
});
