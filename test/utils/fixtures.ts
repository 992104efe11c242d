// CHANGE: Fixture loader shared by parser, resolver and APP tests
// WHY: Realistic xrandr/swaymsg/sway config samples live as plain files next to the tests

import { readFileSync } from "node:fs";

/** Read a file from test/fixtures as UTF-8. */
export const readFixture = (name: string): string =>
	readFileSync(new URL(`../fixtures/${name}`, import.meta.url), "utf8");
