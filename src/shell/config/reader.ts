// CHANGE: Read the Sway config as UTF-8 text
// WHY: A missing or unreadable file is a recoverable FSError, mapped to "no preference" by APP
// PURITY: SHELL
// EFFECT: Effect<string, FSError>
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import { fs } from "../utils/node-mods.js";

/**
 * @effect Effect<string, FSError>
 */
export function readConfigFile(filePath: string): Effect.Effect<string, FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(filePath, "utf8"),
		catch: (error) =>
			new FSError({
				detail: error instanceof Error ? error.message : String(error),
				path: filePath,
			}),
	});
}
