// CHANGE: Single-line prompt on stdin for interactive mode
// WHY: Interactive selection blocks on exactly one line of input
// PURITY: SHELL
// EFFECT: Effect<string, InputReadFailed>
// INVARIANT: EOF before a newline yields "" (rejected later as an invalid selection)
// COMPLEXITY: O(n) where n = line length

import { Effect } from "effect";

import { InputReadFailed } from "../../core/errors.js";
import { createInterface } from "../utils/node-mods.js";

/**
 * Writes the prompt without a newline and reads one line.
 *
 * @effect Effect<string, InputReadFailed>
 */
export function readLine(
	prompt: string,
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout,
): Effect.Effect<string, InputReadFailed> {
	return Effect.async<string, InputReadFailed>((resume) => {
		const rl = createInterface({ input, output, terminal: false });
		let settled = false;
		const finish = (effect: Effect.Effect<string, InputReadFailed>): void => {
			if (settled) return;
			settled = true;
			rl.close();
			resume(effect);
		};
		rl.once("line", (line) => finish(Effect.succeed(line)));
		rl.once("close", () => finish(Effect.succeed("")));
		const onError = (error: Error): void =>
			finish(Effect.fail(new InputReadFailed({ detail: error.message })));
		rl.once("error", onError);
		input.once("error", onError);
		output.write(prompt);
	});
}
