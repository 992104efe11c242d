// CHANGE: Typed domain error ADT for the primary switcher using Effect.Data
// WHY: Fatal and recoverable conditions are values in Effect signatures, not thrown exceptions
// REF: Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * `xrandr --query` could not be run or exited non-zero.
 *
 * @invariant fatal: aborts before any mode logic
 */
export class DisplayQueryFailed extends Data.TaggedError("DisplayQueryFailed")<{
	readonly detail: string;
}> {}

/**
 * Display query succeeded but no output is connected.
 *
 * @invariant fatal
 */
export class NoConnectedOutputs extends Data.TaggedError(
	"NoConnectedOutputs",
)<{}> {}

/**
 * Status mode found no output flagged primary.
 */
export class NoPrimary extends Data.TaggedError("NoPrimary")<{}> {}

/**
 * Interactive input was not an integer in [1, count].
 *
 * @invariant count >= 1
 */
export class InvalidSelection extends Data.TaggedError("InvalidSelection")<{
	readonly input: string;
	readonly count: number;
}> {}

/**
 * Standard input could not be read.
 */
export class InputReadFailed extends Data.TaggedError("InputReadFailed")<{
	readonly detail: string;
}> {}

/**
 * `xrandr --output <name> --primary` reported failure.
 */
export class ApplyPrimaryFailed extends Data.TaggedError("ApplyPrimaryFailed")<{
	readonly output: string;
}> {}

/**
 * Compositor output listing unavailable; recoverable.
 */
export class CompositorQueryFailed extends Data.TaggedError(
	"CompositorQueryFailed",
)<{
	readonly detail: string;
}> {}

/**
 * Default config location cannot be derived (no HOME); recoverable.
 */
export class ConfigPathUnavailable extends Data.TaggedError(
	"ConfigPathUnavailable",
)<{
	readonly variable: string;
}> {}

/**
 * Filesystem operation error
 *
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Command could not be spawned at all.
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Command line could not be interpreted.
 */
export class UsageError extends Data.TaggedError("Usage")<{
	readonly detail: string;
}> {}

/**
 * Errors that terminate a run with exit code 1.
 *
 * @pure true
 */
export type FatalError =
	| DisplayQueryFailed
	| NoConnectedOutputs
	| NoPrimary
	| InvalidSelection
	| InputReadFailed
	| ApplyPrimaryFailed;

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| FatalError
	| CompositorQueryFailed
	| ConfigPathUnavailable
	| FSError
	| ExecError
	| UsageError;
