import { Data } from "effect";

// ============================================================================
// Effect TaggedError Request Error Types
// ============================================================================

/**
 * A reserved query directive (`order`, `limit`, `offset`, `page`,
 * `per_page`) could not be parsed. `key` is the full parameter name,
 * including any association prefix such as `comments.limit`.
 */
export class InvalidDirectiveError extends Data.TaggedError(
	"InvalidDirectiveError",
)<{
	readonly key: string;
	readonly value: string;
	readonly message: string;
}> {}

/**
 * The request body is not an attribute object.
 */
export class MalformedBodyError extends Data.TaggedError("MalformedBodyError")<{
	readonly resource: string;
	readonly message: string;
}> {}

// ============================================================================
// Request Error Union
// ============================================================================

export type RequestError = InvalidDirectiveError | MalformedBodyError;
