/**
 * Error-to-HTTP-status mapping for REST API responses.
 *
 * Maps tagged errors to HTTP status codes and `{ errors }` bodies. Each
 * error's _tag is the discriminant. Anything unrecognized is a server fault
 * and its details stay in the logs.
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

export type ErrorPayload = string | Readonly<Record<string, ReadonlyArray<string>>>;

/**
 * Structured error response returned by mapErrorToResponse.
 */
export interface ErrorResponse {
	/** HTTP status code (400, 404, 422 or 500) */
	readonly status: number;

	readonly body: {
		/** A message, or field name → messages for validation failures */
		readonly errors: ErrorPayload;
	};
}

interface TaggedError {
	readonly _tag: string;
	readonly message?: unknown;
	readonly issues?: unknown;
}

const SERVER_FAULT: ErrorResponse = {
	status: 500,
	body: { errors: "Internal server error" },
};

// ============================================================================
// Status Code Mapping
// ============================================================================

/**
 * Static mapping from error _tag values to HTTP status codes.
 *
 * - 400 Bad Request: malformed directives, bodies and columns the store lacks
 * - 404 Not Found: missing records, tables and associations
 * - 422 Unprocessable Entity: records that fail validation
 */
const ERROR_STATUS_MAP: Readonly<Record<string, number>> = {
	InvalidDirectiveError: 400,
	MalformedBodyError: 400,
	SchemaMismatchError: 400,
	NotFoundError: 404,
	TableNotFoundError: 404,
	ValidationError: 422,
};

const isTaggedError = (error: unknown): error is TaggedError =>
	typeof error === "object" &&
	error !== null &&
	"_tag" in error &&
	typeof error._tag === "string";

/**
 * Group validation issues by field: `{ title: ["is missing"] }`.
 */
const fieldErrors = (
	issues: unknown,
): Readonly<Record<string, ReadonlyArray<string>>> => {
	const grouped: Record<string, Array<string>> = {};
	if (!Array.isArray(issues)) return grouped;
	const list: ReadonlyArray<unknown> = issues;

	for (const issue of list) {
		if (typeof issue !== "object" || issue === null) continue;
		const field = "field" in issue && typeof issue.field === "string" ? issue.field : "(root)";
		const message =
			"message" in issue && typeof issue.message === "string" ? issue.message : "is invalid";
		(grouped[field] ??= []).push(message);
	}
	return grouped;
};

// ============================================================================
// Error Mapping Function
// ============================================================================

/**
 * Map a tagged error to an HTTP response.
 *
 * @example
 * ```typescript
 * mapErrorToResponse(
 *   new NotFoundError({ table: "posts", field: "id", value: "9", message: "Couldn't find posts with id=9" }),
 * )
 * // → { status: 404, body: { errors: "Couldn't find posts with id=9" } }
 * ```
 */
export const mapErrorToResponse = (error: unknown): ErrorResponse => {
	if (!isTaggedError(error)) {
		return SERVER_FAULT;
	}

	const status = Object.hasOwn(ERROR_STATUS_MAP, error._tag)
		? ERROR_STATUS_MAP[error._tag]
		: undefined;
	if (status === undefined) {
		return SERVER_FAULT;
	}

	if (error._tag === "ValidationError") {
		return { status, body: { errors: fieldErrors(error.issues) } };
	}

	return {
		status,
		body: {
			errors: typeof error.message === "string" ? error.message : error._tag,
		},
	};
};
