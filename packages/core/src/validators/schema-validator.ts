/**
 * Effect Schema decode wrapper that maps ParseError to ValidationError.
 */

import { Effect, ParseResult, Schema } from "effect"
import { ValidationError } from "../errors/index.js"
import type { Row } from "../types/table-types.js"

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value)

/**
 * Decode unknown data through a table's schema, producing a row.
 * Properties the schema does not declare are dropped.
 */
export const validateRow = (
	table: string,
	schema: Schema.Schema.AnyNoContext,
	data: unknown,
): Effect.Effect<Row, ValidationError> =>
	Schema.decodeUnknown(schema)(data).pipe(
		Effect.mapError((parseError) =>
			parseErrorToValidationError(table, parseError),
		),
		Effect.flatMap((decoded: unknown) =>
			isRecord(decoded)
				? Effect.succeed(decoded)
				: Effect.fail(
						new ValidationError({
							table,
							message: `Schema for "${table}" does not decode to an object`,
							issues: [{ field: "(root)", message: "is not an object" }],
						}),
					),
		),
	)

/**
 * Convert an Effect Schema ParseError into our ValidationError,
 * extracting structured issue details via ArrayFormatter.
 */
const parseErrorToValidationError = (
	table: string,
	parseError: ParseResult.ParseError,
): ValidationError => {
	const arrayIssues = ParseResult.ArrayFormatter.formatErrorSync(parseError)
	const message = ParseResult.TreeFormatter.formatErrorSync(parseError)

	return new ValidationError({
		table,
		message,
		issues: arrayIssues.map((issue) => ({
			field: issue.path.map(String).join(".") || "(root)",
			message: issue.message,
		})),
	})
}
