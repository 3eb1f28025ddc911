import { Data } from "effect"

// ============================================================================
// Effect TaggedError Query Error Types
// ============================================================================

/**
 * A query referenced a column or association the table does not have.
 * Raised before any rows are read.
 */
export class SchemaMismatchError extends Data.TaggedError("SchemaMismatchError")<{
	readonly table: string
	readonly field: string
	readonly message: string
}> {}

export class TableNotFoundError extends Data.TaggedError("TableNotFoundError")<{
	readonly table: string
	readonly message: string
}> {}

// ============================================================================
// Query Error Union
// ============================================================================

export type QueryError = SchemaMismatchError | TableNotFoundError
