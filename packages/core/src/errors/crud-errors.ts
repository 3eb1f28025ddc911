import { Data } from "effect";

// ============================================================================
// Effect TaggedError CRUD Error Types
// ============================================================================

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
	readonly table: string;
	readonly field: string;
	readonly value: string;
	readonly message: string;
}> {}

export class ValidationError extends Data.TaggedError("ValidationError")<{
	readonly table: string;
	readonly message: string;
	readonly issues: ReadonlyArray<{
		readonly field: string;
		readonly message: string;
	}>;
}> {}

// ============================================================================
// Effect CRUD Error Union
// ============================================================================

export type CrudError = NotFoundError | ValidationError;
