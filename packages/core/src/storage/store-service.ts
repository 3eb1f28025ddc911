import { Context, type Effect } from "effect";
import type { NotFoundError, ValidationError } from "../errors/crud-errors.js";
import type { QueryError } from "../errors/query-errors.js";
import type { Query } from "../query/query.js";
import type { DatabaseConfig, Row, Scalar } from "../types/table-types.js";

// ============================================================================
// Store Effect Service
// ============================================================================

/**
 * The storage collaborator the REST layer drives.
 *
 * `execute` runs a plan: conjunctive predicates, eager loads with batch
 * semantics, ordering (primary key when none), then offset and limit.
 * Lookups take an arbitrary key column.
 */
export interface StoreShape {
	readonly config: DatabaseConfig;

	readonly execute: (
		query: Query,
	) => Effect.Effect<ReadonlyArray<Row>, QueryError>;

	readonly findBy: (
		table: string,
		field: string,
		value: Scalar,
	) => Effect.Effect<Row, NotFoundError | QueryError>;

	readonly insert: (
		table: string,
		input: Readonly<Record<string, unknown>>,
	) => Effect.Effect<Row, ValidationError | QueryError>;

	/**
	 * Merge `changes` into the row found by `field = value`. The primary key
	 * never changes.
	 */
	readonly update: (
		table: string,
		field: string,
		value: Scalar,
		changes: Readonly<Record<string, unknown>>,
	) => Effect.Effect<Row, NotFoundError | ValidationError | QueryError>;

	readonly remove: (
		table: string,
		field: string,
		value: Scalar,
	) => Effect.Effect<Row, NotFoundError | QueryError>;
}

export class Store extends Context.Tag("Store")<Store, StoreShape>() {}
