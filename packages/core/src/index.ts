/**
 * @trellis/core — the relational storage collaborator behind trellis.
 *
 * Tables are declared with Effect Schema; queries are immutable plans built
 * with pipeable builders and executed by the Store service.
 *
 * @module
 */

// ============================================================================
// Tables
// ============================================================================

export type {
	AssociationConfig,
	DatabaseConfig,
	DatabaseData,
	Row,
	Scalar,
	TableConfig,
} from "./types/table-types.js";

export {
	type AssociationEdge,
	columnsOf,
	reflectTable,
	singularize,
	type TableReflection,
} from "./reflection/reflect.js";
export { findEdge } from "./reflection/edges.js";

// ============================================================================
// Query Plans
// ============================================================================

export * as Query from "./query/query.js";
export type {
	Include,
	OrderClause,
	Predicate,
	SortDirection,
} from "./query/query.js";
export { keyOf, valuesMatch } from "./operations/query/filter.js";

// ============================================================================
// Store
// ============================================================================

export { Store, type StoreShape } from "./storage/store-service.js";
export {
	type InMemoryStoreOptions,
	makeInMemoryStore,
	makeInMemoryStoreLayer,
	type QueryLogEntry,
} from "./storage/in-memory-store.js";

// ============================================================================
// Errors
// ============================================================================

export {
	type CrudError,
	NotFoundError,
	type QueryError,
	SchemaMismatchError,
	type StoreError,
	TableNotFoundError,
	ValidationError,
} from "./errors/index.js";
