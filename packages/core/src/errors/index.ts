// ============================================================================
// CRUD Errors (re-exported from crud-errors.ts)
// ============================================================================

export type { CrudError } from "./crud-errors.js";
export { NotFoundError, ValidationError } from "./crud-errors.js";

// ============================================================================
// Query Errors (re-exported from query-errors.ts)
// ============================================================================

export type { QueryError } from "./query-errors.js";
export { SchemaMismatchError, TableNotFoundError } from "./query-errors.js";

// ============================================================================
// Union Types
// ============================================================================

import type { CrudError } from "./crud-errors.js";
import type { QueryError } from "./query-errors.js";

export type StoreError = CrudError | QueryError;
