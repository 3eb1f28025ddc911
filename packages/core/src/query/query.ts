/**
 * Immutable query plans.
 *
 * A plan is plain data: the store decides how to execute it. Builders are
 * data-last so plans compose with `pipe`:
 *
 * @example
 * ```ts
 * import { pipe } from "effect"
 * import { Query } from "@trellis/core"
 *
 * const plan = pipe(
 *   Query.from("posts"),
 *   Query.where("status", "published"),
 *   Query.include("comments", pipe(Query.from("comments"), Query.limit(3))),
 *   Query.orderBy("createdAt", "desc"),
 *   Query.limit(10),
 * )
 * ```
 *
 * @module
 */

import type { Scalar } from "../types/table-types.js";

// ============================================================================
// Types
// ============================================================================

export type SortDirection = "asc" | "desc";

export interface OrderClause {
	readonly field: string;
	readonly direction: SortDirection;
}

/**
 * Conjunctive row predicate.
 *
 * `Related` keeps a row only when at least one row reachable through the
 * association satisfies every nested predicate (a semi-join).
 */
export type Predicate =
	| {
			readonly _tag: "Equals";
			readonly field: string;
			readonly value: Scalar;
	  }
	| {
			readonly _tag: "In";
			readonly field: string;
			readonly values: ReadonlyArray<Scalar>;
	  }
	| {
			readonly _tag: "Related";
			readonly association: string;
			readonly predicates: ReadonlyArray<Predicate>;
	  };

/**
 * Eager-load instruction. The store anchors `query` to the parent rows
 * through the association's keys and loads every parent's children in one
 * batch; order, limit and offset of `query` apply per parent.
 */
export interface Include {
	readonly association: string;
	readonly query: Query;
}

export interface Query {
	readonly table: string;
	readonly predicates: ReadonlyArray<Predicate>;
	readonly includes: ReadonlyArray<Include>;
	readonly order: ReadonlyArray<OrderClause>;
	readonly limit?: number;
	readonly offset?: number;
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Scope a plan to every row of a table.
 */
export const from = (table: string): Query => ({
	table,
	predicates: [],
	includes: [],
	order: [],
});

export const where =
	(field: string, value: Scalar) =>
	(query: Query): Query => ({
		...query,
		predicates: [...query.predicates, { _tag: "Equals", field, value }],
	});

export const whereIn =
	(field: string, values: ReadonlyArray<Scalar>) =>
	(query: Query): Query => ({
		...query,
		predicates: [...query.predicates, { _tag: "In", field, values }],
	});

export const whereRelated =
	(association: string, predicates: ReadonlyArray<Predicate>) =>
	(query: Query): Query => ({
		...query,
		predicates: [
			...query.predicates,
			{ _tag: "Related", association, predicates },
		],
	});

/**
 * Add an eager load. A later include of the same association replaces the
 * earlier one.
 */
export const include =
	(association: string, child: Query) =>
	(query: Query): Query => ({
		...query,
		includes: [
			...query.includes.filter((i) => i.association !== association),
			{ association, query: child },
		],
	});

export const orderBy =
	(field: string, direction: SortDirection = "asc") =>
	(query: Query): Query => ({
		...query,
		order: [...query.order, { field, direction }],
	});

export const limit =
	(count: number) =>
	(query: Query): Query => ({ ...query, limit: count });

export const offset =
	(count: number) =>
	(query: Query): Query => ({ ...query, offset: count });

/**
 * Drop limit and offset from a plan.
 */
export const unpaginated = (query: Query): Query => {
	const { limit: _limit, offset: _offset, ...rest } = query;
	return rest;
};

// ============================================================================
// Inspection
// ============================================================================

/**
 * Scalar predicates (`Equals` and `In`) that constrain `field` directly.
 */
export const predicatesOn = (
	query: Query,
	field: string,
): ReadonlyArray<Predicate> =>
	query.predicates.filter((p) => p._tag !== "Related" && p.field === field);

export const findInclude = (
	query: Query,
	association: string,
): Include | undefined =>
	query.includes.find((i) => i.association === association);
