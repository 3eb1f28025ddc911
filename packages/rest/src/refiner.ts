/**
 * Query Refiner.
 *
 * Applies a classified RefinementRequest to a base plan:
 *
 * 1. filters as conjunctive predicates
 * 2. association nodes as eager loads (and, for singular associations,
 *    as conditions on the parent rows)
 * 3. ordering
 * 4. limit and offset, which the store applies after filtering and ordering
 *
 * @module
 */

import {
	type Predicate,
	Query,
	type QueryError,
	SchemaMismatchError,
	type TableReflection,
} from "@trellis/core";
import { Effect, pipe } from "effect";
import { resolveInclude } from "./association-resolver.js";
import { type Catalog, reflectResource, whitelistedEdge } from "./catalog.js";
import type { Filter, RefinementRequest } from "./query-params.js";

// ============================================================================
// Schema checks
// ============================================================================

/**
 * Whitelisted names must still exist in storage. A field declared in the
 * whitelist but missing from the table is a client-visible mismatch.
 */
const checkColumns = (
	reflection: TableReflection,
	request: RefinementRequest,
): Effect.Effect<void, SchemaMismatchError> => {
	const columns = new Set(reflection.columns);
	const fields = [
		...request.filters.map((f) => f.field),
		...request.order.map((o) => o.field),
	];
	const missing = fields.find((field) => !columns.has(field));

	return missing === undefined
		? Effect.void
		: Effect.fail(
				new SchemaMismatchError({
					table: reflection.name,
					field: missing,
					message: `Unknown column "${missing}" on "${reflection.name}"`,
				}),
			);
};

export const toPredicate = (filter: Filter): Predicate =>
	filter._tag === "Equals"
		? { _tag: "Equals", field: filter.field, value: filter.value }
		: { _tag: "In", field: filter.field, values: filter.values };

/**
 * Conditions that a singular association node places on its parent rows:
 * its own filters plus those of singular associations below it.
 */
export const relatedPredicates = (
	catalog: Catalog,
	request: RefinementRequest,
): Effect.Effect<ReadonlyArray<Predicate>, QueryError> =>
	Effect.gen(function* () {
		const reflection = yield* reflectResource(catalog, request.resource);
		yield* checkColumns(reflection, { ...request, order: [] });

		const predicates: Array<Predicate> = request.filters.map(toPredicate);
		for (const [association, node] of Object.entries(request.associations)) {
			const edge = whitelistedEdge(catalog, request.resource, association);
			if (edge === undefined || edge.cardinality !== "one") continue;
			const nested = yield* relatedPredicates(catalog, node);
			if (nested.length > 0) {
				predicates.push({ _tag: "Related", association, predicates: nested });
			}
		}
		return predicates;
	});

// ============================================================================
// Refinement
// ============================================================================

/**
 * Refine `base` with `request`. Predicates already on `base` (such as an
 * association anchor) are kept; the request can only narrow the result.
 */
export const refine = (
	catalog: Catalog,
	base: Query.Query,
	request: RefinementRequest,
): Effect.Effect<Query.Query, QueryError> =>
	Effect.gen(function* () {
		const reflection = yield* reflectResource(catalog, request.resource);
		yield* checkColumns(reflection, request);

		let query = base;

		for (const filter of request.filters) {
			query = filter._tag === "Equals"
				? Query.where(filter.field, filter.value)(query)
				: Query.whereIn(filter.field, filter.values)(query);
		}

		for (const [association, node] of Object.entries(request.associations)) {
			const edge = whitelistedEdge(catalog, request.resource, association);
			if (edge === undefined) continue;

			if (edge.cardinality === "one") {
				const predicates = yield* relatedPredicates(catalog, node);
				if (predicates.length > 0) {
					query = Query.whereRelated(association, predicates)(query);
				}
			}

			const child = yield* resolveInclude(catalog, edge, node);
			query = Query.include(association, child)(query);
		}

		for (const { field, direction } of request.order) {
			query = Query.orderBy(field, direction)(query);
		}

		const { limit, offset } = request.pagination;
		return pipe(
			query,
			(q) => (offset === undefined ? q : Query.offset(offset)(q)),
			(q) => (limit === undefined ? q : Query.limit(limit)(q)),
		);
	});
