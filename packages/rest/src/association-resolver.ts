/**
 * Association Resolver.
 *
 * Builds child plans for declared associations and remote collections.
 * A child plan is always anchored to its parent through the association's
 * ownership key; client filters on that key are discarded before
 * refinement, never merged with the anchor.
 *
 * @module
 */

import {
	type AssociationEdge,
	NotFoundError,
	Query,
	type QueryError,
	type Row,
	type Scalar,
	type Store,
	type StoreError,
} from "@trellis/core";
import { Effect, pipe } from "effect";
import { type Catalog, whitelistedEdge } from "./catalog.js";
import type { InvalidDirectiveError } from "./errors/rest-errors.js";
import { classify, type QueryParams, type RefinementRequest } from "./query-params.js";
import { refine } from "./refiner.js";
import { isAllowed } from "./registry/whitelist-registry.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Server-side logic behind a remote collection.
 *
 * `resolve` receives the parent record and the request classified against
 * `target`. Returning a plan lets trellis refine and execute it; returning
 * rows hands back a computed collection as-is.
 */
export interface RemoteDefinition {
	readonly target: string;
	readonly resolve: (
		parent: Row,
		request: RefinementRequest,
	) => Effect.Effect<Query.Query | ReadonlyArray<Row>, StoreError, Store>;
}

export type RemoteResult = Query.Query | ReadonlyArray<Row>;

export const isQueryPlan = (result: RemoteResult): result is Query.Query =>
	!Array.isArray(result);

// ============================================================================
// Ownership
// ============================================================================

/**
 * Drop every filter on the column that anchors the child side of `edge`.
 */
export const withoutOwnershipKey = (
	request: RefinementRequest,
	edge: AssociationEdge,
): RefinementRequest => ({
	...request,
	filters: request.filters.filter((f) => f.field !== edge.targetKey),
});

const toScalar = (value: unknown): Scalar => {
	switch (typeof value) {
		case "string":
		case "number":
		case "boolean":
			return value;
		default:
			return null;
	}
};

// ============================================================================
// Resolution
// ============================================================================

/**
 * Plan for `parent`'s `association`, refined by `request`.
 *
 * Singular associations skip refinement: the plan selects the one related
 * row.
 */
export const resolve = (
	catalog: Catalog,
	parent: Row,
	resource: string,
	association: string,
	request: RefinementRequest,
): Effect.Effect<Query.Query, NotFoundError | QueryError> =>
	Effect.gen(function* () {
		const edge = whitelistedEdge(catalog, resource, association);
		if (edge === undefined) {
			return yield* new NotFoundError({
				table: resource,
				field: "association",
				value: association,
				message: `${resource} has no association named ${association}`,
			});
		}

		const anchored = pipe(
			Query.from(edge.target),
			Query.where(edge.targetKey, toScalar(parent[edge.sourceKey])),
		);

		if (edge.cardinality === "one") {
			return Query.limit(1)(anchored);
		}

		return yield* refine(catalog, anchored, withoutOwnershipKey(request, edge));
	});

/**
 * Eager-load plan for `edge`, used when refining a parent collection. The
 * store anchors it to the parent rows in one batch.
 *
 * A singular association carries no filtering, ordering or pagination of
 * its own; only its nested associations are kept.
 */
export const resolveInclude = (
	catalog: Catalog,
	edge: AssociationEdge,
	request: RefinementRequest,
): Effect.Effect<Query.Query, QueryError> => {
	const scoped =
		edge.cardinality === "one"
			? { ...request, filters: [], order: [], pagination: {} }
			: withoutOwnershipKey(request, edge);
	return refine(catalog, Query.from(edge.target), scoped);
};

/**
 * Resolve a remote collection of `parent`. Parameters go through the same
 * classification and whitelist as any other request, against the remote's
 * target resource type. Plans returned by the remote logic are refined.
 */
export const resolveRemote = (
	catalog: Catalog,
	remotes: Readonly<Record<string, RemoteDefinition>>,
	parent: Row,
	resource: string,
	remote: string,
	params: QueryParams,
): Effect.Effect<
	RemoteResult,
	InvalidDirectiveError | StoreError,
	Store
> =>
	Effect.gen(function* () {
		if (
			isAllowed(catalog.registry, resource, remote) !== "remote" ||
			!Object.hasOwn(remotes, remote)
		) {
			return yield* new NotFoundError({
				table: resource,
				field: "remote",
				value: remote,
				message: `${resource} has no remote named ${remote}`,
			});
		}

		const definition = remotes[remote];
		const request = yield* classify(catalog, definition.target, params);
		const result = yield* definition.resolve(parent, request);

		return isQueryPlan(result) ? yield* refine(catalog, result, request) : result;
	});
