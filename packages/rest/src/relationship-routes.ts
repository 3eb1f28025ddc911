/**
 * Handlers for association and remote sub-routes.
 *
 * For a whitelisted association (e.g., posts.comments), generates:
 *   GET /posts/:id/comments — the parent's comments, refined by the query
 *
 * For a singular association (e.g., posts.author) the body holds one record
 * or null. For a remote (e.g., posts.related) the remote's logic supplies
 * the collection.
 *
 * @module
 */

import { Store } from "@trellis/core";
import { Effect } from "effect";
import {
	isQueryPlan,
	resolve,
	resolveRemote,
} from "./association-resolver.js";
import { whitelistedEdge } from "./catalog.js";
import type {
	ActionProgram,
	ResourceContext,
	RestRequest,
} from "./handlers.js";
import { classify } from "./query-params.js";
import {
	declaredAssociations,
	declaredRemotes,
} from "./registry/whitelist-registry.js";
import { serializeCollection, serializeRecord } from "./serializer.js";

const parentKey = (req: RestRequest): string => req.params.id ?? "";

/**
 * One program per whitelisted association that resolves to a declared
 * association of a known table.
 */
export const createAssociatedHandlers = (
	context: ResourceContext,
): ReadonlyArray<readonly [string, ActionProgram]> => {
	const { catalog, definition } = context;
	const handlers: Array<readonly [string, ActionProgram]> = [];

	for (const association of declaredAssociations(catalog.registry, definition.name)) {
		const edge = whitelistedEdge(catalog, definition.name, association);
		if (edge === undefined) continue;

		const program: ActionProgram = (req) =>
			Effect.gen(function* () {
				const store = yield* Store;
				const parent = yield* store.findBy(
					definition.name,
					context.primaryKey,
					parentKey(req),
				);
				const request = yield* classify(catalog, edge.target, req.query);
				const plan = yield* resolve(catalog, parent, definition.name, association, request);
				const rows = yield* store.execute(plan);

				if (edge.cardinality === "one") {
					const [row] = rows;
					return {
						status: 200,
						body: {
							[association]:
								row === undefined ? null : serializeRecord(catalog, edge.target, row),
						},
					};
				}
				return {
					status: 200,
					body: { [association]: serializeCollection(catalog, edge.target, rows) },
				};
			});

		handlers.push([association, program]);
	}

	return handlers;
};

/**
 * One program per whitelisted remote that has a definition.
 */
export const createRemotedHandlers = (
	context: ResourceContext,
): ReadonlyArray<readonly [string, ActionProgram]> => {
	const { catalog, definition } = context;
	const remotes = definition.remotes ?? {};
	const handlers: Array<readonly [string, ActionProgram]> = [];

	for (const remote of declaredRemotes(catalog.registry, definition.name)) {
		if (!Object.hasOwn(remotes, remote)) continue;
		const target = remotes[remote].target;

		const program: ActionProgram = (req) =>
			Effect.gen(function* () {
				const store = yield* Store;
				const parent = yield* store.findBy(
					definition.name,
					context.primaryKey,
					parentKey(req),
				);
				const result = yield* resolveRemote(
					catalog,
					remotes,
					parent,
					definition.name,
					remote,
					req.query,
				);
				const rows = isQueryPlan(result) ? yield* store.execute(result) : result;
				return {
					status: 200,
					body: { [remote]: serializeCollection(catalog, target, rows) },
				};
			});

		handlers.push([remote, program]);
	}

	return handlers;
};
