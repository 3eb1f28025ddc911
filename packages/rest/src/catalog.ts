/**
 * The read-only view of a trellis deployment that request handling needs:
 * the store's table declarations, the whitelist and the refinement limits.
 *
 * @module
 */

import {
	type AssociationEdge,
	type DatabaseConfig,
	findEdge,
	reflectTable,
	type TableReflection,
	TableNotFoundError,
} from "@trellis/core";
import { Effect, Option } from "effect";
import {
	defaultRefinementConfig,
	type RefinementConfig,
} from "./config/refinement-config.js";
import {
	createWhitelistRegistry,
	isAllowed,
	type WhitelistRegistry,
} from "./registry/whitelist-registry.js";

export interface Catalog {
	readonly database: DatabaseConfig;
	readonly registry: WhitelistRegistry;
	readonly config: RefinementConfig;

	/** Serialized attribute sets, per resource type. Columns when absent. */
	readonly attributes: ReadonlyMap<string, ReadonlyArray<string>>;
}

export const makeCatalog = (
	database: DatabaseConfig,
	options: {
		readonly registry?: WhitelistRegistry;
		readonly config?: RefinementConfig;
		readonly attributes?: ReadonlyMap<string, ReadonlyArray<string>>;
	} = {},
): Catalog => ({
	database,
	registry: options.registry ?? createWhitelistRegistry(),
	config: options.config ?? defaultRefinementConfig,
	attributes: options.attributes ?? new Map(),
});

export const reflectResource = (
	catalog: Catalog,
	resource: string,
): Effect.Effect<TableReflection, TableNotFoundError> =>
	Option.match(reflectTable(catalog.database, resource), {
		onNone: () =>
			Effect.fail(
				new TableNotFoundError({
					table: resource,
					message: `Resource "${resource}" has no table`,
				}),
			),
		onSome: (reflection) => Effect.succeed(reflection),
	});

/**
 * An association edge that is both whitelisted and declared on the table.
 */
export const whitelistedEdge = (
	catalog: Catalog,
	resource: string,
	association: string,
): AssociationEdge | undefined => {
	if (isAllowed(catalog.registry, resource, association) !== "association") {
		return undefined;
	}
	return Option.match(reflectTable(catalog.database, resource), {
		onNone: () => undefined,
		onSome: (reflection) => {
			const edge = findEdge(reflection, association);
			return edge !== undefined && Object.hasOwn(catalog.database, edge.target)
				? edge
				: undefined;
		},
	});
};
