/**
 * Parameter Classifier.
 *
 * Turns a request's raw query parameters into a RefinementRequest for one
 * resource type. Reserved directives are parsed first; every other key is
 * resolved against the resource's whitelist. Keys that do not resolve are
 * dropped without error so that clients sending extra parameters keep
 * working.
 *
 * Supported syntax:
 *
 * - Equality: `?status=published` → `Equals(status, "published")`
 * - Set membership: `?status=draft&status=published` → `In(status, [...])`
 * - Ordering: `?order=name,-createdAt` or `?order=name asc,createdAt:desc`
 * - Pagination: `?limit=10&offset=20` or `?page=3&per_page=10`
 * - Association paths: `?comments.approved=true&comments.order=-createdAt`
 * - Eager loads without filters: `?include=comments,author.company`
 *
 * @module
 */

import type { OrderClause, SortDirection } from "@trellis/core";
import { Effect } from "effect";
import type { Catalog } from "./catalog.js";
import { whitelistedEdge } from "./catalog.js";
import { InvalidDirectiveError } from "./errors/rest-errors.js";
import { isAllowed } from "./registry/whitelist-registry.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Input query parameters from URL.
 * Values can be strings or arrays of strings for repeated parameters.
 */
export type QueryParams = Readonly<
	Record<string, string | ReadonlyArray<string> | undefined>
>;

export type Filter =
	| { readonly _tag: "Equals"; readonly field: string; readonly value: string }
	| {
			readonly _tag: "In";
			readonly field: string;
			readonly values: ReadonlyArray<string>;
	  };

/**
 * Normalized pagination. `page`/`per_page` have already been converted.
 */
export interface Pagination {
	readonly limit?: number;
	readonly offset?: number;
}

export interface RefinementRequest {
	readonly resource: string;
	readonly filters: ReadonlyArray<Filter>;
	readonly order: ReadonlyArray<OrderClause>;
	readonly pagination: Pagination;
	/** Association-traversal tree, keyed by association name */
	readonly associations: Readonly<Record<string, RefinementRequest>>;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Reserved parameter names that are not field filters.
 */
export const RESERVED_PARAMS: ReadonlySet<string> = new Set([
	"order",
	"limit",
	"offset",
	"page",
	"per_page",
	"include",
]);

const ORDER_ITEM =
	/^([+-])?([A-Za-z_][A-Za-z0-9_]*)(?:(?:\s+|:)([A-Za-z]+))?$/;

const COUNT = /^\d+$/;

// ============================================================================
// Main Classifier
// ============================================================================

/**
 * Classify raw query parameters for `resource`.
 *
 * @example
 * ```typescript
 * classify(catalog, "posts", {
 *   "author.name": "Alice",
 *   order: "-createdAt",
 *   page: "1",
 *   per_page: "5",
 * })
 * // → {
 * //     resource: "posts",
 * //     filters: [],
 * //     order: [{ field: "createdAt", direction: "desc" }],
 * //     pagination: { limit: 5, offset: 0 },
 * //     associations: {
 * //       author: { resource: "users", filters: [Equals(name, "Alice")], ... }
 * //     }
 * //   }
 * ```
 */
export const classify = (
	catalog: Catalog,
	resource: string,
	query: QueryParams,
): Effect.Effect<RefinementRequest, InvalidDirectiveError> =>
	classifyAt(catalog, resource, query, 0, "");

const classifyAt = (
	catalog: Catalog,
	resource: string,
	query: QueryParams,
	depth: number,
	prefix: string,
): Effect.Effect<RefinementRequest, InvalidDirectiveError> =>
	Effect.gen(function* () {
		const filters: Array<Filter> = [];
		const nested = new Map<string, Record<string, string | Array<string>>>();
		let order: ReadonlyArray<OrderClause> = [];
		let limit: number | undefined;
		let offset: number | undefined;
		let page: number | undefined;
		let perPage: number | undefined;

		const nestedParams = (association: string) => {
			let params = nested.get(association);
			if (params === undefined) {
				params = {};
				nested.set(association, params);
			}
			return params;
		};

		const canTraverse = (association: string) =>
			depth < catalog.config.maxDepth &&
			whitelistedEdge(catalog, resource, association) !== undefined;

		for (const [key, value] of Object.entries(query)) {
			const strValue = normalizeValue(value);
			if (strValue === undefined) continue;

			// Handle reserved parameters
			switch (key) {
				case "order":
					order = yield* parseOrderParam(catalog, resource, `${prefix}${key}`, strValue);
					continue;
				case "limit":
					limit = yield* parseCount(`${prefix}${key}`, strValue, 0);
					continue;
				case "offset":
					offset = yield* parseCount(`${prefix}${key}`, strValue, 0);
					continue;
				case "page":
					page = yield* parseCount(`${prefix}${key}`, strValue, 1);
					continue;
				case "per_page":
					perPage = yield* parseCount(`${prefix}${key}`, strValue, 1);
					continue;
				case "include":
					for (const path of parseListParam(strValue)) {
						const [association, ...rest] = path.split(".");
						if (!canTraverse(association)) continue;
						const params = nestedParams(association);
						params.include = mergeIncludes(params.include, rest.join("."));
					}
					continue;
			}

			// Association path: first segment names the association
			const dot = key.indexOf(".");
			if (dot !== -1) {
				const association = key.slice(0, dot);
				const rest = key.slice(dot + 1);
				if (rest.length > 0 && canTraverse(association)) {
					const params = nestedParams(association);
					params[rest] =
						rest === "include" ? mergeIncludes(params.include, strValue) : toList(value);
				}
				continue;
			}

			if (isAllowed(catalog.registry, resource, key) === "field") {
				const filter = toFilter(key, value);
				if (filter !== undefined) filters.push(filter);
			}
		}

		const associations: Record<string, RefinementRequest> = {};
		for (const [association, params] of nested) {
			const edge = whitelistedEdge(catalog, resource, association);
			if (edge === undefined) continue;
			associations[association] = yield* classifyAt(
				catalog,
				edge.target,
				params,
				depth + 1,
				`${prefix}${association}.`,
			);
		}

		return {
			resource,
			filters,
			order,
			pagination: normalizePagination(catalog, { limit, offset, page, perPage }),
			associations,
		};
	});

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Normalize a query parameter value to a string or undefined.
 * Arrays are joined with commas (for list directives like `order`).
 */
const normalizeValue = (
	value: string | ReadonlyArray<string> | undefined,
): string | undefined => {
	if (value === undefined) return undefined;
	if (typeof value !== "string") {
		return value.length > 0 ? value.join(",") : undefined;
	}
	return value || undefined;
};

const toList = (
	value: string | ReadonlyArray<string> | undefined,
): string | Array<string> =>
	value === undefined ? "" : typeof value === "string" ? value : [...value];

/**
 * A repeated parameter becomes a set-membership filter. Empty values are
 * ignored; nothing left means no filter.
 */
const toFilter = (
	field: string,
	value: string | ReadonlyArray<string> | undefined,
): Filter | undefined => {
	const values = [
		...new Set(value === undefined ? [] : typeof value === "string" ? [value] : value),
	].filter((v) => v.length > 0);
	if (values.length === 0) return undefined;
	if (values.length === 1) return { _tag: "Equals", field, value: values[0] };
	return { _tag: "In", field, values };
};

/**
 * Append include paths to whatever an association already carries, so
 * `include=comments.post` and `comments.include=author` both survive.
 */
const mergeIncludes = (
	current: string | ReadonlyArray<string> | undefined,
	addition: string,
): string =>
	[...parseListParam(normalizeValue(current) ?? ""), ...parseListParam(addition)].join(",");

/**
 * Parse a comma-separated list parameter.
 */
const parseListParam = (value: string): ReadonlyArray<string> =>
	value
		.split(",")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);

const invalid = (key: string, value: string, reason: string) =>
	new InvalidDirectiveError({
		key,
		value,
		message: `Invalid ${key} "${value}": ${reason}`,
	});

/**
 * Parse a non-negative integer directive no smaller than `minimum`.
 */
const parseCount = (
	key: string,
	value: string,
	minimum: number,
): Effect.Effect<number, InvalidDirectiveError> => {
	const trimmed = value.trim();
	if (!COUNT.test(trimmed)) {
		return Effect.fail(invalid(key, value, "expected an integer"));
	}
	const parsed = Number(trimmed);
	if (!Number.isSafeInteger(parsed)) {
		return Effect.fail(invalid(key, value, "is too large"));
	}
	if (parsed < minimum) {
		return Effect.fail(invalid(key, value, `must be at least ${minimum}`));
	}
	return Effect.succeed(parsed);
};

/**
 * Parse the order parameter.
 *
 * Each comma-separated item is a field name, optionally prefixed with `+` or
 * `-`, or suffixed with `asc`/`desc` after a space or colon. Direction
 * defaults to ascending. Malformed items fail the request; well-formed items
 * naming fields outside the whitelist are dropped.
 */
const parseOrderParam = (
	catalog: Catalog,
	resource: string,
	key: string,
	value: string,
): Effect.Effect<ReadonlyArray<OrderClause>, InvalidDirectiveError> => {
	const clauses: Array<OrderClause> = [];
	const seen = new Set<string>();

	for (const part of value.split(",")) {
		const trimmed = part.trim();
		const match = ORDER_ITEM.exec(trimmed);
		if (match === null) {
			return Effect.fail(
				invalid(key, value, trimmed ? `cannot parse "${trimmed}"` : "empty field"),
			);
		}

		const [, sign, field, suffix] = match;
		const token = suffix?.toLowerCase();
		if (token !== undefined && token !== "asc" && token !== "desc") {
			return Effect.fail(invalid(key, value, `unknown direction "${suffix}"`));
		}
		if (sign !== undefined && token !== undefined) {
			return Effect.fail(
				invalid(key, value, `"${trimmed}" gives a direction twice`),
			);
		}

		if (seen.has(field) || isAllowed(catalog.registry, resource, field) !== "field") {
			continue;
		}
		seen.add(field);

		const direction: SortDirection =
			sign === "-" || token === "desc" ? "desc" : "asc";
		clauses.push({ field, direction });
	}

	return Effect.succeed(clauses);
};

/**
 * Convert page/per_page into limit/offset. When either is present the pair
 * wins over raw limit/offset. Limits are capped at `maxLimit`.
 */
const normalizePagination = (
	catalog: Catalog,
	raw: {
		readonly limit: number | undefined;
		readonly offset: number | undefined;
		readonly page: number | undefined;
		readonly perPage: number | undefined;
	},
): Pagination => {
	const { defaultPerPage, maxLimit } = catalog.config;

	if (raw.page !== undefined || raw.perPage !== undefined) {
		const perPage = Math.min(raw.perPage ?? defaultPerPage, maxLimit);
		return { limit: perPage, offset: ((raw.page ?? 1) - 1) * perPage };
	}

	const pagination: { limit?: number; offset?: number } = {};
	if (raw.limit !== undefined) {
		pagination.limit = Math.min(raw.limit, maxLimit);
	}
	if (raw.offset !== undefined) {
		pagination.offset = raw.offset;
	}
	return pagination;
};
