import { Effect, pipe } from "effect";
import type { QueryError } from "../../errors/query-errors.js";
import { SchemaMismatchError } from "../../errors/query-errors.js";
import * as Query from "../../query/query.js";
import { findEdge } from "../../reflection/edges.js";
import type { TableReflection } from "../../reflection/reflect.js";
import type { Row } from "../../types/table-types.js";
import { keyOf } from "../query/filter.js";
import { paginate } from "../query/sort.js";

export type ExecuteQuery = (
	query: Query.Query,
) => Effect.Effect<ReadonlyArray<Row>, QueryError>;

/**
 * Distinct, non-null keys of `field` across rows, in first-seen order.
 */
function distinctKeys(
	rows: ReadonlyArray<Row>,
	field: string,
): ReadonlyArray<string> {
	const keys = new Set<string>();
	for (const row of rows) {
		const key = keyOf(row[field]);
		if (key !== undefined) {
			keys.add(key);
		}
	}
	return [...keys];
}

function groupByKey(
	rows: ReadonlyArray<Row>,
	field: string,
): ReadonlyMap<string, ReadonlyArray<Row>> {
	const groups = new Map<string, Array<Row>>();
	for (const row of rows) {
		const key = keyOf(row[field]);
		if (key === undefined) continue;
		const group = groups.get(key);
		if (group) {
			group.push(row);
		} else {
			groups.set(key, [row]);
		}
	}
	return groups;
}

/**
 * Attach eager-loaded associations to a page of rows.
 *
 * Each include costs one query against its target table no matter how many
 * parent rows there are: the child plan is anchored with an IN predicate over
 * the parents' keys, executed once (nested includes recurse the same way)
 * and the result is grouped back onto the parents.
 *
 * The child plan's order is kept inside each group. Its limit and offset are
 * applied per parent after grouping.
 */
export const attachIncludes = (
	rows: ReadonlyArray<Row>,
	reflection: TableReflection,
	includes: ReadonlyArray<Query.Include>,
	execute: ExecuteQuery,
): Effect.Effect<ReadonlyArray<Row>, QueryError> =>
	Effect.gen(function* () {
		if (includes.length === 0 || rows.length === 0) {
			return rows;
		}

		let result = rows;

		for (const { association, query } of includes) {
			const edge = findEdge(reflection, association);
			if (edge === undefined) {
				return yield* new SchemaMismatchError({
					table: reflection.name,
					field: association,
					message: `Association "${association}" is not declared on "${reflection.name}"`,
				});
			}

			const parentKeys = distinctKeys(result, edge.sourceKey);
			const children =
				parentKeys.length === 0
					? []
					: yield* execute(
							pipe(
								Query.unpaginated(query),
								Query.whereIn(edge.targetKey, parentKeys),
							),
						);
			const groups = groupByKey(children, edge.targetKey);

			result = result.map((row) => {
				const key = keyOf(row[edge.sourceKey]);
				const group = key === undefined ? [] : (groups.get(key) ?? []);
				const value =
					edge.cardinality === "many"
						? paginate(group, query.offset, query.limit)
						: (group[0] ?? null);
				return { ...row, [association]: value };
			});
		}

		return result;
	});
