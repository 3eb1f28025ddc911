import type { OrderClause } from "../../query/query.js";
import type { Row } from "../../types/table-types.js";

/**
 * Compare two non-null values of possibly different types.
 */
function compareValues(aValue: unknown, bValue: unknown): number {
	if (typeof aValue === "string" && typeof bValue === "string") {
		return aValue < bValue ? -1 : aValue > bValue ? 1 : 0;
	}
	if (typeof aValue === "number" && typeof bValue === "number") {
		return aValue - bValue;
	}
	if (typeof aValue === "boolean" && typeof bValue === "boolean") {
		// false < true in ascending order
		return (aValue ? 1 : 0) - (bValue ? 1 : 0);
	}
	if (aValue instanceof Date && bValue instanceof Date) {
		return aValue.getTime() - bValue.getTime();
	}
	const aString = String(aValue);
	const bString = String(bValue);
	return aString < bString ? -1 : aString > bString ? 1 : 0;
}

/**
 * Sort rows by the given clauses, then by primary key ascending so that the
 * result is deterministic for equal sort keys and when no clauses are given.
 *
 * Null and undefined values sort to the end regardless of direction.
 */
export function sortRows(
	rows: ReadonlyArray<Row>,
	order: ReadonlyArray<OrderClause>,
	primaryKey: string,
): ReadonlyArray<Row> {
	const clauses: ReadonlyArray<OrderClause> = [
		...order,
		{ field: primaryKey, direction: "asc" },
	];

	return [...rows].sort((a, b) => {
		for (const { field, direction } of clauses) {
			const aValue = a[field];
			const bValue = b[field];

			if (aValue === undefined || aValue === null) {
				if (bValue === undefined || bValue === null) {
					continue;
				}
				return 1;
			}
			if (bValue === undefined || bValue === null) {
				return -1;
			}

			const comparison = compareValues(aValue, bValue);
			if (comparison !== 0) {
				return direction === "desc" ? -comparison : comparison;
			}
		}
		return 0;
	});
}

/**
 * Apply offset, then limit.
 */
export function paginate(
	rows: ReadonlyArray<Row>,
	offset: number | undefined,
	limit: number | undefined,
): ReadonlyArray<Row> {
	const start = offset ?? 0;
	return limit === undefined
		? rows.slice(start)
		: rows.slice(start, start + limit);
}
