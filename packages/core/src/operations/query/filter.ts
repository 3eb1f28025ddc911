import type { Predicate } from "../../query/query.js";
import type { Row, Scalar } from "../../types/table-types.js";

/**
 * Comparable key for a stored value, the way a SQL driver casts a bound
 * parameter against a column: `5` and `"5"` share the key `"5"`.
 *
 * Returns undefined for null, undefined and non-scalar values; those never
 * match a non-null parameter.
 */
export function keyOf(value: unknown): string | undefined {
	switch (typeof value) {
		case "string":
			return value;
		case "number":
		case "bigint":
		case "boolean":
			return String(value);
		default:
			return value instanceof Date ? value.toISOString() : undefined;
	}
}

/**
 * Whether a stored value equals a bound parameter. `null` only matches a
 * missing or null value.
 */
export function valuesMatch(stored: unknown, parameter: Scalar): boolean {
	if (parameter === null) {
		return stored === null || stored === undefined;
	}
	const key = keyOf(stored);
	return key !== undefined && key === keyOf(parameter);
}

/**
 * Evaluate an `Equals` or `In` predicate against a row. `Related` predicates
 * need the target table and are resolved by the store before filtering.
 */
export function matchesPredicate(
	row: Row,
	predicate: Exclude<Predicate, { readonly _tag: "Related" }>,
): boolean {
	const stored = row[predicate.field];
	if (predicate._tag === "Equals") {
		return valuesMatch(stored, predicate.value);
	}
	return predicate.values.some((value) => valuesMatch(stored, value));
}

/**
 * Keep only the rows whose `field` key is in `keys`.
 */
export function filterByKeys(
	rows: ReadonlyArray<Row>,
	field: string,
	keys: ReadonlySet<string>,
): ReadonlyArray<Row> {
	return rows.filter((row) => {
		const key = keyOf(row[field]);
		return key !== undefined && keys.has(key);
	});
}
