/**
 * Property-based tests for result ordering.
 *
 * Whatever order rows are stored in, a plan's result order depends only on
 * its clauses and the primary key.
 */
import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { sortRows } from "../../src/operations/query/sort.js";

const rowsArbitrary = fc.uniqueArray(
	fc.record({
		id: fc.string({ minLength: 1, maxLength: 6 }),
		rank: fc.option(fc.integer({ min: 0, max: 3 }), { nil: null }),
	}),
	{ selector: (row) => row.id, maxLength: 30 },
);

describe("sortRows properties", () => {
	it("should not depend on the input order", () => {
		fc.assert(
			fc.property(
				rowsArbitrary,
				fc.constantFrom("asc" as const, "desc" as const),
				(rows, direction) => {
					const order = [{ field: "rank", direction }];
					const forward = sortRows(rows, order, "id");
					const backward = sortRows([...rows].reverse(), order, "id");
					expect(backward).toEqual(forward);
				},
			),
		);
	});

	it("should keep null ranks after every non-null rank", () => {
		fc.assert(
			fc.property(rowsArbitrary, (rows) => {
				const sorted = sortRows(rows, [{ field: "rank", direction: "desc" }], "id");
				const firstNull = sorted.findIndex((row) => row.rank === null);
				if (firstNull !== -1) {
					expect(sorted.slice(firstNull).every((row) => row.rank === null)).toBe(true);
				}
			}),
		);
	});
});
