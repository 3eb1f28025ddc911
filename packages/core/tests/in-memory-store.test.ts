/**
 * Tests for the in-memory Store: plan execution, batched eager loading and
 * row writes.
 */

import { Effect, pipe, Schema } from "effect";
import { describe, expect, it } from "vitest";
import {
	makeInMemoryStore,
	makeInMemoryStoreLayer,
	Query,
	type QueryLogEntry,
	Store,
	type StoreShape,
} from "../src/index.js";
import { ids, loaded, loadedOne, seed, tables } from "./blog-fixture.js";

// ============================================================================
// Helper Functions
// ============================================================================

const makeStore = (queryLog?: Array<QueryLogEntry>) =>
	makeInMemoryStore(tables, seed, { queryLog });

const run = <A, E>(
	program: (store: StoreShape) => Effect.Effect<A, E>,
	queryLog?: Array<QueryLogEntry>,
): Promise<A> =>
	Effect.runPromise(Effect.flatMap(makeStore(queryLog), program));

// ============================================================================
// Predicates, ordering and pagination
// ============================================================================

describe("InMemoryStore — execute", () => {
	it("should return every row ordered by primary key", async () => {
		const rows = await run((store) => store.execute(Query.from("posts")));

		expect(ids(rows)).toEqual(["p1", "p2", "p3", "p4"]);
	});

	it("should apply predicates conjunctively", async () => {
		const rows = await run((store) =>
			store.execute(
				pipe(
					Query.from("posts"),
					Query.where("status", "published"),
					Query.whereIn("authorId", ["u2", "u9"]),
				),
			),
		);

		expect(ids(rows)).toEqual(["p4"]);
	});

	it("should compare numbers and strings loosely", async () => {
		const rows = await run((store) =>
			store.execute(pipe(Query.from("posts"), Query.where("views", "10"))),
		);

		expect(ids(rows)).toEqual(["p1", "p3"]);
	});

	it("should match booleans by their string form", async () => {
		const rows = await run((store) =>
			store.execute(pipe(Query.from("comments"), Query.where("approved", "false"))),
		);

		expect(ids(rows)).toEqual(["c2"]);
	});

	it("should break ordering ties by primary key", async () => {
		const rows = await run((store) =>
			store.execute(pipe(Query.from("posts"), Query.orderBy("views", "desc"))),
		);

		expect(ids(rows)).toEqual(["p1", "p3", "p2", "p4"]);
	});

	it("should apply offset and limit after ordering", async () => {
		const rows = await run((store) =>
			store.execute(
				pipe(
					Query.from("posts"),
					Query.orderBy("createdAt", "desc"),
					Query.offset(1),
					Query.limit(2),
				),
			),
		);

		expect(ids(rows)).toEqual(["p3", "p2"]);
	});

	it("should filter through a singular association", async () => {
		const log: Array<QueryLogEntry> = [];
		const rows = await run(
			(store) =>
				store.execute(
					pipe(
						Query.from("posts"),
						Query.whereRelated("author", [{ _tag: "Equals", field: "name", value: "Alice" }]),
					),
				),
			log,
		);

		expect(ids(rows)).toEqual(["p1", "p3"]);
		expect(log).toEqual([
			{ table: "posts", operation: "read" },
			{ table: "users", operation: "read" },
		]);
	});

	it("should fail with SchemaMismatchError for unknown columns", async () => {
		const error = await run((store) =>
			store.execute(pipe(Query.from("posts"), Query.orderBy("rating"))).pipe(Effect.flip),
		);

		expect(error._tag).toBe("SchemaMismatchError");
		expect(error.message).toBe('Unknown column "rating" on "posts"');
	});

	it("should fail with TableNotFoundError for undeclared tables", async () => {
		const error = await run((store) => store.execute(Query.from("tags")).pipe(Effect.flip));

		expect(error._tag).toBe("TableNotFoundError");
	});
});

// ============================================================================
// Eager loading
// ============================================================================

describe("InMemoryStore — includes", () => {
	it("should load each parent's children with one read per include", async () => {
		const log: Array<QueryLogEntry> = [];
		const rows = await run(
			(store) =>
				store.execute(
					pipe(
						Query.from("posts"),
						Query.include("comments", Query.from("comments")),
						Query.include("author", Query.from("users")),
					),
				),
			log,
		);

		expect(rows.map((row) => ids(loaded(row, "comments")))).toEqual([
			["c1", "c2"],
			[],
			["c3"],
			["c4"],
		]);
		expect(rows.map((row) => loadedOne(row, "author")?.name)).toEqual([
			"Alice",
			"Bob",
			"Alice",
			"Bob",
		]);
		expect(log).toEqual([
			{ table: "posts", operation: "read" },
			{ table: "comments", operation: "read" },
			{ table: "users", operation: "read" },
		]);
	});

	it("should apply a child limit per parent", async () => {
		const rows = await run((store) =>
			store.execute(
				pipe(
					Query.from("posts"),
					Query.where("id", "p1"),
					Query.include("comments", pipe(Query.from("comments"), Query.orderBy("body"), Query.limit(1))),
				),
			),
		);

		expect(loaded(rows[0], "comments")).toEqual([
			{ id: "c2", postId: "p1", body: "Meh", approved: false },
		]);
	});

	it("should skip the child read when no parent matched", async () => {
		const log: Array<QueryLogEntry> = [];
		const rows = await run(
			(store) =>
				store.execute(
					pipe(
						Query.from("posts"),
						Query.where("status", "archived"),
						Query.include("comments", Query.from("comments")),
					),
				),
			log,
		);

		expect(rows).toEqual([]);
		expect(log).toEqual([{ table: "posts", operation: "read" }]);
	});

	it("should reject an include whose plan targets another table", async () => {
		const error = await run((store) =>
			store
				.execute(pipe(Query.from("posts"), Query.include("comments", Query.from("users"))))
				.pipe(Effect.flip),
		);

		expect(error._tag).toBe("SchemaMismatchError");
	});
});

// ============================================================================
// Lookups and writes
// ============================================================================

describe("InMemoryStore — rows", () => {
	it("should find a row by any column", async () => {
		const row = await run((store) => store.findBy("users", "email", "bob@example.com"));

		expect(row).toEqual({ id: "u2", name: "Bob", email: "bob@example.com" });
	});

	it("should fail with NotFoundError for a missing row", async () => {
		const error = await run((store) => store.findBy("posts", "id", "nope").pipe(Effect.flip));

		expect(error).toMatchObject({
			_tag: "NotFoundError",
			table: "posts",
			field: "id",
			value: "nope",
			message: "Couldn't find posts with id=nope",
		});
	});

	it("should generate a primary key on insert", async () => {
		const row = await run((store) =>
			store.insert("users", { name: "Carol", email: "carol@example.com" }),
		);

		expect(typeof row.id).toBe("string");
		expect(row.name).toBe("Carol");
	});

	it("should number rows when the primary key is numeric", async () => {
		const counters = {
			counters: { schema: Schema.Struct({ id: Schema.Number, label: Schema.String }) },
			empty: { schema: Schema.Struct({ id: Schema.Int, label: Schema.String }) },
		} as const;
		const program = Effect.gen(function* () {
			const store = yield* makeInMemoryStore(counters, { counters: [{ id: 4, label: "a" }] });
			const next = yield* store.insert("counters", { label: "b" });
			const chosen = yield* store.insert("counters", { id: 10, label: "c" });
			const after = yield* store.insert("counters", { label: "d" });
			const first = yield* store.insert("empty", { label: "e" });
			return [next.id, chosen.id, after.id, first.id];
		});

		await expect(Effect.runPromise(program)).resolves.toEqual([5, 10, 11, 1]);
	});

	it("should reject a duplicate primary key", async () => {
		const error = await run((store) =>
			store.insert("users", { id: "u1", name: "Again", email: "again@example.com" }).pipe(Effect.flip),
		);

		expect(error).toMatchObject({
			_tag: "ValidationError",
			issues: [{ field: "id", message: "has already been taken" }],
		});
	});

	it("should reject rows that fail the schema", async () => {
		const error = await run((store) => store.insert("users", { name: "NoEmail" }).pipe(Effect.flip));

		expect(error._tag).toBe("ValidationError");
		if (error._tag === "ValidationError") {
			expect(error.issues.map((issue) => issue.field)).toEqual(["email"]);
		}
	});

	it("should merge updates and keep the primary key", async () => {
		const rows = await run((store) =>
			Effect.gen(function* () {
				yield* store.update("posts", "id", "p2", { status: "published", id: "p9" });
				return yield* store.execute(pipe(Query.from("posts"), Query.where("status", "published")));
			}),
		);

		expect(ids(rows)).toEqual(["p1", "p2", "p3", "p4"]);
	});

	it("should remove rows", async () => {
		const error = await run((store) =>
			Effect.gen(function* () {
				yield* store.remove("comments", "id", "c1");
				return yield* store.findBy("comments", "id", "c1");
			}).pipe(Effect.flip),
		);

		expect(error._tag).toBe("NotFoundError");
	});

	it("should log writes", async () => {
		const log: Array<QueryLogEntry> = [];
		await run((store) => store.remove("comments", "id", "c4"), log);

		expect(log).toEqual([
			{ table: "comments", operation: "read" },
			{ table: "comments", operation: "write" },
		]);
	});
});

// ============================================================================
// Construction
// ============================================================================

describe("InMemoryStore — construction", () => {
	it("should reject seed data for undeclared tables", async () => {
		const error = await Effect.runPromise(
			makeInMemoryStore(tables, { tags: [{ id: "t1" }] }).pipe(Effect.flip),
		);

		expect(error._tag).toBe("TableNotFoundError");
	});

	it("should reject seed rows that fail the schema", async () => {
		const error = await Effect.runPromise(
			makeInMemoryStore(tables, { users: [{ id: "u1" }] }).pipe(Effect.flip),
		);

		expect(error._tag).toBe("ValidationError");
	});

	it("should provide the Store service through a layer", async () => {
		const row = await Effect.runPromise(
			Effect.gen(function* () {
				const store = yield* Store;
				return yield* store.findBy("posts", "id", "p3");
			}).pipe(Effect.provide(makeInMemoryStoreLayer(tables, seed))),
		);

		expect(row.title).toBe("Third");
	});
});
