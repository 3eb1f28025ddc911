/**
 * Tests for association and remote resolution, including the ownership
 * anchor that client filters cannot override.
 */

import { Query, Store } from "@trellis/core";
import { Effect, pipe } from "effect";
import { describe, expect, it } from "vitest";
import {
	classify,
	isQueryPlan,
	type QueryParams,
	register,
	type RemoteDefinition,
	resolve,
	resolveInclude,
	resolveRemote,
	whitelistedEdge,
} from "../src/index.js";
import {
	makeBlogCatalog,
	makeBlogStore,
	postRemotes,
	posts,
} from "./blog-fixture.js";

const catalog = makeBlogCatalog();

const resolvePlan = (association: string, target: string, query: QueryParams) =>
	Effect.runPromise(
		Effect.flatMap(classify(catalog, target, query), (request) =>
			resolve(catalog, posts.p1, "posts", association, request),
		),
	);

const commentIds = async (query: QueryParams) => {
	const store = await makeBlogStore();
	const plan = await resolvePlan("comments", "comments", query);
	const rows = await Effect.runPromise(store.execute(plan));
	return rows.map((row) => row.id);
};

describe("resolve", () => {
	it("should anchor a collection to its parent before refining", async () => {
		const plan = await resolvePlan("comments", "comments", { approved: "true" });

		expect(plan).toEqual(
			pipe(
				Query.from("comments"),
				Query.where("postId", "p1"),
				Query.where("approved", "true"),
			),
		);
		expect(await commentIds({ approved: "true" })).toEqual(["c1"]);
	});

	it("should ignore client filters on the ownership key", async () => {
		const plan = await resolvePlan("comments", "comments", { postId: "p3" });

		expect(Query.predicatesOn(plan, "postId")).toEqual([
			{ _tag: "Equals", field: "postId", value: "p1" },
		]);
		expect(await commentIds({ postId: "p3" })).toEqual(await commentIds({}));
	});

	it("should select the one related row of a singular association", async () => {
		const plan = await resolvePlan("author", "users", { name: "Bob", order: "-name" });

		expect(plan).toEqual(pipe(Query.from("users"), Query.where("id", "u1"), Query.limit(1)));
	});

	it("should fail with NotFoundError for associations outside the whitelist", async () => {
		const error = await Effect.runPromise(
			Effect.flatMap(classify(catalog, "posts", {}), (request) =>
				resolve(catalog, posts.p1, "posts", "tags", request),
			).pipe(Effect.flip),
		);

		expect(error).toMatchObject({
			_tag: "NotFoundError",
			message: "posts has no association named tags",
		});
	});
});

describe("resolveInclude", () => {
	it("should drop ownership-key filters from a collection include", async () => {
		const edge = whitelistedEdge(catalog, "posts", "comments");
		expect(edge).toBeDefined();
		if (edge === undefined) return;

		const plan = await Effect.runPromise(
			Effect.flatMap(classify(catalog, "comments", { postId: "p3", body: "Ok" }), (request) =>
				resolveInclude(catalog, edge, request),
			),
		);

		expect(plan).toEqual(pipe(Query.from("comments"), Query.where("body", "Ok")));
	});
});

describe("resolveRemote", () => {
	const runRemote = (
		remote: string,
		query: QueryParams,
		remotes: Readonly<Record<string, RemoteDefinition>> = postRemotes,
		remoteCatalog = catalog,
	) =>
		Effect.runPromise(
			Effect.gen(function* () {
				const store = yield* Effect.promise(() => makeBlogStore());
				return yield* resolveRemote(remoteCatalog, remotes, posts.p1, "posts", remote, query).pipe(
					Effect.provideService(Store, store),
					Effect.either,
				);
			}),
		);

	it("should refine a plan returned by the remote", async () => {
		const result = await runRemote("sameAuthor", { order: "-createdAt", secret: "x" });

		expect(result._tag).toBe("Right");
		if (result._tag === "Right") {
			expect(isQueryPlan(result.right)).toBe(true);
			expect(result.right).toEqual(
				pipe(
					Query.from("posts"),
					Query.where("authorId", "u1"),
					Query.orderBy("createdAt", "desc"),
				),
			);
		}
	});

	it("should return computed rows as they are", async () => {
		const remoteCatalog = makeBlogCatalog();
		register(remoteCatalog.registry, "posts", { remotes: ["pinned"] });
		const remotes = {
			pinned: { target: "posts", resolve: () => Effect.succeed([posts.p2]) },
		};

		const result = await runRemote("pinned", {}, remotes, remoteCatalog);

		expect(result._tag === "Right" ? result.right : undefined).toEqual([posts.p2]);
	});

	it("should fail with NotFoundError for remotes outside the whitelist", async () => {
		const hidden = {
			hidden: { target: "posts", resolve: () => Effect.succeed([posts.p2]) },
		};

		for (const [remote, remotes] of [
			["nope", postRemotes],
			["hidden", hidden],
		] as const) {
			const result = await runRemote(remote, {}, remotes);
			expect(result._tag === "Left" ? result.left : undefined).toMatchObject({
				_tag: "NotFoundError",
				message: `posts has no remote named ${remote}`,
			});
		}
	});
});
