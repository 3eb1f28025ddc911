import { Option, Schema } from "effect";
import { describe, expect, it } from "vitest";
import { columnsOf, reflectTable, singularize } from "../src/index.js";
import { tables } from "./blog-fixture.js";

describe("singularize", () => {
	it("should singularize table names", () => {
		expect(singularize("posts")).toBe("post");
		expect(singularize("categories")).toBe("category");
		expect(singularize("address")).toBe("address");
		expect(singularize("staff")).toBe("staff");
	});
});

describe("reflectTable", () => {
	it("should read columns from the schema", () => {
		expect(columnsOf(tables.posts)).toEqual([
			"id",
			"title",
			"status",
			"views",
			"createdAt",
			"authorId",
		]);
	});

	it("should tell numeric primary keys from generated ones", () => {
		const config = {
			counters: { schema: Schema.Struct({ id: Schema.Int }) },
			codes: { schema: Schema.Struct({ code: Schema.Number }), primaryKey: "code" },
		} as const;

		expect(Option.getOrThrow(reflectTable(tables, "posts")).keyKind).toBe("string");
		expect(Option.getOrThrow(reflectTable(config, "counters")).keyKind).toBe("number");
		expect(Option.getOrThrow(reflectTable(config, "codes")).keyKind).toBe("number");
	});

	it("should return None for undeclared tables", () => {
		expect(Option.isNone(reflectTable(tables, "tags"))).toBe(true);
		expect(Option.isNone(reflectTable(tables, "toString"))).toBe(true);
	});

	it("should resolve a ref association to the target's primary key", () => {
		const posts = Option.getOrThrow(reflectTable(tables, "posts"));

		expect(posts.primaryKey).toBe("id");
		expect(posts.associations.author).toEqual({
			name: "author",
			source: "posts",
			target: "users",
			cardinality: "one",
			foreignKey: "authorId",
			foreignKeyOn: "source",
			sourceKey: "authorId",
			targetKey: "id",
		});
	});

	it("should default an inverse foreign key to the singular table name", () => {
		const posts = Option.getOrThrow(reflectTable(tables, "posts"));

		expect(posts.associations.comments).toEqual({
			name: "comments",
			source: "posts",
			target: "comments",
			cardinality: "many",
			foreignKey: "postId",
			foreignKeyOn: "target",
			sourceKey: "id",
			targetKey: "postId",
		});
	});

	it("should use an explicit inverse foreign key", () => {
		const users = Option.getOrThrow(reflectTable(tables, "users"));

		expect(users.associations.posts.targetKey).toBe("authorId");
	});

	it("should take the inverse foreign key from the target's ref", () => {
		const config = {
			articles: {
				schema: Schema.Struct({ slug: Schema.String }),
				primaryKey: "slug",
				associations: {
					notes: { type: "inverse", target: "notes", cardinality: "one" },
				},
			},
			notes: {
				schema: Schema.Struct({ id: Schema.String, articleSlug: Schema.String }),
				associations: {
					article: { type: "ref", target: "articles", foreignKey: "articleSlug" },
				},
			},
		} as const;

		const articles = Option.getOrThrow(reflectTable(config, "articles"));
		const notes = Option.getOrThrow(reflectTable(config, "notes"));

		expect(articles.associations.notes).toMatchObject({
			cardinality: "one",
			sourceKey: "slug",
			targetKey: "articleSlug",
		});
		expect(notes.associations.article).toMatchObject({
			sourceKey: "articleSlug",
			targetKey: "slug",
		});
	});
});
