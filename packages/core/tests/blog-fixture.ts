import { Schema } from "effect";
import type { DatabaseData, Row } from "../src/index.js";

// ============================================================================
// Test Schemas
// ============================================================================

export const UserSchema = Schema.Struct({
	id: Schema.String,
	name: Schema.String,
	email: Schema.String,
});

export const PostSchema = Schema.Struct({
	id: Schema.String,
	title: Schema.String,
	status: Schema.String,
	views: Schema.Number,
	createdAt: Schema.String,
	authorId: Schema.String,
});

export const CommentSchema = Schema.Struct({
	id: Schema.String,
	postId: Schema.String,
	body: Schema.String,
	approved: Schema.Boolean,
});

// ============================================================================
// Test Config
// ============================================================================

export const tables = {
	users: {
		schema: UserSchema,
		associations: {
			posts: { type: "inverse", target: "posts", foreignKey: "authorId" },
		},
	},
	posts: {
		schema: PostSchema,
		associations: {
			author: { type: "ref", target: "users" },
			comments: { type: "inverse", target: "comments" },
		},
	},
	comments: {
		schema: CommentSchema,
		associations: {
			post: { type: "ref", target: "posts" },
		},
	},
} as const;

// ============================================================================
// Initial Test Data
// ============================================================================

export const seed: DatabaseData = {
	users: [
		{ id: "u1", name: "Alice", email: "alice@example.com" },
		{ id: "u2", name: "Bob", email: "bob@example.com" },
	],
	posts: [
		{ id: "p1", title: "First", status: "published", views: 10, createdAt: "2024-01-01", authorId: "u1" },
		{ id: "p2", title: "Second", status: "draft", views: 5, createdAt: "2024-02-01", authorId: "u2" },
		{ id: "p3", title: "Third", status: "published", views: 10, createdAt: "2024-03-01", authorId: "u1" },
		{ id: "p4", title: "Fourth", status: "published", views: 0, createdAt: "2024-04-01", authorId: "u2" },
	],
	comments: [
		{ id: "c1", postId: "p1", body: "Nice", approved: true },
		{ id: "c2", postId: "p1", body: "Meh", approved: false },
		{ id: "c3", postId: "p3", body: "Great", approved: true },
		{ id: "c4", postId: "p4", body: "Ok", approved: true },
	],
};

export const ids = (rows: ReadonlyArray<{ readonly [key: string]: unknown }>) =>
	rows.map((row) => row.id);

const isRow = (value: unknown): value is Row =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Eager-loaded collection attached to a row, or [] when absent.
 */
export const loaded = (row: Row | undefined, association: string): ReadonlyArray<Row> => {
	const value: unknown = row?.[association];
	if (!Array.isArray(value)) return [];
	const items: ReadonlyArray<unknown> = value;
	return items.filter(isRow);
};

/**
 * Eager-loaded record attached to a row, or null.
 */
export const loadedOne = (row: Row | undefined, association: string): Row | null => {
	const value: unknown = row?.[association];
	return isRow(value) ? value : null;
};
