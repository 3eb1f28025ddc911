/**
 * Table declarations for the store.
 *
 * A table is an Effect Schema struct (its property names are the storage
 * columns), a primary key and a set of associations to other tables.
 */

import type { Schema } from "effect";

/**
 * A value that can be bound into a predicate.
 */
export type Scalar = string | number | boolean | null;

/**
 * A materialized row. Eager-loaded associations appear as extra properties
 * named after the association.
 */
export type Row = Readonly<Record<string, unknown>>;

/**
 * Association between two tables.
 *
 * - `ref`: belongs-to. The foreign key is a column of this table and points
 *   at the target's primary key (default `<association>Id`).
 * - `inverse`: has-many, or has-one with `cardinality: "one"`. The foreign key
 *   is a column of the target table and points back at this table's primary
 *   key (default: singular table name + `Id`).
 */
export interface AssociationConfig {
	readonly type: "ref" | "inverse";
	readonly target: string;
	readonly foreignKey?: string;
	readonly cardinality?: "one" | "many";
}

export interface TableConfig {
	/** Effect Schema used to validate rows on insert and update */
	readonly schema: Schema.Schema.AnyNoContext;

	/** Primary key column. Defaults to `"id"`. */
	readonly primaryKey?: string;

	readonly associations?: Readonly<Record<string, AssociationConfig>>;
}

export type DatabaseConfig = Readonly<Record<string, TableConfig>>;

/**
 * Seed rows keyed by table name.
 */
export type DatabaseData = Readonly<Record<string, ReadonlyArray<Row>>>;
