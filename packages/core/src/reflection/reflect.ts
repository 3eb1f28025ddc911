/**
 * Table reflection: columns, primary key and resolved association edges.
 *
 * @module
 */

import { Option, SchemaAST } from "effect";
import type {
	AssociationConfig,
	DatabaseConfig,
	TableConfig,
} from "../types/table-types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A resolved association. Rows are linked when
 * `source[sourceKey] == target[targetKey]`.
 *
 * `foreignKey` is the ownership key: the column that anchors the owned side
 * to its owner.
 */
export interface AssociationEdge {
	readonly name: string;
	readonly source: string;
	readonly target: string;
	readonly cardinality: "one" | "many";
	readonly foreignKey: string;
	readonly foreignKeyOn: "source" | "target";
	readonly sourceKey: string;
	readonly targetKey: string;
}

export interface TableReflection {
	readonly name: string;
	readonly columns: ReadonlyArray<string>;
	readonly primaryKey: string;
	/** Encoded type of the primary key column; decides how inserts generate keys. */
	readonly keyKind: "number" | "string";
	readonly associations: Readonly<Record<string, AssociationEdge>>;
}

const DEFAULT_PRIMARY_KEY = "id";

// ============================================================================
// Naming
// ============================================================================

/**
 * Singularize a table name: "posts" → "post", "categories" → "category".
 */
export const singularize = (name: string): string => {
	if (name.endsWith("ies")) {
		return `${name.slice(0, -3)}y`;
	}
	if (name.endsWith("s") && !name.endsWith("ss")) {
		return name.slice(0, -1);
	}
	return name;
};

/**
 * Derive the foreign key for an inverse association.
 *
 * Priority:
 * 1. Explicit `foreignKey` on the inverse association
 * 2. Explicit `foreignKey` on a `ref` association of the target pointing back
 * 3. Singular source table name + "Id"
 */
const resolveInverseForeignKey = (
	association: AssociationConfig,
	tableName: string,
	config: DatabaseConfig,
): string => {
	if (association.foreignKey) {
		return association.foreignKey;
	}

	const targetConfig = config[association.target];
	if (targetConfig?.associations) {
		const reverse = Object.values(targetConfig.associations).find(
			(a) => a.type === "ref" && a.target === tableName,
		);
		if (reverse?.foreignKey) {
			return reverse.foreignKey;
		}
	}

	return `${singularize(tableName)}Id`;
};

const primaryKeyOf = (table: TableConfig | undefined): string =>
	table?.primaryKey ?? DEFAULT_PRIMARY_KEY;

// ============================================================================
// Reflection
// ============================================================================

/**
 * Column names of a table, read from its schema's property signatures.
 */
export const columnsOf = (table: TableConfig): ReadonlyArray<string> =>
	SchemaAST.getPropertySignatures(table.schema.ast).flatMap((signature) =>
		typeof signature.name === "string" ? [signature.name] : [],
	);

/**
 * Whether a column's encoded form is a number. Refinements such as
 * `Schema.Int` count as numbers.
 */
const keyKindOf = (table: TableConfig, column: string): "number" | "string" => {
	const signature = SchemaAST.getPropertySignatures(table.schema.ast).find(
		(candidate) => candidate.name === column,
	);
	return signature !== undefined &&
		SchemaAST.isNumberKeyword(SchemaAST.encodedAST(signature.type))
		? "number"
		: "string";
};

const edgeFor = (
	name: string,
	association: AssociationConfig,
	tableName: string,
	config: DatabaseConfig,
): AssociationEdge => {
	const sourcePrimaryKey = primaryKeyOf(config[tableName]);
	const targetPrimaryKey = primaryKeyOf(config[association.target]);

	if (association.type === "ref") {
		const foreignKey = association.foreignKey ?? `${name}Id`;
		return {
			name,
			source: tableName,
			target: association.target,
			cardinality: "one",
			foreignKey,
			foreignKeyOn: "source",
			sourceKey: foreignKey,
			targetKey: targetPrimaryKey,
		};
	}

	const foreignKey = resolveInverseForeignKey(association, tableName, config);
	return {
		name,
		source: tableName,
		target: association.target,
		cardinality: association.cardinality ?? "many",
		foreignKey,
		foreignKeyOn: "target",
		sourceKey: sourcePrimaryKey,
		targetKey: foreignKey,
	};
};

/**
 * Reflect a declared table. `None` when the table is not part of the config.
 */
export const reflectTable = (
	config: DatabaseConfig,
	tableName: string,
): Option.Option<TableReflection> => {
	if (!Object.hasOwn(config, tableName)) {
		return Option.none();
	}
	const table = config[tableName];

	const associations: Record<string, AssociationEdge> = {};
	for (const [name, association] of Object.entries(table.associations ?? {})) {
		associations[name] = edgeFor(name, association, tableName, config);
	}

	return Option.some({
		name: tableName,
		columns: columnsOf(table),
		primaryKey: primaryKeyOf(table),
		keyKind: keyKindOf(table, primaryKeyOf(table)),
		associations,
	});
};
