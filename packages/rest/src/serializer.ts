/**
 * Default serializer.
 *
 * A record is rendered with its resource type's attribute set (the table's
 * columns unless the resource declares its own list). Associations appear
 * only when they were eager-loaded; otherwise the foreign key column is the
 * reference.
 *
 * @module
 */

import { findEdge, reflectTable, type Row } from "@trellis/core";
import { Option } from "effect";
import type { Catalog } from "./catalog.js";

const isRecord = (value: unknown): value is Row =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const serializeRecord = (
	catalog: Catalog,
	resource: string,
	row: Row,
): Record<string, unknown> => {
	const reflection = Option.getOrUndefined(
		reflectTable(catalog.database, resource),
	);
	if (reflection === undefined) {
		return { ...row };
	}

	const output: Record<string, unknown> = {};
	const attributes = catalog.attributes.get(resource) ?? reflection.columns;
	for (const attribute of attributes) {
		if (Object.hasOwn(row, attribute)) {
			output[attribute] = row[attribute];
		}
	}

	for (const name of Object.keys(reflection.associations)) {
		const edge = findEdge(reflection, name);
		if (edge === undefined || !Object.hasOwn(row, name)) continue;

		const loaded = row[name];
		if (Array.isArray(loaded)) {
			const items: ReadonlyArray<unknown> = loaded;
			output[name] = serializeCollection(catalog, edge.target, items.filter(isRecord));
		} else if (isRecord(loaded)) {
			output[name] = serializeRecord(catalog, edge.target, loaded);
		} else {
			output[name] = null;
		}
	}

	return output;
};

export const serializeCollection = (
	catalog: Catalog,
	resource: string,
	rows: ReadonlyArray<Row>,
): ReadonlyArray<Record<string, unknown>> =>
	rows.map((row) => serializeRecord(catalog, resource, row));
