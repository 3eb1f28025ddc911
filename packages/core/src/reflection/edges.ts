import type { AssociationEdge, TableReflection } from "./reflect.js";

/**
 * Look up an association edge by name. Inherited object keys such as
 * "constructor" never resolve.
 */
export const findEdge = (
	reflection: TableReflection,
	name: string,
): AssociationEdge | undefined =>
	Object.hasOwn(reflection.associations, name)
		? reflection.associations[name]
		: undefined;
