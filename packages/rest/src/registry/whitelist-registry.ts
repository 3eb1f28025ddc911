/**
 * Whitelist Registry.
 *
 * Declares, per resource type, which names client input may refer to:
 * scalar fields, associations and remote collections. Written during
 * startup and only read afterwards. Registration merges into what is
 * already declared; nothing is ever removed. Undeclared resource types
 * allow nothing.
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

export interface WhitelistDeclaration {
	readonly fields?: Iterable<string>;
	readonly associations?: Iterable<string>;
	readonly remotes?: Iterable<string>;

	/**
	 * Fields accepted from create and update bodies. When a resource never
	 * declares any, its declared fields are writable.
	 */
	readonly writable?: Iterable<string>;
}

interface WhitelistEntry {
	readonly fields: Set<string>;
	readonly associations: Set<string>;
	readonly remotes: Set<string>;
	readonly writable: Set<string>;
}

export interface WhitelistRegistry {
	readonly entries: Map<string, WhitelistEntry>;
}

/**
 * What a name resolves to on a resource type. A name declared in more than
 * one category resolves in the order field, association, remote.
 */
export type Allowance = "field" | "association" | "remote" | "none";

const EMPTY: ReadonlySet<string> = new Set();

// ============================================================================
// Registration
// ============================================================================

export const createWhitelistRegistry = (): WhitelistRegistry => ({
	entries: new Map(),
});

const addAll = (target: Set<string>, names: Iterable<string> | undefined) => {
	for (const name of names ?? []) {
		target.add(name);
	}
};

/**
 * Declare queryable names for a resource type. Returns the registry so
 * declarations can be chained.
 */
export const register = (
	registry: WhitelistRegistry,
	resource: string,
	declaration: WhitelistDeclaration,
): WhitelistRegistry => {
	let entry = registry.entries.get(resource);
	if (entry === undefined) {
		entry = {
			fields: new Set(),
			associations: new Set(),
			remotes: new Set(),
			writable: new Set(),
		};
		registry.entries.set(resource, entry);
	}

	addAll(entry.fields, declaration.fields);
	addAll(entry.associations, declaration.associations);
	addAll(entry.remotes, declaration.remotes);
	addAll(entry.writable, declaration.writable);

	return registry;
};

// ============================================================================
// Lookup
// ============================================================================

export const isAllowed = (
	registry: WhitelistRegistry,
	resource: string,
	name: string,
): Allowance => {
	const entry = registry.entries.get(resource);
	if (entry === undefined) return "none";
	if (entry.fields.has(name)) return "field";
	if (entry.associations.has(name)) return "association";
	if (entry.remotes.has(name)) return "remote";
	return "none";
};

export const declaredFields = (
	registry: WhitelistRegistry,
	resource: string,
): ReadonlySet<string> => registry.entries.get(resource)?.fields ?? EMPTY;

export const declaredAssociations = (
	registry: WhitelistRegistry,
	resource: string,
): ReadonlySet<string> =>
	registry.entries.get(resource)?.associations ?? EMPTY;

export const declaredRemotes = (
	registry: WhitelistRegistry,
	resource: string,
): ReadonlySet<string> => registry.entries.get(resource)?.remotes ?? EMPTY;

export const writableFields = (
	registry: WhitelistRegistry,
	resource: string,
): ReadonlySet<string> => {
	const entry = registry.entries.get(resource);
	if (entry === undefined) return EMPTY;
	return entry.writable.size > 0 ? entry.writable : entry.fields;
};
