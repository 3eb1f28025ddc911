/**
 * In-memory implementation of the Store service.
 *
 * Rows live in one Ref<ReadonlyMap<key, Row>> per table. Every table read
 * and write is appended to an optional query log so tests can count the
 * queries a plan costs.
 */

import { Effect, Layer, Option, Ref } from "effect"
import { NotFoundError, ValidationError } from "../errors/crud-errors.js"
import type { QueryError } from "../errors/query-errors.js"
import { SchemaMismatchError, TableNotFoundError } from "../errors/query-errors.js"
import { filterByKeys, keyOf, matchesPredicate, valuesMatch } from "../operations/query/filter.js"
import { paginate, sortRows } from "../operations/query/sort.js"
import { attachIncludes } from "../operations/relationships/populate.js"
import type { Query } from "../query/query.js"
import { findEdge } from "../reflection/edges.js"
import { reflectTable, type TableReflection } from "../reflection/reflect.js"
import type { DatabaseConfig, DatabaseData, Row, Scalar } from "../types/table-types.js"
import { generateId } from "../utils/id-generator.js"
import { validateRow } from "../validators/schema-validator.js"
import { Store, type StoreShape } from "./store-service.js"

// ============================================================================
// Types
// ============================================================================

export interface QueryLogEntry {
	readonly table: string
	readonly operation: "read" | "write"
}

export interface InMemoryStoreOptions {
	/** Receives one entry per table read or write. */
	readonly queryLog?: Array<QueryLogEntry>
}

type TableState = Ref.Ref<ReadonlyMap<string, Row>>

// ============================================================================
// Plan validation
// ============================================================================

const mismatch = (table: string, field: string, message: string) =>
	new SchemaMismatchError({ table, field, message })

/**
 * Reject plans that name a column or association the table does not have.
 */
const checkPlan = (
	reflection: TableReflection,
	query: Query,
): Effect.Effect<void, SchemaMismatchError> =>
	Effect.gen(function* () {
		const columns = new Set(reflection.columns)
		const table = reflection.name

		for (const predicate of query.predicates) {
			if (predicate._tag === "Related") {
				if (findEdge(reflection, predicate.association) === undefined) {
					return yield* mismatch(
						table,
						predicate.association,
						`Unknown association "${predicate.association}" on "${table}"`,
					)
				}
			} else if (!columns.has(predicate.field)) {
				return yield* mismatch(
					table,
					predicate.field,
					`Unknown column "${predicate.field}" on "${table}"`,
				)
			}
		}

		for (const { field } of query.order) {
			if (!columns.has(field)) {
				return yield* mismatch(table, field, `Unknown column "${field}" on "${table}"`)
			}
		}

		for (const { association, query: child } of query.includes) {
			const edge = findEdge(reflection, association)
			if (edge === undefined || edge.target !== child.table) {
				return yield* mismatch(
					table,
					association,
					`Cannot include "${association}" from "${child.table}" on "${table}"`,
				)
			}
		}
	})

// ============================================================================
// Store construction
// ============================================================================

/**
 * Build an in-memory store from a table config and seed rows. Seed rows are
 * decoded through their table's schema.
 */
export const makeInMemoryStore = (
	config: DatabaseConfig,
	initialData: DatabaseData = {},
	options: InMemoryStoreOptions = {},
): Effect.Effect<StoreShape, ValidationError | TableNotFoundError> =>
	Effect.gen(function* () {
		const reflections = new Map<string, TableReflection>()
		const tables = new Map<string, TableState>()
		const sequences = new Map<string, Ref.Ref<number>>()

		for (const table of Object.keys(initialData)) {
			if (!Object.hasOwn(config, table)) {
				return yield* new TableNotFoundError({
					table,
					message: `Seed data given for undeclared table "${table}"`,
				})
			}
		}

		for (const table of Object.keys(config)) {
			const reflection = yield* Option.match(reflectTable(config, table), {
				onNone: () =>
					Effect.fail(
						new TableNotFoundError({ table, message: `Table "${table}" is not declared` }),
					),
				onSome: (found) => Effect.succeed(found),
			})
			const rows = new Map<string, Row>()

			for (const raw of initialData[table] ?? []) {
				const row = yield* validateRow(table, config[table].schema, raw)
				const key = keyOf(row[reflection.primaryKey])
				if (key === undefined) {
					return yield* new ValidationError({
						table,
						message: `Seed row for "${table}" has no ${reflection.primaryKey}`,
						issues: [{ field: reflection.primaryKey, message: "can't be blank" }],
					})
				}
				rows.set(key, row)
			}

			reflections.set(table, reflection)
			tables.set(table, yield* Ref.make<ReadonlyMap<string, Row>>(rows))
			sequences.set(table, yield* Ref.make(0))
		}

		const log = (table: string, operation: QueryLogEntry["operation"]) =>
			Effect.sync(() => {
				options.queryLog?.push({ table, operation })
			}).pipe(
				Effect.zipRight(Effect.logDebug(`${operation} ${table}`)),
			)

		const lookup = (
			table: string,
		): Effect.Effect<readonly [TableReflection, TableState], TableNotFoundError> => {
			const reflection = reflections.get(table)
			const state = tables.get(table)
			return reflection !== undefined && state !== undefined
				? Effect.succeed([reflection, state] as const)
				: Effect.fail(
						new TableNotFoundError({
							table,
							message: `Table "${table}" is not declared`,
						}),
					)
		}

		const read = (table: string, state: TableState) =>
			Ref.get(state).pipe(
				Effect.tap(() => log(table, "read")),
				Effect.map((map) => [...map.values()]),
			)

		const execute = (query: Query): Effect.Effect<ReadonlyArray<Row>, QueryError> =>
			Effect.gen(function* () {
				const [reflection, state] = yield* lookup(query.table)
				yield* checkPlan(reflection, query)

				let rows: ReadonlyArray<Row> = yield* read(query.table, state)

				for (const predicate of query.predicates) {
					if (predicate._tag === "Related") {
						const edge = findEdge(reflection, predicate.association)
						if (edge === undefined) continue
						const related = yield* execute({
							table: edge.target,
							predicates: predicate.predicates,
							includes: [],
							order: [],
						})
						const keys = new Set<string>()
						for (const row of related) {
							const key = keyOf(row[edge.targetKey])
							if (key !== undefined) keys.add(key)
						}
						rows = filterByKeys(rows, edge.sourceKey, keys)
					} else {
						rows = rows.filter((row) => matchesPredicate(row, predicate))
					}
				}

				const page = paginate(
					sortRows(rows, query.order, reflection.primaryKey),
					query.offset,
					query.limit,
				)

				return yield* attachIncludes(page, reflection, query.includes, execute)
			})

		const findBy = (table: string, field: string, value: Scalar) =>
			Effect.gen(function* () {
				const [reflection, state] = yield* lookup(table)
				if (!reflection.columns.includes(field)) {
					return yield* mismatch(table, field, `Unknown column "${field}" on "${table}"`)
				}

				const rows = sortRows(yield* read(table, state), [], reflection.primaryKey)
				const found = rows.find((row) => valuesMatch(row[field], value))
				if (found === undefined) {
					return yield* new NotFoundError({
						table,
						field,
						value: String(value),
						message: `Couldn't find ${table} with ${field}=${String(value)}`,
					})
				}
				return found
			})

		/**
		 * Next key for a row inserted without one. Numeric keys continue from
		 * the highest key in the table; anything else gets a generated id.
		 */
		const nextKey = (
			table: string,
			reflection: TableReflection,
			state: TableState,
		): Effect.Effect<string | number> => {
			const sequence = sequences.get(table)
			if (reflection.keyKind === "string" || sequence === undefined) {
				return Effect.sync(generateId)
			}
			return Effect.gen(function* () {
				const rows = yield* Ref.get(state)
				const highest = [...rows.values()].reduce((max, row) => {
					const key = row[reflection.primaryKey]
					return typeof key === "number" && key > max ? key : max
				}, 0)
				return yield* Ref.modify(sequence, (last) => {
					const next = Math.max(last, Math.floor(highest)) + 1
					return [next, next] as const
				})
			})
		}

		const insert = (table: string, input: Readonly<Record<string, unknown>>) =>
			Effect.gen(function* () {
				const [reflection, state] = yield* lookup(table)
				const primaryKey = reflection.primaryKey
				const given = input[primaryKey]
				const row = yield* validateRow(table, config[table].schema, {
					...input,
					[primaryKey]:
						given === undefined || given === null
							? yield* nextKey(table, reflection, state)
							: given,
				})

				const key = keyOf(row[primaryKey])
				const inserted =
					key !== undefined &&
					(yield* Ref.modify(state, (map): readonly [boolean, ReadonlyMap<string, Row>] =>
						map.has(key) ? [false, map] : [true, new Map(map).set(key, row)],
					))
				if (!inserted) {
					return yield* new ValidationError({
						table,
						message: `${primaryKey} has already been taken`,
						issues: [{ field: primaryKey, message: "has already been taken" }],
					})
				}

				yield* log(table, "write")
				return row
			})

		const update = (
			table: string,
			field: string,
			value: Scalar,
			changes: Readonly<Record<string, unknown>>,
		) =>
			Effect.gen(function* () {
				const existing = yield* findBy(table, field, value)
				const [reflection, state] = yield* lookup(table)
				const primaryKey = reflection.primaryKey
				const row = yield* validateRow(table, config[table].schema, {
					...existing,
					...changes,
					[primaryKey]: existing[primaryKey],
				})

				const key = keyOf(existing[primaryKey]) ?? String(existing[primaryKey])
				yield* Ref.update(state, (map) => new Map(map).set(key, row))
				yield* log(table, "write")
				return row
			})

		const remove = (table: string, field: string, value: Scalar) =>
			Effect.gen(function* () {
				const existing = yield* findBy(table, field, value)
				const [reflection, state] = yield* lookup(table)
				const key =
					keyOf(existing[reflection.primaryKey]) ?? String(existing[reflection.primaryKey])
				yield* Ref.update(state, (map) => {
					const next = new Map(map)
					next.delete(key)
					return next
				})
				yield* log(table, "write")
				return existing
			})

		return { config, execute, findBy, insert, update, remove } satisfies StoreShape
	})

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Provide the Store service from an in-memory store.
 */
export const makeInMemoryStoreLayer = (
	config: DatabaseConfig,
	initialData?: DatabaseData,
	options?: InMemoryStoreOptions,
): Layer.Layer<Store, ValidationError | TableNotFoundError> =>
	Layer.effect(Store, makeInMemoryStore(config, initialData, options))
