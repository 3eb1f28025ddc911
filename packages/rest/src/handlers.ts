/**
 * Resource Action Dispatcher.
 *
 * Generates framework-agnostic route descriptors for the actions a resource
 * type opts into. Actions are disabled unless listed in `handles`; a
 * disabled action gets no route at all.
 *
 * Generated routes per resource (when handled):
 * - GET    /:resource                 — index
 * - POST   /:resource                 — create
 * - GET    /:resource/:id             — show
 * - PUT    /:resource/:id             — update (PATCH too)
 * - DELETE /:resource/:id             — destroy
 * - GET    /:resource/:id/:association — associated, one per whitelisted association
 * - GET    /:resource/:id/:remote      — remoted, one per registered remote
 *
 * @module
 */

import {
	Query,
	type Row,
	Store,
	type StoreShape,
	singularize,
	type TableNotFoundError,
} from "@trellis/core";
import { Cause, Effect, Option } from "effect";
import type { RemoteDefinition } from "./association-resolver.js";
import { type Catalog, makeCatalog, reflectResource } from "./catalog.js";
import type { RefinementConfig } from "./config/refinement-config.js";
import { mapErrorToResponse } from "./error-mapping.js";
import { MalformedBodyError } from "./errors/rest-errors.js";
import { classify, type QueryParams } from "./query-params.js";
import { refine } from "./refiner.js";
import {
	createWhitelistRegistry,
	register,
	type WhitelistDeclaration,
	type WhitelistRegistry,
	writableFields,
} from "./registry/whitelist-registry.js";
import {
	createAssociatedHandlers,
	createRemotedHandlers,
} from "./relationship-routes.js";
import { createRouter, type RouterRequest } from "./router.js";
import { serializeCollection, serializeRecord } from "./serializer.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Framework-agnostic request object shape.
 * Adapters for specific frameworks convert their native request objects to
 * this shape before invoking handlers.
 */
export interface RestRequest {
	/**
	 * URL path parameters extracted by the router.
	 * Example: for route "/posts/:id", params = { id: "123" }
	 */
	readonly params: Readonly<Record<string, string>>;

	/**
	 * URL query parameters (search params).
	 * Example: ?tags=a&tags=b → { tags: ["a", "b"] }
	 */
	readonly query: QueryParams;

	/**
	 * Parsed request body (for POST/PUT/PATCH requests).
	 */
	readonly body: unknown;
}

/**
 * Framework-agnostic response object shape.
 */
export interface RestResponse {
	/** HTTP status code (200, 201, 204, 400, 404, 422, 500) */
	readonly status: number;

	/** Response body to serialize as JSON; null for 204 */
	readonly body: unknown;

	readonly headers?: Readonly<Record<string, string>>;
}

export type RestHandler = (req: RestRequest) => Promise<RestResponse>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "PATCH";

export const API_ACTIONS = [
	"index",
	"create",
	"show",
	"update",
	"destroy",
	"associated",
	"remoted",
] as const;

export type ActionName = (typeof API_ACTIONS)[number];

export interface RouteDescriptor {
	readonly method: HttpMethod;

	/** URL path pattern (e.g., "/posts", "/posts/:id") */
	readonly path: string;

	readonly action: ActionName;

	readonly handler: RestHandler;
}

export interface ResourceDefinition {
	/** Table name; also the collection path segment and collection root key */
	readonly name: string;

	/** Enabled actions. `"all"` enables every action. Nothing is enabled by default. */
	readonly handles: ReadonlyArray<string>;

	/** Lookup key for show/update/destroy/associated/remoted. Defaults to the table's primary key. */
	readonly primaryKey?: string;

	/** Root key for single records and wrapped bodies. Defaults to the singular name. */
	readonly memberKey?: string;

	readonly whitelist?: WhitelistDeclaration;
	readonly remotes?: Readonly<Record<string, RemoteDefinition>>;

	/** Serialized attributes. Defaults to every column. */
	readonly attributes?: ReadonlyArray<string>;
}

/**
 * Everything an action needs about its resource type.
 */
export interface ResourceContext {
	readonly catalog: Catalog;
	readonly definition: ResourceDefinition;
	readonly primaryKey: string;
	readonly memberKey: string;
}

export type ActionProgram = (
	req: RestRequest,
) => Effect.Effect<RestResponse, unknown, Store>;

// ============================================================================
// Running actions
// ============================================================================

const respondToFailure = (
	cause: Cause.Cause<unknown>,
): Effect.Effect<RestResponse> => {
	const failure = Cause.failureOption(cause);
	const response = mapErrorToResponse(
		Option.isSome(failure) ? failure.value : undefined,
	);
	return response.status >= 500
		? Effect.logError("Request failed", cause).pipe(Effect.as(response))
		: Effect.succeed(response);
};

/**
 * Turn an action program into a Promise-returning handler. Failures and
 * defects become error responses.
 */
export const toHandler =
	(
		store: StoreShape,
		context: ResourceContext,
		action: ActionName,
		program: ActionProgram,
	): RestHandler =>
	(req) =>
		Effect.runPromise(
			program(req).pipe(
				Effect.provideService(Store, store),
				Effect.catchAllCause(respondToFailure),
				Effect.annotateLogs({ resource: context.definition.name, action }),
			),
		);

// ============================================================================
// Helpers
// ============================================================================

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * The `:id` path parameter.
 */
export const memberKeyParam = (req: RestRequest): string => req.params.id ?? "";

/**
 * Attributes from a create/update body, limited to writable fields. The body
 * may wrap them under the member key: `{ "post": { ... } }`.
 */
const extractAttributes = (
	context: ResourceContext,
	body: unknown,
): Effect.Effect<Record<string, unknown>, MalformedBodyError> => {
	const resource = context.definition.name;
	if (!isRecord(body)) {
		return Effect.fail(
			new MalformedBodyError({
				resource,
				message: `Expected a JSON object of ${resource} attributes`,
			}),
		);
	}

	const wrapped = body[context.memberKey];
	const source = isRecord(wrapped) ? wrapped : body;
	const attributes: Record<string, unknown> = {};
	for (const field of writableFields(context.catalog.registry, resource)) {
		if (Object.hasOwn(source, field)) {
			attributes[field] = source[field];
		}
	}
	return Effect.succeed(attributes);
};

const locationOf = (context: ResourceContext, row: Row): string =>
	`/${context.definition.name}/${encodeURIComponent(String(row[context.primaryKey]))}`;

// ============================================================================
// Individual Action Programs
// ============================================================================

const indexAction =
	(context: ResourceContext): ActionProgram =>
	(req) =>
		Effect.gen(function* () {
			const { catalog, definition } = context;
			const store = yield* Store;
			const request = yield* classify(catalog, definition.name, req.query);
			const plan = yield* refine(catalog, Query.from(definition.name), request);
			const rows = yield* store.execute(plan);
			return {
				status: 200,
				body: { [definition.name]: serializeCollection(catalog, definition.name, rows) },
			};
		});

const createAction =
	(context: ResourceContext): ActionProgram =>
	(req) =>
		Effect.gen(function* () {
			const { catalog, definition } = context;
			const store = yield* Store;
			const attributes = yield* extractAttributes(context, req.body);
			const row = yield* store.insert(definition.name, attributes);
			return {
				status: 201,
				body: { [context.memberKey]: serializeRecord(catalog, definition.name, row) },
				headers: { location: locationOf(context, row) },
			};
		});

const showAction =
	(context: ResourceContext): ActionProgram =>
	(req) =>
		Effect.gen(function* () {
			const { catalog, definition } = context;
			const store = yield* Store;
			const row = yield* store.findBy(definition.name, context.primaryKey, memberKeyParam(req));
			return {
				status: 200,
				body: { [context.memberKey]: serializeRecord(catalog, definition.name, row) },
			};
		});

const updateAction =
	(context: ResourceContext): ActionProgram =>
	(req) =>
		Effect.gen(function* () {
			const store = yield* Store;
			const attributes = yield* extractAttributes(context, req.body);
			yield* store.update(
				context.definition.name,
				context.primaryKey,
				memberKeyParam(req),
				attributes,
			);
			return { status: 204, body: null };
		});

const destroyAction =
	(context: ResourceContext): ActionProgram =>
	(req) =>
		Effect.gen(function* () {
			const store = yield* Store;
			yield* store.remove(context.definition.name, context.primaryKey, memberKeyParam(req));
			return { status: 204, body: null };
		});

// ============================================================================
// Route Generation
// ============================================================================

const ACTION_NAMES: ReadonlySet<string> = new Set(API_ACTIONS);

const isActionName = (name: string): name is ActionName => ACTION_NAMES.has(name);

/**
 * Split a `handles` list into enabled actions and names that are not
 * actions. `"all"` enables every action.
 */
export const resolveHandledActions = (
	handles: ReadonlyArray<string>,
): { readonly enabled: ReadonlySet<ActionName>; readonly unhandled: ReadonlyArray<string> } => {
	const enabled = new Set<ActionName>(
		handles.includes("all") ? API_ACTIONS : handles.filter(isActionName),
	);
	const unhandled = handles.filter((name) => name !== "all" && !isActionName(name));
	return { enabled, unhandled };
};

/**
 * Build the routes for one resource type.
 */
export const createResourceRoutes = (
	catalog: Catalog,
	store: StoreShape,
	definition: ResourceDefinition,
): Effect.Effect<ReadonlyArray<RouteDescriptor>, TableNotFoundError> =>
	Effect.gen(function* () {
		const reflection = yield* reflectResource(catalog, definition.name);
		const { enabled, unhandled } = resolveHandledActions(definition.handles);

		if (unhandled.length > 0) {
			yield* Effect.logWarning(
				`Resource "${definition.name}" isn't handling the following unwhitelisted actions: ${unhandled.join(",")}`,
			);
		}

		const context: ResourceContext = {
			catalog,
			definition,
			primaryKey: definition.primaryKey ?? reflection.primaryKey,
			memberKey: definition.memberKey ?? singularize(definition.name),
		};
		const handler = (action: ActionName, program: ActionProgram) =>
			toHandler(store, context, action, program);

		const collection = `/${definition.name}`;
		const member = `${collection}/:id`;
		const routes: Array<RouteDescriptor> = [];

		if (enabled.has("index")) {
			routes.push({ method: "GET", path: collection, action: "index", handler: handler("index", indexAction(context)) });
		}
		if (enabled.has("create")) {
			routes.push({ method: "POST", path: collection, action: "create", handler: handler("create", createAction(context)) });
		}
		if (enabled.has("show")) {
			routes.push({ method: "GET", path: member, action: "show", handler: handler("show", showAction(context)) });
		}
		if (enabled.has("update")) {
			const update = handler("update", updateAction(context));
			routes.push({ method: "PUT", path: member, action: "update", handler: update });
			routes.push({ method: "PATCH", path: member, action: "update", handler: update });
		}
		if (enabled.has("destroy")) {
			routes.push({ method: "DELETE", path: member, action: "destroy", handler: handler("destroy", destroyAction(context)) });
		}
		if (enabled.has("associated")) {
			for (const [association, program] of createAssociatedHandlers(context)) {
				routes.push({ method: "GET", path: `${member}/${association}`, action: "associated", handler: handler("associated", program) });
			}
		}
		if (enabled.has("remoted")) {
			for (const [remote, program] of createRemotedHandlers(context)) {
				routes.push({ method: "GET", path: `${member}/${remote}`, action: "remoted", handler: handler("remoted", program) });
			}
		}

		for (const route of routes) {
			yield* Effect.logDebug(`${route.method} ${route.path} → ${definition.name}#${route.action}`);
		}

		return routes;
	});

// ============================================================================
// API Factory
// ============================================================================

export interface RestApiOptions {
	readonly store: StoreShape;
	readonly resources: ReadonlyArray<ResourceDefinition>;

	/** Registry to extend. Each resource's `whitelist` is merged into it. */
	readonly registry?: WhitelistRegistry;

	readonly config?: RefinementConfig;
}

export interface RestApi {
	readonly catalog: Catalog;
	readonly routes: ReadonlyArray<RouteDescriptor>;
	readonly handle: (request: RouterRequest) => Promise<RestResponse>;
}

/**
 * Register every resource's whitelist and build its routes.
 *
 * @example
 * ```typescript
 * const store = await Effect.runPromise(makeInMemoryStore(tables, seed))
 * const api = await Effect.runPromise(
 *   createRestApi({
 *     store,
 *     resources: [
 *       {
 *         name: "posts",
 *         handles: ["index", "show", "associated"],
 *         whitelist: { fields: ["title", "createdAt"], associations: ["comments", "author"] },
 *       },
 *     ],
 *   }),
 * )
 *
 * const response = await api.handle({
 *   method: "GET",
 *   path: "/posts",
 *   query: { "author.name": "Alice", order: "-createdAt" },
 * })
 * ```
 */
export const createRestApi = (
	options: RestApiOptions,
): Effect.Effect<RestApi, TableNotFoundError> =>
	Effect.gen(function* () {
		const registry = options.registry ?? createWhitelistRegistry();
		const attributes = new Map<string, ReadonlyArray<string>>();

		for (const definition of options.resources) {
			register(registry, definition.name, {
				...definition.whitelist,
				remotes: [
					...(definition.whitelist?.remotes ?? []),
					...Object.keys(definition.remotes ?? {}),
				],
			});
			if (definition.attributes !== undefined) {
				attributes.set(definition.name, definition.attributes);
			}
		}

		const catalog = makeCatalog(options.store.config, {
			registry,
			config: options.config,
			attributes,
		});

		const routes: Array<RouteDescriptor> = [];
		for (const definition of options.resources) {
			routes.push(...(yield* createResourceRoutes(catalog, options.store, definition)));
		}

		const router = createRouter(routes);
		return { catalog, routes, handle: router.handle };
	});
