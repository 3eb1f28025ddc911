/**
 * @trellis/rest — convention-driven REST endpoints over a relational store.
 *
 * Each resource type opts into actions and whitelists the fields,
 * associations and remotes clients may touch. Query strings refine the
 * collection plan: filters, association traversal, ordering and
 * pagination, all bounded by the whitelist.
 *
 * @example
 * ```ts
 * import { createRestApi } from "@trellis/rest"
 * import { makeInMemoryStore } from "@trellis/core"
 *
 * const store = await Effect.runPromise(makeInMemoryStore(tables, seed))
 * const api = await Effect.runPromise(createRestApi({ store, resources }))
 *
 * // Framework-agnostic handler signature:
 * // (req: { params, query, body }) => Promise<{ status, body, headers? }>
 *
 * // Generated routes (for handled actions only):
 * // GET    /posts               — index
 * // POST   /posts               — create
 * // GET    /posts/:id           — show
 * // PUT    /posts/:id           — update
 * // DELETE /posts/:id           — destroy
 * // GET    /posts/:id/comments  — associated
 * // GET    /posts/:id/related   — remoted
 * ```
 *
 * @module
 */

// ============================================================================
// Action Dispatch
// ============================================================================

export {
	type ActionName,
	type ActionProgram,
	API_ACTIONS,
	createResourceRoutes,
	createRestApi,
	type HttpMethod,
	type ResourceContext,
	type ResourceDefinition,
	resolveHandledActions,
	type RestApi,
	type RestApiOptions,
	type RestHandler,
	type RestRequest,
	type RestResponse,
	type RouteDescriptor,
	toHandler,
} from "./handlers.js";
export {
	createRouter,
	type RouteMatch,
	type Router,
	type RouterRequest,
} from "./router.js";

// ============================================================================
// Whitelist
// ============================================================================

export {
	type Allowance,
	createWhitelistRegistry,
	declaredAssociations,
	declaredFields,
	declaredRemotes,
	isAllowed,
	register,
	type WhitelistDeclaration,
	type WhitelistRegistry,
	writableFields,
} from "./registry/whitelist-registry.js";
export { type Catalog, makeCatalog, reflectResource, whitelistedEdge } from "./catalog.js";

// ============================================================================
// Refinement
// ============================================================================

export {
	classify,
	type Filter,
	type Pagination,
	type QueryParams,
	type RefinementRequest,
	RESERVED_PARAMS,
} from "./query-params.js";
export { refine, relatedPredicates, toPredicate } from "./refiner.js";
export {
	isQueryPlan,
	type RemoteDefinition,
	type RemoteResult,
	resolve,
	resolveInclude,
	resolveRemote,
	withoutOwnershipKey,
} from "./association-resolver.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	defaultRefinementConfig,
	loadRefinementConfig,
	type RefinementConfig,
	refinementConfig,
} from "./config/refinement-config.js";

// ============================================================================
// Output & Errors
// ============================================================================

export { serializeCollection, serializeRecord } from "./serializer.js";
export {
	type ErrorPayload,
	type ErrorResponse,
	mapErrorToResponse,
} from "./error-mapping.js";
export {
	InvalidDirectiveError,
	MalformedBodyError,
	type RequestError,
} from "./errors/rest-errors.js";
