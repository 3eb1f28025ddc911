/**
 * Minimal path router over route descriptors, for mounting the generated
 * routes without a framework and for exercising them in tests.
 *
 * @module
 */

import type { RestResponse, RouteDescriptor } from "./handlers.js";
import type { QueryParams } from "./query-params.js";

export interface RouterRequest {
	readonly method: string;
	/** Request path; a trailing query string is ignored */
	readonly path: string;
	readonly query?: QueryParams;
	readonly body?: unknown;
}

export interface RouteMatch {
	readonly route: RouteDescriptor;
	readonly params: Readonly<Record<string, string>>;
}

export interface Router {
	readonly routes: ReadonlyArray<RouteDescriptor>;
	readonly match: (method: string, path: string) => RouteMatch | undefined;
	readonly handle: (request: RouterRequest) => Promise<RestResponse>;
}

const segmentsOf = (path: string): ReadonlyArray<string> => {
	const [pathname = ""] = path.split("?");
	return pathname.split("/").filter((segment) => segment.length > 0);
};

// Malformed percent-encoding is no match rather than an error.
const decodeSegment = (segment: string): string | undefined => {
	try {
		return decodeURIComponent(segment);
	} catch (error) {
		if (error instanceof URIError) return undefined;
		throw error;
	}
};

const matchPath = (
	pattern: ReadonlyArray<string>,
	segments: ReadonlyArray<string>,
): Record<string, string> | undefined => {
	if (pattern.length !== segments.length) return undefined;

	const params: Record<string, string> = {};
	for (let i = 0; i < pattern.length; i++) {
		const expected = pattern[i];
		const decoded = decodeSegment(segments[i]);
		if (decoded === undefined) return undefined;

		if (expected.startsWith(":")) {
			params[expected.slice(1)] = decoded;
		} else if (expected !== decoded) {
			return undefined;
		}
	}
	return params;
};

const NOT_FOUND: RestResponse = {
	status: 404,
	body: { errors: "Route not found" },
};

export const createRouter = (routes: ReadonlyArray<RouteDescriptor>): Router => {
	const compiled = routes.map((route) => ({
		route,
		pattern: segmentsOf(route.path),
	}));

	const match = (method: string, path: string): RouteMatch | undefined => {
		const verb = method.toUpperCase();
		const segments = segmentsOf(path);
		for (const { route, pattern } of compiled) {
			if (route.method !== verb) continue;
			const params = matchPath(pattern, segments);
			if (params !== undefined) return { route, params };
		}
		return undefined;
	};

	const handle = async (request: RouterRequest): Promise<RestResponse> => {
		const found = match(request.method, request.path);
		if (found === undefined) return NOT_FOUND;
		return found.route.handler({
			params: found.params,
			query: request.query ?? {},
			body: request.body,
		});
	};

	return { routes, match, handle };
};
