// ---------------------------------------------------------------------------
// Router — one mount point's route table and path matching
// ---------------------------------------------------------------------------

import { type Middleware, MiddlewareChain } from "./middleware";
import type { RouteParams } from "./request";

/** Method key that matches any request method. */
export const ANY_METHOD = "*";

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

type Segment = { kind: "literal"; value: string } | { kind: "param"; name: string };

/** A route pattern split into literal and `:param` segments. */
export interface CompiledPattern {
	/** Canonical form, e.g. `/users/:id`. */
	readonly source: string;
	readonly segments: readonly Segment[];
	readonly paramNames: readonly string[];
}

interface RouteEntry {
	readonly method: string;
	readonly pattern: CompiledPattern;
	readonly chain: MiddlewareChain;
}

/** Result of looking a method and path up in a router. */
export type RouteLookup =
	| { kind: "matched"; chain: MiddlewareChain; params: RouteParams; pattern: string }
	| { kind: "method-not-allowed"; allowed: string[] }
	| { kind: "not-found" };

/** Diagnostic description of one registered route. */
export interface RouteInfo {
	method: string;
	pattern: string;
	handlers: number;
}

/** Split a path into its non-empty segments. */
export function splitPath(path: string): string[] {
	return path.split("/").filter((segment) => segment.length > 0);
}

/**
 * Compile a route pattern such as `/users/:id/posts/:postId`.
 *
 * Throws on an empty or malformed parameter name and on a parameter name
 * used twice in the same pattern.
 */
export function compilePattern(pattern: string): CompiledPattern {
	const segments: Segment[] = [];
	const paramNames: string[] = [];

	for (const part of splitPath(pattern)) {
		if (!part.startsWith(":")) {
			segments.push({ kind: "literal", value: part });
			continue;
		}
		const name = part.slice(1);
		if (!PARAM_NAME.test(name)) {
			throw new Error(`Invalid parameter "${part}" in route pattern "${pattern}"`);
		}
		if (paramNames.includes(name)) {
			throw new Error(`Duplicate parameter ":${name}" in route pattern "${pattern}"`);
		}
		paramNames.push(name);
		segments.push({ kind: "param", name });
	}

	const source = `/${segments.map((s) => (s.kind === "literal" ? s.value : `:${s.name}`)).join("/")}`;
	return { source, segments, paramNames };
}

/**
 * Match path segments against a compiled pattern.
 *
 * Every pattern segment must line up with exactly one path segment.
 * Returns the bound parameters, or null when the path does not match.
 */
export function matchPattern(pattern: CompiledPattern, pathSegments: readonly string[]): RouteParams | null {
	if (pattern.segments.length !== pathSegments.length) return null;

	const bound: Array<[string, string]> = [];
	for (let i = 0; i < pattern.segments.length; i++) {
		const segment = pattern.segments[i];
		const value = pathSegments[i];
		if (segment === undefined || value === undefined) return null;
		if (segment.kind === "literal") {
			if (segment.value !== value) return null;
		} else {
			bound.push([segment.name, value]);
		}
	}
	return Object.freeze(Object.fromEntries(bound));
}

/**
 * Route table for a single mount point.
 *
 * Routes are tried in registration order and the first full-path match
 * wins. Registering the same method and pattern again replaces the chain
 * in place. The table is swapped for a new frozen array on every change,
 * so a lookup never observes a half-applied registration.
 *
 * @example
 * ```ts
 * const users = new Router()
 *   .get("/users/:id", auth, loadUser)
 *   .post("/users", auth, createUser);
 * server.register("/api", users);
 * ```
 */
export class Router {
	private table: readonly RouteEntry[] = [];

	/** Register `handlers` (or a prebuilt chain) for `method` and `pattern`. */
	route(method: string, pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		const chain = toChain(handlers);
		if (chain.length === 0) {
			throw new Error(`Route ${method} ${pattern} needs at least one handler`);
		}

		const entry: RouteEntry = {
			method: method.toUpperCase(),
			pattern: compilePattern(pattern),
			chain,
		};
		const index = this.table.findIndex(
			(e) => e.method === entry.method && e.pattern.source === entry.pattern.source,
		);
		const next = [...this.table];
		if (index === -1) {
			next.push(entry);
		} else {
			next[index] = entry;
		}
		this.table = Object.freeze(next);
		return this;
	}

	get(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route("GET", pattern, ...handlers);
	}

	post(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route("POST", pattern, ...handlers);
	}

	put(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route("PUT", pattern, ...handlers);
	}

	patch(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route("PATCH", pattern, ...handlers);
	}

	delete(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route("DELETE", pattern, ...handlers);
	}

	head(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route("HEAD", pattern, ...handlers);
	}

	options(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route("OPTIONS", pattern, ...handlers);
	}

	/** Register for every method. */
	all(pattern: string, ...handlers: Array<Middleware | MiddlewareChain>): this {
		return this.route(ANY_METHOD, pattern, ...handlers);
	}

	/**
	 * Look up the chain for `method` and `path`.
	 *
	 * A path that matches only under other methods reports
	 * "method-not-allowed" with those methods. HEAD falls back to a GET route.
	 */
	match(method: string, path: string): RouteLookup {
		const wanted = method.toUpperCase();
		const segments = splitPath(path);
		const allowed: string[] = [];
		let headFallback: { entry: RouteEntry; params: RouteParams } | null = null;

		for (const entry of this.table) {
			const params = matchPattern(entry.pattern, segments);
			if (params === null) continue;

			if (entry.method === wanted || entry.method === ANY_METHOD) {
				return { kind: "matched", chain: entry.chain, params, pattern: entry.pattern.source };
			}
			if (wanted === "HEAD" && entry.method === "GET" && headFallback === null) {
				headFallback = { entry, params };
			}
			if (!allowed.includes(entry.method)) allowed.push(entry.method);
		}

		if (headFallback !== null) {
			const { entry, params } = headFallback;
			return { kind: "matched", chain: entry.chain, params, pattern: entry.pattern.source };
		}
		if (allowed.length > 0) return { kind: "method-not-allowed", allowed };
		return { kind: "not-found" };
	}

	/** List registered routes in match order. */
	routes(): RouteInfo[] {
		return this.table.map((e) => ({
			method: e.method,
			pattern: e.pattern.source,
			handlers: e.chain.length,
		}));
	}
}

function toChain(items: ReadonlyArray<Middleware | MiddlewareChain>): MiddlewareChain {
	const handlers: Middleware[] = [];
	for (const item of items) {
		if (item instanceof MiddlewareChain) {
			handlers.push(...item.handlers);
		} else {
			handlers.push(item);
		}
	}
	return new MiddlewareChain(handlers);
}
