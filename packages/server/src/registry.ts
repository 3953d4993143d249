// ---------------------------------------------------------------------------
// Mount Registry — mount prefix → Router, resolved longest-prefix-first
// ---------------------------------------------------------------------------

import { Err, NotFoundError, Ok, type Result } from "@switchyard/core";
import type { MiddlewareChain } from "./middleware";
import type { RouteParams } from "./request";
import type { Router } from "./router";

/** One mounted router. */
export interface MountEntry {
	readonly mountPath: string;
	readonly router: Router;
}

/**
 * Immutable view of the registry.
 *
 * `mounts` is ordered by prefix length, longest first. Each registration
 * produces a new snapshot with a higher `version`.
 */
export interface RegistrySnapshot {
	readonly version: number;
	readonly mounts: readonly MountEntry[];
}

/** A request resolved to its middleware chain. */
export interface Resolution {
	chain: MiddlewareChain;
	params: RouteParams;
	mountPath: string;
	/** The router pattern that matched, relative to the mount. */
	pattern: string;
}

/**
 * Normalise a mount path.
 *
 * `"/"` (and `""`) become the empty root prefix, trailing slashes are
 * dropped and a missing leading slash is added: `"api/"` → `"/api"`.
 */
export function normalizeMountPath(mountPath: string): string {
	const trimmed = mountPath.trim().replace(/\/+$/, "");
	if (trimmed === "") return "";
	return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

/** Whether `path` lies under `mountPath` on a segment boundary. */
export function isUnderMount(mountPath: string, path: string): boolean {
	if (mountPath === "") return true;
	return path === mountPath || path.startsWith(`${mountPath}/`);
}

/**
 * Registry of mounted routers.
 *
 * Reads go through the current snapshot, which is replaced wholesale on
 * registration; dispatch never takes a lock.
 */
export class MountRegistry {
	private current: RegistrySnapshot = Object.freeze({ version: 0, mounts: Object.freeze([]) });

	/**
	 * Mount `router` at `mountPath`.
	 *
	 * The last registration for a normalised prefix wins.
	 */
	register(mountPath: string, router: Router): RegistrySnapshot {
		const normalized = normalizeMountPath(mountPath);
		const others = this.current.mounts.filter((m) => m.mountPath !== normalized);
		return this.swap([...others, { mountPath: normalized, router }]);
	}

	/** Remove the router mounted at `mountPath`. Returns false if none was. */
	unregister(mountPath: string): boolean {
		const normalized = normalizeMountPath(mountPath);
		const remaining = this.current.mounts.filter((m) => m.mountPath !== normalized);
		if (remaining.length === this.current.mounts.length) return false;
		this.swap(remaining);
		return true;
	}

	snapshot(): RegistrySnapshot {
		return this.current;
	}

	/**
	 * Resolve a method and path to a middleware chain.
	 *
	 * Picks the longest mount prefix the path lies under, strips it and
	 * hands the remainder to that router. A miss in the chosen router does
	 * not fall back to a shorter prefix.
	 */
	resolve(method: string, path: string): Result<Resolution, NotFoundError> {
		const { mounts } = this.current;
		const mount = mounts.find((m) => isUnderMount(m.mountPath, path));
		if (!mount) {
			return Err(new NotFoundError(`No router mounted for ${path}`, "no-mount"));
		}

		const remainder = path.slice(mount.mountPath.length) || "/";
		const lookup = mount.router.match(method, remainder);

		switch (lookup.kind) {
			case "matched":
				return Ok({
					chain: lookup.chain,
					params: lookup.params,
					mountPath: mount.mountPath,
					pattern: lookup.pattern,
				});
			case "method-not-allowed":
				return Err(
					new NotFoundError(
						`${method} not routed for ${path} (allowed: ${lookup.allowed.join(", ")})`,
						"method-not-allowed",
					),
				);
			case "not-found":
				return Err(new NotFoundError(`No route for ${method} ${path}`, "no-route"));
		}
	}

	private swap(mounts: MountEntry[]): RegistrySnapshot {
		const ordered = mounts.sort((a, b) => b.mountPath.length - a.mountPath.length);
		this.current = Object.freeze({
			version: this.current.version + 1,
			mounts: Object.freeze(ordered),
		});
		return this.current;
	}
}
