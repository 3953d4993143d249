// ---------------------------------------------------------------------------
// Status routes — health, metrics and route listing for a running server
// ---------------------------------------------------------------------------

import { Router } from "./router";
import type { Server } from "./server";

/**
 * Build a router exposing the server's own state:
 *
 * - `GET /health`  — `{ status: "ok", pool }`
 * - `GET /metrics` — Prometheus text exposition
 * - `GET /routes`  — every mount and its routes, in match order
 */
export function createStatusRouter(server: Server): Router {
	return new Router()
		.get("/health", (_req, res, session) => {
			res.json({ status: "ok", pool: server.stats() });
			session.stop();
		})
		.get("/metrics", (_req, res, session) => {
			const stats = server.stats();
			if (stats) server.metrics.samplePool(stats);
			res.header("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
			res.send(server.metrics.expose(), 200);
			session.stop();
		})
		.get("/routes", (_req, res, session) => {
			const { version, mounts } = server.mounts();
			res.json({
				version,
				mounts: mounts.map((m) => ({ mountPath: m.mountPath, routes: m.router.routes() })),
			});
			session.stop();
		});
}
