import { fromPromise } from "@switchyard/core";
import { createStatusRouter, Logger, Server } from "@switchyard/server";
import { resolveServeConfig, type ServeConfig } from "../config";
import { fatal } from "../output";

/** Mount prefix of the built-in health, metrics and routes endpoints. */
export const STATUS_MOUNT = "/_switchyard";

/**
 * Build a server from resolved settings, mount the status router and bind.
 *
 * Rejects with the server's `BindError` when the address is unavailable.
 */
export async function startServer(config: ServeConfig, logger?: Logger): Promise<Server> {
	const server = new Server({ ...config, logger: logger ?? new Logger(config.logLevel) });
	server.register(STATUS_MOUNT, createStatusRouter(server));
	await server.listen(config.port, config.address, config.workers);
	return server;
}

/** `switchyard serve`: run until SIGINT or SIGTERM. */
export async function serve(flags: Record<string, string>): Promise<void> {
	const config = resolveServeConfig(flags);
	if (!config.ok) fatal(config.error.message);

	const started = await fromPromise(startServer(config.value));
	if (!started.ok) fatal(started.error.message);
	const server = started.value;

	const shutdown = () => {
		server.close().then(
			() => process.exit(0),
			(err: unknown) => fatal(`Shutdown failed: ${String(err)}`),
		);
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}
