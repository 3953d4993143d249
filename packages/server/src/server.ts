// ---------------------------------------------------------------------------
// Server — mount registry, dispatch loop and listener
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "node:http";
import type { Duplex } from "node:stream";
import {
	API_ERROR_CODES,
	BindError,
	DeadlineExceededError,
	type NotFoundError,
	type NotFoundReason,
	type Result,
	statusForError,
	type SwitchyardError,
	toError,
} from "@switchyard/core";
import { errorFields, Logger, type LogLevel } from "./logger";
import { DispatchMetrics } from "./metrics";
import { type ChainOutcome, type MiddlewareChain, runChain, type UnsignalledPolicy } from "./middleware";
import { MountRegistry, type RegistrySnapshot, type Resolution } from "./registry";
import { DEFAULT_MAX_BODY_BYTES, type IncomingRequest, parseRequest, type Request } from "./request";
import { Response, type ResponseSink, sendError } from "./response";
import type { Router } from "./router";
import { DEFAULT_WORKERS, type PoolStats, WorkerPool } from "./worker-pool";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configuration for the dispatcher. Every field is optional. */
export interface ServerConfig {
	/** Port to listen on (default 3000). */
	port?: number;
	/** Address to bind (default loopback, 127.0.0.1). */
	address?: string;
	/** Worker count for the dispatch pool (default 4). */
	workers?: number;
	/** Queued requests allowed before new ones get a 503 (default unbounded). */
	maxQueue?: number;
	/** Per-request deadline in milliseconds; a 504 is sent when it passes. */
	requestTimeoutMs?: number;
	/** Maximum request body size in bytes (default 1 MiB). */
	maxBodyBytes?: number;
	/** Decision applied when a handler returns without signalling (default "continue"). */
	unsignalled?: UnsignalledPolicy;
	/** Minimum log level for the default logger (default "info"). */
	logLevel?: LogLevel;
	/** Logger to use instead of the default stdout logger. */
	logger?: Logger;
}

/** Where the server ended up listening. */
export interface ListenInfo {
	address: string;
	port: number;
}

/** What happened to one dispatched request. */
export interface DispatchResult {
	status: number;
	outcome?: ChainOutcome;
	error?: SwitchyardError;
	/** True when the response was cut short after its headers went out. */
	aborted?: boolean;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_ADDRESS = "127.0.0.1";

const MALFORMED_RESPONSE = "HTTP/1.1 400 Bad Request\r\nConnection: close\r\nContent-Length: 0\r\n\r\n";

const MISS_MESSAGE: Record<NotFoundReason, string> = {
	"no-mount": "no router mounted for path",
	"no-route": "no route matched in router",
	"method-not-allowed": "path matched under another method",
};

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

/**
 * HTTP dispatcher: mounted routers, per-route middleware chains, and a
 * fixed worker pool that runs each accepted request.
 *
 * @example
 * ```ts
 * const api = new Router().get("/users/:id", auth, loadUser);
 * const server = new Server({ workers: 8 });
 * server.register("/api", api);
 * await server.listen(8080);
 * ```
 */
export class Server {
	readonly metrics = new DispatchMetrics();
	private readonly config: ServerConfig;
	private readonly logger: Logger;
	private readonly registry = new MountRegistry();
	private httpServer: HttpServer | null = null;
	private pool: WorkerPool | null = null;
	private bound: ListenInfo | null = null;

	constructor(config: ServerConfig = {}) {
		this.config = config;
		this.logger = config.logger ?? new Logger(config.logLevel ?? "info");
	}

	// -----------------------------------------------------------------------
	// Registry
	// -----------------------------------------------------------------------

	/**
	 * Mount `router` under `mountPath`. `"/"` mounts at the root; the last
	 * registration for a prefix wins. Safe to call while serving.
	 */
	register(mountPath: string, router: Router): this {
		const snapshot = this.registry.register(mountPath, router);
		this.logger.debug("router registered", { mountPath, version: snapshot.version });
		return this;
	}

	unregister(mountPath: string): boolean {
		return this.registry.unregister(mountPath);
	}

	/** Resolve a method and path to its chain and parameters. */
	resolve(method: string, path: string): Result<Resolution, NotFoundError> {
		return this.registry.resolve(method, path);
	}

	mounts(): RegistrySnapshot {
		return this.registry.snapshot();
	}

	/** Worker pool statistics, or null before `listen`. */
	stats(): PoolStats | null {
		return this.pool?.stats() ?? null;
	}

	/** The bound port (available after `listen`). */
	get port(): number {
		return this.bound?.port ?? this.config.port ?? DEFAULT_PORT;
	}

	// -----------------------------------------------------------------------
	// Dispatch
	// -----------------------------------------------------------------------

	/**
	 * Handle one request end to end: parse, resolve, run the chain, close.
	 *
	 * Never rejects for request-level failures; they become error responses.
	 */
	async dispatch(incoming: IncomingRequest, sink: ResponseSink): Promise<DispatchResult> {
		const started = performance.now();
		const requestId = randomUUID();
		const res = new Response(sink);
		const log = this.logger.child({ requestId, method: incoming.method, url: incoming.url });

		let result: DispatchResult;
		try {
			result = await this.handle(incoming, res, requestId, log);
			res.end();
		} catch (err) {
			result = this.recover(res, toError(err), requestId, log);
		}

		const status = result.aborted ? "aborted" : String(res.statusCode);
		this.metrics.requestsTotal.inc({ status });
		this.metrics.requestDuration.observe({}, performance.now() - started);
		return { ...result, status: res.statusCode };
	}

	private async handle(
		incoming: IncomingRequest,
		res: Response,
		requestId: string,
		log: Logger,
	): Promise<DispatchResult> {
		const parsed = await parseRequest(incoming, {
			maxBodyBytes: this.config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
			id: requestId,
		});
		if (!parsed.ok) {
			log.warn("request rejected by parser", errorFields(parsed.error));
			return this.fail(res, parsed.error, requestId);
		}
		const request = parsed.value;

		const resolved = this.registry.resolve(request.method, request.route);
		if (!resolved.ok) {
			log.info(MISS_MESSAGE[resolved.error.reason], { route: request.route });
			return this.fail(res, resolved.error, requestId);
		}

		const { chain, params, mountPath, pattern } = resolved.value;
		log.debug("route matched", { mountPath, pattern, handlers: chain.length });

		const outcome = await this.execute(chain, request.withParams(params), res, log);

		if (outcome instanceof DeadlineExceededError) {
			log.warn("request deadline exceeded", { timeoutMs: outcome.timeoutMs });
			return this.fail(res, outcome, requestId);
		}

		if (outcome.state === "aborted") {
			const partial = res.headersSent;
			this.metrics.handlerFaults.inc();
			log.error("middleware handler failed", {
				step: outcome.at,
				partial,
				...errorFields(outcome.error),
			});
			return {
				...this.fail(res, outcome.error, requestId, "Internal server error"),
				outcome,
				aborted: partial,
			};
		}

		return { status: res.statusCode, outcome };
	}

	/** Run the chain, racing it against the configured deadline. */
	private async execute(
		chain: MiddlewareChain,
		req: Request,
		res: Response,
		log: Logger,
	): Promise<ChainOutcome | DeadlineExceededError> {
		const unsignalled = this.config.unsignalled;
		const timeoutMs = this.config.requestTimeoutMs;
		if (timeoutMs === undefined) {
			return runChain(chain, req, res, { unsignalled });
		}

		const controller = new AbortController();
		const running = runChain(chain, req, res, { unsignalled, signal: controller.signal });
		let timer: ReturnType<typeof setTimeout> | undefined;
		const deadline = new Promise<DeadlineExceededError>((resolve) => {
			timer = setTimeout(() => {
				resolve(new DeadlineExceededError(`Request exceeded ${timeoutMs}ms deadline`, timeoutMs));
			}, timeoutMs);
		});

		try {
			const first = await Promise.race([running, deadline]);
			if (first instanceof DeadlineExceededError) {
				controller.abort();
				void running.then((late) => {
					log.debug("chain settled after deadline", { state: late.state, ran: late.ran });
				});
			}
			return first;
		} finally {
			clearTimeout(timer);
		}
	}

	/**
	 * Handle a response that could not be written, such as one whose handler
	 * left an invalid status. Replaces it with a 500 while nothing has been
	 * sent, and otherwise drops the connection.
	 */
	private recover(res: Response, error: Error, requestId: string, log: Logger): DispatchResult {
		this.metrics.handlerFaults.inc();
		log.error("response could not be written", { partial: res.headersSent, ...errorFields(error) });

		if (!res.headersSent) {
			try {
				sendError(res, "Internal server error", 500, {
					code: API_ERROR_CODES.INTERNAL_ERROR,
					requestId,
				});
				return { status: res.statusCode };
			} catch (retryErr) {
				log.error("error response could not be written", errorFields(toError(retryErr)));
			}
		}

		// No error argument: an errored socket would reach the clientError handler.
		res.destroy();
		return { status: res.statusCode, aborted: true };
	}

	/** Send an error response, or end a response whose headers already went out. */
	private fail(
		res: Response,
		error: SwitchyardError,
		requestId: string,
		message = error.message,
	): DispatchResult {
		const { status, code } = statusForError(error);
		if (res.headersSent) {
			res.end();
		} else {
			sendError(res, message, status, { code, requestId });
		}
		return { status: res.statusCode, error };
	}

	// -----------------------------------------------------------------------
	// Listener
	// -----------------------------------------------------------------------

	/**
	 * Bind and start accepting connections.
	 *
	 * Rejects with {@link BindError} when the address cannot be bound. Once
	 * bound, listener errors are logged and serving continues.
	 */
	async listen(
		port = this.config.port ?? DEFAULT_PORT,
		address = this.config.address ?? DEFAULT_ADDRESS,
		workers = this.config.workers ?? DEFAULT_WORKERS,
	): Promise<ListenInfo> {
		if (this.httpServer) {
			throw new Error(`Server is already listening on ${address}:${this.port}`);
		}

		const pool = new WorkerPool({
			workers,
			maxQueue: this.config.maxQueue,
			logger: this.logger.child({ component: "worker-pool" }),
		});
		const httpServer = createServer((req, res) => {
			this.accept(pool, req, res);
		});
		httpServer.on("clientError", (err, socket) => {
			this.rejectMalformed(err, socket);
		});

		try {
			await new Promise<void>((resolve, reject) => {
				const onError = (err: Error) => {
					httpServer.off("listening", onListening);
					reject(new BindError(`Could not bind ${address}:${port}: ${err.message}`, err));
				};
				const onListening = () => {
					httpServer.off("error", onError);
					resolve();
				};
				httpServer.once("error", onError);
				httpServer.once("listening", onListening);
				httpServer.listen(port, address);
			});
		} catch (err) {
			await pool.close();
			throw err;
		}

		httpServer.on("error", (err) => {
			this.logger.error("listener error, still accepting", errorFields(err));
		});

		const addr = httpServer.address();
		this.bound = {
			address,
			port: addr !== null && typeof addr === "object" ? addr.port : port,
		};
		this.httpServer = httpServer;
		this.pool = pool;
		this.logger.info("listening", { ...this.bound, workers });
		return this.bound;
	}

	/** Stop accepting, let queued requests finish, and release the port. */
	async close(): Promise<void> {
		const httpServer = this.httpServer;
		const pool = this.pool;
		if (!httpServer || !pool) return;

		const closed = new Promise<void>((resolve, reject) => {
			httpServer.close((err) => (err ? reject(err) : resolve()));
		});
		await pool.close();
		await closed;

		this.httpServer = null;
		this.pool = null;
		this.bound = null;
		this.logger.info("stopped");
	}

	private accept(pool: WorkerPool, req: IncomingMessage, res: ServerResponse): void {
		const queued = pool.execute(async () => {
			// Sampled here, once this task counts as busy.
			this.metrics.samplePool(pool.stats());
			await this.dispatch(req, res);
		});
		if (queued.ok) return;

		this.metrics.samplePool(pool.stats());
		this.metrics.rejectedTotal.inc({ reason: "unavailable" });
		this.logger.warn("request rejected", {
			method: req.method,
			url: req.url,
			...errorFields(queued.error),
		});
		req.resume();
		const { status, code } = statusForError(queued.error);
		sendError(new Response(res), queued.error.message, status, { code });
	}

	private rejectMalformed(err: Error, socket: Duplex): void {
		this.metrics.rejectedTotal.inc({ reason: "malformed" });
		this.logger.warn("malformed request", errorFields(err));
		if (socket.writable) {
			socket.end(MALFORMED_RESPONSE);
		} else {
			socket.destroy();
		}
	}
}
