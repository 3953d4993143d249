// ---------------------------------------------------------------------------
// Middleware — per-step sessions, chains, and the chain runner
// ---------------------------------------------------------------------------

import { HandlerFaultError, SessionError, toError } from "@switchyard/core";
import type { Request } from "./request";
import type { Response } from "./response";

// ---------------------------------------------------------------------------
// Session — one-shot continue/stop signal
// ---------------------------------------------------------------------------

/** The decision a handler reports for its step. */
export type SessionDecision = "continue" | "stop";

/**
 * One-shot signal handed to a single middleware step.
 *
 * A handler calls `next()` to let the chain continue or `stop()` to end it.
 * The dispatcher reads {@link MiddlewareSession.decision} once the handler
 * settles. Signalling twice throws {@link SessionError}.
 */
export class MiddlewareSession {
	private signalled: SessionDecision | undefined;

	/** The decision sent so far, or `undefined` if the handler has not signalled. */
	get decision(): SessionDecision | undefined {
		return this.signalled;
	}

	next(): void {
		this.send("continue");
	}

	stop(): void {
		this.send("stop");
	}

	private send(decision: SessionDecision): void {
		if (this.signalled !== undefined) {
			throw new SessionError(
				`Session already signalled "${this.signalled}", cannot signal "${decision}"`,
			);
		}
		this.signalled = decision;
	}
}

// ---------------------------------------------------------------------------
// Middleware and chains
// ---------------------------------------------------------------------------

/** A middleware handler. Report the step's decision through `session`. */
export type Middleware = (
	req: Request,
	res: Response,
	session: MiddlewareSession,
) => void | Promise<void>;

/**
 * Immutable, ordered list of handlers bound to one route.
 *
 * `use()` returns a new chain, so a chain shared between routes or
 * already registered with a router never changes underneath them.
 */
export class MiddlewareChain {
	readonly handlers: readonly Middleware[];

	constructor(handlers: readonly Middleware[] = []) {
		this.handlers = Object.freeze([...handlers]);
	}

	static of(...handlers: Middleware[]): MiddlewareChain {
		return new MiddlewareChain(handlers);
	}

	/** Return a new chain with `handler` appended. */
	use(handler: Middleware): MiddlewareChain {
		return new MiddlewareChain([...this.handlers, handler]);
	}

	get length(): number {
		return this.handlers.length;
	}
}

// ---------------------------------------------------------------------------
// Chain runner
// ---------------------------------------------------------------------------

/** Fallback applied when a handler returns without signalling. */
export type UnsignalledPolicy = SessionDecision;

export interface RunChainOptions {
	/** Decision applied to a step whose handler never signalled (default "continue"). */
	unsignalled?: UnsignalledPolicy;
	/** When aborted, no further handler is started. */
	signal?: AbortSignal;
}

/**
 * How a chain execution ended.
 *
 * `ran` is the number of handlers that were invoked. `at` is the index of
 * the handler that stopped or faulted.
 */
export type ChainOutcome =
	| { state: "done"; ran: number }
	| { state: "stopped"; ran: number; at: number }
	| { state: "cancelled"; ran: number }
	| { state: "aborted"; ran: number; at: number; error: HandlerFaultError };

/**
 * Execute a middleware chain.
 *
 * Each handler receives a fresh {@link MiddlewareSession}. After the handler
 * settles its decision is read: "stop" ends the chain immediately and
 * "continue" advances to the next handler. A handler that throws or rejects
 * aborts the chain; the fault is returned, never rethrown.
 */
export async function runChain(
	chain: MiddlewareChain,
	req: Request,
	res: Response,
	options: RunChainOptions = {},
): Promise<ChainOutcome> {
	const policy = options.unsignalled ?? "continue";
	const handlers = chain.handlers;

	for (let i = 0; i < handlers.length; i++) {
		if (options.signal?.aborted) {
			return { state: "cancelled", ran: i };
		}

		const handler = handlers[i];
		if (handler === undefined) break;
		const session = new MiddlewareSession();

		try {
			await handler(req, res, session);
		} catch (err) {
			const cause = toError(err);
			const name = handler.name || "anonymous";
			return {
				state: "aborted",
				ran: i + 1,
				at: i,
				error: new HandlerFaultError(
					`Middleware "${name}" at step ${i} failed: ${cause.message}`,
					i,
					cause,
				),
			};
		}

		if ((session.decision ?? policy) === "stop") {
			return { state: "stopped", ran: i + 1, at: i };
		}
	}

	return { state: "done", ran: handlers.length };
}
