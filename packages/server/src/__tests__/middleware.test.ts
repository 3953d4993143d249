import { HandlerFaultError, SessionError } from "@switchyard/core";
import { describe, expect, it } from "vitest";
import {
	type Middleware,
	MiddlewareChain,
	MiddlewareSession,
	type RunChainOptions,
	runChain,
} from "../middleware";
import { Response } from "../response";
import { FakeSink, makeRequest } from "./test-helpers";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Handler that records its name, then signals `decision` (or nothing). */
function step(calls: string[], name: string, decision?: "continue" | "stop"): Middleware {
	const handler: Middleware = (_req, _res, session) => {
		calls.push(name);
		if (decision === "continue") session.next();
		if (decision === "stop") session.stop();
	};
	return handler;
}

function run(chain: MiddlewareChain, options: RunChainOptions = {}) {
	return runChain(chain, makeRequest(), new Response(new FakeSink()), options);
}

// ---------------------------------------------------------------------------
// MiddlewareSession
// ---------------------------------------------------------------------------

describe("MiddlewareSession", () => {
	it("starts unsignalled", () => {
		expect(new MiddlewareSession().decision).toBeUndefined();
	});

	it("records next() as continue and stop() as stop", () => {
		const a = new MiddlewareSession();
		a.next();
		expect(a.decision).toBe("continue");

		const b = new MiddlewareSession();
		b.stop();
		expect(b.decision).toBe("stop");
	});

	it("rejects a second signal", () => {
		const session = new MiddlewareSession();
		session.next();
		expect(() => session.stop()).toThrow(SessionError);
		expect(session.decision).toBe("continue");
	});
});

// ---------------------------------------------------------------------------
// MiddlewareChain
// ---------------------------------------------------------------------------

describe("MiddlewareChain", () => {
	it("use() returns a new chain and leaves the original untouched", () => {
		const calls: string[] = [];
		const base = MiddlewareChain.of(step(calls, "a"));
		const extended = base.use(step(calls, "b"));

		expect(base.length).toBe(1);
		expect(extended.length).toBe(2);
		expect(Object.isFrozen(extended.handlers)).toBe(true);
	});
});

// ---------------------------------------------------------------------------
// runChain
// ---------------------------------------------------------------------------

describe("runChain", () => {
	it("runs every handler once, in order, when all continue", async () => {
		const calls: string[] = [];
		const chain = MiddlewareChain.of(
			step(calls, "auth", "continue"),
			step(calls, "load", "continue"),
			step(calls, "render", "continue"),
		);

		const outcome = await run(chain);

		expect(calls).toEqual(["auth", "load", "render"]);
		expect(outcome).toEqual({ state: "done", ran: 3 });
	});

	it("invokes nothing after a handler signals stop", async () => {
		const calls: string[] = [];
		const chain = MiddlewareChain.of(
			step(calls, "a", "continue"),
			step(calls, "b", "stop"),
			step(calls, "c", "continue"),
			step(calls, "d", "continue"),
		);

		const outcome = await run(chain);

		expect(calls).toEqual(["a", "b"]);
		expect(outcome).toEqual({ state: "stopped", ran: 2, at: 1 });
	});

	it("awaits async handlers before reading their decision", async () => {
		const calls: string[] = [];
		const slow: Middleware = async (_req, _res, session) => {
			await new Promise((resolve) => setTimeout(resolve, 5));
			calls.push("slow");
			session.stop();
		};
		const chain = MiddlewareChain.of(slow, step(calls, "after", "continue"));

		const outcome = await run(chain);

		expect(calls).toEqual(["slow"]);
		expect(outcome.state).toBe("stopped");
	});

	it("continues past an unsignalled handler by default", async () => {
		const calls: string[] = [];
		const chain = MiddlewareChain.of(step(calls, "quiet"), step(calls, "next", "continue"));

		expect(await run(chain)).toEqual({ state: "done", ran: 2 });
		expect(calls).toEqual(["quiet", "next"]);
	});

	it("stops at an unsignalled handler under the stop policy", async () => {
		const calls: string[] = [];
		const chain = MiddlewareChain.of(step(calls, "quiet"), step(calls, "next", "continue"));

		expect(await run(chain, { unsignalled: "stop" })).toEqual({
			state: "stopped",
			ran: 1,
			at: 0,
		});
		expect(calls).toEqual(["quiet"]);
	});

	it("aborts on a throwing handler without rethrowing", async () => {
		const calls: string[] = [];
		const boom: Middleware = () => {
			throw new Error("kaput");
		};
		const chain = MiddlewareChain.of(step(calls, "a", "continue"), boom, step(calls, "c", "continue"));

		const outcome = await run(chain);

		expect(calls).toEqual(["a"]);
		expect(outcome.state).toBe("aborted");
		if (outcome.state !== "aborted") return;
		expect(outcome.at).toBe(1);
		expect(outcome.ran).toBe(2);
		expect(outcome.error).toBeInstanceOf(HandlerFaultError);
		expect(outcome.error.step).toBe(1);
		expect(outcome.error.message).toBe('Middleware "boom" at step 1 failed: kaput');
		expect(outcome.error.cause?.message).toBe("kaput");
	});

	it("aborts on a rejected promise", async () => {
		const failing: Middleware = async () => {
			throw new Error("async kaput");
		};
		const outcome = await run(MiddlewareChain.of(failing));

		expect(outcome.state).toBe("aborted");
		if (outcome.state === "aborted") expect(outcome.error.cause?.message).toBe("async kaput");
	});

	it("treats a double signal as a handler fault", async () => {
		const twice: Middleware = (_req, _res, session) => {
			session.next();
			session.stop();
		};
		const outcome = await run(MiddlewareChain.of(twice));

		expect(outcome.state).toBe("aborted");
		if (outcome.state === "aborted") expect(outcome.error.cause).toBeInstanceOf(SessionError);
	});

	it("starts no handler once the abort signal has fired", async () => {
		const calls: string[] = [];
		const controller = new AbortController();
		const first: Middleware = (_req, _res, session) => {
			calls.push("first");
			controller.abort();
			session.next();
		};
		const chain = MiddlewareChain.of(first, step(calls, "second", "continue"));

		const outcome = await run(chain, { signal: controller.signal });

		expect(calls).toEqual(["first"]);
		expect(outcome).toEqual({ state: "cancelled", ran: 1 });
	});

	it("hands every handler the same request and response", async () => {
		const sink = new FakeSink();
		const res = new Response(sink);
		const request = makeRequest({ route: "/x" });
		const seen: Array<[string, boolean]> = [];
		const record: Middleware = (r, out, session) => {
			seen.push([r.route, out === res]);
			session.next();
		};

		await runChain(MiddlewareChain.of(record, record), request, res);

		expect(seen).toEqual([
			["/x", true],
			["/x", true],
		]);
	});
});
