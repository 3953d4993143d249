// ---------------------------------------------------------------------------
// Response — write half of one connection
// ---------------------------------------------------------------------------

import type { OutgoingHttpHeader } from "node:http";

/**
 * The subset of `node:http`'s `ServerResponse` the dispatcher writes through.
 *
 * Kept structural so tests can record writes without a socket.
 */
export interface ResponseSink {
	statusCode: number;
	readonly headersSent: boolean;
	readonly writableEnded: boolean;
	setHeader(name: string, value: OutgoingHttpHeader): unknown;
	write(chunk: string | Uint8Array): boolean;
	end(chunk?: string | Uint8Array): unknown;
	destroy(error?: Error): unknown;
}

/**
 * Response bound to a single connection and owned by one handler chain.
 *
 * Every response carries `Connection: close`; connections are never reused.
 * Status and header changes after the headers have been sent, and writes
 * after the response has ended, are ignored.
 */
export class Response {
	private readonly sink: ResponseSink;

	constructor(sink: ResponseSink) {
		this.sink = sink;
		if (!sink.headersSent) sink.setHeader("Connection", "close");
	}

	get statusCode(): number {
		return this.sink.statusCode;
	}

	get headersSent(): boolean {
		return this.sink.headersSent;
	}

	/** True once the response has been ended. */
	get closed(): boolean {
		return this.sink.writableEnded;
	}

	status(code: number): this {
		if (!this.sink.headersSent) this.sink.statusCode = code;
		return this;
	}

	header(name: string, value: OutgoingHttpHeader): this {
		if (!this.sink.headersSent) this.sink.setHeader(name, value);
		return this;
	}

	/** Write a body chunk; headers are flushed on the first write. */
	write(chunk: string | Uint8Array): this {
		if (!this.closed) this.sink.write(chunk);
		return this;
	}

	/** Send `body` and end the response. */
	send(body: string | Uint8Array, status?: number): void {
		if (this.closed) return;
		if (status !== undefined) this.status(status);
		this.sink.end(body);
	}

	/** Send `body` as JSON and end the response. */
	json(body: unknown, status?: number): void {
		this.header("Content-Type", "application/json");
		this.send(JSON.stringify(body), status);
	}

	end(): void {
		if (!this.closed) this.sink.end();
	}

	/** Drop the connection without completing the response. */
	destroy(error?: Error): void {
		this.sink.destroy(error);
	}
}

/** Send a JSON error response with a structured error code and request ID. */
export function sendError(
	res: Response,
	message: string,
	status: number,
	opts?: { code?: string; requestId?: string },
): void {
	const body: Record<string, string> = { error: message };
	if (opts?.code) body.code = opts.code;
	if (opts?.requestId) body.requestId = opts.requestId;
	res.json(body, status);
}
