import type { IncomingHttpHeaders, OutgoingHttpHeader } from "node:http";
import { request as httpRequest, type IncomingMessage } from "node:http";
import { Readable } from "node:stream";
import { type LogEntry, Logger } from "../logger";
import { Request } from "../request";
import type { ResponseSink } from "../response";

// ---------------------------------------------------------------------------
// In-memory request / response stand-ins
// ---------------------------------------------------------------------------

/** Records everything written to it, in place of a `ServerResponse`. */
export class FakeSink implements ResponseSink {
	statusCode = 200;
	headersSent = false;
	writableEnded = false;
	/** Set once `destroy` is called: the error passed, or true. */
	destroyed: Error | true | null = null;
	readonly headers: Record<string, OutgoingHttpHeader> = {};
	private readonly chunks: string[] = [];

	setHeader(name: string, value: OutgoingHttpHeader): this {
		this.headers[name.toLowerCase()] = value;
		return this;
	}

	write(chunk: string | Uint8Array): boolean {
		this.writeHead();
		this.chunks.push(decode(chunk));
		return true;
	}

	end(chunk?: string | Uint8Array): this {
		this.writeHead();
		if (chunk !== undefined) this.chunks.push(decode(chunk));
		this.writableEnded = true;
		return this;
	}

	destroy(error?: Error): this {
		this.destroyed = error ?? true;
		return this;
	}

	/** Flush headers, rejecting a status outside 100-999 as `ServerResponse` does. */
	private writeHead(): void {
		if (this.headersSent) return;
		if (this.statusCode < 100 || this.statusCode > 999) {
			throw new RangeError(`Invalid status code: ${this.statusCode}`);
		}
		this.headersSent = true;
	}

	get body(): string {
		return this.chunks.join("");
	}
}

function decode(chunk: string | Uint8Array): string {
	return typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8");
}

/** Build an inbound request stream from a method, url and optional body. */
export function incoming(
	method: string | undefined,
	url: string | undefined,
	body?: string,
	headers: IncomingHttpHeaders = {},
) {
	const stream = Readable.from(body === undefined ? [] : [Buffer.from(body)]);
	return Object.assign(stream, { method, url, headers });
}

/** A parsed request for handler-level tests. */
export function makeRequest(overrides: { method?: string; route?: string } = {}): Request {
	return new Request({
		id: "req-1",
		method: overrides.method ?? "GET",
		route: overrides.route ?? "/",
		query: {},
		headers: {},
		body: Buffer.alloc(0),
	});
}

/** Logger that collects parsed entries instead of writing to stdout. */
export function createTestLogger(level: "debug" | "info" | "warn" | "error" = "debug") {
	const lines: LogEntry[] = [];
	const logger = new Logger(level, {}, (line) => {
		lines.push(JSON.parse(line) as LogEntry);
	});
	return { logger, lines };
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

// ---------------------------------------------------------------------------
// HTTP client
// ---------------------------------------------------------------------------

/** Make an HTTP request and return { status, headers, body }. */
export function req(
	url: string,
	options: { method?: string; headers?: Record<string, string>; body?: string } = {},
): Promise<{ status: number; headers: Record<string, string>; body: string }> {
	return new Promise((resolve, reject) => {
		const parsed = new URL(url);
		const r = httpRequest(
			{
				hostname: parsed.hostname,
				port: parsed.port,
				path: parsed.pathname + parsed.search,
				method: options.method ?? "GET",
				headers: options.headers,
				agent: false,
			},
			(res: IncomingMessage) => {
				const chunks: Buffer[] = [];
				res.on("data", (chunk: Buffer) => chunks.push(chunk));
				res.on("end", () => {
					const body = Buffer.concat(chunks).toString("utf-8");
					const headers: Record<string, string> = {};
					for (const [key, value] of Object.entries(res.headers)) {
						if (typeof value === "string") {
							headers[key] = value;
						}
					}
					resolve({ status: res.statusCode ?? 0, headers, body });
				});
			},
		);
		r.on("error", reject);
		if (options.body) {
			r.write(options.body);
		}
		r.end();
	});
}
