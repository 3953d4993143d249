// ---------------------------------------------------------------------------
// Request — parsed, immutable view of one inbound HTTP request
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";
import { Err, Ok, ParseError, PayloadTooLargeError, type Result, toError } from "@switchyard/core";

/** Route parameters bound by the router, e.g. `{ id: "42" }` for `/users/:id`. */
export type RouteParams = Readonly<Record<string, string>>;

/**
 * Minimal shape of an inbound request stream.
 *
 * `node:http`'s `IncomingMessage` satisfies it; tests can build one from
 * `Readable.from()`.
 */
export interface IncomingRequest extends AsyncIterable<Buffer | string> {
	readonly method?: string;
	readonly url?: string;
	readonly headers: IncomingHttpHeaders;
}

export interface ParseOptions {
	/** Maximum accepted body size in bytes. */
	maxBodyBytes: number;
	/** Request id to assign; generated when omitted. */
	id?: string;
}

/** Default body limit: 1 MiB. */
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const METHOD_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

interface RequestInit {
	id: string;
	method: string;
	route: string;
	query: Readonly<Record<string, string>>;
	headers: IncomingHttpHeaders;
	body: Buffer;
	params?: RouteParams;
}

/**
 * Immutable inbound request.
 *
 * `route` is the request path without its query string. `params` is empty
 * until the router binds them via {@link Request.withParams}.
 */
export class Request {
	readonly id: string;
	readonly method: string;
	readonly route: string;
	readonly query: Readonly<Record<string, string>>;
	readonly headers: IncomingHttpHeaders;
	readonly body: Buffer;
	readonly params: RouteParams;

	constructor(init: RequestInit) {
		this.id = init.id;
		this.method = init.method;
		this.route = init.route;
		this.query = Object.freeze({ ...init.query });
		this.headers = init.headers;
		this.body = init.body;
		this.params = Object.freeze({ ...init.params });
		Object.freeze(this);
	}

	/** Return a copy of this request with `params` bound. */
	withParams(params: RouteParams): Request {
		return new Request({
			id: this.id,
			method: this.method,
			route: this.route,
			query: this.query,
			headers: this.headers,
			body: this.body,
			params,
		});
	}

	/** First value of a header (case-insensitive), or undefined. */
	header(name: string): string | undefined {
		const value = this.headers[name.toLowerCase()];
		return Array.isArray(value) ? value[0] : value;
	}

	/** Body decoded as UTF-8. */
	text(): string {
		return this.body.toString("utf-8");
	}

	/** Body parsed as JSON. An empty body is a parse failure. */
	json(): Result<unknown, ParseError> {
		try {
			return Ok(JSON.parse(this.text()) as unknown);
		} catch (err) {
			return Err(new ParseError("Request body is not valid JSON", toError(err)));
		}
	}
}

/**
 * Read and validate an inbound request.
 *
 * Rejects a missing or malformed method, a request target that is not an
 * origin-form path, an aborted body stream, and bodies over `maxBodyBytes`.
 */
export async function parseRequest(
	incoming: IncomingRequest,
	options: ParseOptions,
): Promise<Result<Request, ParseError | PayloadTooLargeError>> {
	const method = incoming.method;
	if (!method || !METHOD_TOKEN.test(method)) {
		return Err(new ParseError(`Invalid request method: ${method ?? "(none)"}`));
	}

	const rawUrl = incoming.url ?? "";
	if (!rawUrl.startsWith("/")) {
		return Err(new ParseError(`Invalid request target: ${rawUrl || "(empty)"}`));
	}

	let url: URL;
	try {
		// Prefixed with a fixed origin so a leading "//" stays part of the path.
		url = new URL(`http://localhost${rawUrl}`);
	} catch (err) {
		return Err(new ParseError(`Invalid request target: ${rawUrl}`, toError(err)));
	}

	const declared = incoming.headers["content-length"];
	if (declared !== undefined && Number(declared) > options.maxBodyBytes) {
		return Err(tooLarge(options.maxBodyBytes));
	}

	// Oversized bodies are drained rather than cut off so the socket stays
	// usable for the 413 response.
	const chunks: Buffer[] = [];
	let size = 0;
	try {
		for await (const chunk of incoming) {
			const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
			size += buf.length;
			if (size <= options.maxBodyBytes) chunks.push(buf);
		}
	} catch (err) {
		return Err(new ParseError("Request body could not be read", toError(err)));
	}
	if (size > options.maxBodyBytes) {
		return Err(tooLarge(options.maxBodyBytes));
	}

	const query = Object.fromEntries(
		[...new Set(url.searchParams.keys())].map((key) => [key, url.searchParams.get(key) ?? ""]),
	);

	return Ok(
		new Request({
			id: options.id ?? randomUUID(),
			method: method.toUpperCase(),
			route: url.pathname,
			query,
			headers: incoming.headers,
			body: Buffer.concat(chunks),
		}),
	);
}

function tooLarge(limit: number): PayloadTooLargeError {
	return new PayloadTooLargeError(`Request body exceeds ${limit} bytes`, limit);
}
