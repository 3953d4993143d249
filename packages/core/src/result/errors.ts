/** Base error class for all Switchyard errors */
export class SwitchyardError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Why a request failed to resolve to a route. */
export type NotFoundReason = "no-mount" | "no-route" | "method-not-allowed";

/** No mount prefix or no route within the matched router accepts the request */
export class NotFoundError extends SwitchyardError {
	readonly reason: NotFoundReason;

	constructor(message: string, reason: NotFoundReason, cause?: Error) {
		super(message, "NOT_FOUND", cause);
		this.reason = reason;
	}
}

/** Malformed inbound request */
export class ParseError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "PARSE_ERROR", cause);
	}
}

/** Request body exceeds the configured limit */
export class PayloadTooLargeError extends SwitchyardError {
	readonly limit: number;

	constructor(message: string, limit: number, cause?: Error) {
		super(message, "PAYLOAD_TOO_LARGE", cause);
		this.limit = limit;
	}
}

/** Transient failure — the request may be retried later. */
export class UnavailableError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "UNAVAILABLE", cause);
	}
}

/** A middleware handler threw or rejected mid-chain */
export class HandlerFaultError extends SwitchyardError {
	/** Zero-based position of the failing handler in its chain. */
	readonly step: number;

	constructor(message: string, step: number, cause?: Error) {
		super(message, "HANDLER_FAULT", cause);
		this.step = step;
	}
}

/** The per-request deadline elapsed before the chain finished */
export class DeadlineExceededError extends SwitchyardError {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number, cause?: Error) {
		super(message, "DEADLINE_EXCEEDED", cause);
		this.timeoutMs = timeoutMs;
	}
}

/** A middleware session received more than one signal */
export class SessionError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "SESSION_ALREADY_SIGNALLED", cause);
	}
}

/** The listening socket could not be bound */
export class BindError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "BIND_FAILED", cause);
	}
}

/** Structured error codes for API responses. */
export const API_ERROR_CODES = {
	NOT_FOUND: "NOT_FOUND",
	PARSE_ERROR: "PARSE_ERROR",
	PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
	UNAVAILABLE: "UNAVAILABLE",
	DEADLINE_EXCEEDED: "DEADLINE_EXCEEDED",
	INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

/** A single error code value from {@link API_ERROR_CODES}. */
export type ApiErrorCode = (typeof API_ERROR_CODES)[keyof typeof API_ERROR_CODES];

/** HTTP status and client-facing code for an error surfaced to a client. */
export interface ErrorStatus {
	status: number;
	code: ApiErrorCode;
}

/**
 * Map an error to the status and code sent to the client.
 *
 * Anything that is not a known client-facing error is a 500.
 */
export function statusForError(err: Error): ErrorStatus {
	if (err instanceof NotFoundError) return { status: 404, code: API_ERROR_CODES.NOT_FOUND };
	if (err instanceof ParseError) return { status: 400, code: API_ERROR_CODES.PARSE_ERROR };
	if (err instanceof PayloadTooLargeError) {
		return { status: 413, code: API_ERROR_CODES.PAYLOAD_TOO_LARGE };
	}
	if (err instanceof UnavailableError) return { status: 503, code: API_ERROR_CODES.UNAVAILABLE };
	if (err instanceof DeadlineExceededError) {
		return { status: 504, code: API_ERROR_CODES.DEADLINE_EXCEEDED };
	}
	return { status: 500, code: API_ERROR_CODES.INTERNAL_ERROR };
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
