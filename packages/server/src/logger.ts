// ---------------------------------------------------------------------------
// Structured Logger — JSON-lines logger for the dispatcher
// ---------------------------------------------------------------------------

/** Supported log levels, ordered by severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Narrow an arbitrary string to a {@link LogLevel}, or null when unknown. */
export function parseLogLevel(value: string): LogLevel | null {
	switch (value) {
		case "debug":
		case "info":
		case "warn":
		case "error":
			return value;
		default:
			return null;
	}
}

/**
 * Structured logger that outputs JSON lines to stdout.
 *
 * Supports log-level filtering and child loggers with bound context.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const reqLogger = logger.child({ requestId: "abc-123" });
 * reqLogger.info("route matched", { mountPath: "/api" });
 * // => {"level":"info","msg":"route matched","ts":"...","requestId":"abc-123","mountPath":"/api"}
 * ```
 */
export class Logger {
	readonly level: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function — defaults to stdout, overridable for testing. */
	private readonly writeFn: (line: string) => void;

	constructor(
		level: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.level = level;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stdout.write(`${line}\n`));
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/** Whether a message at `level` would be written. */
	isEnabled(level: LogLevel): boolean {
		return LEVEL_VALUE[level] >= LEVEL_VALUE[this.level];
	}

	/**
	 * Create a child logger with additional bound context.
	 *
	 * The child inherits the parent's level and write function; child
	 * bindings win over parent bindings with the same key.
	 */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.level, { ...this.bindings, ...bindings }, this.writeFn);
	}

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (!this.isEnabled(level)) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
			...data,
		};

		this.writeFn(JSON.stringify(entry));
	}
}

/** Serialise an error into plain log fields. */
export function errorFields(err: Error): Record<string, unknown> {
	const fields: Record<string, unknown> = { error: err.message, errorName: err.name };
	if ("code" in err && typeof err.code === "string") fields.errorCode = err.code;
	if (err.cause instanceof Error) fields.cause = err.cause.message;
	return fields;
}
