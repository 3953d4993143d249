import { readFileSync } from "node:fs";
import { Err, Ok, type Result, SwitchyardError, toError } from "@switchyard/core";
import {
	DEFAULT_ADDRESS,
	DEFAULT_MAX_BODY_BYTES,
	DEFAULT_PORT,
	DEFAULT_WORKERS,
	type LogLevel,
	parseLogLevel,
	type ServerConfig,
	type UnsignalledPolicy,
} from "@switchyard/server";

/** Invalid flag, environment variable or config file */
export class ConfigError extends SwitchyardError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_CONFIG", cause);
	}
}

/** Fully resolved settings for `switchyard serve`. */
export interface ServeConfig extends ServerConfig {
	port: number;
	address: string;
	workers: number;
	maxBodyBytes: number;
	unsignalled: UnsignalledPolicy;
	logLevel: LogLevel;
}

/** Where one setting may come from, highest precedence first. */
interface Setting {
	key: string;
	flag?: string;
	env?: string;
}

/** A raw value and a description of where it was found. */
interface Found {
	value: unknown;
	from: string;
}

type Env = Record<string, string | undefined>;

/** Reads every source for one setting and returns the winning raw value. */
type Lookup = (setting: Setting) => Found | undefined;

/**
 * Resolve serve settings from flags, environment and an optional JSON file.
 *
 * Precedence is flags, then `SWITCHYARD_*` variables, then the file named by
 * `--config`, then defaults. Values that do not parse are errors.
 */
export function resolveServeConfig(
	flags: Record<string, string>,
	env: Env = process.env,
): Result<ServeConfig, ConfigError> {
	const path = flags.config;
	let file: Record<string, unknown> = {};
	if (path !== undefined) {
		const loaded = loadConfigFile(path);
		if (!loaded.ok) return loaded;
		file = loaded.value;
	}

	const lookup: Lookup = (setting) => {
		const flag = setting.flag === undefined ? undefined : flags[setting.flag];
		if (setting.flag !== undefined && flag !== undefined) {
			return { value: flag, from: `--${setting.flag}` };
		}
		const variable = setting.env === undefined ? undefined : env[setting.env];
		if (setting.env !== undefined && variable !== undefined && variable !== "") {
			return { value: variable, from: setting.env };
		}
		if (setting.key in file) {
			return { value: file[setting.key], from: `"${setting.key}" in ${path ?? "config file"}` };
		}
		return undefined;
	};

	const port = integer(lookup({ key: "port", flag: "port", env: "SWITCHYARD_PORT" }), 0, 65_535);
	if (!port.ok) return port;
	const workers = integer(lookup({ key: "workers", flag: "workers", env: "SWITCHYARD_WORKERS" }), 1);
	if (!workers.ok) return workers;
	const maxQueue = integer(
		lookup({ key: "maxQueue", flag: "max-queue", env: "SWITCHYARD_MAX_QUEUE" }),
		0,
	);
	if (!maxQueue.ok) return maxQueue;
	const requestTimeoutMs = integer(
		lookup({ key: "requestTimeoutMs", flag: "timeout", env: "SWITCHYARD_REQUEST_TIMEOUT_MS" }),
		1,
	);
	if (!requestTimeoutMs.ok) return requestTimeoutMs;
	const maxBodyBytes = integer(lookup({ key: "maxBodyBytes" }), 1);
	if (!maxBodyBytes.ok) return maxBodyBytes;

	const address = text(lookup({ key: "address", flag: "address", env: "SWITCHYARD_ADDRESS" }));
	if (!address.ok) return address;
	const logLevel = oneOf(
		lookup({ key: "logLevel", flag: "log-level", env: "SWITCHYARD_LOG_LEVEL" }),
		"debug, info, warn, error",
		parseLogLevel,
	);
	if (!logLevel.ok) return logLevel;
	const unsignalled = oneOf(lookup({ key: "unsignalled" }), "continue, stop", parseUnsignalled);
	if (!unsignalled.ok) return unsignalled;

	return Ok({
		port: port.value ?? DEFAULT_PORT,
		address: address.value ?? DEFAULT_ADDRESS,
		workers: workers.value ?? DEFAULT_WORKERS,
		maxQueue: maxQueue.value,
		requestTimeoutMs: requestTimeoutMs.value,
		maxBodyBytes: maxBodyBytes.value ?? DEFAULT_MAX_BODY_BYTES,
		unsignalled: unsignalled.value ?? "continue",
		logLevel: logLevel.value ?? "info",
	});
}

/** Read a JSON config file into a plain object. */
export function loadConfigFile(path: string): Result<Record<string, unknown>, ConfigError> {
	let raw: string;
	try {
		raw = readFileSync(path, "utf-8");
	} catch (err) {
		const cause = toError(err);
		return Err(new ConfigError(`Could not read config file ${path}: ${cause.message}`, cause));
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err) {
		return Err(new ConfigError(`Config file ${path} is not valid JSON`, toError(err)));
	}

	if (!isRecord(parsed)) {
		return Err(new ConfigError(`Config file ${path} must contain a JSON object`));
	}
	return Ok(parsed);
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

function integer(
	found: Found | undefined,
	min: number,
	max = Number.MAX_SAFE_INTEGER,
): Result<number | undefined, ConfigError> {
	if (found === undefined) return Ok(undefined);
	const { value, from } = found;
	let n = Number.NaN;
	if (typeof value === "number") n = value;
	else if (typeof value === "string" && /^\d+$/.test(value)) n = Number(value);
	if (!Number.isInteger(n) || n < min || n > max) {
		const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
		return Err(new ConfigError(`Invalid ${from}: expected an integer ${range}, got ${JSON.stringify(value)}`));
	}
	return Ok(n);
}

function text(found: Found | undefined): Result<string | undefined, ConfigError> {
	if (found === undefined) return Ok(undefined);
	const { value, from } = found;
	if (typeof value !== "string" || value.trim() === "") {
		return Err(new ConfigError(`Invalid ${from}: expected a non-empty string, got ${JSON.stringify(value)}`));
	}
	return Ok(value.trim());
}

function oneOf<T>(
	found: Found | undefined,
	choices: string,
	parse: (value: string) => T | null,
): Result<T | undefined, ConfigError> {
	if (found === undefined) return Ok(undefined);
	const { value, from } = found;
	const parsed = typeof value === "string" ? parse(value) : null;
	if (parsed === null) {
		return Err(new ConfigError(`Invalid ${from}: expected one of ${choices}, got ${JSON.stringify(value)}`));
	}
	return Ok(parsed);
}

function parseUnsignalled(value: string): UnsignalledPolicy | null {
	return value === "continue" || value === "stop" ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
