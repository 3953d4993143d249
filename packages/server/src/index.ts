export { errorFields, type LogEntry, Logger, type LogLevel, parseLogLevel } from "./logger";
export {
	Counter,
	DispatchMetrics,
	Gauge,
	Histogram,
	type Labels,
} from "./metrics";
export {
	type ChainOutcome,
	type Middleware,
	MiddlewareChain,
	MiddlewareSession,
	type RunChainOptions,
	runChain,
	type SessionDecision,
	type UnsignalledPolicy,
} from "./middleware";
export {
	isUnderMount,
	type MountEntry,
	MountRegistry,
	normalizeMountPath,
	type RegistrySnapshot,
	type Resolution,
} from "./registry";
export {
	DEFAULT_MAX_BODY_BYTES,
	type IncomingRequest,
	type ParseOptions,
	parseRequest,
	Request,
	type RouteParams,
} from "./request";
export { Response, type ResponseSink, sendError } from "./response";
export {
	ANY_METHOD,
	type CompiledPattern,
	compilePattern,
	matchPattern,
	type RouteInfo,
	type RouteLookup,
	Router,
	splitPath,
} from "./router";
export {
	DEFAULT_ADDRESS,
	DEFAULT_PORT,
	type DispatchResult,
	type ListenInfo,
	Server,
	type ServerConfig,
} from "./server";
export { createStatusRouter } from "./status";
export {
	DEFAULT_WORKERS,
	type PoolStats,
	type Task,
	WorkerPool,
	type WorkerPoolConfig,
} from "./worker-pool";
