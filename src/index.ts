// ── Shared kernel ────────────────────────────────────────────────────
export {
	type PositionId,
	type InstrumentId,
	type AccountId,
	positionId,
	instrumentId,
	accountId,
	idToNumber,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	Decimal,
	TradeSide,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	LogTag,
	ErrorCategory,
	ErrorKind,
	TradingError,
	TransportError,
	TimeoutError,
	RateLimitError,
	AuthError,
	NotFoundError,
	DuplicateKeyError,
	RejectedOrderError,
	ConfigError,
	SystemError,
	type PolicyFallbackWarning,
	classifyError,
} from "./shared/index.js";

// ── Configuration ────────────────────────────────────────────────────
export {
	type MirrorConfig,
	type VolumeConfig,
	type DispatchConfig,
	type SessionConfig,
	type ReconciliationConfig,
	DEFAULT_ENDPOINTS,
	loadConfig,
	parseConfig,
	configFromEnv,
} from "./config/index.js";
export { type Credentials, type OpenApiKeySet, createCredentials } from "./auth/index.js";

// ── Symbols & sizing ─────────────────────────────────────────────────
export { Broker, type InstrumentSpec, type SymbolCatalog, SymbolMapper } from "./symbols/index.js";
export {
	PolicyKind,
	type VolumePolicy,
	type SizingLimits,
	type VolumeComputation,
	computeSlaveVolume,
	selectPolicy,
	pipValuePerLot,
} from "./sizing/index.js";

// ── Positions ────────────────────────────────────────────────────────
export {
	PositionLedger,
	PairSource,
	reconcile,
	mirrorComment,
	type LivePosition,
	type MirroredPosition,
	type ReconcileResult,
} from "./position/index.js";

// ── Classification & dispatch ────────────────────────────────────────
export {
	EventClassifier,
	DecisionAction,
	ExecutionKind,
	SkipReason,
	type CopyDecision,
	type ExecutionEvent,
} from "./classifier/index.js";
export {
	OrderDispatcher,
	type OrderOutcome,
	type OrderRequest,
	type SlaveGateway,
} from "./dispatch/index.js";

// ── Session & transport ──────────────────────────────────────────────
export {
	SessionCoordinator,
	SessionState,
	ReconnectionPolicy,
	QuoteBook,
	type SessionEvents,
} from "./session/index.js";
export {
	OpenApiConnection,
	type OpenApiTransport,
	type SpotQuote,
} from "./transport/index.js";

// ── Engine ───────────────────────────────────────────────────────────
export { CopyEngine, createMirror, type Mirror, type EngineEvents } from "./engine/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, createLogger } from "./lib/logger/index.js";
export { TypedEmitter } from "./lib/events/index.js";
export { KeyedWorkerPool } from "./lib/queue/index.js";
export { TokenBucketRateLimiter, RateLimiterManager } from "./lib/rate-limit/index.js";
export { WsClient } from "./lib/websocket/index.js";
