export {
	type PositionId,
	type InstrumentId,
	type AccountId,
	positionId,
	instrumentId,
	accountId,
	idToNumber,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatchAsync,
} from "./result.js";

export {
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
	isTransportError,
	isAuthError,
	isNotFoundError,
	isRejectedOrderError,
} from "./errors.js";

export { Decimal, type StepRounding } from "./decimal.js";
export { TradeSide, tradeSideFromWire, tradeSideToWire } from "./trade-side.js";
export { type Clock, SystemClock, FakeClock, Duration, sleep } from "./time.js";
export { LogTag } from "./log-tags.js";
