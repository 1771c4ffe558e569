export type {
	OpenApiTransport,
	SpotQuote,
	TraderInfo,
	TransportEvents,
} from "./types.js";
export { ExecutionType, PayloadType, PRICE_SCALE, endpointUrl } from "./protocol.js";
export {
	DEFAULT_LOT_SIZE,
	decodeExecutionEvent,
	decodeFrame,
	lotsToUnits,
	unitsToLots,
} from "./codec.js";
export { OpenApiConnection, errorFromPayload } from "./open-api-connection.js";
export type { OpenApiConnectionOptions } from "./open-api-connection.js";
