/**
 * Open API JSON protocol constants.
 *
 * Every frame is `{ clientMsgId?, payloadType, payload }`. Volumes on the
 * wire are integer hundredths of a base unit; spot prices are integers
 * scaled by PRICE_SCALE; money amounts are scaled by 10^moneyDigits.
 */

export const PayloadType = {
	Heartbeat: 51,
	ApplicationAuthReq: 2100,
	ApplicationAuthRes: 2101,
	AccountAuthReq: 2102,
	AccountAuthRes: 2103,
	NewOrderReq: 2106,
	ClosePositionReq: 2111,
	AssetListReq: 2112,
	AssetListRes: 2113,
	SymbolsListReq: 2114,
	SymbolsListRes: 2115,
	SymbolByIdReq: 2116,
	SymbolByIdRes: 2117,
	TraderReq: 2121,
	TraderRes: 2122,
	ReconcileReq: 2124,
	ReconcileRes: 2125,
	ExecutionEvent: 2126,
	SubscribeSpotsReq: 2127,
	SubscribeSpotsRes: 2128,
	SpotEvent: 2131,
	OrderErrorEvent: 2132,
	ErrorRes: 2142,
	AccountsTokenInvalidatedEvent: 2147,
	ClientDisconnectEvent: 2148,
} as const;

export type PayloadType = (typeof PayloadType)[keyof typeof PayloadType];

export const ExecutionType = {
	OrderAccepted: 2,
	OrderFilled: 3,
	OrderReplaced: 4,
	OrderCancelled: 5,
	OrderExpired: 6,
	OrderRejected: 7,
	OrderCancelRejected: 8,
	Swap: 9,
	DepositWithdraw: 10,
	OrderPartialFill: 11,
} as const;

export const PositionStatus = {
	Open: 1,
	Closed: 2,
} as const;

export const OrderType = {
	Market: 1,
} as const;

export const PRICE_SCALE = 100_000;

/** Error codes that mean the credentials or tokens themselves are bad. */
export const AUTH_ERROR_CODES: ReadonlySet<string> = new Set([
	"CH_CLIENT_AUTH_FAILURE",
	"CH_CLIENT_NOT_AUTHENTICATED",
	"CH_ACCESS_TOKEN_INVALID",
	"CH_CTID_TRADER_ACCOUNT_NOT_FOUND",
	"OA_AUTH_TOKEN_EXPIRED",
	"ACCOUNT_NOT_AUTHORIZED",
	"ACCESS_DENIED",
]);

export const NOT_FOUND_ERROR_CODES: ReadonlySet<string> = new Set([
	"POSITION_NOT_FOUND",
	"SYMBOL_NOT_FOUND",
	"ORDER_NOT_FOUND",
]);

export const RATE_LIMIT_ERROR_CODE = "REQUEST_FREQUENCY_EXCEEDED";

export function endpointUrl(host: string, port: number): string {
	return `wss://${host}:${port}`;
}
