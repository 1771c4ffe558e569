/**
 * Zod schemas for inbound Open API payloads and their mapping to domain
 * values. Decoders never throw; malformed frames come back as
 * ValidationError.
 */

import { ExecutionKind, type ExecutionEvent } from "../classifier/types.js";
import { ValidationError, validate, z } from "../lib/validation/index.js";
import type { LivePosition } from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import {
	type AccountId,
	type InstrumentId,
	accountId,
	instrumentId,
	positionId,
} from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { tradeSideFromWire } from "../shared/trade-side.js";
import type { InstrumentSpec } from "../symbols/types.js";
import { ExecutionType, PRICE_SCALE, PositionStatus } from "./protocol.js";
import type { SpotQuote, TraderInfo } from "./types.js";

const int = z.number().int();

// ── Schemas ─────────────────────────────────────────────────────────

export const frameSchema = z.object({
	clientMsgId: z.string().optional(),
	payloadType: int,
	payload: z.record(z.unknown()).default({}),
});

export type Frame = z.output<typeof frameSchema>;

const tradeDataSchema = z.object({
	symbolId: int,
	volume: int.nonnegative(),
	tradeSide: int,
	openTimestamp: int.optional(),
	comment: z.string().optional(),
});

const positionSchema = z.object({
	positionId: int,
	tradeData: tradeDataSchema,
	positionStatus: int.optional(),
});

const dealSchema = z.object({
	dealId: int,
	positionId: int,
	symbolId: int,
	volume: int.nonnegative(),
	filledVolume: int.nonnegative().optional(),
	tradeSide: int,
	createTimestamp: int.optional(),
	executionTimestamp: int.optional(),
});

export const executionEventSchema = z.object({
	ctidTraderAccountId: int,
	executionType: int,
	position: positionSchema.optional(),
	deal: dealSchema.optional(),
	errorCode: z.string().optional(),
});

export type ExecutionPayload = z.output<typeof executionEventSchema>;

const reconcileResSchema = z.object({
	ctidTraderAccountId: int,
	position: z.array(positionSchema).default([]),
});

const lightSymbolSchema = z.object({
	symbolId: int,
	symbolName: z.string(),
	enabled: z.boolean().optional(),
	baseAssetId: int,
	quoteAssetId: int,
});

export const symbolsListResSchema = z.object({
	symbol: z.array(lightSymbolSchema).default([]),
});

const symbolDetailSchema = z.object({
	symbolId: int,
	digits: int.nonnegative(),
	pipPosition: int.nonnegative(),
	lotSize: int.positive().optional(),
	stepVolume: int.positive().optional(),
	minVolume: int.positive().optional(),
});

export const symbolByIdResSchema = z.object({
	symbol: z.array(symbolDetailSchema).default([]),
});

const traderResSchema = z.object({
	trader: z.object({
		ctidTraderAccountId: int,
		balance: int,
		depositAssetId: int,
		moneyDigits: int.nonnegative().default(2),
	}),
});

const spotEventSchema = z.object({
	ctidTraderAccountId: int,
	symbolId: int,
	bid: int.nonnegative().optional(),
	ask: int.nonnegative().optional(),
});

export const errorPayloadSchema = z.object({
	errorCode: z.string(),
	description: z.string().optional(),
	ctidTraderAccountId: int.optional(),
	positionId: int.optional(),
});

export type ErrorPayload = z.output<typeof errorPayloadSchema>;

// ── Units ───────────────────────────────────────────────────────────

/** Venue lot size when a symbol's detail omits it: 100 000 base units. */
export const DEFAULT_LOT_SIZE = 10_000_000;

/** Lot size in venue units for an instrument, or null when unknown. */
export type LotSizeLookup = (id: InstrumentId) => number | null;

export function unitsToLots(units: number, lotSize: number): Decimal {
	return Decimal.from(units).div(Decimal.from(lotSize));
}

/** Lots to integer venue units, truncating anything below one unit. */
export function lotsToUnits(lots: Decimal, lotSize: number): number {
	return lots.mul(Decimal.from(lotSize)).roundToStep(Decimal.one(), "down").toNumber();
}

function scaled(value: number, digits: number): Decimal {
	let divisor = Decimal.one();
	for (let i = 0; i < digits; i++) divisor = divisor.mul(Decimal.from(10));
	return Decimal.from(value).div(divisor);
}

// ── Decoders ────────────────────────────────────────────────────────

export function decodeFrame(raw: string): Result<Frame, ValidationError> {
	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return err(new ValidationError("Frame is not valid JSON", [{ path: [], message }]));
	}
	return validate(frameSchema, data, "Malformed frame");
}

function executionKind(executionType: number, positionStatus: number | undefined): ExecutionKind {
	switch (executionType) {
		case ExecutionType.OrderFilled:
		case ExecutionType.OrderPartialFill:
			if (positionStatus === PositionStatus.Closed) return ExecutionKind.PositionClosed;
			return executionType === ExecutionType.OrderFilled
				? ExecutionKind.OrderFilled
				: ExecutionKind.OrderPartiallyFilled;
		case ExecutionType.OrderAccepted:
			return ExecutionKind.OrderAccepted;
		case ExecutionType.OrderRejected:
			return ExecutionKind.OrderRejected;
		case ExecutionType.OrderCancelled:
			return ExecutionKind.OrderCancelled;
		case ExecutionType.OrderExpired:
			return ExecutionKind.OrderExpired;
		case ExecutionType.OrderReplaced:
			return ExecutionKind.OrderReplaced;
		case ExecutionType.Swap:
			return ExecutionKind.Swap;
		case ExecutionType.DepositWithdraw:
			return ExecutionKind.DepositWithdraw;
		default:
			return ExecutionKind.Other;
	}
}

export function parseExecutionPayload(payload: unknown): Result<ExecutionPayload, ValidationError> {
	return validate(executionEventSchema, payload, "Malformed execution event");
}

/**
 * Map an execution payload to an ExecutionEvent. The deal id is the
 * sequence number; events without a deal carry 0.
 */
export function decodeExecutionEvent(
	payload: ExecutionPayload,
	lotSizeOf: LotSizeLookup,
	receivedAt: number,
): Result<ExecutionEvent, ValidationError> {
	const { position, deal } = payload;
	const kind = executionKind(payload.executionType, position?.positionStatus);
	const symbol = instrumentId(position?.tradeData.symbolId ?? deal?.symbolId ?? 0);
	const lotSize = lotSizeOf(symbol);
	if (lotSize === null && (position !== undefined || deal !== undefined)) {
		return err(
			new ValidationError(`No lot size known for instrument ${symbol}`, [
				{ path: ["position", "tradeData", "symbolId"], message: "unknown instrument" },
			]),
		);
	}

	const wireSide = position?.tradeData.tradeSide ?? deal?.tradeSide ?? 1;
	const side = tradeSideFromWire(wireSide);
	if (side === null) {
		return err(
			new ValidationError(`Unknown trade side ${wireSide}`, [
				{ path: ["position", "tradeData", "tradeSide"], message: "expected 1 or 2" },
			]),
		);
	}

	const lots = (units: number) => (lotSize === null ? Decimal.zero() : unitsToLots(units, lotSize));
	const closed = position?.positionStatus === PositionStatus.Closed;

	return ok({
		masterPositionId: positionId(position?.positionId ?? deal?.positionId ?? 0),
		instrumentId: symbol,
		kind,
		side,
		volumeDelta: lots(deal ? (deal.filledVolume ?? deal.volume) : 0),
		resultingMasterVolume: closed ? Decimal.zero() : lots(position?.tradeData.volume ?? 0),
		timestamp: deal?.executionTimestamp ?? deal?.createTimestamp ?? receivedAt,
		sequenceNo: deal?.dealId ?? 0,
	});
}

/** Open positions from a reconcile response. Positions with an unknown lot size are rejected. */
export function decodePositions(
	payload: unknown,
	lotSizeOf: LotSizeLookup,
): Result<LivePosition[], ValidationError> {
	const parsed = validate(reconcileResSchema, payload, "Malformed reconcile response");
	if (!parsed.ok) return parsed;

	const positions: LivePosition[] = [];
	for (const p of parsed.value.position) {
		const symbol = instrumentId(p.tradeData.symbolId);
		const lotSize = lotSizeOf(symbol);
		const side = tradeSideFromWire(p.tradeData.tradeSide);
		if (lotSize === null || side === null) {
			return err(
				new ValidationError(`Cannot decode position ${p.positionId}`, [
					{
						path: ["position", p.positionId],
						message: lotSize === null ? "unknown instrument" : "unknown trade side",
					},
				]),
			);
		}
		positions.push({
			positionId: positionId(p.positionId),
			instrumentId: symbol,
			side,
			volume: unitsToLots(p.tradeData.volume, lotSize),
			openedAt: p.tradeData.openTimestamp ?? 0,
			comment: p.tradeData.comment ?? null,
		});
	}
	return ok(positions);
}

/**
 * Join the light symbol list with symbol details. Disabled symbols and
 * symbols without details are left out.
 */
export function decodeInstruments(
	list: z.output<typeof symbolsListResSchema>,
	details: z.output<typeof symbolByIdResSchema>,
): InstrumentSpec[] {
	const byId = new Map(details.symbol.map((s) => [s.symbolId, s] as const));
	const specs: InstrumentSpec[] = [];
	for (const light of list.symbol) {
		if (light.enabled === false) continue;
		const detail = byId.get(light.symbolId);
		if (!detail) continue;
		const lotSize = detail.lotSize ?? DEFAULT_LOT_SIZE;
		const lotStep = detail.stepVolume
			? unitsToLots(detail.stepVolume, lotSize)
			: Decimal.from("0.01");
		specs.push({
			id: instrumentId(light.symbolId),
			name: light.symbolName,
			digits: detail.digits,
			pipPosition: detail.pipPosition,
			lotSize,
			lotStep,
			minVolume: detail.minVolume ? unitsToLots(detail.minVolume, lotSize) : lotStep,
			baseAssetId: light.baseAssetId,
			quoteAssetId: light.quoteAssetId,
		});
	}
	return specs;
}

export function decodeTrader(payload: unknown): Result<TraderInfo, ValidationError> {
	const parsed = validate(traderResSchema, payload, "Malformed trader response");
	if (!parsed.ok) return parsed;
	const { trader } = parsed.value;
	return ok({
		accountId: accountId(trader.ctidTraderAccountId),
		balance: scaled(trader.balance, trader.moneyDigits),
		depositAssetId: trader.depositAssetId,
	});
}

export function decodeSpot(
	payload: unknown,
	receivedAt: number,
): Result<{ accountId: AccountId; quote: SpotQuote }, ValidationError> {
	const parsed = validate(spotEventSchema, payload, "Malformed spot event");
	if (!parsed.ok) return parsed;
	const { ctidTraderAccountId, symbolId, bid, ask } = parsed.value;
	const price = (v: number | undefined) =>
		v === undefined ? null : Decimal.from(v).div(Decimal.from(PRICE_SCALE));
	return ok({
		accountId: accountId(ctidTraderAccountId),
		quote: { instrumentId: instrumentId(symbolId), bid: price(bid), ask: price(ask), receivedAt },
	});
}
