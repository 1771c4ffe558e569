import { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import { positionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { OrderConfirmation, OrderRequest, SlaveGateway } from "./types.js";

/**
 * In-memory slave account. Market orders open positions numbered from 9001
 * unless they name one; queued failures are returned before any success.
 */
export class FakeSlaveGateway implements SlaveGateway {
	readonly requests: OrderRequest[] = [];
	balance = Decimal.from(10_000);
	balanceQueries = 0;
	private readonly failures: TradingError[] = [];
	private nextPositionId = 9001;

	failNext(...errors: TradingError[]): void {
		this.failures.push(...errors);
	}

	async sendOrder(request: OrderRequest): Promise<Result<OrderConfirmation, TradingError>> {
		this.requests.push(request);
		const failure = this.failures.shift();
		if (failure) return err(failure);
		const slavePositionId = request.slavePositionId ?? positionId(this.nextPositionId++);
		return ok({ slavePositionId, volume: request.volume });
	}

	async queryBalance(): Promise<Result<Decimal, TradingError>> {
		this.balanceQueries++;
		return ok(this.balance);
	}
}
