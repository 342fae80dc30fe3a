/**
 * Order - Mutable Record with a One-Way Status Transition
 *
 * pending -> success | failed. Nothing else.
 */

import { OrderError } from '../core/errors';
import { generateOrderId } from '../utils/id';

export type OrderStatus = 'pending' | 'success' | 'failed';

export class Order {
    readonly id: string;
    private _status: OrderStatus = 'pending';

    constructor(
        readonly symbol: string,
        readonly quantity: number,
        readonly price: number,
        readonly timestamp: Date
    ) {
        if (!(price > 0)) {
            throw new OrderError(`Invalid order price for ${symbol}: ${price} (must be > 0)`, {
                symbol,
                price,
            });
        }
        this.id = generateOrderId();
    }

    get status(): OrderStatus {
        return this._status;
    }

    get side(): 'buy' | 'sell' {
        return this.quantity > 0 ? 'buy' : 'sell';
    }

    get notional(): number {
        return Math.abs(this.quantity) * this.price;
    }

    markSuccess(): void {
        this.transition('success');
    }

    markFailed(): void {
        this.transition('failed');
    }

    toString(): string {
        return `Order(${this.side.toUpperCase()} ${Math.abs(this.quantity)} ${this.symbol} @ ${this.price})`;
    }

    private transition(next: OrderStatus): void {
        if (this._status !== 'pending') {
            throw new Error(`[ORDER] ${this.id} cannot move from ${this._status} to ${next}`);
        }
        this._status = next;
    }
}
