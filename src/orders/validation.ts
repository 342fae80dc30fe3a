/**
 * Order Validation - Signal → Order
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * EVALUATION ORDER:
 * 0. Hold         → no order, no error, whatever the rest of the payload
 * 1. Shape        → exactly [action, symbol, quantity, price]
 * 2. Direction    → Buy +1, Sell -1; zero net quantity is a pass
 * 3. Symbol       → must be tracked by the portfolio
 * 4. Sell check   → |quantity| <= held quantity (no short selling)
 * 5. Buy check    → quantity * price <= cash (no margin)
 * 6. Construction → Order enforces price > 0
 *
 * Any failure throws OrderError; the portfolio is never touched here.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { OrderError } from '../core/errors';
import { ENGINE_CONFIG } from '../config/constants';
import { Signal, SignalAction, isSignalAction } from '../types/market';
import { Portfolio } from '../portfolio';
import { Order } from './order';

/**
 * What order creation needs from a strategy's run state
 */
export interface OrderContext {
    readonly portfolio: Portfolio;
}

const DIRECTION: Record<SignalAction, number> = {
    Buy: 1,
    Sell: -1,
    Hold: 0,
};

/**
 * Validate an untyped strategy output as a Signal tuple
 */
export function parseSignal(raw: unknown): Signal {
    if (!Array.isArray(raw) || raw.length !== ENGINE_CONFIG.SIGNAL_LENGTH) {
        const got = Array.isArray(raw) ? `${raw.length} elements` : typeof raw;
        throw new OrderError(
            `Malformed signal: expected ${ENGINE_CONFIG.SIGNAL_LENGTH} elements, got ${got}`,
            { got }
        );
    }

    const [action, symbol, quantity, price] = raw;

    if (!isSignalAction(action)) {
        throw new OrderError(`Malformed signal: unknown action ${String(action)}`);
    }
    if (typeof symbol !== 'string' || symbol.length === 0) {
        throw new OrderError(`Malformed signal: symbol must be a non-empty string`);
    }
    if (typeof quantity !== 'number' || !Number.isFinite(quantity)) {
        throw new OrderError(`Malformed signal: quantity must be a finite number, got ${String(quantity)}`);
    }
    if (typeof price !== 'number' || !Number.isFinite(price)) {
        throw new OrderError(`Malformed signal: price must be a finite number, got ${String(price)}`);
    }

    return [action, symbol, quantity, price];
}

/**
 * Turn a strategy signal into a pending order.
 *
 * Returns null for a Hold, or when the signal nets to zero quantity: no
 * order is created and no cash or position check runs.
 */
export function createOrder(context: OrderContext, signal: unknown, timestamp: Date): Order | null {
    if (Array.isArray(signal) && signal[0] === 'Hold') return null;

    const [action, symbol, rawQuantity, price] = parseSignal(signal);
    const quantity = rawQuantity * DIRECTION[action];

    if (quantity === 0) return null;

    const { portfolio } = context;
    if (!portfolio.hasSymbol(symbol)) {
        throw new OrderError(`Unknown symbol ${symbol}: not present in the observation set`, { symbol });
    }

    const position = portfolio.getPosition(symbol);

    if (quantity < 0 && Math.abs(quantity) > position.quantity) {
        throw new OrderError(
            `Not enough shares to sell ${symbol}: attempted ${Math.abs(quantity)}, held ${position.quantity}`,
            { symbol, attempted: Math.abs(quantity), available: position.quantity }
        );
    }

    if (quantity > 0 && quantity * price > portfolio.cash) {
        throw new OrderError(
            `Not enough cash to buy ${quantity} ${symbol}: need ${(quantity * price).toFixed(2)}, ` +
            `have ${portfolio.cash.toFixed(2)}`,
            { symbol, needed: quantity * price, available: portfolio.cash }
        );
    }

    return new Order(symbol, quantity, price, timestamp);
}
