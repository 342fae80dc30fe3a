/**
 * Portfolio - Cash & Positions for a Single Strategy
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * INVARIANTS:
 *   1. Every symbol the replay can touch has a Position from construction on.
 *      Nothing is inserted during the replay loop.
 *   2. applyTrade is the only mutation path.
 *   3. cash has no floor here; order validation keeps it non-negative.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { toBigNumber } from '../utils/math';
import { Position, PriceMap, PortfolioSnapshot } from './types';

export class Portfolio {
    private _cash: number;
    private readonly positions: Map<string, Position>;

    constructor(initialCash: number, symbols: Iterable<string>) {
        this._cash = initialCash;
        this.positions = new Map();
        for (const symbol of symbols) {
            this.positions.set(symbol, { symbol, quantity: 0, averagePrice: 0 });
        }
    }

    get cash(): number {
        return this._cash;
    }

    hasSymbol(symbol: string): boolean {
        return this.positions.has(symbol);
    }

    symbols(): string[] {
        return [...this.positions.keys()];
    }

    /**
     * Copy of the position for a tracked symbol
     */
    getPosition(symbol: string): Position {
        return { ...this.requirePosition(symbol) };
    }

    /**
     * Apply a filled trade. Positive quantity buys, negative sells.
     *
     * Buys move the average price to the quantity-weighted mean of the old
     * basis and the fill; sells leave it unchanged.
     */
    applyTrade(symbol: string, signedQuantity: number, price: number): void {
        const position = this.requirePosition(symbol);
        const qty = toBigNumber(signedQuantity);
        const oldQty = toBigNumber(position.quantity);
        const newQty = oldQty.plus(qty);

        if (signedQuantity > 0) {
            position.averagePrice = toBigNumber(position.averagePrice)
                .times(oldQty)
                .plus(toBigNumber(price).times(qty))
                .div(newQty)
                .toNumber();
        }

        position.quantity = newQty.toNumber();
        this._cash = toBigNumber(this._cash).minus(qty.times(price)).toNumber();
    }

    /**
     * Mark-to-market value: cash + sum(quantity * current price)
     */
    value(currentPrices: PriceMap): number {
        let total = toBigNumber(this._cash);
        for (const position of this.positions.values()) {
            const price = currentPrices.get(position.symbol);
            if (price === undefined) {
                throw new Error(`[PORTFOLIO] No current price for tracked symbol ${position.symbol}`);
            }
            if (position.quantity !== 0) {
                total = total.plus(toBigNumber(position.quantity).times(price));
            }
        }
        return total.toNumber();
    }

    snapshot(): PortfolioSnapshot {
        return {
            cash: this._cash,
            positions: [...this.positions.values()].map(p => ({ ...p })),
        };
    }

    private requirePosition(symbol: string): Position {
        const position = this.positions.get(symbol);
        if (!position) {
            throw new Error(`[PORTFOLIO] Symbol ${symbol} is not tracked by this portfolio`);
        }
        return position;
    }
}
