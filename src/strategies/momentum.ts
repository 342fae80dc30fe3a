/**
 * Momentum
 *
 * momentum = price / price(lookback observations ago) - 1
 * Buy above buyThreshold, sell below sellThreshold, otherwise hold.
 */

import { MarketObservation, Signal } from '../types/market';
import { RollingWindow } from './rollingWindow';
import { MomentumParams, TaggedStrategy } from './types';

export class MomentumStrategy implements TaggedStrategy {
    readonly kind = 'momentum';
    private readonly history = new Map<string, RollingWindow>();

    constructor(
        readonly name: string,
        private readonly params: MomentumParams
    ) { }

    generateSignals(observation: MarketObservation): Signal {
        const { symbol, price } = observation;
        const window = this.windowFor(symbol);
        window.push(price);

        const reference = window.oldest();
        if (!window.isFull || reference === undefined || reference === 0) {
            return ['Hold', symbol, 0, price];
        }

        const momentum = price / reference - 1;

        if (momentum > this.params.buyThreshold) return ['Buy', symbol, this.params.quantity, price];
        if (momentum < this.params.sellThreshold) return ['Sell', symbol, this.params.quantity, price];
        return ['Hold', symbol, 0, price];
    }

    private windowFor(symbol: string): RollingWindow {
        let window = this.history.get(symbol);
        if (!window) {
            // current price plus `lookback` prior prices
            window = new RollingWindow(this.params.lookback + 1);
            this.history.set(symbol, window);
        }
        return window;
    }
}
