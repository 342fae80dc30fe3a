/**
 * Moving Average Crossover
 *
 * Buy while the short moving average is above the long one, sell while it
 * is below, hold on a tie or until the long window has filled.
 */

import { MarketObservation, Signal } from '../types/market';
import { RollingWindow } from './rollingWindow';
import { MovingAverageCrossoverParams, TaggedStrategy } from './types';

interface SymbolWindows {
    short: RollingWindow;
    long: RollingWindow;
}

export class MovingAverageCrossoverStrategy implements TaggedStrategy {
    readonly kind = 'ma_crossover';
    private readonly windows = new Map<string, SymbolWindows>();

    constructor(
        readonly name: string,
        private readonly params: MovingAverageCrossoverParams
    ) { }

    generateSignals(observation: MarketObservation): Signal {
        const { symbol, price } = observation;
        const windows = this.windowsFor(symbol);
        windows.short.push(price);
        windows.long.push(price);

        if (!windows.long.isFull) {
            return ['Hold', symbol, 0, price];
        }

        const shortMa = windows.short.mean();
        const longMa = windows.long.mean();

        if (shortMa > longMa) return ['Buy', symbol, this.params.quantity, price];
        if (shortMa < longMa) return ['Sell', symbol, this.params.quantity, price];
        return ['Hold', symbol, 0, price];
    }

    private windowsFor(symbol: string): SymbolWindows {
        let windows = this.windows.get(symbol);
        if (!windows) {
            windows = {
                short: new RollingWindow(this.params.shortWindow),
                long: new RollingWindow(this.params.longWindow),
            };
            this.windows.set(symbol, windows);
        }
        return windows;
    }
}
