/**
 * MACD Crossover
 *
 * MACD line = EMA(fast) - EMA(slow); signal line = EMA(signalPeriod) of the
 * MACD line. Each EMA is seeded with the simple average of its first
 * `period` inputs. Buy when the MACD line crosses above the signal line,
 * sell when it crosses below, hold otherwise.
 */

import { MarketObservation, Signal } from '../types/market';
import { MacdParams, TaggedStrategy } from './types';

/**
 * SMA-seeded exponential moving average
 */
class IncrementalEma {
    private seedSum = 0;
    private seedCount = 0;
    private _value: number | null = null;
    private readonly alpha: number;

    constructor(private readonly period: number) {
        this.alpha = 2 / (period + 1);
    }

    update(input: number): number | null {
        if (this._value === null) {
            this.seedSum += input;
            this.seedCount++;
            if (this.seedCount === this.period) {
                this._value = this.seedSum / this.period;
            }
            return this._value;
        }
        this._value = this._value + (input - this._value) * this.alpha;
        return this._value;
    }
}

interface MacdState {
    fast: IncrementalEma;
    slow: IncrementalEma;
    signal: IncrementalEma;
    prev: { macd: number; signal: number } | null;
}

export class MacdStrategy implements TaggedStrategy {
    readonly kind = 'macd';
    private readonly states = new Map<string, MacdState>();

    constructor(
        readonly name: string,
        private readonly params: MacdParams
    ) { }

    generateSignals(observation: MarketObservation): Signal {
        const { symbol, price } = observation;
        const state = this.stateFor(symbol);

        const fast = state.fast.update(price);
        const slow = state.slow.update(price);
        if (fast === null || slow === null) {
            return ['Hold', symbol, 0, price];
        }

        const macd = fast - slow;
        const signal = state.signal.update(macd);
        if (signal === null) {
            return ['Hold', symbol, 0, price];
        }

        const prev = state.prev;
        state.prev = { macd, signal };
        if (prev === null) {
            return ['Hold', symbol, 0, price];
        }

        if (prev.macd <= prev.signal && macd > signal) {
            return ['Buy', symbol, this.params.quantity, price];
        }
        if (prev.macd >= prev.signal && macd < signal) {
            return ['Sell', symbol, this.params.quantity, price];
        }
        return ['Hold', symbol, 0, price];
    }

    private stateFor(symbol: string): MacdState {
        let state = this.states.get(symbol);
        if (!state) {
            state = {
                fast: new IncrementalEma(this.params.fastPeriod),
                slow: new IncrementalEma(this.params.slowPeriod),
                signal: new IncrementalEma(this.params.signalPeriod),
                prev: null,
            };
            this.states.set(symbol, state);
        }
        return state;
    }
}
