/**
 * Shared test fixtures: observation builders and scripted strategies.
 */

import { createObservation, MarketObservation, Signal, ValueSample } from '../../src/types/market';
import { Strategy } from '../../src/strategies';

export const DAY_MS = 24 * 60 * 60 * 1000;

export function day(index: number): Date {
    return new Date(Date.UTC(2024, 0, 1) + index * DAY_MS);
}

export function observations(symbol: string, prices: readonly number[]): MarketObservation[] {
    return prices.map((price, i) => createObservation(day(i), symbol, price));
}

export function history(values: readonly number[]): ValueSample[] {
    return values.map((value, i) => ({ timestamp: day(i), value }));
}

/**
 * Strategy whose signal is a function of the observation and its call index.
 * Records every observation it is shown.
 */
export class ScriptedStrategy implements Strategy {
    readonly seen: MarketObservation[] = [];

    constructor(
        readonly name: string,
        private readonly script: (observation: MarketObservation, call: number) => Signal
    ) { }

    generateSignals(observation: MarketObservation): Signal {
        const signal = this.script(observation, this.seen.length);
        this.seen.push(observation);
        return signal;
    }
}

export function holdOnly(name: string): ScriptedStrategy {
    return new ScriptedStrategy(name, obs => ['Hold', obs.symbol, 0, obs.price]);
}
