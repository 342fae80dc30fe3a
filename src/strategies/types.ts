/**
 * Strategies - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The engine depends only on the Strategy capability: a display name and one
 * generateSignals call per observation. Concrete strategies are tagged by
 * `kind` and keep their own per-symbol rolling buffers.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { MarketObservation, Signal } from '../types/market';

export interface Strategy {
    /** Stable display name, used as the result key */
    readonly name: string;

    /** Called exactly once per observation, in timestamp order */
    generateSignals(observation: MarketObservation): Signal;
}

export type StrategyKind = 'ma_crossover' | 'momentum' | 'macd';

export interface MovingAverageCrossoverParams {
    shortWindow: number;
    longWindow: number;
    quantity: number;
}

export interface MomentumParams {
    /** Number of observations back the reference price is taken from */
    lookback: number;
    buyThreshold: number;
    sellThreshold: number;
    quantity: number;
}

export interface MacdParams {
    fastPeriod: number;
    slowPeriod: number;
    signalPeriod: number;
    quantity: number;
}

export type StrategyConfig =
    | { kind: 'ma_crossover'; name?: string; params?: Partial<MovingAverageCrossoverParams> }
    | { kind: 'momentum'; name?: string; params?: Partial<MomentumParams> }
    | { kind: 'macd'; name?: string; params?: Partial<MacdParams> };

/**
 * Strategy produced by the factory
 */
export interface TaggedStrategy extends Strategy {
    readonly kind: StrategyKind;
}
