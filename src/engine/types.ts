/**
 * Execution Engine - Type Definitions
 */

import { ErrorRecord, ValueSample } from '../types/market';
import { Order } from '../orders';
import { Portfolio } from '../portfolio';
import { Strategy } from '../strategies';
import { RandomSource } from '../utils/random';

/**
 * Everything the replay tracks for one strategy.
 *
 * Owned and mutated by the engine during run(); read-only afterwards.
 */
export interface StrategyRunState {
    readonly name: string;
    readonly strategy: Strategy;
    readonly portfolio: Portfolio;

    /** Every order created, successful or failed, in creation order */
    readonly orders: Order[];

    /** OrderError messages with the tick they occurred on */
    readonly validationErrors: ErrorRecord[];

    /** ExecutionError messages with the tick they occurred on */
    readonly executionErrors: ErrorRecord[];

    /** One sample per observation processed */
    readonly history: ValueSample[];
}

/**
 * Read-only view handed out once run() returns
 */
export interface StrategyRunResult {
    readonly name: string;
    readonly strategy: Strategy;
    readonly portfolio: Portfolio;
    readonly orders: readonly Order[];
    readonly validationErrors: readonly ErrorRecord[];
    readonly executionErrors: readonly ErrorRecord[];
    readonly history: readonly ValueSample[];
}

export type RunResults = ReadonlyMap<string, StrategyRunResult>;

export interface EngineOptions {
    /**
     * Reserved. Accepted and exposed, but order validation never allows a
     * position to go below zero.
     */
    allowShort?: boolean;

    /** Probability that a validated order is rejected by the market. Defaults to ENGINE_CONFIG. */
    failureProbability?: number;

    /** Source for the execution-failure draw. Takes precedence over seed. */
    random?: RandomSource;

    /** Seed for the default mulberry32 source. Defaults to ENGINE_CONFIG. */
    seed?: number;
}
