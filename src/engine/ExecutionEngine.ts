/**
 * ExecutionEngine.ts - Deterministic Replay Engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * CHRONOLOGICAL MULTI-STRATEGY REPLAY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * CONSTRUCTION (fatal errors surface here, never mid-replay):
 * - stable-sorts observations by timestamp (ties keep input order)
 * - derives the distinct symbol set
 * - builds one isolated StrategyRunState per strategy with its own Portfolio
 *
 * PER OBSERVATION:
 * 1. currentPrices[symbol] = price (written before any strategy reads it)
 * 2. for each strategy, in registration order:
 *    a. signal = strategy.generateSignals(observation)
 *    b. createOrder → null (hold) skips to (e); OrderError → validation log
 *    c. executeOrder → 'success', or ExecutionError → 'failed' + execution log
 *    d. the order is recorded either way
 *    e. history gets (timestamp, portfolio value), every tick, unconditionally
 *
 * ISOLATION: strategies share only the read-only price map. A rejection for
 * one strategy never touches another's portfolio, orders or logs.
 *
 * DETERMINISM: the only stochastic input is the injected RandomSource.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { ConfigError, ExecutionError, OrderError } from '../core/errors';
import { ENGINE_CONFIG, LOG_PREFIX } from '../config/constants';
import { MarketObservation } from '../types/market';
import { Portfolio } from '../portfolio';
import { createOrder, executeOrder, Order } from '../orders';
import { Strategy } from '../strategies';
import { createSeededRandom, RandomSource } from '../utils/random';
import { EngineOptions, RunResults, StrategyRunState } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function validateObservations(observations: readonly MarketObservation[]): void {
    observations.forEach((obs, index) => {
        if (!(obs.timestamp instanceof Date) || Number.isNaN(obs.timestamp.getTime())) {
            throw new ConfigError(`Observation ${index} has an invalid timestamp`, { index });
        }
        if (typeof obs.symbol !== 'string' || obs.symbol.length === 0) {
            throw new ConfigError(`Observation ${index} has an empty symbol`, { index });
        }
        if (!Number.isFinite(obs.price) || obs.price <= 0) {
            throw new ConfigError(`Observation ${index} (${obs.symbol}) has non-positive price ${obs.price}`, {
                index,
                price: obs.price,
            });
        }
    });
}

/**
 * Stable sort by timestamp; Array.prototype.sort is stable on Node >= 12
 */
export function sortObservations(observations: readonly MarketObservation[]): MarketObservation[] {
    return [...observations].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class ExecutionEngine {
    readonly allowShort: boolean;
    readonly failureProbability: number;
    readonly symbols: readonly string[];

    private readonly observations: readonly MarketObservation[];
    private readonly strategies: readonly Strategy[];
    private readonly states = new Map<string, StrategyRunState>();
    private readonly random: RandomSource;
    private hasRun = false;

    constructor(
        observations: readonly MarketObservation[],
        strategies: readonly Strategy[],
        initialCash: number,
        options: EngineOptions = {}
    ) {
        if (!Number.isFinite(initialCash) || initialCash <= 0) {
            throw new ConfigError(`Initial cash must be a positive number, got ${initialCash}`);
        }
        validateObservations(observations);

        this.failureProbability = options.failureProbability ?? ENGINE_CONFIG.FAILURE_PROBABILITY;
        if (!(this.failureProbability >= 0 && this.failureProbability <= 1)) {
            throw new ConfigError(`failureProbability must be within [0, 1], got ${this.failureProbability}`);
        }

        this.random = options.random ?? createSeededRandom(options.seed ?? ENGINE_CONFIG.DEFAULT_SEED);
        this.allowShort = options.allowShort ?? false;
        if (this.allowShort) {
            logger.warn(`${LOG_PREFIX.ENGINE} allowShort is reserved and not implemented; sells stay capped at held quantity`);
        }

        this.observations = sortObservations(observations);
        this.symbols = [...new Set(this.observations.map(obs => obs.symbol))];
        this.strategies = [...strategies];

        for (const strategy of this.strategies) {
            if (this.states.has(strategy.name)) {
                throw new ConfigError(`Duplicate strategy name '${strategy.name}'; names key the results`, {
                    name: strategy.name,
                });
            }
            this.states.set(strategy.name, {
                name: strategy.name,
                strategy,
                portfolio: new Portfolio(initialCash, this.symbols),
                orders: [],
                validationErrors: [],
                executionErrors: [],
                history: [],
            });
        }

        logger.info(
            `${LOG_PREFIX.ENGINE} initialized observations=${this.observations.length} ` +
            `symbols=${this.symbols.length} strategies=${this.strategies.length} ` +
            `initialCash=${initialCash.toFixed(2)} failureProbability=${this.failureProbability}`
        );
    }

    /**
     * Replay every observation against every strategy. Single-shot.
     */
    run(): RunResults {
        if (this.hasRun) {
            throw new Error(`${LOG_PREFIX.ENGINE} run() may only be called once per engine`);
        }
        this.hasRun = true;

        const currentPrices = new Map<string, number>(this.symbols.map(symbol => [symbol, 0]));

        for (const observation of this.observations) {
            currentPrices.set(observation.symbol, observation.price);

            for (const strategy of this.strategies) {
                const state = this.requireState(strategy.name);
                this.processTick(state, observation);
                state.history.push({
                    timestamp: observation.timestamp,
                    value: state.portfolio.value(currentPrices),
                });
            }
        }

        for (const state of this.states.values()) {
            const failed = state.orders.filter(o => o.status === 'failed').length;
            const last = state.history[state.history.length - 1];
            logger.info(
                `${LOG_PREFIX.ENGINE} complete strategy=${state.name} orders=${state.orders.length} ` +
                `failed=${failed} rejected=${state.validationErrors.length} ` +
                `finalValue=${last ? last.value.toFixed(2) : 'n/a'}`
            );
        }

        return this.states;
    }

    /**
     * Signal → validate → execute for one strategy on one tick.
     * Tick-local errors are logged into the state; anything else propagates.
     */
    private processTick(state: StrategyRunState, observation: MarketObservation): void {
        const { timestamp } = observation;
        const signal = state.strategy.generateSignals(observation);

        let order: Order | null;
        try {
            order = createOrder(state, signal, timestamp);
        } catch (err) {
            if (!(err instanceof OrderError)) throw err;
            state.validationErrors.push({ timestamp, message: err.message });
            logger.debug(`${LOG_PREFIX.ENGINE} validation strategy=${state.name} ${err.message}`);
            return;
        }

        if (order === null) return;

        try {
            executeOrder(state, order, this.random, this.failureProbability);
            order.markSuccess();
        } catch (err) {
            if (!(err instanceof ExecutionError)) throw err;
            order.markFailed();
            state.executionErrors.push({ timestamp, message: err.message });
            logger.debug(`${LOG_PREFIX.ENGINE} execution strategy=${state.name} ${err.message}`);
        }

        state.orders.push(order);
    }

    private requireState(name: string): StrategyRunState {
        const state = this.states.get(name);
        if (!state) {
            throw new Error(`${LOG_PREFIX.ENGINE} no run state for strategy ${name}`);
        }
        return state;
    }
}
