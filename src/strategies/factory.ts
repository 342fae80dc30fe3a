/**
 * Strategy Factory
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Builds concrete strategies from StrategyConfig. Parameter problems are
 * configuration errors: they throw ConfigError here, before any replay, and
 * are never caught by the engine.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigError } from '../core/errors';
import { LOG_PREFIX } from '../config/constants';
import logger from '../utils/logger';
import { MacdStrategy } from './macd';
import { MomentumStrategy } from './momentum';
import { MovingAverageCrossoverStrategy } from './movingAverageCrossover';
import {
    MacdParams,
    MomentumParams,
    MovingAverageCrossoverParams,
    StrategyConfig,
    TaggedStrategy,
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_MA_CROSSOVER_PARAMS: MovingAverageCrossoverParams = {
    shortWindow: 5,
    longWindow: 20,
    quantity: 100,
};

export const DEFAULT_MOMENTUM_PARAMS: MomentumParams = {
    lookback: 20,
    buyThreshold: 0,
    sellThreshold: 0,
    quantity: 100,
};

export const DEFAULT_MACD_PARAMS: MacdParams = {
    fastPeriod: 12,
    slowPeriod: 26,
    signalPeriod: 9,
    quantity: 100,
};

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function requirePositiveInteger(kind: string, key: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(`${kind}: ${key} must be a positive integer, got ${value}`, { kind, key, value });
    }
}

function requireFinite(kind: string, key: string, value: number): void {
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${kind}: ${key} must be a finite number, got ${value}`, { kind, key, value });
    }
}

function requirePositive(kind: string, key: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${kind}: ${key} must be positive, got ${value}`, { kind, key, value });
    }
}

function resolveName(config: StrategyConfig, fallback: string): string {
    if (config.name === undefined) return fallback;
    if (config.name.trim() === '') {
        throw new ConfigError(`${config.kind}: name must be a non-empty string`);
    }
    return config.name;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

function buildMovingAverageCrossover(
    config: Extract<StrategyConfig, { kind: 'ma_crossover' }>
): MovingAverageCrossoverStrategy {
    const params = { ...DEFAULT_MA_CROSSOVER_PARAMS, ...config.params };
    requirePositiveInteger(config.kind, 'shortWindow', params.shortWindow);
    requirePositiveInteger(config.kind, 'longWindow', params.longWindow);
    requirePositive(config.kind, 'quantity', params.quantity);
    if (params.shortWindow >= params.longWindow) {
        throw new ConfigError(
            `${config.kind}: shortWindow (${params.shortWindow}) must be smaller than longWindow (${params.longWindow})`
        );
    }
    const name = resolveName(config, `MovingAverageCrossover_${params.shortWindow}_${params.longWindow}`);
    return new MovingAverageCrossoverStrategy(name, params);
}

function buildMomentum(config: Extract<StrategyConfig, { kind: 'momentum' }>): MomentumStrategy {
    const params = { ...DEFAULT_MOMENTUM_PARAMS, ...config.params };
    requirePositiveInteger(config.kind, 'lookback', params.lookback);
    requireFinite(config.kind, 'buyThreshold', params.buyThreshold);
    requireFinite(config.kind, 'sellThreshold', params.sellThreshold);
    requirePositive(config.kind, 'quantity', params.quantity);
    if (params.buyThreshold < params.sellThreshold) {
        throw new ConfigError(
            `${config.kind}: buyThreshold (${params.buyThreshold}) must not be below sellThreshold (${params.sellThreshold})`
        );
    }
    const name = resolveName(config, `Momentum_${params.lookback}`);
    return new MomentumStrategy(name, params);
}

function buildMacd(config: Extract<StrategyConfig, { kind: 'macd' }>): MacdStrategy {
    const params = { ...DEFAULT_MACD_PARAMS, ...config.params };
    requirePositiveInteger(config.kind, 'fastPeriod', params.fastPeriod);
    requirePositiveInteger(config.kind, 'slowPeriod', params.slowPeriod);
    requirePositiveInteger(config.kind, 'signalPeriod', params.signalPeriod);
    requirePositive(config.kind, 'quantity', params.quantity);
    if (params.fastPeriod >= params.slowPeriod) {
        throw new ConfigError(
            `${config.kind}: fastPeriod (${params.fastPeriod}) must be smaller than slowPeriod (${params.slowPeriod})`
        );
    }
    const name = resolveName(config, `MACD_${params.fastPeriod}_${params.slowPeriod}_${params.signalPeriod}`);
    return new MacdStrategy(name, params);
}

function buildStrategy(config: StrategyConfig): TaggedStrategy {
    switch (config.kind) {
        case 'ma_crossover':
            return buildMovingAverageCrossover(config);
        case 'momentum':
            return buildMomentum(config);
        case 'macd':
            return buildMacd(config);
    }
}

/**
 * Build a strategy from its configuration. Throws ConfigError on bad params.
 */
export function createStrategy(config: StrategyConfig): TaggedStrategy {
    const strategy = buildStrategy(config);
    logger.debug(`${LOG_PREFIX.STRATEGY} built ${strategy.kind} as ${strategy.name}`);
    return strategy;
}

export function createStrategies(configs: readonly StrategyConfig[]): TaggedStrategy[] {
    return configs.map(config => createStrategy(config));
}
