import dotenv from 'dotenv';
import { ENGINE_CONFIG, METRICS_CONFIG } from './constants';
import { ConfigError } from '../core/errors';

dotenv.config();

export type BacktestConfig = {
    INITIAL_CASH: number;
    FAILURE_PROBABILITY: number;
    SEED: number;
    RISK_FREE_RATE: number;
    PERIODS_PER_YEAR: number;
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${key} must be a finite number, got "${raw}"`, { key, raw });
    }
    return value;
}

/**
 * Build config from environment variables, falling back to constants.
 * Throws ConfigError on any unparsable or out-of-range value.
 */
export function loadConfig(env: Env = process.env): BacktestConfig {
    const config: BacktestConfig = {
        INITIAL_CASH: readNumber(env, 'BACKTEST_INITIAL_CASH', ENGINE_CONFIG.INITIAL_CASH),
        FAILURE_PROBABILITY: readNumber(env, 'BACKTEST_FAILURE_PROBABILITY', ENGINE_CONFIG.FAILURE_PROBABILITY),
        SEED: readNumber(env, 'BACKTEST_SEED', ENGINE_CONFIG.DEFAULT_SEED),
        RISK_FREE_RATE: readNumber(env, 'BACKTEST_RISK_FREE_RATE', METRICS_CONFIG.RISK_FREE_RATE),
        PERIODS_PER_YEAR: readNumber(env, 'BACKTEST_PERIODS_PER_YEAR', METRICS_CONFIG.PERIODS_PER_YEAR),
    };

    if (config.INITIAL_CASH <= 0) {
        throw new ConfigError(`BACKTEST_INITIAL_CASH must be positive, got ${config.INITIAL_CASH}`);
    }
    if (config.FAILURE_PROBABILITY < 0 || config.FAILURE_PROBABILITY > 1) {
        throw new ConfigError(
            `BACKTEST_FAILURE_PROBABILITY must be within [0, 1], got ${config.FAILURE_PROBABILITY}`
        );
    }
    if (!Number.isInteger(config.SEED)) {
        throw new ConfigError(`BACKTEST_SEED must be an integer, got ${config.SEED}`);
    }
    if (config.PERIODS_PER_YEAR <= 0) {
        throw new ConfigError(`BACKTEST_PERIODS_PER_YEAR must be positive, got ${config.PERIODS_PER_YEAR}`);
    }

    return config;
}
