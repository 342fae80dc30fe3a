// Configuration Constants for the backtest engine

export const ENGINE_CONFIG = {
    // Execution
    FAILURE_PROBABILITY: 0.01, // 1% of validated orders are rejected by the market

    // Capital
    INITIAL_CASH: 1_000_000,

    // Seed for the execution-failure draw when none is supplied
    DEFAULT_SEED: 42,

    // Signal tuple arity: [action, symbol, quantity, price]
    SIGNAL_LENGTH: 4,
} as const;

export const METRICS_CONFIG = {
    // Per-period risk-free rate subtracted before the Sharpe ratio
    RISK_FREE_RATE: 0,

    // Used only when a report asks for an annualized Sharpe
    PERIODS_PER_YEAR: 252,
} as const;

export const LOG_PREFIX = {
    ENGINE: '[ENGINE]',
    METRICS: '[METRICS]',
    STRATEGY: '[STRATEGY]',
    CONFIG: '[CONFIG]',
    BACKTEST: '[BACKTEST]',
} as const;
