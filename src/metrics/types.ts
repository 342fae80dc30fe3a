/**
 * Metrics - Type Definitions
 */

import { PortfolioSnapshot } from '../portfolio';

/**
 * Fractional change between consecutive samples, stamped with the later one
 */
export interface PeriodReturn {
    readonly timestamp: Date;
    readonly return: number;
}

export type SharpeUndefinedReason = 'INSUFFICIENT_DATA' | 'ZERO_VOLATILITY';

/**
 * Sharpe-like ratio, or an explicit reason it cannot be computed.
 * A zero-volatility series keeps its mean excess return so callers can
 * tell +inf from 0/0.
 */
export type SharpeResult =
    | { readonly defined: true; readonly value: number }
    | { readonly defined: false; readonly reason: SharpeUndefinedReason; readonly meanExcessReturn?: number };

export interface DrawdownPoint {
    readonly timestamp: Date;
    readonly cumulativeReturn: number;
    readonly peak: number;
    readonly drawdown: number;
}

export interface DrawdownReport {
    /** Worst cum/peak - 1, always <= 0 */
    readonly maxDrawdown: number;
    readonly peakTime: Date;
    readonly bottomTime: Date;
    readonly recoveryTime: Date | null;
    /** recoveryTime - peakTime in ms; null iff recoveryTime is null */
    readonly recoveryDurationMs: number | null;
    readonly series: readonly DrawdownPoint[];
}

export interface ReportOptions {
    riskFreeRate?: number;
    /** When set, an annualized Sharpe is included */
    periodsPerYear?: number;
}

export interface StrategyReport {
    name: string;
    samples: number;
    initialValue: number | null;
    finalValue: number | null;
    totalReturn: number | null;
    sharpe: SharpeResult;
    annualizedSharpe: SharpeResult | null;
    drawdown: DrawdownReport | null;
    orders: {
        total: number;
        success: number;
        failed: number;
        /** success / total; null with no orders */
        fillRate: number | null;
    };
    validationErrors: string[];
    executionErrors: string[];
    finalPortfolio: PortfolioSnapshot;
}

export interface RunReport {
    strategies: StrategyReport[];
    /** Highest total return; null when no strategy has one */
    best: string | null;
}
