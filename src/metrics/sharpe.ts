/**
 * Metrics - Sharpe Ratio
 *
 * mean(r - rf) / sampleStd(r) over period returns. No annualization here;
 * annualizeSharpe is for the report layer.
 */

import { METRICS_CONFIG } from '../config/constants';
import { ValueSample } from '../types/market';
import { calculateMean, calculateSampleStdDev } from '../utils/math';
import { periodReturns } from './returns';
import { SharpeResult } from './types';

export function sharpeRatio(
    history: readonly ValueSample[],
    riskFreeRate: number = METRICS_CONFIG.RISK_FREE_RATE
): SharpeResult {
    const returns = periodReturns(history).map(r => r.return);

    // sample std needs two points
    if (returns.length < 2) {
        return { defined: false, reason: 'INSUFFICIENT_DATA' };
    }

    const meanExcessReturn = calculateMean(returns) - riskFreeRate;
    const volatility = calculateSampleStdDev(returns);

    if (volatility === 0) {
        return { defined: false, reason: 'ZERO_VOLATILITY', meanExcessReturn };
    }

    return { defined: true, value: meanExcessReturn / volatility };
}

/**
 * Scale a per-period ratio by sqrt(periodsPerYear)
 */
export function annualizeSharpe(result: SharpeResult, periodsPerYear: number): SharpeResult {
    if (!result.defined) return result;
    return { defined: true, value: result.value * Math.sqrt(periodsPerYear) };
}
