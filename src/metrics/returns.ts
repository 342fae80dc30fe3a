/**
 * Metrics - Return Series
 */

import { ValueSample } from '../types/market';
import { calculatePercentageChange } from '../utils/math';
import { PeriodReturn } from './types';

/**
 * last / first - 1. A single sample yields 0.
 */
export function totalReturn(history: readonly ValueSample[]): number {
    if (history.length === 0) {
        throw new Error('[METRICS] totalReturn needs at least one sample');
    }
    const first = history[0].value;
    const last = history[history.length - 1].value;
    return last / first - 1;
}

/**
 * Percentage change between consecutive samples. The first sample has no
 * predecessor and is dropped, so the result is one shorter than the input.
 */
export function periodReturns(history: readonly ValueSample[]): PeriodReturn[] {
    const returns: PeriodReturn[] = [];
    for (let i = 1; i < history.length; i++) {
        returns.push({
            timestamp: history[i].timestamp,
            return: calculatePercentageChange(history[i].value, history[i - 1].value),
        });
    }
    return returns;
}
