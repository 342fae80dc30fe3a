/**
 * Metrics - Maximum Drawdown with Recovery
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ALGORITHM (over the period-return series):
 * 1. cum[i]  = Π (1 + r[j]) for j <= i
 * 2. peak[i] = max(cum[0..i])
 * 3. dd[i]   = cum[i] / peak[i] - 1            (<= 0)
 * 4. bottom  = first index of min(dd)
 * 5. peak    = last point stamped at or before bottom's timestamp with
 *              cum == peak[bottom]
 * 6. recover = first point stamped strictly after bottom's timestamp with
 *              cum >= peak[bottom], else none
 * 7. duration = recover - peak, else none
 *
 * Several samples can share a timestamp (one per symbol per tick), so
 * steps 5 and 6 compare timestamps, not positions. peak[bottom] is copied
 * from some cum[k], so step 5 compares exactly.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ValueSample } from '../types/market';
import { periodReturns } from './returns';
import { DrawdownPoint, DrawdownReport } from './types';

function buildSeries(history: readonly ValueSample[]): DrawdownPoint[] {
    const series: DrawdownPoint[] = [];
    let cumulative = 1;
    let peak = -Infinity;

    for (const { timestamp, return: r } of periodReturns(history)) {
        cumulative *= 1 + r;
        peak = Math.max(peak, cumulative);
        series.push({
            timestamp,
            cumulativeReturn: cumulative,
            peak,
            drawdown: cumulative / peak - 1,
        });
    }
    return series;
}

/**
 * Worst peak-to-trough decline of a value history.
 * Returns null below two samples (no period returns to work with).
 */
export function maxDrawdown(history: readonly ValueSample[]): DrawdownReport | null {
    if (history.length < 2) return null;

    const series = buildSeries(history);

    let bottomIndex = 0;
    for (let i = 1; i < series.length; i++) {
        // strict: ties keep the first occurrence
        if (series[i].drawdown < series[bottomIndex].drawdown) {
            bottomIndex = i;
        }
    }

    const bottom = series[bottomIndex];
    const peakValue = bottom.peak;
    const bottomMs = bottom.timestamp.getTime();

    let peakIndex = bottomIndex;
    for (let i = 0; i < series.length && series[i].timestamp.getTime() <= bottomMs; i++) {
        if (series[i].cumulativeReturn === peakValue) {
            peakIndex = i;
        }
    }

    let recoveryIndex: number | null = null;
    for (let i = bottomIndex + 1; i < series.length; i++) {
        if (series[i].timestamp.getTime() <= bottomMs) continue;
        if (series[i].cumulativeReturn >= peakValue) {
            recoveryIndex = i;
            break;
        }
    }

    const peakTime = series[peakIndex].timestamp;
    const recoveryTime = recoveryIndex === null ? null : series[recoveryIndex].timestamp;

    return {
        maxDrawdown: bottom.drawdown,
        peakTime,
        bottomTime: bottom.timestamp,
        recoveryTime,
        recoveryDurationMs: recoveryTime === null ? null : recoveryTime.getTime() - peakTime.getTime(),
        series,
    };
}
