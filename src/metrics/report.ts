/**
 * Metrics - Strategy & Run Reports
 *
 * Plain-data summaries for the reporting layer. Rendering (charts,
 * markdown) happens elsewhere.
 */

import { METRICS_CONFIG, LOG_PREFIX } from '../config/constants';
import { RunResults, StrategyRunResult } from '../engine';
import { formatErrorRecord } from '../types/market';
import logger from '../utils/logger';
import { maxDrawdown } from './drawdown';
import { totalReturn } from './returns';
import { annualizeSharpe, sharpeRatio } from './sharpe';
import { ReportOptions, RunReport, SharpeResult, StrategyReport } from './types';

export function buildStrategyReport(result: StrategyRunResult, options: ReportOptions = {}): StrategyReport {
    const { history, orders } = result;
    const riskFreeRate = options.riskFreeRate ?? METRICS_CONFIG.RISK_FREE_RATE;

    const sharpe = sharpeRatio(history, riskFreeRate);
    const success = orders.filter(o => o.status === 'success').length;
    const failed = orders.filter(o => o.status === 'failed').length;

    return {
        name: result.name,
        samples: history.length,
        initialValue: history.length > 0 ? history[0].value : null,
        finalValue: history.length > 0 ? history[history.length - 1].value : null,
        totalReturn: history.length > 0 ? totalReturn(history) : null,
        sharpe,
        annualizedSharpe: options.periodsPerYear === undefined
            ? null
            : annualizeSharpe(sharpe, options.periodsPerYear),
        drawdown: maxDrawdown(history),
        orders: {
            total: orders.length,
            success,
            failed,
            fillRate: orders.length > 0 ? success / orders.length : null,
        },
        validationErrors: result.validationErrors.map(formatErrorRecord),
        executionErrors: result.executionErrors.map(formatErrorRecord),
        finalPortfolio: result.portfolio.snapshot(),
    };
}

export function formatSharpe(result: SharpeResult): string {
    if (result.defined) return result.value.toFixed(4);
    return result.reason === 'ZERO_VOLATILITY' ? 'undefined (zero volatility)' : 'undefined (insufficient data)';
}

function logReport(report: StrategyReport): void {
    const pct = (v: number | null | undefined) => (v === null || v === undefined ? 'n/a' : `${(v * 100).toFixed(2)}%`);
    logger.info(
        `${LOG_PREFIX.METRICS} ${report.name} return=${pct(report.totalReturn)} ` +
        `sharpe=${formatSharpe(report.sharpe)} maxDD=${pct(report.drawdown?.maxDrawdown)} ` +
        `orders=${report.orders.total} failed=${report.orders.failed} rejected=${report.validationErrors.length}`
    );
}

/**
 * Reports for every strategy, in registration order
 */
export function buildRunReport(results: RunResults, options: ReportOptions = {}): RunReport {
    const strategies = [...results.values()].map(result => buildStrategyReport(result, options));
    strategies.forEach(logReport);

    let best: StrategyReport | null = null;
    for (const report of strategies) {
        if (report.totalReturn === null) continue;
        if (best === null || best.totalReturn === null || report.totalReturn > best.totalReturn) {
            best = report;
        }
    }

    return { strategies, best: best ? best.name : null };
}
