/**
 * Metrics Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Risk/return statistics over a strategy's (timestamp, value) history:
 * - totalReturn      needs >= 1 sample
 * - periodReturns    one shorter than the history
 * - sharpeRatio      needs >= 3 samples; undefined results are explicit
 * - maxDrawdown      needs >= 2 samples; recovery fields nullable
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    PeriodReturn,
    SharpeResult,
    SharpeUndefinedReason,
    DrawdownPoint,
    DrawdownReport,
    ReportOptions,
    StrategyReport,
    RunReport,
} from './types';

export { totalReturn, periodReturns } from './returns';
export { sharpeRatio, annualizeSharpe } from './sharpe';
export { maxDrawdown } from './drawdown';
export { buildStrategyReport, buildRunReport, formatSharpe } from './report';
