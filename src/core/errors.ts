/**
 * Backtest error taxonomy
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * OrderError      recoverable, tick-local. Signal failed validation; the
 *                 strategy's portfolio is untouched and the replay continues.
 * ExecutionError  recoverable, tick-local. The simulated market rejected a
 *                 validated order; the order is kept with status 'failed'.
 * ConfigError     fatal. Raised while building strategies, engine options or
 *                 environment config, always before the first tick.
 *
 * Anything else thrown during a replay is a programmer error and propagates.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type BacktestErrorCode = 'ORDER_REJECTED' | 'EXECUTION_REJECTED' | 'INVALID_CONFIG';

export abstract class BacktestError extends Error {
    abstract readonly code: BacktestErrorCode;

    constructor(
        message: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class OrderError extends BacktestError {
    readonly code = 'ORDER_REJECTED';
}

export class ExecutionError extends BacktestError {
    readonly code = 'EXECUTION_REJECTED';
}

export class ConfigError extends BacktestError {
    readonly code = 'INVALID_CONFIG';
}
