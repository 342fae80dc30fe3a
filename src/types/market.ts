// Market & Signal Types

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One (timestamp, symbol, price) market update. Never mutated after creation.
 */
export interface MarketObservation {
    readonly timestamp: Date;
    readonly symbol: string;
    readonly price: number;
}

export function createObservation(timestamp: Date, symbol: string, price: number): MarketObservation {
    return Object.freeze({ timestamp, symbol, price });
}

// ═══════════════════════════════════════════════════════════════════════════════
// SIGNALS
// ═══════════════════════════════════════════════════════════════════════════════

export type SignalAction = 'Buy' | 'Sell' | 'Hold';

export const SIGNAL_ACTIONS: readonly SignalAction[] = ['Buy', 'Sell', 'Hold'];

/**
 * A strategy's recommendation for the current tick: [action, symbol, quantity, price]
 */
export type Signal = readonly [action: SignalAction, symbol: string, quantity: number, price: number];

export function isSignalAction(value: unknown): value is SignalAction {
    return value === 'Buy' || value === 'Sell' || value === 'Hold';
}

// ═══════════════════════════════════════════════════════════════════════════════
// TIME SERIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Mark-to-market portfolio value at an observation timestamp
 */
export interface ValueSample {
    readonly timestamp: Date;
    readonly value: number;
}

/**
 * Timestamped entry in a strategy's validation or execution error log
 */
export interface ErrorRecord {
    readonly timestamp: Date;
    readonly message: string;
}

export function formatErrorRecord(record: ErrorRecord): string {
    return `${record.timestamp.toISOString()}: ${record.message}`;
}
