/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS - PUBLIC API
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * NO runtime logic at import time beyond logger and dotenv setup.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './types';
export { BacktestError, OrderError, ExecutionError, ConfigError } from './core/errors';
export type { BacktestErrorCode } from './core/errors';
export { ENGINE_CONFIG, METRICS_CONFIG } from './config/constants';
export { loadConfig } from './config/default';
export type { BacktestConfig } from './config/default';

export * from './portfolio';
export * from './orders';
export * from './engine';
export * from './metrics';
export * from './strategies';

export { runBacktest } from './runtime/runBacktest';
export type { BacktestRequest, BacktestOutcome } from './runtime/runBacktest';

export { createSeededRandom, createSequenceRandom } from './utils/random';
export type { RandomSource } from './utils/random';
export { default as logger } from './utils/logger';
