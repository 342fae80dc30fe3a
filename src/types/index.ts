// Type Definitions for the Backtest Engine

export * from './market';
