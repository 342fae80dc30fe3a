export { ExecutionEngine, sortObservations } from './ExecutionEngine';
export type {
    StrategyRunState,
    StrategyRunResult,
    RunResults,
    EngineOptions,
} from './types';
